import { registerStore, type StoreFactory } from "./store"
import { FileRecordStore } from "./file-store"
import { TextRecords, type TextRecord } from "../core/types"
import { ParseError } from "../core/errors"

/**
 * A JSON array of { id, source, target, metadata? } records.
 */
export class JsonRecordStore extends FileRecordStore {
  readonly name = "json"
  readonly markup = false

  protected parse(content: string): TextRecord[] {
    let json: unknown
    try {
      json = JSON.parse(content)
    } catch (error) {
      throw new ParseError(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        undefined,
        this.location
      )
    }

    const parsed = TextRecords.safeParse(json)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue ? ` at ${issue.path.join(".")}` : ""
      throw new ParseError(`Invalid record document${where}: ${issue?.message ?? "unrecognized shape"}`, undefined, undefined, this.location)
    }
    return parsed.data
  }

  protected render(_content: string, records: readonly TextRecord[]): string {
    return `${JSON.stringify(records, null, 2)}\n`
  }
}

export const JsonStore: StoreFactory = {
  name: "json",
  extensions: [".json"],
  priority: 50,
  open: (file) => new JsonRecordStore(file),
}

// Register the store
registerStore(JsonStore)
