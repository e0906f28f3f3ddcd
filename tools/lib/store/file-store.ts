import type { RecordStore } from "./store"
import type { TextRecord } from "../core/types"
import { DriftError } from "../core/errors"
import { computeChecksum, readTextFile, writeTextFile } from "../core/files"

/**
 * Shared plumbing for stores backed by one document on disk.
 *
 * list() remembers the document checksum; persist() refuses to write over the
 * document when it changed in between.
 */
export abstract class FileRecordStore implements RecordStore {
  abstract readonly name: string
  abstract readonly markup: boolean
  private checksum: string | null = null

  constructor(readonly location: string) {}

  protected abstract parse(content: string): TextRecord[]

  // Render the document with the given records written into it
  protected abstract render(content: string, records: readonly TextRecord[]): string

  list(): TextRecord[] {
    const content = this.read()
    const records = this.parse(content)
    this.checksum = computeChecksum(content)
    return records
  }

  persist(records: readonly TextRecord[], output?: string): string {
    const content = this.read()
    const actual = computeChecksum(content)
    if (this.checksum !== null && actual !== this.checksum) {
      throw new DriftError(this.location, this.checksum, actual)
    }

    const destination = output ?? this.location
    const rendered = this.render(content, records)
    writeTextFile(destination, rendered)
    if (destination === this.location) this.checksum = computeChecksum(rendered)
    return destination
  }

  private read(): string {
    return readTextFile(this.location, "Document")
  }
}
