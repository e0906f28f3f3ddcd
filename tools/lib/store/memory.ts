import type { RecordStore } from "./store"
import type { TextRecord } from "../core/types"

/**
 * In-process store. persist() replaces the held records; the output argument
 * only renames the reported location.
 */
export class MemoryRecordStore implements RecordStore {
  readonly name = "memory"
  private records: TextRecord[]

  constructor(
    records: readonly TextRecord[],
    readonly location = "memory",
    readonly markup = false
  ) {
    this.records = records.map((record) => ({ ...record }))
  }

  list(): TextRecord[] {
    return this.records.map((record) => ({ ...record }))
  }

  persist(records: readonly TextRecord[], output?: string): string {
    this.records = records.map((record) => ({ ...record }))
    return output ?? this.location
  }
}
