// Import stores (they register themselves)
import "./json"
import "./xliff"

export { openRecordStore, getStoreForFile, getStoreByName, getStores, registerStore } from "./store"
export type { RecordStore, StoreFactory } from "./store"
export { MemoryRecordStore } from "./memory"
export { JsonRecordStore } from "./json"
export { XliffRecordStore } from "./xliff"
export { createBackup, listBackups, restoreBackup, cleanupBackups } from "./backup"
