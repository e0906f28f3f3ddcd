import path from "path"
import type { TextRecord } from "../core/types"
import { MissingResourceError } from "../core/errors"

/**
 * Store interface for translation documents.
 * Each store (JSON, XLIFF, ...) implements this interface.
 */
export interface RecordStore {
  readonly name: string
  readonly location: string // identifier of the backing document
  readonly markup: boolean // targets are inline XML; rules only see their text


  // Records in document order
  list(): TextRecord[]

  // Write targets back; returns where they went (output, or location)
  persist(records: readonly TextRecord[], output?: string): string
}

export interface StoreFactory {
  name: string
  extensions: string[] // Files this store handles (e.g., [".xlf", ".xliff"])
  priority: number // Higher = preferred when multiple match
  open(file: string): RecordStore
}

// Registry of store factories
const factories: StoreFactory[] = []

/**
 * Register a store factory. A factory with the same name replaces the old one.
 */
export function registerStore(factory: StoreFactory): void {
  const existing = factories.findIndex((f) => f.name === factory.name)
  if (existing !== -1) factories.splice(existing, 1)
  factories.push(factory)
  factories.sort((a, b) => b.priority - a.priority) // Higher priority first
}

/**
 * Get the store factory for a file, by extension (case-insensitive)
 */
export function getStoreForFile(file: string): StoreFactory | null {
  const ext = path.extname(file).toLowerCase()
  return factories.find((f) => f.extensions.includes(ext) || f.extensions.includes("*")) ?? null
}

export function getStoreByName(name: string): StoreFactory | null {
  return factories.find((f) => f.name === name) ?? null
}

export function getStores(): StoreFactory[] {
  return [...factories]
}

export function openRecordStore(file: string): RecordStore {
  const factory = getStoreForFile(file)
  if (!factory) throw new MissingResourceError(`Record store for ${path.extname(file) || "extensionless file"}`, file)
  return factory.open(file)
}
