import { readFileSync, writeFileSync, mkdirSync } from "fs"
import { dirname } from "path"
import { createHash } from "crypto"
import { IoError, MissingResourceError } from "./errors"

/**
 * Compute SHA256 checksum of content (first 12 chars)
 */
export function computeChecksum(content: string): string {
  return createHash("sha256").update(content).digest("hex").slice(0, 12)
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

/**
 * Read a UTF-8 file. A missing file is a MissingResourceError naming the
 * resource; any other failure is an IoError.
 */
export function readTextFile(path: string, resource: string): string {
  try {
    return readFileSync(path, "utf-8")
  } catch (error) {
    if (isNotFound(error)) throw new MissingResourceError(resource, path)
    throw new IoError(path, "read", error)
  }
}

/**
 * Write a UTF-8 file, creating parent directories.
 */
export function writeTextFile(path: string, content: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, content, "utf-8")
  } catch (error) {
    throw new IoError(path, "write", error)
  }
}
