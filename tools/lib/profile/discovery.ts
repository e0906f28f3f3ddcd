import { existsSync, readdirSync } from "fs"
import { join } from "path"
import type { ProfileInfo } from "../core/types"
import { readTextFile } from "../core/files"
import { isQaError } from "../core/errors"
import { extractTag } from "../xml/markup"
import { createLog } from "../log"
import { PROFILE_SUFFIX, parseProfileXml } from "./profile"

const log = createLog("profiles")

/**
 * Describe one profile document. Documents that fail to parse still get
 * listed, with whatever metadata can be pulled out of the raw text.
 */
export function describeProfile(path: string): ProfileInfo {
  const content = readTextFile(path, "Profile")
  try {
    const profile = parseProfileXml(content, path)
    return {
      path,
      name: profile.name,
      description: profile.description,
      language: profile.language,
      parsed: true,
    }
  } catch (error) {
    if (!isQaError(error)) throw error
    log.warn(`could not parse ${path}: ${error.message}`)
    return {
      path,
      name: extractTag(content, "name") ?? fileStem(path),
      description: extractTag(content, "description") ?? "",
      language: extractTag(content, "language") ?? "",
      parsed: false,
    }
  }
}

function fileStem(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? path
  return base.endsWith(PROFILE_SUFFIX) ? base.slice(0, -PROFILE_SUFFIX.length) : base
}

/**
 * List the profiles in a directory (files ending in _qa_profile.xml),
 * sorted by file name. A missing directory lists nothing.
 */
export function listProfiles(dir: string): ProfileInfo[] {
  if (!existsSync(dir)) return []

  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(PROFILE_SUFFIX))
    .map((entry) => entry.name)
    .sort()
    .map((name) => describeProfile(join(dir, name)))
}
