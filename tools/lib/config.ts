/**
 * config.ts - Environment-driven settings
 *
 * Everything lives under a per-user directory (default ~/.locqa) unless an
 * explicit variable points elsewhere.
 */

import { homedir } from "os"
import { join } from "path"
import { z } from "zod"

const EnvSchema = z.object({
  HOME: z.string().optional(),
  LOCQA_HOME: z.string().min(1).optional(),
  LOCQA_LIBRARY: z.string().min(1).optional(),
  LOCQA_PROFILES_DIR: z.string().min(1).optional(),
  LOCQA_BACKUP_DIR: z.string().min(1).optional(),
  LOCQA_QUIET: z
    .enum(["1", "0", "true", "false", ""])
    .optional()
    .transform((v) => v === "1" || v === "true"),
})

export interface Config {
  homeDir: string
  libraryPath: string
  profilesDir: string
  backupDir: string | null // null = back up next to the document
  quiet: boolean
}

export const LIBRARY_FILE = "library.xml"
export const PROFILES_SUBDIR = "profiles"

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid environment: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`)
  }
  const vars = parsed.data
  const homeDir = vars.LOCQA_HOME ?? join(vars.HOME ?? homedir(), ".locqa")

  return {
    homeDir,
    libraryPath: vars.LOCQA_LIBRARY ?? join(homeDir, LIBRARY_FILE),
    profilesDir: vars.LOCQA_PROFILES_DIR ?? join(homeDir, PROFILES_SUBDIR),
    backupDir: vars.LOCQA_BACKUP_DIR ?? null,
    quiet: vars.LOCQA_QUIET,
  }
}
