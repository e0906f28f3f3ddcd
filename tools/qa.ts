#!/usr/bin/env node
/**
 * qa.ts - Rule-driven QA for translated documents
 *
 * Profiles (ordered pattern rules) are run over a document's records to report
 * problems (find) or fix them (replace). A snippet library holds reusable
 * patterns that can be copied into profiles.
 *
 * Usage:
 *   locqa find <file> <pattern>                   One-off search
 *   locqa replace <file> <pattern> <replacement>  One-off replace (writes the file)
 *   locqa batch-find <file> <profile>             Report every match of a profile
 *   locqa batch-replace <file> <profile>          Apply a profile's replacements
 *   locqa stats <file> <profile>                  Match counts per rule and category
 *   locqa doc-stats <file>                        Translation progress and ICU problems
 *   locqa apply-edits <file> <edits.json|->       Overwrite targets by record id
 *   locqa profiles list|show|create|import|export|delete|remove-rule
 *   locqa library show|search|add|remove|import|import-xbench|export|copy
 *   locqa backup list|restore|cleanup
 *
 * <profile> is a path, or the name of a profile in the profiles directory.
 * Reporting commands take --json. Errors print { error, kind } to stderr.
 */

import { existsSync } from "fs"
import { join } from "path"
import { Command } from "commander"
import { z } from "zod"
import { loadConfig, type Config } from "./lib/config"
import { setLogging } from "./lib/log"
import { isQaError } from "./lib/core/errors"
import {
  adHocProfile,
  runApplyEdits,
  runBatchFind,
  runBatchReplace,
  runDocumentStats,
  type WriteOptions,
} from "./lib/core/batch"
import { formatDocumentStats } from "./lib/core/document-stats"
import { loadEdits, parseEdits } from "./lib/core/edits"
import { formatFindReport, formatReplaceReport, formatStatsReport, summarizeFind } from "./lib/core/stats"
import {
  addRule,
  deleteProfile,
  emptyProfile,
  exportProfile,
  importProfile,
  loadProfile,
  nextOrder,
  profileFileName,
  removeRule,
  saveProfile,
  touchProfile,
} from "./lib/profile/profile"
import { listProfiles } from "./lib/profile/discovery"
import {
  addSnippet,
  exportLibrary,
  findSnippet,
  importLibrary,
  loadLibrary,
  mergeLibraries,
  removeSnippet,
  saveLibrary,
  searchSnippets,
  snippetToRule,
} from "./lib/library/snippets"
import { checklistStats, checklistToLibrary, loadChecklist } from "./lib/library/xbench"
import { cleanupBackups, listBackups, restoreBackup } from "./lib/store"
import type { SnippetEntry } from "./lib/core/types"

function output(data: unknown): void {
  console.log(JSON.stringify(data, null, 2))
}

function error(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err)
  const kind = isQaError(err) ? err.kind : "Error"
  console.error(JSON.stringify({ error: message, kind }))
  process.exitCode = 1
}

// Run a command body, turning thrown errors into the JSON error line
function guard<A extends unknown[]>(fn: (...args: A) => void | Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (err) {
      error(err)
    }
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString("utf8")
}

const IntegerArg = z.string().regex(/^-?\d+$/, "must be an integer").transform(Number)
const CountArg = z.string().regex(/^\d+$/, "must be a non-negative integer").transform(Number)

function parseArg(schema: z.ZodType<number, z.ZodTypeDef, string>, value: string, name: string): number {
  const parsed = schema.safeParse(value)
  if (!parsed.success) throw new Error(`${name} ${parsed.error.issues[0]?.message ?? "is invalid"}: ${value}`)
  return parsed.data
}

interface WriteFlags {
  output?: string
  backup?: boolean // commander sets false for --no-backup
  json?: boolean
}

interface RuleFlags {
  exclude?: string
  caseSensitive?: boolean
}

function formatSnippet(entry: SnippetEntry): string {
  const desc = entry.description ? ` - ${entry.description}` : ""
  return `  ${entry.id}  ${entry.name}${desc}\n      ${entry.pattern} -> ${entry.replace}`
}

export function createProgram(config: Config): Command {
  const resolveProfile = (ref: string): string =>
    existsSync(ref) ? ref : join(config.profilesDir, profileFileName(ref))

  const writeOptions = (flags: WriteFlags): WriteOptions => ({
    output: flags.output,
    backup: flags.backup,
    backupDir: config.backupDir,
  })

  const program = new Command()

  program
    .name("locqa")
    .description("Rule-driven QA for translated documents")
    .version("0.1.0")
    .option("-q, --quiet", "Suppress log output on stderr")
    .hook("preAction", (cmd) => {
      if (cmd.opts<{ quiet?: boolean }>().quiet) setLogging(false)
    })

  // ==========================================================================
  // One-off patterns
  // ==========================================================================

  program
    .command("find")
    .description("Report matches of a single pattern")
    .argument("<file>", "Document to search")
    .argument("<pattern>", "Regular expression")
    .option("-x, --exclude <pattern>", "Drop matches that intersect this pattern")
    .option("-c, --case-sensitive", "Match case exactly")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, pattern: string, opts: RuleFlags & { json?: boolean }) => {
        const profile = adHocProfile(pattern, { excludePattern: opts.exclude, caseSensitive: opts.caseSensitive })
        const result = runBatchFind(profile, file)
        if (opts.json) output(result)
        else console.log(formatFindReport(result))
      })
    )

  program
    .command("replace")
    .description("Replace a single pattern throughout a document")
    .argument("<file>", "Document to rewrite")
    .argument("<pattern>", "Regular expression")
    .argument("<replacement>", "Replacement template ($1, $<name>, \\1 ...)")
    .option("-x, --exclude <pattern>", "Drop matches that intersect this pattern")
    .option("-c, --case-sensitive", "Match case exactly")
    .option("-o, --output <file>", "Write to this file instead of the document")
    .option("--no-backup", "Do not back up the document first")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, pattern: string, replacement: string, opts: RuleFlags & WriteFlags) => {
        const profile = adHocProfile(pattern, {
          replacement,
          excludePattern: opts.exclude,
          caseSensitive: opts.caseSensitive,
        })
        const result = runBatchReplace(profile, file, writeOptions(opts))
        if (opts.json) output(result)
        else console.log(formatReplaceReport(result))
      })
    )

  // ==========================================================================
  // Profiles against documents
  // ==========================================================================

  program
    .command("batch-find")
    .description("Report every match of a profile's enabled rules")
    .argument("<file>", "Document to check")
    .argument("<profile>", "Profile path or name")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, profile: string, opts: { json?: boolean }) => {
        const result = runBatchFind(resolveProfile(profile), file)
        if (opts.json) output(result)
        else console.log(formatFindReport(result))
      })
    )

  program
    .command("batch-replace")
    .description("Apply a profile's replacements to a document")
    .argument("<file>", "Document to rewrite")
    .argument("<profile>", "Profile path or name")
    .option("-o, --output <file>", "Write to this file instead of the document")
    .option("--no-backup", "Do not back up the document first")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, profile: string, opts: WriteFlags) => {
        const result = runBatchReplace(resolveProfile(profile), file, writeOptions(opts))
        if (opts.json) output(result)
        else console.log(formatReplaceReport(result))
      })
    )

  program
    .command("stats")
    .description("Summarize a profile's matches per rule and category")
    .argument("<file>", "Document to check")
    .argument("<profile>", "Profile path or name")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, profile: string, opts: { json?: boolean }) => {
        const summary = summarizeFind(runBatchFind(resolveProfile(profile), file))
        if (opts.json) output(summary)
        else console.log(formatStatsReport(summary))
      })
    )

  program
    .command("doc-stats")
    .description("Count translated records and check ICU messages")
    .argument("<file>", "Document to check")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, opts: { json?: boolean }) => {
        const stats = runDocumentStats(file)
        if (opts.json) output(stats)
        else console.log(formatDocumentStats(stats))
      })
    )

  program
    .command("apply-edits")
    .description("Overwrite record targets from an edits file ([{id, target}] or {id: target})")
    .argument("<file>", "Document to rewrite")
    .argument("<edits>", "Edits JSON file, or - for stdin")
    .option("-o, --output <file>", "Write to this file instead of the document")
    .option("--no-backup", "Do not back up the document first")
    .option("--json", "Output as JSON")
    .action(
      guard(async (file: string, editsPath: string, opts: WriteFlags) => {
        const edits = editsPath === "-" ? parseEdits(await readStdin(), "stdin") : loadEdits(editsPath)
        const report = runApplyEdits(file, edits, writeOptions(opts))
        if (opts.json) {
          output(report)
          return
        }
        console.log(`Applied ${report.applied} edit(s)${report.success ? ` -> ${report.output}` : ""}`)
        for (const id of report.unknownIds) console.log(`  unknown record id: ${id}`)
      })
    )

  // ==========================================================================
  // Profile management
  // ==========================================================================

  const profiles = program.command("profiles").description("Manage QA profiles")

  profiles
    .command("list")
    .description("List profiles in the profiles directory")
    .option("--json", "Output as JSON")
    .action(
      guard((opts: { json?: boolean }) => {
        const found = listProfiles(config.profilesDir)
        if (opts.json) {
          output(found)
          return
        }
        if (found.length === 0) console.log(`No profiles in ${config.profilesDir}`)
        for (const info of found) {
          const lang = info.language ? ` [${info.language}]` : ""
          const broken = info.parsed ? "" : " (unreadable)"
          console.log(`${info.name}${lang}${broken}  ${info.path}`)
        }
      })
    )

  profiles
    .command("show")
    .description("Show a profile's rules")
    .argument("<profile>", "Profile path or name")
    .option("--json", "Output as JSON")
    .action(
      guard((ref: string, opts: { json?: boolean }) => {
        const profile = loadProfile(resolveProfile(ref))
        if (opts.json) {
          output(profile)
          return
        }
        console.log(`${profile.name}${profile.language ? ` [${profile.language}]` : ""}`)
        if (profile.description) console.log(profile.description)
        for (const rule of profile.rules) {
          const state = rule.enabled ? " " : "-"
          console.log(`${state} [${rule.order}] ${rule.name} (${rule.category}): ${rule.pattern} -> ${rule.replacement}`)
        }
      })
    )

  profiles
    .command("create")
    .description("Create an empty profile in the profiles directory")
    .argument("<name>", "Profile name")
    .option("-l, --language <code>", "Target language", "")
    .option("-d, --description <text>", "Description", "")
    .action(
      guard((name: string, opts: { language: string; description: string }) => {
        const path = join(config.profilesDir, profileFileName(name))
        if (existsSync(path)) throw new Error(`Profile already exists: ${path}`)
        saveProfile(touchProfile(emptyProfile(name, opts.language, opts.description)), path)
        console.log(path)
      })
    )

  profiles
    .command("remove-rule")
    .description("Remove the rule with the given order")
    .argument("<profile>", "Profile path or name")
    .argument("<order>", "Rule order")
    .action(
      guard((ref: string, order: string) => {
        const path = resolveProfile(ref)
        const profile = loadProfile(path)
        const updated = removeRule(profile, parseArg(IntegerArg, order, "order"))
        if (updated.rules.length === profile.rules.length) throw new Error(`No rule with order ${order}`)
        saveProfile(touchProfile(updated), path)
      })
    )

  profiles
    .command("import")
    .description("Copy a profile document into the profiles directory")
    .argument("<file>", "Profile document")
    .option("--overwrite", "Replace a profile with the same name")
    .action(
      guard((file: string, opts: { overwrite?: boolean }) => {
        console.log(importProfile(file, config.profilesDir, opts.overwrite))
      })
    )

  profiles
    .command("export")
    .description("Copy a profile document elsewhere")
    .argument("<profile>", "Profile path or name")
    .argument("<destination>", "Target file")
    .action(guard((ref: string, destination: string) => exportProfile(resolveProfile(ref), destination)))

  profiles
    .command("delete")
    .description("Delete a profile document")
    .argument("<profile>", "Profile path or name")
    .action(guard((ref: string) => deleteProfile(resolveProfile(ref))))

  // ==========================================================================
  // Snippet library
  // ==========================================================================

  const library = program.command("library").description("Manage the snippet library")

  library
    .command("show")
    .description("List snippets by category")
    .option("--json", "Output as JSON")
    .action(
      guard((opts: { json?: boolean }) => {
        const lib = loadLibrary(config.libraryPath)
        if (opts.json) {
          output(lib)
          return
        }
        for (const category of lib.categories) {
          console.log(`${category.name} (${category.entries.length})`)
          for (const entry of category.entries) console.log(formatSnippet(entry))
        }
      })
    )

  library
    .command("search")
    .description("Search snippet names, descriptions and patterns")
    .argument("<query>", "Case-insensitive substring")
    .option("--json", "Output as JSON")
    .action(
      guard((query: string, opts: { json?: boolean }) => {
        const hits = searchSnippets(loadLibrary(config.libraryPath), query)
        if (opts.json) output(hits)
        else for (const entry of hits) console.log(`[${entry.category}]\n${formatSnippet(entry)}`)
      })
    )

  library
    .command("add")
    .description("Add a snippet")
    .requiredOption("-n, --name <name>", "Snippet name")
    .requiredOption("-p, --pattern <regex>", "Pattern")
    .requiredOption("-c, --category <name>", "Category (created when missing)")
    .option("-r, --replace <template>", "Replacement template", "")
    .option("-d, --description <text>", "Description", "")
    .action(
      guard((opts: { name: string; pattern: string; category: string; replace: string; description: string }) => {
        const { library: updated, entry } = addSnippet(loadLibrary(config.libraryPath), opts)
        saveLibrary(updated, config.libraryPath)
        console.log(entry.id)
      })
    )

  library
    .command("remove")
    .description("Remove a snippet by id")
    .argument("<id>", "Snippet id")
    .action(
      guard((id: string) => {
        const updated = removeSnippet(loadLibrary(config.libraryPath), id)
        if (!updated) throw new Error(`No snippet with id ${id}`)
        saveLibrary(updated, config.libraryPath)
      })
    )

  library
    .command("import")
    .description("Import snippets from a library document")
    .argument("<file>", "Library document")
    .option("--replace", "Replace the library instead of appending")
    .action(
      guard((file: string, opts: { replace?: boolean }) => {
        const imported = importLibrary(file)
        const updated = opts.replace ? imported : mergeLibraries(loadLibrary(config.libraryPath), imported)
        saveLibrary(updated, config.libraryPath)
      })
    )

  library
    .command("import-xbench")
    .description("Import the enabled regex items of an Xbench checklist (.xbckl)")
    .argument("<file>", "Checklist file")
    .option("--replace", "Replace the library instead of appending")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, opts: { replace?: boolean; json?: boolean }) => {
        const checklist = loadChecklist(file)
        const imported = checklistToLibrary(checklist)
        const updated = opts.replace ? imported : mergeLibraries(loadLibrary(config.libraryPath), imported)
        saveLibrary(updated, config.libraryPath)

        const stats = checklistStats(checklist)
        const count = imported.categories.reduce((n, c) => n + c.entries.length, 0)
        if (opts.json) {
          output({ checklist: checklist.name, ...stats, imported: count })
          return
        }
        console.log(
          [
            `Checklist: ${checklist.name || file}`,
            `Items: ${stats.totalItems} (${stats.regexItems} regex, ${stats.enabledItems} enabled, ${stats.withReplacement} with replacement)`,
            `Imported ${count} snippet(s)`,
          ].join("\n")
        )
      })
    )

  library
    .command("export")
    .description("Write the library to a file")
    .argument("<destination>", "Target file")
    .action(guard((destination: string) => exportLibrary(loadLibrary(config.libraryPath), destination)))

  library
    .command("copy")
    .description("Copy a snippet into a profile as a new rule")
    .argument("<id>", "Snippet id")
    .argument("<profile>", "Profile path or name")
    .action(
      guard((id: string, ref: string) => {
        const entry = findSnippet(loadLibrary(config.libraryPath), id)
        if (!entry) throw new Error(`No snippet with id ${id}`)
        const path = resolveProfile(ref)
        const profile = loadProfile(path)
        const rule = snippetToRule(entry, nextOrder(profile))
        saveProfile(touchProfile(addRule(profile, rule)), path)
        console.log(`Added [${rule.order}] ${rule.name}`)
      })
    )

  // ==========================================================================
  // Backups
  // ==========================================================================

  const backup = program.command("backup").description("Manage document backups")

  backup
    .command("list")
    .description("List backups of a document, newest first")
    .argument("<file>", "Document")
    .option("--json", "Output as JSON")
    .action(
      guard((file: string, opts: { json?: boolean }) => {
        const backups = listBackups(file, config.backupDir)
        if (opts.json) output(backups)
        else for (const path of backups) console.log(path)
      })
    )

  backup
    .command("restore")
    .description("Restore a backup over its document")
    .argument("<backup>", "Backup file")
    .option("-t, --target <file>", "Document to restore (required for backups in a backup directory)")
    .action(
      guard((file: string, opts: { target?: string }) => {
        console.log(restoreBackup(file, opts.target, config.backupDir))
      })
    )

  backup
    .command("cleanup")
    .description("Delete old backups of a document")
    .argument("<file>", "Document")
    .option("-k, --keep <count>", "Backups to keep", "10")
    .action(
      guard((file: string, opts: { keep: string }) => {
        const deleted = cleanupBackups(file, parseArg(CountArg, opts.keep, "--keep"), config.backupDir)
        console.log(`Deleted ${deleted.length} backup(s)`)
      })
    )

  return program
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let config: Config
  try {
    config = loadConfig()
  } catch (err) {
    error(err)
    return
  }
  if (config.quiet) setLogging(false)

  const program = createProgram(config)
  if (argv.length === 0) {
    program.outputHelp()
    return
  }
  await program.parseAsync(["node", "locqa", ...argv])
}

if (require.main === module) {
  main().catch(error)
}
