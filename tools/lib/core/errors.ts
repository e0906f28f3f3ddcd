/**
 * errors.ts - Error kinds surfaced by the engine, persistence and stores
 *
 * Every error carries a `kind` so the CLI (and JSON consumers) can tell them
 * apart without instanceof checks.
 */

export type QaErrorKind =
  | "ParseError"
  | "InvalidPattern"
  | "UnknownRecordId"
  | "IOError"
  | "MissingResource"
  | "Drift"

export abstract class QaError extends Error {
  abstract readonly kind: QaErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Malformed document. Line/column are 1-indexed when the parser reports them.
 */
export class ParseError extends QaError {
  readonly kind = "ParseError"

  constructor(
    message: string,
    readonly line?: number,
    readonly column?: number,
    readonly path?: string
  ) {
    super(message)
  }
}

export class InvalidPatternError extends QaError {
  readonly kind = "InvalidPattern"

  constructor(
    readonly ruleName: string,
    readonly pattern: string,
    reason: string
  ) {
    super(`Invalid pattern in rule "${ruleName}": ${reason}`)
  }
}

export class UnknownRecordIdError extends QaError {
  readonly kind = "UnknownRecordId"

  constructor(readonly recordId: string) {
    super(`Unknown record id: ${recordId}`)
  }
}

export class IoError extends QaError {
  readonly kind = "IOError"

  constructor(
    readonly path: string,
    action: string,
    cause: unknown
  ) {
    super(`Failed to ${action} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
  }
}

export class MissingResourceError extends QaError {
  readonly kind = "MissingResource"

  constructor(
    readonly resource: string,
    readonly path: string
  ) {
    super(`${resource} not found: ${path}`)
  }
}

/**
 * The backing document changed between list() and persist().
 */
export class DriftError extends QaError {
  readonly kind = "Drift"

  constructor(
    readonly path: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Checksum mismatch for ${path}: expected ${expected}, got ${actual}`)
  }
}

export function isQaError(error: unknown): error is QaError {
  return error instanceof QaError
}
