// Verbose stderr logging, tagged per module. Stdout stays reserved for command output.
let _logEnabled = true

export function setLogging(enabled: boolean): void {
  _logEnabled = enabled
}

export interface Log {
  info(msg: string): void
  warn(msg: string): void
}

export function createLog(tag: string): Log {
  return {
    info(msg) {
      if (_logEnabled) console.error(`[${tag}] ${msg}`)
    },
    warn(msg) {
      if (_logEnabled) console.error(`[${tag}] warning: ${msg}`)
    },
  }
}
