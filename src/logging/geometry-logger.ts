// Messages from parsing and document reading. Every entity imports this, so it imports nothing.

export type LogVerbosity = 'normal' | 'verbose'

/** Every message logged since the last `clearGeometryLogs`. */
export const geometryLogs: string[] = []

let verbosity: LogVerbosity = 'normal'

// Jest sets NODE_ENV=test; SPATIAL_VERBOSE_TESTS=true prints anyway
const printToConsole =
  typeof process === 'undefined' || process.env.NODE_ENV !== 'test' || process.env.SPATIAL_VERBOSE_TESTS === 'true'

/**
 * 'verbose' also records `logDebug` messages, such as rejected ambiguous text.
 */
export function setVerbosity(level: LogVerbosity) {
  verbosity = level
}

export function log(message: string) {
  geometryLogs.push(message)
  if (printToConsole) {
    console.log(message)
  }
}

export function logDebug(message: string) {
  if (verbosity === 'verbose') {
    log(message)
  }
}

export function clearGeometryLogs() {
  geometryLogs.length = 0
}
