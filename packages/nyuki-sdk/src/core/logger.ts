/**
 * Runtime diagnostic logger.
 *
 * Logs to `console.debug/info/warn/error` with a `[Nyuki]` prefix so every
 * line from the runtime can be told apart from handler output.
 *
 * **Privacy**: Never pass passwords to these functions. Stanza payloads
 * are only logged through `logDebug`, which is off unless the agent runs
 * with the debug flag.
 *
 * @module Core/Logger
 */

const PREFIX = '[Nyuki]'

let debugEnabled = false

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled
}

export function logDebug(message: string): void {
  if (!debugEnabled) return
  console.debug(PREFIX, message)
}

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}

/** Extract a printable message from anything thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
