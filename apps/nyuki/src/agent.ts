/**
 * Agent process lifecycle: load configuration, start, wait for a signal
 * or a fatal session error, stop. Resolves with the process exit code.
 */
import type { EventEmitter } from 'node:events'
import {
  DuplicateCapabilityError,
  Nyuki,
  NyukiError,
  describeError,
  logError,
  logInfo,
  type NyukiConfig,
} from '@nyuki/sdk'
import { parseCliOptions } from './cli'
import { registerSampleCapabilities } from './capabilities'
import { ConfigError, loadConfig, toNyukiConfig, type AgentConfig } from './config/agentConfig'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const

type Outcome = { type: 'started' } | { type: 'failed'; error: unknown } | { type: 'finished'; code: number }

export interface RunOptions {
  /** Source of shutdown signals */
  signals?: EventEmitter
  /** Applied over the options derived from the configuration */
  overrides?: Partial<NyukiConfig>
  /** Called with the agent before it starts */
  setup?: (nyuki: Nyuki) => void
}

/**
 * Run an agent until it is asked to stop.
 *
 * Exit code 1 when startup fails (capability conflict, listen failure,
 * rejected credentials, exhausted reconnects) or when the session fails
 * for good later on; 0 after a shutdown signal.
 */
export async function run(config: AgentConfig, options: RunOptions = {}): Promise<number> {
  const signals = options.signals ?? process
  const nyuki = new Nyuki({ ...toNyukiConfig(config), ...options.overrides })

  try {
    registerSampleCapabilities(nyuki)
    options.setup?.(nyuki)
  } catch (err) {
    if (err instanceof DuplicateCapabilityError) {
      logError(err.message)
      return EXIT_FAILURE
    }
    throw err
  }

  nyuki.onTeardown(() => logInfo('Goodbye'))
  nyuki.subscribe('sender', (event) => {
    logInfo(`Publication from ${event.from ?? 'unknown'} on sender: ${JSON.stringify(event.payload)}`)
  })

  let finish: (code: number) => void = () => undefined
  const finished = new Promise<number>((resolve) => {
    finish = resolve
  })
  const onSignal = (signal: string) => {
    logInfo(`Received ${signal}, shutting down`)
    finish(EXIT_OK)
  }
  for (const signal of SHUTDOWN_SIGNALS) signals.on(signal, onSignal)
  const offFatal = nyuki.on('session:fatal', ({ error }) => {
    logError(error.message)
    finish(EXIT_FAILURE)
  })

  const startup: Promise<Outcome> = nyuki.start().then(
    (): Outcome => ({ type: 'started' }),
    (error: unknown): Outcome => ({ type: 'failed', error })
  )
  const stopped = finished.then((code): Outcome => ({ type: 'finished', code }))

  try {
    const outcome = await Promise.race([startup, stopped])
    switch (outcome.type) {
      case 'finished':
        return outcome.code
      case 'failed':
        // Session failures were already reported through session:fatal
        if (!(outcome.error instanceof NyukiError)) logError(`Startup failed: ${describeError(outcome.error)}`)
        return EXIT_FAILURE
      case 'started':
        logInfo('Agent started')
        return await finished
    }
  } finally {
    offFatal()
    for (const signal of SHUTDOWN_SIGNALS) signals.off(signal, onSignal)
    await nyuki.stop()
  }
}

/**
 * Command-line entry: parse flags, load the configuration file, run.
 */
export async function main(args: string[], options: RunOptions = {}): Promise<number> {
  let config: AgentConfig
  try {
    const cli = parseCliOptions(args)
    config = await loadConfig(cli.config, cli)
  } catch (err) {
    if (err instanceof ConfigError) {
      logError(err.message)
      return EXIT_FAILURE
    }
    throw err
  }
  return run(config, options)
}
