/**
 * Agent configuration.
 *
 * Read from a JSON file, overridden by command-line flags, then validated.
 * Every tuning parameter has its default here.
 */
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { NyukiConfig } from '@nyuki/sdk'

export const DEFAULT_CONFIG_FILE = 'conf.json'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const portSchema = z.number().int().min(1).max(65535)

const reconnectSchema = z.object({
  initialDelayMs: z.number().int().positive().default(1000),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().int().positive().default(120_000),
  jitter: z.number().min(0).max(1).default(0.2),
  maxAttempts: z.number().int().positive().nullable().default(null),
})

const queueSchema = z.object({
  capacity: z.number().int().positive().default(1000),
  overflow: z.enum(['drop-oldest', 'reject']).default('drop-oldest'),
})

const busSchema = z.object({
  jid: z.string().min(1).regex(/^[^@/\s]+@[^@/\s]+(\/\S+)?$/, 'Expected <user>@<domain>'),
  password: z.string().min(1),
  host: z.string().min(1).optional(),
  port: portSchema.default(5222),
  resource: z.string().min(1).default('nyuki'),
  mucDomain: z.string().min(1).optional(),
  alternatePasswords: z.array(z.string().min(1)).default([]),
  reconnect: reconnectSchema.default({}),
  queue: queueSchema.default({}),
})

const apiSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: portSchema.default(8080),
})

const dispatchSchema = z.object({
  maxConcurrency: z.number().int().positive().default(16),
  overloadPolicy: z.enum(['queue', 'reject']).default('queue'),
  maxQueued: z.number().int().min(0).default(256),
  defaultDeadlineMs: z.number().int().positive().nullable().default(null),
})

export const agentConfigSchema = z.object({
  bus: busSchema,
  api: apiSchema.default({}),
  dispatch: dispatchSchema.default({}),
  debug: z.boolean().default(false),
})

export type AgentConfig = z.infer<typeof agentConfigSchema>

/** Values taken from the command line; each one replaces its file counterpart. */
export type ConfigOverrides = {
  jid?: string
  password?: string
  /** `host[:port]` of the bus server */
  server?: string
  /** `host[:port]` the API binds */
  api?: string
  debug?: boolean
}

export interface HostPort {
  host: string
  port?: number
}

/**
 * Split `host[:port]`. Without a port only the host is returned.
 *
 * @throws ConfigError when the port is not a number in 1-65535
 */
export function splitHostPort(value: string): HostPort {
  const separator = value.lastIndexOf(':')
  if (separator === -1) return { host: value }

  const host = value.slice(0, separator)
  const portText = value.slice(separator + 1)
  const port = Number(portText)
  if (!host || !/^\d+$/.test(portText) || !portSchema.safeParse(port).success) {
    throw new ConfigError(`Invalid address "${value}": expected <host>[:<port>]`)
  }
  return { host, port }
}

// Sections stay loose until the overrides are in: the file alone may lack the credentials
const fileSchema = z
  .object({
    bus: z.record(z.unknown()).default({}),
    api: z.record(z.unknown()).default({}),
  })
  .passthrough()

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Apply command-line overrides to the parsed file contents and validate.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(file: unknown, overrides: ConfigOverrides = {}): AgentConfig {
  const base = fileSchema.safeParse(file ?? {})
  if (!base.success) throw new ConfigError(`Invalid configuration: ${formatIssues(base.error)}`)

  const bus: Record<string, unknown> = { ...base.data.bus }
  if (overrides.jid !== undefined) bus.jid = overrides.jid
  if (overrides.password !== undefined) bus.password = overrides.password
  if (overrides.server !== undefined) {
    const { host, port } = splitHostPort(overrides.server)
    bus.host = host
    if (port !== undefined) bus.port = port
  }

  const api: Record<string, unknown> = { ...base.data.api }
  if (overrides.api !== undefined) {
    const { host, port } = splitHostPort(overrides.api)
    api.host = host
    if (port !== undefined) api.port = port
  }

  const merged: Record<string, unknown> = { ...base.data, bus, api }
  if (overrides.debug !== undefined) merged.debug = overrides.debug

  const result = agentConfigSchema.safeParse(merged)
  if (!result.success) throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`)
  return result.data
}

/**
 * @throws ConfigError when the file is missing or not JSON
 */
export async function readConfigFile(path: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file ${path} does not exist`)
    }
    throw err
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
}

export async function loadConfig(path: string, overrides: ConfigOverrides = {}): Promise<AgentConfig> {
  return resolveConfig(await readConfigFile(path), overrides)
}

/** Map the validated file layout onto the runtime's options. */
export function toNyukiConfig(config: AgentConfig): NyukiConfig {
  const { reconnect, queue, ...bus } = config.bus
  return {
    bus: { ...bus, backoff: reconnect, queue },
    api: config.api,
    dispatch: config.dispatch,
    debug: config.debug,
  }
}
