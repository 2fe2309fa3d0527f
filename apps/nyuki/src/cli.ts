import { Command } from 'commander'
import { DEFAULT_CONFIG_FILE, type ConfigOverrides } from './config/agentConfig'

// A type alias: commander's opts<T>() needs an index-compatible shape
export type CliOptions = ConfigOverrides & {
  config: string
}

export function createProgram(): Command {
  return new Command()
    .name('nyuki')
    .description('Run a nyuki agent on the bus')
    .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_FILE)
    .option('-j, --jid <jid>', 'bus JID: <user>@<domain>')
    .option('-p, --password <password>', 'bus password')
    .option('-s, --server <address>', 'bus server: <host>[:<port>]')
    .option('-a, --api <address>', 'API binding: <host>[:<port>]')
    .option('-d, --debug', 'log debug output')
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseCliOptions(args: string[], program: Command = createProgram()): CliOptions {
  program.parse(args, { from: 'user' })
  return program.opts<CliOptions>()
}
