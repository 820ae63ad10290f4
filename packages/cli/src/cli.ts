import { Command } from 'commander'
import { createRequire } from 'node:module'
import { createThreadsCommand } from './commands/threads/index.js'
import { runStatusCommand } from './commands/status.js'
import { runRunCommand } from './commands/run.js'
import { withOutput } from './output/index.js'

const require = createRequire(import.meta.url)

type CliPackageJson = {
  version?: unknown
}

function resolveCliVersion(): string {
  const packageJson: CliPackageJson = require('../package.json')
  if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
    return packageJson.version.trim()
  }
  throw new Error('Unable to resolve CLI version from package.json.')
}

const VERSION = resolveCliVersion()

export function createCli(): Command {
  const program = new Command()

  program
    .name('pocket-agent')
    .description('Drive a remote coding-agent app-server from the command line')
    .version(VERSION, '-v, --version', 'output the version number')
    // Global output options
    .option('-o, --format <format>', 'output format: table, json', 'table')
    .option('--json', 'output in JSON format (alias for --format json)')
    .option('-q, --quiet', 'minimal output (IDs only)')
    .option('--no-headers', 'omit table headers')
    .option('--no-color', 'disable colored output')

  program
    .command('status')
    .description('Connect to the app-server and show diagnostics')
    .option('--url <url>', 'App-server WebSocket URL (default: POCKET_AGENT_URL or config.json)')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runStatusCommand))

  program
    .command('run')
    .description('Run one turn on a new or existing thread and stream its output')
    .argument('<prompt>', 'The message for the agent')
    .option('--thread <id>', 'Resume this thread instead of starting a new one')
    .option('--cwd <path>', 'Working directory for a new thread (default: current)')
    .option('--model <model>', 'Model to use')
    .option('--effort <effort>', 'Reasoning effort (e.g., low, medium, high)')
    .option('--approve', 'Accept command and file-change approvals (default: decline)')
    .option('--url <url>', 'App-server WebSocket URL (default: POCKET_AGENT_URL or config.json)')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runRunCommand))

  program.addCommand(createThreadsCommand())

  return program
}
