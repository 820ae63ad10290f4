import { Command } from 'commander'
import { runThreadsLsCommand } from './ls.js'
import { withOutput } from '../../output/index.js'

export function createThreadsCommand(): Command {
  const threads = new Command('threads').description('Browse app-server threads')

  threads
    .command('ls')
    .description('List recent threads')
    .option('--archived', 'List archived threads instead')
    .option('--limit <n>', 'Maximum number of threads (default: 100)')
    .option('--url <url>', 'App-server WebSocket URL (default: POCKET_AGENT_URL or config.json)')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runThreadsLsCommand))

  return threads
}
