import type { Command } from 'commander'
import type { RemoteThreadRecord } from '@pocket-agent/protocol'
import { connectToAppServer } from '../../utils/client.js'
import type { CommandError, CommandOptions, ListResult, OutputSchema } from '../../output/index.js'

/** Thread list item for display */
export interface ThreadListItem {
  id: string
  shortId: string
  preview: string
  model: string
  cwd: string
  updated: string
  archived: boolean
}

/** Helper to get relative time string */
export function relativeTime(date: Date, now: number = Date.now()): string {
  const seconds = Math.floor((now - date.getTime()) / 1000)

  if (seconds < 60) return 'just now'
  if (seconds < 3600) return `${Math.floor(seconds / 60)} minutes ago`
  if (seconds < 86400) return `${Math.floor(seconds / 3600)} hours ago`
  return `${Math.floor(seconds / 86400)} days ago`
}

/** Shorten home directory in path */
export function shortenPath(path: string, home: string | undefined = process.env.HOME): string {
  if (home && path.startsWith(home)) {
    return '~' + path.slice(home.length)
  }
  return path
}

export const threadLsSchema: OutputSchema<ThreadListItem> = {
  idField: 'id',
  columns: [
    { header: 'THREAD', field: 'shortId', width: 10 },
    { header: 'PREVIEW', field: 'preview', width: 40 },
    { header: 'MODEL', field: 'model', width: 14 },
    { header: 'CWD', field: 'cwd', width: 30 },
    {
      header: 'UPDATED',
      field: 'updated',
      width: 16,
      color: (_value, item) => (item.archived ? 'gray' : undefined),
    },
  ],
}

export function toThreadListItem(
  thread: RemoteThreadRecord,
  now: number = Date.now(),
  home: string | undefined = process.env.HOME
): ThreadListItem {
  const model = thread.reasoningEffort
    ? `${thread.model ?? 'default'}/${thread.reasoningEffort}`
    : (thread.model ?? '-')
  return {
    id: thread.id,
    shortId: thread.id.slice(0, 8),
    preview: thread.preview.replace(/\s+/g, ' ').trim() || '-',
    model,
    cwd: thread.cwd ? shortenPath(thread.cwd, home) : '-',
    updated: relativeTime(thread.updatedAt, now),
    archived: thread.archived,
  }
}

export interface ThreadLsOptions extends CommandOptions {
  url?: string
  archived?: boolean
  limit?: string
}

export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const limit = Number(raw)
  if (!Number.isInteger(limit) || limit <= 0) {
    const error: CommandError = {
      code: 'INVALID_LIMIT',
      message: `--limit must be a positive integer, got: ${raw}`,
    }
    throw error
  }
  return limit
}

export async function runThreadsLsCommand(
  options: ThreadLsOptions,
  _command: Command
): Promise<ListResult<ThreadListItem>> {
  const limit = parseLimit(options.limit)
  const { client } = await connectToAppServer({ url: options.url })
  try {
    const threads = await client.threadList({ archived: options.archived === true, limit })
    const now = Date.now()
    return {
      type: 'list',
      data: threads.map((thread) => toThreadListItem(thread, now)),
      schema: threadLsSchema,
    }
  } finally {
    await client.disconnect()
  }
}
