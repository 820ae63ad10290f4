import type { Command } from 'commander'
import type { AppServerDiagnostics } from '@pocket-agent/protocol'
import { connectToAppServer } from '../utils/client.js'
import type { CommandOptions, ListResult, OutputSchema } from '../output/index.js'

export interface StatusRow {
  key: string
  value: string
}

export const statusSchema: OutputSchema<StatusRow> = {
  idField: 'key',
  columns: [
    { header: 'KEY', field: 'key', width: 18 },
    { header: 'VALUE', field: 'value', width: 60 },
  ],
}

export interface StatusOptions extends CommandOptions {
  url?: string
}

export function toStatusRows(url: string, diagnostics: AppServerDiagnostics): StatusRow[] {
  return [
    { key: 'Endpoint', value: url },
    { key: 'CLI version', value: diagnostics.cliVersion || 'unknown' },
    { key: 'Minimum version', value: `${diagnostics.minimumRequiredVersion}+` },
    { key: 'Auth', value: diagnostics.authStatus },
    { key: 'Model', value: diagnostics.currentModel || '-' },
    {
      key: 'Ping',
      value:
        diagnostics.lastPingLatencyMs === null
          ? '-'
          : `${Math.round(diagnostics.lastPingLatencyMs)} ms`,
    },
    {
      key: 'Checked at',
      value: diagnostics.lastCheckedAt ? diagnostics.lastCheckedAt.toISOString() : '-',
    },
  ]
}

export async function runStatusCommand(
  options: StatusOptions,
  _command: Command
): Promise<ListResult<StatusRow>> {
  const { client, url } = await connectToAppServer({ url: options.url })
  try {
    const diagnostics = await client.runDiagnostics()
    return {
      type: 'list',
      data: toStatusRows(url, diagnostics),
      schema: statusSchema,
    }
  } finally {
    await client.disconnect()
  }
}
