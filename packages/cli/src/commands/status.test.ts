import { describe, expect, it } from 'vitest'
import { toStatusRows } from './status.js'

describe('toStatusRows', () => {
  it('lists diagnostics in display order', () => {
    const rows = toStatusRows('ws://10.0.0.5:4500/', {
      cliVersion: '0.102.0',
      authStatus: 'authenticated',
      currentModel: '',
      lastPingLatencyMs: 12.6,
      lastCheckedAt: new Date('2026-03-01T12:00:00Z'),
      minimumRequiredVersion: '0.101.0',
    })

    expect(rows).toEqual([
      { key: 'Endpoint', value: 'ws://10.0.0.5:4500/' },
      { key: 'CLI version', value: '0.102.0' },
      { key: 'Minimum version', value: '0.101.0+' },
      { key: 'Auth', value: 'authenticated' },
      { key: 'Model', value: '-' },
      { key: 'Ping', value: '13 ms' },
      { key: 'Checked at', value: '2026-03-01T12:00:00.000Z' },
    ])
  })
})
