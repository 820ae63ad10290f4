import {
  AppServerClient,
  createChildLogger,
  createRootLogger,
  formatErrorMessage,
  loadPersistedConfig,
  resolveClientConfig,
  type ResolvedClientConfig,
} from '@pocket-agent/protocol'
import type { CommandError } from '../output/index.js'

export interface ConnectOptions {
  url?: string
}

export interface ConnectedClient {
  client: AppServerClient
  url: string
  config: ResolvedClientConfig
}

/**
 * Pick the app-server URL: --url, then POCKET_AGENT_URL, then config.json.
 */
export function resolveTargetUrl(
  options: ConnectOptions | undefined,
  config: Pick<ResolvedClientConfig, 'url'>
): string {
  const url = options?.url?.trim() || config.url
  if (!url) {
    const error: CommandError = {
      code: 'NO_URL',
      message: '[Config] No app-server URL configured.',
      details: 'Pass --url ws://host:port, set POCKET_AGENT_URL, or add appServer.url to config.json',
    }
    throw error
  }
  return url
}

/**
 * Create and connect a client
 * Returns the connected client or throws if connection fails
 */
export async function connectToAppServer(options?: ConnectOptions): Promise<ConnectedClient> {
  const persisted = loadPersistedConfig()
  const config = resolveClientConfig(persisted)
  const url = resolveTargetUrl(options, config)
  const logger = createRootLogger(persisted)

  const client = new AppServerClient({
    logger: createChildLogger(logger, 'app-server'),
    clientInfo: config.clientInfo,
    minimumCliVersion: config.minimumCliVersion,
    requestTimeoutMs: config.requestTimeoutMs,
    pingIntervalMs: config.pingIntervalMs,
    reconnect: config.reconnect,
  })

  try {
    await client.connect(url)
    return { client, url, config }
  } catch (err) {
    const message = client.lastError ?? formatErrorMessage(err)
    await client.disconnect()
    const error: CommandError = {
      code: 'CONNECT_FAILED',
      message,
      details: `Could not reach app-server at ${url}`,
    }
    throw error
  }
}
