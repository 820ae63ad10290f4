import {
  DEFAULT_CLIENT_INFO,
  DEFAULT_PING_INTERVAL_MS,
  DEFAULT_RECONNECT_BASE_DELAY_MS,
  DEFAULT_RECONNECT_MAX_ATTEMPTS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MINIMUM_CLI_VERSION,
} from "../client/app-server-client.js";
import type { PersistedConfig } from "./persisted-config.js";

export interface ResolvedClientConfig {
  /** App-server endpoint, if one is configured. */
  url: string | undefined;
  clientInfo: { name: string; version: string };
  minimumCliVersion: string;
  requestTimeoutMs: number;
  pingIntervalMs: number;
  reconnect: {
    enabled: boolean;
    maxAttempts: number;
    baseDelayMs: number;
  };
}

/** Environment over `config.json` over built-in defaults. */
export function resolveClientConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientConfig {
  const appServer = persistedConfig?.appServer;
  const url = env.POCKET_AGENT_URL?.trim() || appServer?.url?.trim() || undefined;

  return {
    url,
    clientInfo: {
      name: persistedConfig?.clientInfo?.name ?? DEFAULT_CLIENT_INFO.name,
      version: persistedConfig?.clientInfo?.version ?? DEFAULT_CLIENT_INFO.version,
    },
    minimumCliVersion: appServer?.minimumCliVersion ?? MINIMUM_CLI_VERSION,
    requestTimeoutMs: appServer?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    pingIntervalMs: appServer?.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS,
    reconnect: {
      enabled: appServer?.reconnect?.enabled ?? true,
      maxAttempts: appServer?.reconnect?.maxAttempts ?? DEFAULT_RECONNECT_MAX_ATTEMPTS,
      baseDelayMs: appServer?.reconnect?.baseDelayMs ?? DEFAULT_RECONNECT_BASE_DELAY_MS,
    },
  };
}
