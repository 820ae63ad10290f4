import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import type pino from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

const LogConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    format: LogFormatSchema.optional(),
  })
  .strict();

const ReconnectConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    maxAttempts: z.number().int().min(0).optional(),
    baseDelayMs: z.number().int().positive().optional(),
  })
  .strict();

const AppServerConfigSchema = z
  .object({
    url: z.string().optional(),
    minimumCliVersion: z.string().min(1).optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    pingIntervalMs: z.number().int().positive().optional(),
    reconnect: ReconnectConfigSchema.optional(),
  })
  .strict();

const ClientInfoSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
  })
  .strict();

export const PersistedConfigSchema = z
  .object({
    // v1 schema marker
    version: z.literal(1).optional(),
    log: LogConfigSchema.optional(),
    appServer: AppServerConfigSchema.optional(),
    clientInfo: ClientInfoSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

const CONFIG_FILENAME = "config.json";
const DEFAULT_HOME_DIRNAME = ".pocket-agent";
const DEFAULT_PERSISTED_CONFIG: PersistedConfig = PersistedConfigSchema.parse({
  version: 1,
  appServer: {
    reconnect: {
      enabled: true,
    },
  },
});

/**
 * Directory holding config.json: POCKET_AGENT_HOME (with `~` expanded), else
 * ~/.pocket-agent. Nothing is created here; the directory appears on first write.
 */
export function resolveConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.POCKET_AGENT_HOME?.trim();
  if (!configured) {
    return path.join(os.homedir(), DEFAULT_HOME_DIRNAME);
  }
  if (configured === "~" || configured.startsWith("~/")) {
    return path.join(os.homedir(), configured.slice(1));
  }
  return path.resolve(configured);
}

export function getConfigPath(home: string): string {
  return path.join(home, CONFIG_FILENAME);
}

function getLogger(logger: pino.Logger | undefined): pino.Logger | undefined {
  return logger?.child({ module: "config" });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function loadPersistedConfig(
  home: string = resolveConfigHome(),
  logger?: pino.Logger
): PersistedConfig {
  const log = getLogger(logger);
  const configPath = getConfigPath(home);

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info(`Initialized config file at ${configPath}`);
    } catch (err) {
      throw new Error(`[Config] Failed to initialize ${configPath}: ${errorMessage(err)}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new Error(`[Config] Failed to read ${configPath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${errorMessage(err)}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }

  log?.info(`Loaded from ${configPath}`);
  return result.data;
}

export function savePersistedConfig(
  home: string,
  config: PersistedConfig,
  logger?: pino.Logger
): void {
  const log = getLogger(logger);
  const configPath = getConfigPath(home);

  const result = PersistedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`[Config] Invalid config to save:\n${formatIssues(result.error)}`);
  }

  try {
    mkdirSync(path.dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(result.data, null, 2) + "\n");
    log?.info(`Saved to ${configPath}`);
  } catch (err) {
    throw new Error(`[Config] Failed to write ${configPath}: ${errorMessage(err)}`);
  }
}
