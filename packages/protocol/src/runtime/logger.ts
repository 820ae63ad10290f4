import pino from "pino";
import type { z } from "zod";
import {
  LogFormatSchema,
  LogLevelSchema,
  type PersistedConfig,
} from "./persisted-config.js";

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

// Unrecognised values fall through to the config file.
function readEnv<T>(schema: z.ZodType<T>, raw: string | undefined): T | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const result = schema.safeParse(raw.trim().toLowerCase());
  return result.success ? result.data : undefined;
}

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = readEnv(LogLevelSchema, env.POCKET_AGENT_LOG);
  const envFormat = readEnv(LogFormatSchema, env.POCKET_AGENT_LOG_FORMAT);

  const level: LogLevel = envLevel ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat = envFormat ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): pino.Logger {
  const config = resolveLogConfig(persistedConfig, env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined;

  return pino(
    {
      level: config.level,
      transport,
    },
    transport ? undefined : pino.destination(2)
  );
}

export function createChildLogger(parent: pino.Logger, name: string): pino.Logger {
  return parent.child({ name });
}
