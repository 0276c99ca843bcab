/**
 * Server configuration from environment variables, validated with zod.
 */

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CORS_ALLOWED_ORIGINS: z.string().default("*"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),
  AUTH_JWT_SECRET: z.string().min(1).optional(),
  AUTH_REQUIRED: booleanFlag(true),
  CHAT_MAX_ROOMS: positiveInt(100),
  CHAT_QUEUE_TIMEOUT_MS: positiveInt(300_000),
  CHAT_ROOM_CLEANUP_INTERVAL_MS: positiveInt(300_000),
  CHAT_PROMOTION_INTERVAL_MS: positiveInt(5_000),
  CHAT_QUEUE_SWEEP_INTERVAL_MS: positiveInt(30_000),
  WS_PATH: z.string().startsWith("/").default("/ws/chat"),
  WS_MAX_MESSAGE_BYTES: positiveInt(8192),
  WS_PING_INTERVAL_MS: positiveInt(30_000),
});

export interface ServerConfig {
  host: string;
  port: number;
  corsAllowedOrigins: string[];
  log: {
    level: z.infer<typeof envSchema>["LOG_LEVEL"];
    format: z.infer<typeof envSchema>["LOG_FORMAT"];
  };
  auth: {
    jwtSecret?: string;
    required: boolean;
  };
  chat: {
    maxRooms: number;
    queueTimeoutMs: number;
    roomCleanupIntervalMs: number;
    promotionIntervalMs: number;
    queueSweepIntervalMs: number;
  };
  ws: {
    path: string;
    maxMessageBytes: number;
    pingIntervalMs: number;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

function parseOrigins(raw: string): string[] {
  return raw
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  const origins = parseOrigins(e.CORS_ALLOWED_ORIGINS);
  return {
    host: e.HOST,
    port: e.PORT,
    corsAllowedOrigins: origins.length > 0 ? origins : ["*"],
    log: { level: e.LOG_LEVEL, format: e.LOG_FORMAT },
    auth: { jwtSecret: e.AUTH_JWT_SECRET, required: e.AUTH_REQUIRED },
    chat: {
      maxRooms: e.CHAT_MAX_ROOMS,
      queueTimeoutMs: e.CHAT_QUEUE_TIMEOUT_MS,
      roomCleanupIntervalMs: e.CHAT_ROOM_CLEANUP_INTERVAL_MS,
      promotionIntervalMs: e.CHAT_PROMOTION_INTERVAL_MS,
      queueSweepIntervalMs: e.CHAT_QUEUE_SWEEP_INTERVAL_MS,
    },
    ws: {
      path: e.WS_PATH,
      maxMessageBytes: e.WS_MAX_MESSAGE_BYTES,
      pingIntervalMs: e.WS_PING_INTERVAL_MS,
    },
  };
}
