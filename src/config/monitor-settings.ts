import { z } from "zod";
import { ConfigError } from "../errors.js";

export interface MonitorSettings {
  readonly logLevel: string;
  readonly logFile: string;
  readonly statusHost: string;
  /** 0 disables the status server */
  readonly statusPort: number;
  readonly terminalDisplay: boolean;
  readonly publishIntervalMs: number;
  readonly pingIntervalMs: number;
  readonly keepaliveTimeoutMs: number;
  readonly connectTimeoutMs: number;
  readonly reconnectMinMs: number;
  readonly reconnectMaxMs: number;
  /** Consecutive failures before giving up; undefined retries forever */
  readonly maxReconnectAttempts: number | undefined;
  readonly latencySampleCapacity: number;
  readonly origin: string | undefined;
  readonly userAgent: string;
  /** Account stats endpoint; undefined disables the dashboard poller */
  readonly dashboardStatsUrl: string | undefined;
  readonly dashboardPollIntervalMs: number;
  readonly dashboardTimeoutMs: number;
}

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const SettingsSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    LOG_FILE: z.string().min(1).default("logs/pulsewatch.log"),
    STATUS_HOST: z.string().min(1).default("127.0.0.1"),
    STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
    TERMINAL_DISPLAY: flag(true),
    PUBLISH_INTERVAL_MS: positiveMs(1_000),
    PING_INTERVAL_MS: positiveMs(10_000),
    KEEPALIVE_TIMEOUT_MS: positiveMs(5_000),
    CONNECT_TIMEOUT_MS: positiveMs(10_000),
    RECONNECT_MIN_MS: positiveMs(1_000),
    RECONNECT_MAX_MS: positiveMs(30_000),
    MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().positive().optional(),
    LATENCY_SAMPLE_CAPACITY: z.coerce.number().int().positive().default(50),
    ORIGIN: z.string().url().optional(),
    USER_AGENT: z.string().min(1).default("pulsewatch"),
    DASHBOARD_STATS_URL: z.string().url().optional(),
    DASHBOARD_POLL_INTERVAL_MS: positiveMs(60_000),
    DASHBOARD_TIMEOUT_MS: positiveMs(10_000),
  })
  .refine((env) => env.RECONNECT_MAX_MS >= env.RECONNECT_MIN_MS, {
    message: "RECONNECT_MAX_MS must be >= RECONNECT_MIN_MS",
    path: ["RECONNECT_MAX_MS"],
  });

/** Empty strings count as unset. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): MonitorSettings {
  const result = SettingsSchema.safeParse(dropEmpty(env));

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid settings: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  const s = result.data;
  return {
    logLevel: s.LOG_LEVEL,
    logFile: s.LOG_FILE,
    statusHost: s.STATUS_HOST,
    statusPort: s.STATUS_PORT,
    terminalDisplay: s.TERMINAL_DISPLAY,
    publishIntervalMs: s.PUBLISH_INTERVAL_MS,
    pingIntervalMs: s.PING_INTERVAL_MS,
    keepaliveTimeoutMs: s.KEEPALIVE_TIMEOUT_MS,
    connectTimeoutMs: s.CONNECT_TIMEOUT_MS,
    reconnectMinMs: s.RECONNECT_MIN_MS,
    reconnectMaxMs: s.RECONNECT_MAX_MS,
    maxReconnectAttempts: s.MAX_RECONNECT_ATTEMPTS,
    latencySampleCapacity: s.LATENCY_SAMPLE_CAPACITY,
    origin: s.ORIGIN,
    userAgent: s.USER_AGENT,
    dashboardStatsUrl: s.DASHBOARD_STATS_URL,
    dashboardPollIntervalMs: s.DASHBOARD_POLL_INTERVAL_MS,
    dashboardTimeoutMs: s.DASHBOARD_TIMEOUT_MS,
  };
}
