import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, type ConfigIssue } from "../errors.js";

export interface MonitorConfig {
  readonly accessToken: string;
  readonly wsUrl: string;
  readonly protocolVersion: string;
}

const SECURE_WS_PROTOCOL = "wss:";

function protocolOf(value: string): string | null {
  try {
    return new URL(value).protocol;
  } catch {
    return null;
  }
}

const MonitorConfigSchema = z.object({
  accessToken: z.string().trim().min(1, "access_token is required"),
  wsUrl: z
    .string()
    .trim()
    .min(1, "ws_url is required")
    .url("ws_url must be a valid URL")
    .refine((value) => protocolOf(value) === SECURE_WS_PROTOCOL, {
      message: "ws_url must use the wss:// scheme",
    }),
  protocolVersion: z.string().trim().min(1, "version is required"),
});

const FILE_KEYS: Record<keyof MonitorConfig, string> = {
  accessToken: "access_token",
  wsUrl: "ws_url",
  protocolVersion: "version",
};

const FILE_KEY_BY_FIELD = new Map<string, string>(Object.entries(FILE_KEYS));

const FileObjectSchema = z.record(z.unknown());

const ENV_KEYS: Record<keyof MonitorConfig, string> = {
  accessToken: "ACCESS_TOKEN",
  wsUrl: "WS_URL",
  protocolVersion: "PROTOCOL_VERSION",
};

export const DEFAULT_CONFIG_PATH = "./config.json";

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => {
    const field = String(issue.path[0] ?? "");
    const path = FILE_KEY_BY_FIELD.get(field) ?? issue.path.join(".");
    return { path, message: issue.message };
  });
}

/**
 * Validates an already-assembled config. Throws ConfigError listing
 * every bad field; the returned object is frozen.
 */
export function parseMonitorConfig(input: unknown): MonitorConfig {
  const result = MonitorConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  return Object.freeze({ ...result.data });
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(`Cannot read config file "${path}"`, [], { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(`Config file "${path}" is not valid JSON`, [], { cause: err });
  }

  const object = FileObjectSchema.safeParse(parsed);
  if (!object.success || Array.isArray(parsed)) {
    throw new ConfigError(`Config file "${path}" must contain a JSON object`);
  }

  return object.data;
}

interface LoadConfigOptions {
  readonly path?: string;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Reads the connection config from a JSON file, letting environment
 * variables override individual fields. A missing file is fine as long
 * as the environment supplies every field.
 */
export async function loadMonitorConfig(
  options: LoadConfigOptions = {},
): Promise<MonitorConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? env["PULSEWATCH_CONFIG"] ?? DEFAULT_CONFIG_PATH;
  const file = (await readConfigFile(path)) ?? {};

  // empty variables count as unset
  const pick = (field: keyof MonitorConfig): unknown => {
    const fromEnv = env[ENV_KEYS[field]];
    return fromEnv !== undefined && fromEnv !== "" ? fromEnv : file[FILE_KEYS[field]];
  };

  return parseMonitorConfig({
    accessToken: pick("accessToken"),
    wsUrl: pick("wsUrl"),
    protocolVersion: pick("protocolVersion"),
  });
}
