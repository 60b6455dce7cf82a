export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
  readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[] = [], options?: ErrorOptions) {
    super(message, options);
    this.issues = issues;
  }
}

export type TransportErrorKind =
  | "connect"
  | "timeout"
  | "read"
  | "send"
  | "keepalive"
  | "closed";

/** Any socket-level failure. Always absorbed by the reconnect loop. */
export class TransportError extends Error {
  override readonly name = "TransportError";
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
  }
}

const MAX_RAW_LENGTH = 200;

/** A single inbound frame that could not be decoded. */
export class ProtocolError extends Error {
  override readonly name = "ProtocolError";
  readonly raw: string;

  constructor(message: string, raw: string, options?: ErrorOptions) {
    super(message, options);
    this.raw = raw.length > MAX_RAW_LENGTH ? `${raw.slice(0, MAX_RAW_LENGTH)}…` : raw;
  }
}

/** A display sink refused a snapshot. */
export class PublishError extends Error {
  override readonly name = "PublishError";
  readonly sink: string;

  constructor(sink: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.sink = sink;
  }
}

/** The dashboard stats endpoint could not be read. Logged, never fatal. */
export class DashboardError extends Error {
  override readonly name = "DashboardError";
  /** HTTP status, when the server answered */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
