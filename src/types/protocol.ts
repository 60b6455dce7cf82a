import type { ConnectionState } from "../connection/connection-state.js";

/** GET /health response */
export interface HealthResponse {
  readonly status: "ok" | "degraded";
  readonly state: ConnectionState;
  readonly reconnectAttempts: number;
  /** Seconds since the current connection opened */
  readonly uptime: number;
  readonly lastError: string | null;
}

/** Error body for any non-2xx response */
export interface ErrorResponse {
  readonly error: string;
}
