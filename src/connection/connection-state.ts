export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting"
  | "failed";

export interface ConnectionStatus {
  readonly state: ConnectionState;
  readonly lastConnectedAt: number | null;
  readonly lastDisconnectedAt: number | null;
  /** Consecutive failed attempts since the last successful connect */
  readonly reconnectAttempts: number;
  /** Every handshake attempted in this process */
  readonly connectionAttempts: number;
  readonly lastError: string | null;
}

const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  disconnected: ["connecting"],
  connecting: ["connected", "reconnecting", "disconnected", "failed"],
  connected: ["reconnecting", "disconnected"],
  reconnecting: ["connecting", "disconnected", "failed"],
  failed: ["connecting", "disconnected"],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function createInitialStatus(): ConnectionStatus {
  return {
    state: "disconnected",
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    reconnectAttempts: 0,
    connectionAttempts: 0,
    lastError: null,
  };
}
