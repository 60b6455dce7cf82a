import { vi } from "vitest";
import type { MonitorConfig } from "./config/monitor-config.js";
import type { ConnectionStatus } from "./connection/connection-state.js";
import type { MonitorSocket } from "./connection/socket-factory.js";
import { TransportError } from "./errors.js";
import type { MonitorLogger } from "./logger.js";

export function createSilentLogger(): MonitorLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createTestMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    accessToken: "test-token",
    wsUrl: "wss://node.example.test/websocket",
    protocolVersion: "v0.2",
    ...overrides,
  };
}

export function createTestStatus(overrides: Partial<ConnectionStatus> = {}): ConnectionStatus {
  return {
    state: "connected",
    lastConnectedAt: 0,
    lastDisconnectedAt: null,
    reconnectAttempts: 0,
    connectionAttempts: 1,
    lastError: null,
    ...overrides,
  };
}

export type FakeSocket = MonitorSocket & {
  readonly sent: string[];
  failSends: boolean;
  readonly emitMessage: (data: string) => void;
  readonly emitClose: (code: number, reason?: string) => void;
  readonly emitError: (err: Error) => void;
};

/** In-process stand-in for a websocket returned by openSocket(). */
export function createFakeSocket(): FakeSocket {
  const messageCallbacks: Array<(data: string) => void> = [];
  const closeCallbacks: Array<(code: number, reason: string) => void> = [];
  const errorCallbacks: Array<(err: Error) => void> = [];

  const socket: FakeSocket = {
    sent: [],
    failSends: false,
    send: vi.fn(async (data: string) => {
      if (socket.failSends) {
        throw new TransportError("send", "write EPIPE");
      }
      socket.sent.push(data);
    }),
    close: vi.fn(async (_code?: number, _reason?: string) => {}),
    terminate: vi.fn(),
    onMessage: (callback) => {
      messageCallbacks.push(callback);
    },
    onClose: (callback) => {
      closeCallbacks.push(callback);
    },
    onError: (callback) => {
      errorCallbacks.push(callback);
    },
    emitMessage: (data) => {
      for (const cb of messageCallbacks) cb(data);
    },
    emitClose: (code, reason = "") => {
      for (const cb of closeCallbacks) cb(code, reason);
    },
    emitError: (err) => {
      for (const cb of errorCallbacks) cb(err);
    },
  };

  return socket;
}
