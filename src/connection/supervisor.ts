import { parseMonitorConfig, type MonitorConfig } from "../config/monitor-config.js";
import { ProtocolError, TransportError, errorMessage, type TransportErrorKind } from "../errors.js";
import type { MonitorLogger } from "../logger.js";
import type { InboundMessage, MessageCodec } from "../protocol/messages.js";
import { createNodeCodec } from "../protocol/node-codec.js";
import { computeBackoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from "./backoff.js";
import {
  canTransition,
  createInitialStatus,
  type ConnectionState,
  type ConnectionStatus,
} from "./connection-state.js";
import { openSocket, type MonitorSocket } from "./socket-factory.js";

/** Mutable version of ConnectionStatus for internal state tracking */
interface MutableStatus {
  state: ConnectionState;
  lastConnectedAt: number | null;
  lastDisconnectedAt: number | null;
  reconnectAttempts: number;
  connectionAttempts: number;
  lastError: string | null;
}

interface ActiveRun {
  readonly id: number;
  readonly config: MonitorConfig;
  readonly abort: AbortController;
}

export type SupervisorEvent =
  | { readonly type: "connected"; readonly at: number }
  | { readonly type: "message"; readonly message: InboundMessage; readonly receivedAt: number }
  | { readonly type: "ping"; readonly at: number }
  | { readonly type: "disconnected"; readonly reason: string; readonly at: number }
  | { readonly type: "error"; readonly error: TransportError | ProtocolError }
  | { readonly type: "state"; readonly status: ConnectionStatus };

export type SupervisorListener = (event: SupervisorEvent) => void;

const DEFAULT_PING_INTERVAL_MS = 10_000;
const DEFAULT_KEEPALIVE_TIMEOUT_MS = 5_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const NORMAL_CLOSURE = 1000;

export interface ConnectionSupervisorOptions {
  readonly logger: MonitorLogger;
  readonly codec?: MessageCodec;
  readonly backoff?: BackoffPolicy;
  readonly pingIntervalMs?: number;
  readonly keepaliveTimeoutMs?: number;
  readonly connectTimeoutMs?: number;
  /** Consecutive failures before entering "failed"; omit to retry forever */
  readonly maxReconnectAttempts?: number;
  readonly headers?: Readonly<Record<string, string>>;
  readonly clock?: () => number;
  readonly random?: () => number;
}

export interface ConnectionSupervisor {
  /** Throws ConfigError before touching the network. No-op while a run is active. */
  readonly start: (config: MonitorConfig) => void;
  readonly stop: () => Promise<void>;
  readonly subscribe: (listener: SupervisorListener) => () => void;
  readonly getStatus: () => ConnectionStatus;
  /** false when there is no open connection to send on */
  readonly send: (data: string) => Promise<boolean>;
}

/** Endpoint without query string or credentials, safe to log. */
export function describeEndpoint(wsUrl: string): string {
  const url = new URL(wsUrl);
  return `${url.protocol}//${url.host}${url.pathname}`;
}

export function buildConnectUrl(config: MonitorConfig): string {
  const url = new URL(config.wsUrl);
  url.searchParams.set("accessToken", config.accessToken);
  url.searchParams.set("version", config.protocolVersion);
  return url.toString();
}

function toTransportError(err: unknown, kind: TransportErrorKind): TransportError {
  return err instanceof TransportError
    ? err
    : new TransportError(kind, errorMessage(err), { cause: err });
}

/**
 * Keeps one websocket to the node service alive.
 *
 * Failed handshakes and dropped sockets go through "reconnecting" with
 * exponential backoff; a keepalive ping detects half-open sockets that
 * never report a close. Every callback carries the id of the run that
 * created it, so anything that fires after stop() or a newer start()
 * is ignored.
 */
export function createConnectionSupervisor(
  options: ConnectionSupervisorOptions,
): ConnectionSupervisor {
  const { logger } = options;
  const codec = options.codec ?? createNodeCodec();
  const backoff = options.backoff ?? DEFAULT_BACKOFF;
  const pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
  const keepaliveTimeoutMs = options.keepaliveTimeoutMs ?? DEFAULT_KEEPALIVE_TIMEOUT_MS;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const maxReconnectAttempts = options.maxReconnectAttempts;
  const headers = options.headers ?? {};
  const clock = options.clock ?? Date.now;
  const random = options.random ?? Math.random;

  const listeners = new Set<SupervisorListener>();
  const status: MutableStatus = { ...createInitialStatus() };

  let runCounter = 0;
  let run: ActiveRun | null = null;
  let socket: MonitorSocket | null = null;
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  let pingTimer: ReturnType<typeof setInterval> | null = null;
  let keepaliveTimer: ReturnType<typeof setTimeout> | null = null;
  let pendingPingAt: number | null = null;

  function snapshotStatus(): ConnectionStatus {
    return Object.freeze({ ...status });
  }

  function emit(event: SupervisorEvent): void {
    for (const listener of [...listeners]) {
      try {
        listener(event);
      } catch (err: unknown) {
        logger.error(`Supervisor listener failed on "${event.type}": ${errorMessage(err)}`);
      }
    }
  }

  function transitionTo(state: ConnectionState): void {
    if (status.state === state) return;
    if (!canTransition(status.state, state)) {
      throw new Error(`Illegal connection transition: ${status.state} → ${state}`);
    }
    logger.info(`Connection: ${status.state} → ${state}`);

    status.state = state;
    if (state === "connected") {
      status.lastConnectedAt = clock();
      status.reconnectAttempts = 0;
      status.lastError = null;
    } else if (state === "disconnected" || state === "reconnecting") {
      status.lastDisconnectedAt = clock();
    }
    emit({ type: "state", status: snapshotStatus() });
  }

  function isCurrent(id: number): boolean {
    return run !== null && run.id === id;
  }

  function stopKeepalive(): void {
    if (pingTimer !== null) {
      clearInterval(pingTimer);
      pingTimer = null;
    }
    if (keepaliveTimer !== null) {
      clearTimeout(keepaliveTimer);
      keepaliveTimer = null;
    }
    pendingPingAt = null;
  }

  function dropSocket(): void {
    stopKeepalive();
    const current = socket;
    socket = null;
    current?.terminate();
  }

  function handleFailure(id: number, err: TransportError): void {
    if (!isCurrent(id)) return;

    const wasConnected = status.state === "connected";
    dropSocket();

    status.reconnectAttempts += 1;
    status.lastError = err.message;
    logger.error(`Transport failure (${err.kind}): ${err.message}`);
    emit({ type: "error", error: err });
    if (wasConnected) {
      emit({ type: "disconnected", reason: err.message, at: clock() });
    }

    if (maxReconnectAttempts !== undefined && status.reconnectAttempts >= maxReconnectAttempts) {
      logger.error(`Giving up after ${status.reconnectAttempts} consecutive failures`);
      run = null;
      if (wasConnected) transitionTo("reconnecting");
      transitionTo("failed");
      return;
    }

    scheduleReconnect(id);
  }

  function scheduleReconnect(id: number): void {
    if (reconnectTimer !== null) return;

    const delay = computeBackoffDelay(status.reconnectAttempts - 1, backoff, random);
    transitionTo("reconnecting");
    logger.info(`Reconnect attempt ${status.reconnectAttempts} in ${delay}ms`);

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      if (!isCurrent(id)) return;
      transitionTo("connecting");
      launchConnect(id);
    }, delay);
  }

  function sendPing(id: number): void {
    const current = socket;
    if (!isCurrent(id) || current === null) return;

    const sentAt = clock();
    pendingPingAt = sentAt;

    if (keepaliveTimer === null) {
      keepaliveTimer = setTimeout(() => {
        keepaliveTimer = null;
        handleFailure(
          id,
          new TransportError("keepalive", `No response within ${keepaliveTimeoutMs}ms of ping`),
        );
      }, keepaliveTimeoutMs);
    }

    // counted only once the frame is written
    void current.send(codec.encodePing()).then(
      () => {
        if (socket === current) emit({ type: "ping", at: sentAt });
      },
      (err: unknown) => {
        if (socket === current) handleFailure(id, toTransportError(err, "send"));
      },
    );
  }

  function handleFrame(id: number, raw: string): void {
    if (!isCurrent(id)) return;

    const receivedAt = clock();
    // any frame proves the socket is alive
    if (keepaliveTimer !== null) {
      clearTimeout(keepaliveTimer);
      keepaliveTimer = null;
    }

    let message: InboundMessage;
    try {
      message = codec.decode(raw);
    } catch (err: unknown) {
      const protocolErr =
        err instanceof ProtocolError ? err : new ProtocolError(errorMessage(err), raw, { cause: err });
      logger.warn(`Discarding inbound frame: ${protocolErr.message}`);
      emit({ type: "error", error: protocolErr });
      return;
    }

    if (message.kind === "pong") {
      message = {
        kind: "pong",
        roundTripMs: pendingPingAt === null ? null : receivedAt - pendingPingAt,
      };
      pendingPingAt = null;
    }

    emit({ type: "message", message, receivedAt });
  }

  function attach(id: number, opened: MonitorSocket): void {
    socket = opened;

    opened.onMessage((raw) => {
      if (socket === opened) handleFrame(id, raw);
    });
    opened.onClose((code, reason) => {
      if (socket !== opened) return;
      const detail = reason ? `: ${reason}` : "";
      handleFailure(id, new TransportError("closed", `Connection closed (code ${code}${detail})`));
    });
    opened.onError((err) => {
      if (socket !== opened) return;
      handleFailure(id, new TransportError("read", err.message, { cause: err }));
    });
  }

  async function connect(id: number): Promise<void> {
    const active = run;
    if (active === null || active.id !== id) return;

    status.connectionAttempts += 1;
    logger.info(
      `Connecting to ${describeEndpoint(active.config.wsUrl)} (attempt ${status.connectionAttempts})`,
    );

    let opened: MonitorSocket;
    try {
      opened = await openSocket({
        url: buildConnectUrl(active.config),
        headers,
        timeoutMs: connectTimeoutMs,
        signal: active.abort.signal,
      });
    } catch (err: unknown) {
      handleFailure(id, toTransportError(err, "connect"));
      return;
    }

    if (!isCurrent(id)) {
      opened.terminate();
      return;
    }

    attach(id, opened);
    transitionTo("connected");
    emit({ type: "connected", at: clock() });

    pingTimer = setInterval(() => sendPing(id), pingIntervalMs);
    sendPing(id);
  }

  function launchConnect(id: number): void {
    connect(id).catch((err: unknown) => {
      logger.error(`Connect loop crashed: ${errorMessage(err)}`);
    });
  }

  return {
    start(config: MonitorConfig): void {
      const validated = parseMonitorConfig(config);
      if (run !== null) return;

      runCounter += 1;
      run = { id: runCounter, config: validated, abort: new AbortController() };
      status.reconnectAttempts = 0;
      status.lastError = null;

      transitionTo("connecting");
      launchConnect(runCounter);
    },

    async stop(): Promise<void> {
      const active = run;
      run = null;
      active?.abort.abort();

      if (reconnectTimer !== null) {
        clearTimeout(reconnectTimer);
        reconnectTimer = null;
      }
      stopKeepalive();

      const wasConnected = status.state === "connected";
      const current = socket;
      socket = null;

      if (status.state !== "disconnected") {
        transitionTo("disconnected");
      }
      if (wasConnected) {
        emit({ type: "disconnected", reason: "stopped", at: clock() });
      }

      if (current !== null) {
        await current.close(NORMAL_CLOSURE, "client shutdown");
      }
    },

    subscribe(listener: SupervisorListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    getStatus(): ConnectionStatus {
      return snapshotStatus();
    },

    async send(data: string): Promise<boolean> {
      const current = socket;
      const active = run;
      if (current === null || active === null || status.state !== "connected") {
        return false;
      }

      try {
        await current.send(data);
        return true;
      } catch (err: unknown) {
        if (socket === current) handleFailure(active.id, toTransportError(err, "send"));
        return false;
      }
    },
  };
}
