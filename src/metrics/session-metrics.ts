import type { InboundMessage } from "../protocol/messages.js";

export const DEFAULT_LATENCY_CAPACITY = 50;
export const POINTS_PER_HEARTBEAT = 75;
export const MAX_HEARTBEATS_PER_DAY = 96;
export const HEARTBEAT_INTERVAL_MS = 15 * 60 * 1000;

export interface LatencyStats {
  readonly current: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly average: number | null;
  readonly samples: number;
}

/** One consistent read of every metric, taken in a single call. */
export interface MetricsView {
  readonly connected: boolean;
  readonly connectedAt: number | null;
  readonly uptimeMs: number;
  readonly lastMessageAt: number | null;
  readonly lastPulseAt: number | null;
  readonly pointTotal: number;
  readonly pointsToday: number;
  readonly heartbeatsToday: number;
  /** heartbeatsToday as a share of the daily maximum, 0-100 */
  readonly heartbeatPercent: number;
  /** Pulses that arrived at least one heartbeat interval apart this session */
  readonly heartbeatsObserved: number;
  /** null until the first connect */
  readonly nextHeartbeatInMs: number | null;
  readonly pingCount: number;
  readonly latency: LatencyStats;
  readonly lastDisconnectReason: string | null;
}

export interface SessionMetrics {
  readonly onConnected: (at: number) => void;
  readonly onMessage: (payload: InboundMessage, at: number) => void;
  readonly onPingSent: (at: number) => void;
  readonly onDisconnected: (reason: string) => void;
  readonly uptime: (now: number) => number;
  readonly latestLatency: () => number | undefined;
  readonly latencySamples: () => readonly number[];
  readonly latencyStats: () => LatencyStats;
  readonly pointTotal: () => number;
  readonly view: (now: number) => MetricsView;
}

export interface SessionMetricsOptions {
  readonly latencyCapacity?: number;
  readonly heartbeatIntervalMs?: number;
}

function isCount(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value >= 0;
}

/**
 * In-memory session statistics fed by supervisor events.
 *
 * Never does I/O or reads a clock: every timestamp comes from the caller.
 * pointTotal only moves up; latency samples live in a fixed-size FIFO
 * and every latency figure is computed over what the FIFO holds.
 */
export function createSessionMetrics(options: SessionMetricsOptions = {}): SessionMetrics {
  const capacity = Math.max(1, Math.floor(options.latencyCapacity ?? DEFAULT_LATENCY_CAPACITY));
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;

  let connectedAt: number | null = null;
  let lastMessageAt: number | null = null;
  let lastPulseAt: number | null = null;
  let pointTotal = 0;
  let pointsToday = 0;
  let pingCount = 0;
  let lastDisconnectReason: string | null = null;
  const samples: number[] = [];
  let lastHeartbeatAt: number | null = null;
  let heartbeatsObserved = 0;

  function recordLatency(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) return;
    samples.push(ms);
    if (samples.length > capacity) {
      samples.shift();
    }
  }

  function notePulse(at: number): void {
    if (lastHeartbeatAt === null) {
      lastHeartbeatAt = at;
    } else if (at - lastHeartbeatAt >= heartbeatIntervalMs) {
      heartbeatsObserved += 1;
      lastHeartbeatAt = at;
    }
  }

  function nextHeartbeatIn(now: number): number | null {
    if (lastHeartbeatAt === null) return null;
    return Math.max(0, heartbeatIntervalMs - (now - lastHeartbeatAt));
  }

  function applyBalance(total: number | null, today: number | null): void {
    if (isCount(total)) {
      pointTotal = Math.max(pointTotal, total);
    }
    if (isCount(today)) {
      pointsToday = today;
    }
  }

  function latencyStats(): LatencyStats {
    const count = samples.length;
    const sum = samples.reduce((acc, ms) => acc + ms, 0);
    return {
      current: count > 0 ? (samples[count - 1] ?? null) : null,
      min: count > 0 ? Math.min(...samples) : null,
      max: count > 0 ? Math.max(...samples) : null,
      average: count > 0 ? sum / count : null,
      samples: count,
    };
  }

  function uptime(now: number): number {
    return connectedAt === null ? 0 : Math.max(0, now - connectedAt);
  }

  return {
    onConnected(at: number): void {
      connectedAt = at;
      lastMessageAt = null;
      lastHeartbeatAt = at;
    },

    onMessage(payload: InboundMessage, at: number): void {
      lastMessageAt = at;

      switch (payload.kind) {
        case "welcome":
          applyBalance(payload.pointsTotal, payload.pointsToday);
          return;
        case "pulse":
          lastPulseAt = at;
          notePulse(at);
          applyBalance(payload.pointsTotal, payload.pointsToday);
          return;
        case "points":
          if (Number.isFinite(payload.delta) && payload.delta > 0) {
            pointTotal += payload.delta;
            pointsToday += payload.delta;
          }
          return;
        case "pong":
          if (payload.roundTripMs !== null) recordLatency(payload.roundTripMs);
          return;
        case "unknown":
          return;
      }
    },

    onPingSent(): void {
      pingCount += 1;
    },

    onDisconnected(reason: string): void {
      connectedAt = null;
      lastDisconnectReason = reason;
    },

    uptime,

    latestLatency(): number | undefined {
      return samples[samples.length - 1];
    },

    latencySamples(): readonly number[] {
      return [...samples];
    },

    latencyStats,

    pointTotal(): number {
      return pointTotal;
    },

    view(now: number): MetricsView {
      const heartbeatsToday = Math.floor(pointsToday / POINTS_PER_HEARTBEAT);
      return {
        connected: connectedAt !== null,
        connectedAt,
        uptimeMs: uptime(now),
        lastMessageAt,
        lastPulseAt,
        pointTotal,
        pointsToday,
        heartbeatsToday,
        heartbeatPercent: (heartbeatsToday / MAX_HEARTBEATS_PER_DAY) * 100,
        heartbeatsObserved,
        nextHeartbeatInMs: nextHeartbeatIn(now),
        pingCount,
        latency: latencyStats(),
        lastDisconnectReason,
      };
    },
  };
}
