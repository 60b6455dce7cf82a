import type { ConnectionState, ConnectionStatus } from "../connection/connection-state.js";
import type { DashboardStats } from "../dashboard/dashboard-poller.js";
import {
  MAX_HEARTBEATS_PER_DAY,
  type LatencyStats,
  type MetricsView,
} from "../metrics/session-metrics.js";

export interface StatusSnapshot {
  readonly capturedAt: number;
  readonly state: ConnectionState;
  /** Time since the current connection opened; 0 unless connected */
  readonly uptimeMs: number;
  /** Time since the monitor started */
  readonly runtimeMs: number;
  readonly latestLatencyMs: number | null;
  readonly pointTotal: number;
  readonly pointsToday: number;
  readonly heartbeatsToday: number;
  readonly maxHeartbeatsPerDay: number;
  readonly heartbeatPercent: number;
  readonly heartbeatsObserved: number;
  readonly nextHeartbeatInMs: number | null;
  /** null until the dashboard has answered once */
  readonly dashboardPointsToday: number | null;
  /** pointsToday minus dashboardPointsToday */
  readonly pointsTodayDifference: number | null;
  readonly latency: LatencyStats;
  readonly pingCount: number;
  readonly reconnectAttempts: number;
  readonly connectionAttempts: number;
  readonly lastMessageAt: number | null;
  readonly lastPulseAt: number | null;
  readonly lastErrorMessage: string | null;
}

export function buildSnapshot(
  status: ConnectionStatus,
  view: MetricsView,
  now: number,
  startedAt: number,
  dashboard: DashboardStats | null = null,
): StatusSnapshot {
  const connected = status.state === "connected";

  return Object.freeze({
    capturedAt: now,
    state: status.state,
    uptimeMs: connected ? view.uptimeMs : 0,
    runtimeMs: Math.max(0, now - startedAt),
    latestLatencyMs: view.latency.current,
    pointTotal: view.pointTotal,
    pointsToday: view.pointsToday,
    heartbeatsToday: view.heartbeatsToday,
    maxHeartbeatsPerDay: MAX_HEARTBEATS_PER_DAY,
    heartbeatPercent: view.heartbeatPercent,
    heartbeatsObserved: view.heartbeatsObserved,
    nextHeartbeatInMs: view.nextHeartbeatInMs,
    dashboardPointsToday: dashboard?.pointsToday ?? null,
    pointsTodayDifference: dashboard === null ? null : view.pointsToday - dashboard.pointsToday,
    latency: Object.freeze({ ...view.latency }),
    pingCount: view.pingCount,
    reconnectAttempts: status.reconnectAttempts,
    connectionAttempts: status.connectionAttempts,
    lastMessageAt: view.lastMessageAt,
    lastPulseAt: view.lastPulseAt,
    lastErrorMessage: status.lastError ?? view.lastDisconnectReason,
  });
}
