import type { StatusSnapshot } from "./status-snapshot.js";

const pad = (n: number): string => String(n).padStart(2, "0");

/** 3_725_000 → "01:02:05" */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

export function formatLatency(ms: number | null): string {
  return ms === null ? "N/A" : `${ms.toFixed(1)}ms`;
}

export function formatPoints(points: number): string {
  return Math.floor(points).toLocaleString("en-US");
}

/** 840_000 → "14:00" */
export function formatCountdown(ms: number | null): string {
  if (ms === null) return "--:--";
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  return `${pad(Math.floor(totalSeconds / 60))}:${pad(totalSeconds % 60)}`;
}

function formatDifference(diff: number): string {
  return `${diff > 0 ? "+" : ""}${formatPoints(diff)}`;
}

export function renderStatusLine(snapshot: StatusSnapshot): string {
  const parts = [
    `[${snapshot.state.toUpperCase()}]`,
    `runtime ${formatDuration(snapshot.runtimeMs)}`,
    `uptime ${formatDuration(snapshot.uptimeMs)}`,
    `points ${formatPoints(snapshot.pointTotal)} (today ${formatPoints(snapshot.pointsToday)})`,
    `heartbeats ${snapshot.heartbeatsToday}/${snapshot.maxHeartbeatsPerDay} (${snapshot.heartbeatPercent.toFixed(1)}%)`,
    `next heartbeat ${formatCountdown(snapshot.nextHeartbeatInMs)}`,
    `latency ${formatLatency(snapshot.latestLatencyMs)} avg ${formatLatency(snapshot.latency.average)}`,
    `pings ${snapshot.pingCount}`,
    `reconnects ${snapshot.reconnectAttempts}`,
  ];

  if (snapshot.dashboardPointsToday !== null && snapshot.pointsTodayDifference !== null) {
    parts.splice(
      4,
      0,
      `dashboard today ${formatPoints(snapshot.dashboardPointsToday)} (${formatDifference(snapshot.pointsTodayDifference)})`,
    );
  }

  if (snapshot.lastErrorMessage !== null && snapshot.state !== "connected") {
    parts.push(`last error: ${snapshot.lastErrorMessage}`);
  }

  return parts.join(" | ");
}
