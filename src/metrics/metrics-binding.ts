import type { ConnectionSupervisor } from "../connection/supervisor.js";
import type { SessionMetrics } from "./session-metrics.js";

/** Feeds supervisor events into metrics. Returns the unsubscribe function. */
export function bindSessionMetrics(
  supervisor: ConnectionSupervisor,
  metrics: SessionMetrics,
): () => void {
  return supervisor.subscribe((event) => {
    switch (event.type) {
      case "connected":
        metrics.onConnected(event.at);
        return;
      case "message":
        metrics.onMessage(event.message, event.receivedAt);
        return;
      case "ping":
        metrics.onPingSent(event.at);
        return;
      case "disconnected":
        metrics.onDisconnected(event.reason);
        return;
      case "error":
      case "state":
        return;
    }
  });
}
