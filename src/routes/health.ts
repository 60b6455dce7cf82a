import type { FastifyInstance } from "fastify";
import type { ErrorResponse, HealthResponse } from "../types/protocol.js";
import type { ConnectionStatus } from "../connection/connection-state.js";
import type { StatusSnapshot } from "../status/status-snapshot.js";

interface HealthDeps {
  readonly getStatus: () => ConnectionStatus;
  readonly getSnapshot: () => StatusSnapshot | null;
  readonly clock?: () => number;
}

export function registerHealthRoute(
  app: FastifyInstance,
  deps: HealthDeps,
): void {
  const clock = deps.clock ?? Date.now;

  app.get("/health", async (): Promise<HealthResponse> => {
    const status = deps.getStatus();
    const connected = status.state === "connected";
    const uptimeMs =
      connected && status.lastConnectedAt !== null ? clock() - status.lastConnectedAt : 0;

    return {
      status: connected ? "ok" : "degraded",
      state: status.state,
      reconnectAttempts: status.reconnectAttempts,
      uptime: Math.max(0, Math.round(uptimeMs / 1000)),
      lastError: status.lastError,
    };
  });

  app.get("/status", async (_request, reply): Promise<StatusSnapshot | ErrorResponse> => {
    const snapshot = deps.getSnapshot();
    if (snapshot === null) {
      reply.code(503);
      return { error: "No status published yet" };
    }
    return snapshot;
  });
}
