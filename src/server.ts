import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import type { ConnectionStatus } from "./connection/connection-state.js";
import type { StatusSnapshot } from "./status/status-snapshot.js";
import { registerHealthRoute } from "./routes/health.js";

interface BuildServerDeps {
  readonly logger: FastifyBaseLogger;
  readonly getStatus: () => ConnectionStatus;
  readonly getSnapshot: () => StatusSnapshot | null;
  readonly clock?: () => number;
}

export async function buildServer(
  deps: BuildServerDeps,
): Promise<FastifyInstance> {
  const app = Fastify({
    loggerInstance: deps.logger,
  });

  registerHealthRoute(app, {
    getStatus: deps.getStatus,
    getSnapshot: deps.getSnapshot,
    clock: deps.clock,
  });

  await app.ready();
  return app;
}
