#!/usr/bin/env node
import dotenv from "dotenv";
import type { FastifyInstance } from "fastify";
import { loadMonitorConfig } from "./config/monitor-config.js";
import { loadSettings } from "./config/monitor-settings.js";
import { createConnectionSupervisor, describeEndpoint } from "./connection/supervisor.js";
import { createDashboardPoller } from "./dashboard/dashboard-poller.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createFileDestination, createLogger, toMonitorLogger } from "./logger.js";
import { bindSessionMetrics } from "./metrics/metrics-binding.js";
import { createSessionMetrics } from "./metrics/session-metrics.js";
import { buildServer } from "./server.js";
import { createLatestSnapshotSink, createTerminalSink } from "./status/sinks.js";
import { createStatusPublisher, type DisplaySink } from "./status/status-publisher.js";

const EXIT_OK = 0;
const EXIT_CONFIG = 1;
const EXIT_FATAL = 2;

async function main(): Promise<number> {
  dotenv.config();

  const settings = loadSettings();
  const config = await loadMonitorConfig();

  const log = createLogger(
    settings.logLevel,
    settings.terminalDisplay ? createFileDestination(settings.logFile) : undefined,
  );
  const logger = toMonitorLogger(log);

  const headers: Record<string, string> = { "User-Agent": settings.userAgent };
  if (settings.origin !== undefined) {
    headers["Origin"] = settings.origin;
  }

  const metrics = createSessionMetrics({ latencyCapacity: settings.latencySampleCapacity });
  const supervisor = createConnectionSupervisor({
    logger,
    pingIntervalMs: settings.pingIntervalMs,
    keepaliveTimeoutMs: settings.keepaliveTimeoutMs,
    connectTimeoutMs: settings.connectTimeoutMs,
    maxReconnectAttempts: settings.maxReconnectAttempts,
    backoff: {
      minDelayMs: settings.reconnectMinMs,
      maxDelayMs: settings.reconnectMaxMs,
      jitter: 1,
    },
    headers,
  });
  bindSessionMetrics(supervisor, metrics);

  const dashboard =
    settings.dashboardStatsUrl === undefined
      ? undefined
      : createDashboardPoller({
          url: settings.dashboardStatsUrl,
          accessToken: config.accessToken,
          intervalMs: settings.dashboardPollIntervalMs,
          timeoutMs: settings.dashboardTimeoutMs,
          headers,
          logger,
        });

  const latestSink = createLatestSnapshotSink();
  const sinks: DisplaySink[] = [latestSink];
  if (settings.terminalDisplay) {
    sinks.push(createTerminalSink());
  }

  const publisher = createStatusPublisher({
    intervalMs: settings.publishIntervalMs,
    supervisor,
    metrics,
    dashboard,
    sinks,
    logger,
  });

  let app: FastifyInstance | undefined;
  if (settings.statusPort > 0) {
    app = await buildServer({
      logger: log,
      getStatus: () => supervisor.getStatus(),
      getSnapshot: () => latestSink.latest(),
    });
    await app.listen({ port: settings.statusPort, host: settings.statusHost });
  }

  let resolveExit: (code: number) => void = () => undefined;
  const exited = new Promise<number>((resolve) => {
    resolveExit = resolve;
  });
  let shuttingDown = false;

  const shutdown = async (signal: string, code: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info(`Received ${signal}, shutting down...`);
    publisher.stop();
    dashboard?.stop();
    await supervisor.stop();
    publisher.publishNow();
    await app?.close();
    resolveExit(code);
  };

  const requestShutdown = (signal: string, code: number) => {
    shutdown(signal, code).catch((err: unknown) => {
      log.error(`Shutdown failed: ${errorMessage(err)}`);
      resolveExit(EXIT_FATAL);
    });
  };

  process.on("SIGINT", () => requestShutdown("SIGINT", EXIT_OK));
  process.on("SIGTERM", () => requestShutdown("SIGTERM", EXIT_OK));

  process.on("uncaughtException", (err) => {
    log.fatal(`uncaughtException: ${err.stack ?? err.message}`);
    requestShutdown("uncaughtException", EXIT_FATAL);
  });

  process.on("unhandledRejection", (reason) => {
    log.fatal(`unhandledRejection: ${errorMessage(reason)}`);
    requestShutdown("unhandledRejection", EXIT_FATAL);
  });

  log.info(`Monitoring ${describeEndpoint(config.wsUrl)} (protocol ${config.protocolVersion})`);
  supervisor.start(config);
  dashboard?.start();
  publisher.start();

  return exited;
}

main()
  .then((code) => {
    if (code === EXIT_OK) process.stdout.write("\n");
    process.exit(code);
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`);
      process.exit(EXIT_CONFIG);
    }
    process.stderr.write(`Failed to start pulsewatch: ${errorMessage(err)}\n`);
    process.exit(EXIT_FATAL);
  });
