import type { ConnectionStatus } from "../connection/connection-state.js";
import type { DashboardStats } from "../dashboard/dashboard-poller.js";
import { PublishError, errorMessage } from "../errors.js";
import type { MonitorLogger } from "../logger.js";
import type { MetricsView } from "../metrics/session-metrics.js";
import { buildSnapshot, type StatusSnapshot } from "./status-snapshot.js";

export interface DisplaySink {
  readonly name: string;
  readonly render: (snapshot: StatusSnapshot) => void | Promise<void>;
}

export interface StatusPublisherOptions {
  readonly intervalMs: number;
  readonly supervisor: { readonly getStatus: () => ConnectionStatus };
  readonly metrics: { readonly view: (now: number) => MetricsView };
  readonly dashboard?: { readonly latest: () => DashboardStats | null };
  readonly sinks: readonly DisplaySink[];
  readonly logger: MonitorLogger;
  readonly clock?: () => number;
  /** Defaults to the publisher's creation time */
  readonly startedAt?: number;
}

export interface StatusPublisher {
  readonly start: () => void;
  readonly stop: () => void;
  /** Builds a snapshot and hands it to every sink right away */
  readonly publishNow: () => StatusSnapshot;
  readonly isRunning: () => boolean;
}

/**
 * Pushes a fresh snapshot to every sink on a fixed cadence, whether or
 * not anything changed, so uptime keeps moving on screen. Reads only
 * in-memory state. A failing sink is logged once per failure streak and
 * never stops the timer or the other sinks.
 */
export function createStatusPublisher(options: StatusPublisherOptions): StatusPublisher {
  const { intervalMs, supervisor, metrics, sinks, logger } = options;
  const clock = options.clock ?? Date.now;
  const startedAt = options.startedAt ?? clock();

  let timer: ReturnType<typeof setInterval> | null = null;
  const failingSinks = new Set<string>();

  function reportFailure(sink: DisplaySink, err: unknown): void {
    const publishErr =
      err instanceof PublishError
        ? err
        : new PublishError(sink.name, errorMessage(err), { cause: err });
    if (failingSinks.has(sink.name)) return;
    failingSinks.add(sink.name);
    logger.error(`Display sink "${sink.name}" failed: ${publishErr.message}`);
  }

  function reportSuccess(sink: DisplaySink): void {
    if (failingSinks.delete(sink.name)) {
      logger.info(`Display sink "${sink.name}" recovered`);
    }
  }

  function deliver(sink: DisplaySink, snapshot: StatusSnapshot): void {
    let result: unknown;
    try {
      result = sink.render(snapshot);
    } catch (err: unknown) {
      reportFailure(sink, err);
      return;
    }

    if (result instanceof Promise) {
      void result.then(
        () => reportSuccess(sink),
        (err: unknown) => reportFailure(sink, err),
      );
      return;
    }
    reportSuccess(sink);
  }

  function publishNow(): StatusSnapshot {
    const now = clock();
    const snapshot = buildSnapshot(
      supervisor.getStatus(),
      metrics.view(now),
      now,
      startedAt,
      options.dashboard?.latest() ?? null,
    );
    for (const sink of sinks) {
      deliver(sink, snapshot);
    }
    return snapshot;
  }

  return {
    start(): void {
      if (timer !== null) return;
      timer = setInterval(publishNow, intervalMs);
    },

    stop(): void {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
    },

    publishNow,

    isRunning(): boolean {
      return timer !== null;
    },
  };
}
