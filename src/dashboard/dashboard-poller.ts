import { z } from "zod";
import { DashboardError, errorMessage } from "../errors.js";
import type { MonitorLogger } from "../logger.js";

export interface DashboardStats {
  readonly pointsToday: number;
  readonly heartbeats: number;
  readonly fetchedAt: number;
}

const StatsResponseSchema = z.object({
  points_today: z.number().nonnegative(),
  heartbeats: z.number().int().nonnegative(),
});

export interface DashboardPollerOptions {
  readonly url: string;
  readonly accessToken: string;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly logger: MonitorLogger;
  readonly headers?: Readonly<Record<string, string>>;
  readonly fetchFn?: typeof fetch;
  readonly clock?: () => number;
}

export interface DashboardPoller {
  readonly start: () => void;
  readonly stop: () => void;
  /** Never rejects; resolves null when the request failed */
  readonly pollNow: () => Promise<DashboardStats | null>;
  readonly latest: () => DashboardStats | null;
}

/**
 * Polls the account's stats endpoint on its own timer. The status
 * publisher only ever reads `latest()`, so a slow or failing endpoint
 * never delays a snapshot. At most one request is in flight.
 */
export function createDashboardPoller(options: DashboardPollerOptions): DashboardPoller {
  const { url, accessToken, intervalMs, timeoutMs, logger } = options;
  const fetchFn = options.fetchFn ?? fetch;
  const clock = options.clock ?? Date.now;
  const headers = {
    ...options.headers,
    Accept: "application/json",
    Authorization: `Bearer ${accessToken}`,
  };

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<DashboardStats | null> | null = null;
  let latest: DashboardStats | null = null;

  async function fetchStats(): Promise<DashboardStats> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchFn(url, { headers, signal: controller.signal });
      if (!response.ok) {
        throw new DashboardError(`HTTP ${response.status}`, response.status);
      }

      const parsed = StatsResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ");
        throw new DashboardError(`Unexpected response (${detail})`, response.status);
      }

      return {
        pointsToday: parsed.data.points_today,
        heartbeats: parsed.data.heartbeats,
        fetchedAt: clock(),
      };
    } catch (err: unknown) {
      if (err instanceof DashboardError) throw err;
      if (controller.signal.aborted) {
        throw new DashboardError(`Timed out after ${timeoutMs}ms`, null, { cause: err });
      }
      throw new DashboardError(errorMessage(err), null, { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  function pollNow(): Promise<DashboardStats | null> {
    if (inFlight !== null) return inFlight;

    const request = fetchStats().then(
      (stats) => {
        latest = stats;
        logger.info(`Dashboard stats updated: ${stats.pointsToday} points today`);
        return stats;
      },
      (err: unknown) => {
        logger.error(`Dashboard stats request failed: ${errorMessage(err)}`);
        return null;
      },
    );
    inFlight = request;
    void request.then(() => {
      if (inFlight === request) inFlight = null;
    });
    return request;
  }

  return {
    start(): void {
      if (timer !== null) return;
      void pollNow();
      timer = setInterval(() => void pollNow(), intervalMs);
    },

    stop(): void {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
    },

    pollNow,

    latest: () => latest,
  };
}
