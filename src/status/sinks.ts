import { renderStatusLine } from "./format.js";
import type { DisplaySink } from "./status-publisher.js";
import type { StatusSnapshot } from "./status-snapshot.js";

interface TerminalStream {
  readonly isTTY?: boolean;
  write(chunk: string): boolean;
}

const CLEAR_LINE = "\r\x1b[2K";

/** Rewrites one status line in place on a TTY, appends lines otherwise. */
export function createTerminalSink(stream: TerminalStream = process.stdout): DisplaySink {
  return {
    name: "terminal",
    render(snapshot: StatusSnapshot): void {
      const line = renderStatusLine(snapshot);
      stream.write(stream.isTTY ? `${CLEAR_LINE}${line}` : `${line}\n`);
    },
  };
}

export interface LatestSnapshotSink extends DisplaySink {
  readonly latest: () => StatusSnapshot | null;
}

/** Holds the most recent snapshot for the status server to serve. */
export function createLatestSnapshotSink(): LatestSnapshotSink {
  let latest: StatusSnapshot | null = null;

  return {
    name: "status-server",
    render(snapshot: StatusSnapshot): void {
      latest = snapshot;
    },
    latest: () => latest,
  };
}
