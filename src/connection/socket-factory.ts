import WebSocket from "ws";
import { TransportError } from "../errors.js";

export interface MonitorSocket {
  /** Resolves once the frame is handed to the OS; rejects with TransportError */
  readonly send: (data: string) => Promise<void>;
  /** Resolves when the peer acknowledges, or after a short grace period */
  readonly close: (code?: number, reason?: string) => Promise<void>;
  /** Drops the connection without a closing handshake */
  readonly terminate: () => void;
  readonly onMessage: (callback: (data: string) => void) => void;
  readonly onClose: (callback: (code: number, reason: string) => void) => void;
  readonly onError: (callback: (err: Error) => void) => void;
}

export interface OpenSocketOptions {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  readonly signal: AbortSignal;
}

const CLOSE_GRACE_MS = 1_000;

function toText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function wrapSocket(ws: WebSocket): MonitorSocket {
  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new TransportError("send", "Socket is not open"));
          return;
        }
        ws.send(data, (err) => {
          if (err) {
            reject(new TransportError("send", err.message, { cause: err }));
            return;
          }
          resolve();
        });
      }),
    close: (code, reason) =>
      new Promise<void>((resolve) => {
        if (ws.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        const timer = setTimeout(() => {
          ws.terminate();
          resolve();
        }, CLOSE_GRACE_MS);
        ws.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        ws.close(code, reason);
      }),
    terminate: () => ws.terminate(),
    onMessage: (callback) => {
      ws.on("message", (data, isBinary) => {
        if (!isBinary) callback(toText(data));
      });
    },
    onClose: (callback) => {
      ws.on("close", (code, reason) => callback(code, reason.toString("utf8")));
    },
    onError: (callback) => {
      ws.on("error", callback);
    },
  };
}

/**
 * Opens a websocket and resolves once the handshake completes.
 *
 * Rejects with TransportError when the handshake fails, exceeds
 * `timeoutMs`, or `signal` aborts; in every rejection path the
 * underlying socket is terminated.
 */
export function openSocket(options: OpenSocketOptions): Promise<MonitorSocket> {
  const { url, headers, timeoutMs, signal } = options;

  return new Promise<MonitorSocket>((resolve, reject) => {
    if (signal.aborted) {
      reject(new TransportError("connect", "Connect aborted"));
      return;
    }

    // the timer below owns the handshake deadline
    const ws = new WebSocket(url, { headers });
    let settled = false;

    const timer = setTimeout(() => {
      fail(new TransportError("timeout", `Handshake timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    function onAbort(): void {
      fail(new TransportError("connect", "Connect aborted"));
    }

    function onOpen(): void {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(wrapSocket(ws));
    }

    function onHandshakeError(err: Error): void {
      fail(new TransportError("connect", err.message, { cause: err }));
    }

    function onHandshakeClose(code: number): void {
      fail(new TransportError("closed", `Socket closed during handshake (code ${code})`));
    }

    function cleanup(): void {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      ws.off("open", onOpen);
      ws.off("error", onHandshakeError);
      ws.off("close", onHandshakeClose);
    }

    function fail(err: TransportError): void {
      if (settled) return;
      settled = true;
      cleanup();
      // terminate() during the handshake re-emits an error; the attempt is
      // already rejected with the real cause.
      ws.once("error", () => undefined);
      ws.terminate();
      reject(err);
    }

    signal.addEventListener("abort", onAbort, { once: true });
    ws.on("open", onOpen);
    ws.on("error", onHandshakeError);
    ws.on("close", onHandshakeClose);
  });
}
