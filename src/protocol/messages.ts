/** Server greeting after the socket authenticates */
export interface WelcomeMessage {
  readonly kind: "welcome";
  readonly pointsTotal: number | null;
  readonly pointsToday: number | null;
}

/** Periodic server pulse carrying the current point balance */
export interface PulseMessage {
  readonly kind: "pulse";
  readonly pointsTotal: number | null;
  readonly pointsToday: number | null;
}

/** Explicit point increment */
export interface PointsMessage {
  readonly kind: "points";
  readonly delta: number;
}

/**
 * Keepalive reply. The codec leaves roundTripMs null; the supervisor
 * fills it in from the outstanding ping.
 */
export interface PongMessage {
  readonly kind: "pong";
  readonly roundTripMs: number | null;
}

export interface UnknownMessage {
  readonly kind: "unknown";
  readonly type: string | null;
}

export type InboundMessage =
  | WelcomeMessage
  | PulseMessage
  | PointsMessage
  | PongMessage
  | UnknownMessage;

/**
 * The wire contract with the remote service. Swap the codec to follow a
 * different message schema without touching the supervisor.
 */
export interface MessageCodec {
  /** Throws ProtocolError on a frame it cannot read */
  readonly decode: (raw: string) => InboundMessage;
  readonly encodePing: () => string;
}
