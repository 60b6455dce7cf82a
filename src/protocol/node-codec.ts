import { z } from "zod";
import { ProtocolError } from "../errors.js";
import type { InboundMessage, MessageCodec } from "./messages.js";

const WELCOME_TEXT = "Connected successfully";
const PULSE_TEXT = "Pulse from server";

const count = z.number().finite().nonnegative().nullable().catch(null);

// passthrough: unknown fields are allowed and ignored
const FrameSchema = z
  .object({
    type: z.string().optional().catch(undefined),
    message: z.unknown().optional(),
    pointsTotal: count.optional(),
    pointsToday: count.optional(),
    points: z.number().finite().optional().catch(undefined),
  })
  .passthrough();

type Frame = z.infer<typeof FrameSchema>;

function classify(frame: Frame): InboundMessage {
  const type = frame.type?.toUpperCase() ?? null;
  const text = typeof frame.message === "string" ? frame.message : "";

  if (type === "PONG") {
    return { kind: "pong", roundTripMs: null };
  }

  if (text.includes(WELCOME_TEXT)) {
    return {
      kind: "welcome",
      pointsTotal: frame.pointsTotal ?? null,
      pointsToday: frame.pointsToday ?? null,
    };
  }

  if (text.includes(PULSE_TEXT)) {
    return {
      kind: "pulse",
      pointsTotal: frame.pointsTotal ?? null,
      pointsToday: frame.pointsToday ?? null,
    };
  }

  if (type === "POINTS" && frame.points !== undefined) {
    return { kind: "points", delta: frame.points };
  }

  return { kind: "unknown", type: frame.type ?? null };
}

/**
 * Codec for the node service's JSON frames:
 *
 * - `{"type":"PONG"}` answers our `{"type":"PING"}`
 * - `{"message":"Connected successfully", "pointsTotal": n, "pointsToday": n}`
 * - `{"message":"Pulse from server", "pointsTotal": n, "pointsToday": n}`
 * - `{"type":"POINTS", "points": n}` for an explicit increment
 *
 * Anything else that parses as a JSON object decodes to `unknown`.
 */
export function createNodeCodec(): MessageCodec {
  return {
    decode(raw: string): InboundMessage {
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch (err: unknown) {
        throw new ProtocolError("Inbound frame is not valid JSON", raw, { cause: err });
      }

      if (value === null || typeof value !== "object" || Array.isArray(value)) {
        throw new ProtocolError("Inbound frame is not a JSON object", raw);
      }

      const frame = FrameSchema.safeParse(value);
      if (!frame.success) {
        throw new ProtocolError(frame.error.issues[0]?.message ?? "Malformed frame", raw);
      }

      return classify(frame.data);
    },

    encodePing(): string {
      return JSON.stringify({ type: "PING" });
    },
  };
}
