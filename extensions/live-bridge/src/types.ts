/**
 * Live Bridge Types
 *
 * Type definitions for the client WebSocket protocol and the
 * internal units that flow between a session's two relay loops.
 */

import type { ReadError, ReceiveError } from "./errors.js";

/**
 * Direction a media chunk travels relative to the client.
 */
export type MediaDirection = "inbound" | "outbound";

/**
 * Opaque unit of forwarded media. Frozen on construction.
 */
export interface MediaChunk {
  readonly payload: Buffer;
  /** e.g. "audio/pcm;rate=16000" */
  readonly mediaType: string;
  readonly direction: MediaDirection;
}

export function createMediaChunk(
  payload: Buffer,
  mediaType: string,
  direction: MediaDirection,
): MediaChunk {
  return Object.freeze({ payload, mediaType, direction });
}

// ─────────────────────────────────────────────────────────────────────────────
// Messages from client → bridge
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Media frame from the client: `{"data": <base64>, "mime_type": <string>}`.
 * A `text` field in the same message is sent as a turn after the media.
 */
export interface MediaEnvelope {
  kind: "media";
  /** Base64-encoded payload (16kHz mono PCM16 for "audio/pcm") */
  data: string;
  mime_type: string;
  text?: string;
}

/**
 * Text turn from the client: `{"text": <string>}`.
 */
export interface TextEnvelope {
  kind: "text";
  text: string;
}

/**
 * All inbound envelope types (client → bridge).
 */
export type ClientEnvelope = MediaEnvelope | TextEnvelope;

// ─────────────────────────────────────────────────────────────────────────────
// Messages from bridge → client
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Audio from the model (24kHz mono PCM16 by convention).
 */
export interface AudioEnvelope {
  audio: string;
}

export interface TextOutEnvelope {
  text: string;
}

export interface InterruptedEnvelope {
  interrupted: true;
}

export interface TurnCompleteEnvelope {
  turn_complete: true;
}

/**
 * Final diagnostic frame written before the bridge closes a client.
 */
export interface ErrorEnvelope {
  error: string;
  message: string;
}

/**
 * All outbound envelope types (bridge → client).
 */
export type OutboundEnvelope =
  | AudioEnvelope
  | TextOutEnvelope
  | InterruptedEnvelope
  | TurnCompleteEnvelope
  | ErrorEnvelope;

// ─────────────────────────────────────────────────────────────────────────────
// Upstream events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Protocol-level event from the upstream that carries no media.
 */
export type SessionSignal =
  | { type: "turn-boundary" }
  | { type: "generation-complete" }
  | { type: "interrupted" }
  | { type: "text"; text: string }
  | { type: "go-away"; timeLeft?: string }
  | { type: "upstream-error"; reason: string };

export type UpstreamEvent =
  | { type: "chunk"; chunk: MediaChunk }
  | { type: "signal"; signal: SessionSignal }
  | { type: "closed"; code: number; reason: string }
  | { type: "error"; error: ReceiveError }
  | { type: "cancelled" };

export type ClientRead =
  | { type: "envelope"; envelope: ClientEnvelope }
  | { type: "closed"; code: number; reason: string }
  | { type: "error"; error: ReadError }
  | { type: "cancelled" };

// ─────────────────────────────────────────────────────────────────────────────
// Session State
// ─────────────────────────────────────────────────────────────────────────────

export type SessionState = "active" | "closing" | "closed";

/**
 * Why a session ended.
 */
export type EndReason =
  | "client-closed"
  | "client-error"
  | "malformed-envelope"
  | "send-failed"
  | "receive-failed"
  | "write-failed"
  | "unencodable-chunk"
  | "upstream-closed"
  | "upstream-error"
  | "idle-timeout"
  | "max-duration"
  | "server-shutdown";

/**
 * Point-in-time view of a session, safe to hand to listeners.
 */
export interface SessionSnapshot {
  id: string;
  state: SessionState;
  remoteAddress?: string;
  startedAt: number;
  lastActivityAt: number;
  endedAt?: number;
  chunksIn: number;
  chunksOut: number;
  endReason?: EndReason;
}

