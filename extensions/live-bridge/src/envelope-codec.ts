/**
 * Envelope Codec
 *
 * Translates between the client's JSON envelopes and internal media chunks.
 * Pure functions: no state, no I/O.
 */

import {
  createMediaChunk,
  type AudioEnvelope,
  type ClientEnvelope,
  type ErrorEnvelope,
  type InterruptedEnvelope,
  type MediaChunk,
  type MediaEnvelope,
  type OutboundEnvelope,
  type TextEnvelope,
  type TextOutEnvelope,
  type TurnCompleteEnvelope,
} from "./types.js";
import { MalformedEnvelopeError, UnencodableChunkError } from "./errors.js";

/** Default max inbound message size in bytes (1MB) */
export const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024;
/** Default max outbound payload size in bytes (1MB) */
export const DEFAULT_MAX_CHUNK_BYTES = 1024 * 1024;

const BASE64_REGEX =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Parse a raw client message into a typed envelope.
 *
 * @param raw Raw JSON string from WebSocket
 * @throws MalformedEnvelopeError if the message is not a known envelope shape
 */
export function parseClientEnvelope(
  raw: string,
  maxMessageSize = DEFAULT_MAX_MESSAGE_SIZE,
): ClientEnvelope {
  // Check message size first to prevent memory exhaustion
  if (Buffer.byteLength(raw, "utf8") > maxMessageSize) {
    throw new MalformedEnvelopeError("Message too large");
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new MalformedEnvelopeError("Invalid JSON", raw);
  }

  if (!isRecord(json)) {
    throw new MalformedEnvelopeError("Message must be an object", raw);
  }

  const hasMedia = "data" in json || "mime_type" in json;
  const hasText = "text" in json;

  if (hasMedia && hasText) {
    return { ...parseMediaEnvelope(json, raw), text: parseTextEnvelope(json, raw).text };
  }
  if (hasMedia) {
    return parseMediaEnvelope(json, raw);
  }
  if (hasText) {
    return parseTextEnvelope(json, raw);
  }
  throw new MalformedEnvelopeError("Unknown message shape", raw);
}

/**
 * Decode a media envelope into an inbound chunk.
 *
 * @throws MalformedEnvelopeError if `data` is not valid base64 or `mime_type` is empty
 */
export function decodeInbound(envelope: MediaEnvelope): MediaChunk {
  const mediaType = envelope.mime_type.trim();
  if (mediaType.length === 0) {
    throw new MalformedEnvelopeError("Empty 'mime_type' field");
  }
  if (envelope.data.length === 0) {
    throw new MalformedEnvelopeError("Empty 'data' field");
  }
  if (!isBase64(envelope.data)) {
    throw new MalformedEnvelopeError("'data' is not valid base64");
  }
  return createMediaChunk(Buffer.from(envelope.data, "base64"), mediaType, "inbound");
}

/**
 * Encode an upstream chunk as a client audio envelope.
 *
 * @throws UnencodableChunkError if the payload exceeds `maxPayloadBytes`
 */
export function encodeOutbound(
  chunk: MediaChunk,
  maxPayloadBytes = DEFAULT_MAX_CHUNK_BYTES,
): AudioEnvelope {
  if (chunk.payload.length > maxPayloadBytes) {
    throw new UnencodableChunkError(chunk.payload.length, maxPayloadBytes);
  }
  return { audio: chunk.payload.toString("base64") };
}

/**
 * Canonical base64 check: standard alphabet, required padding, and the
 * decoded bytes re-encode to the same string (no stray padding bits).
 */
export function isBase64(value: string): boolean {
  return BASE64_REGEX.test(value) && Buffer.from(value, "base64").toString("base64") === value;
}

/**
 * Serialize an outbound envelope to JSON.
 */
export function serializeOutboundEnvelope(envelope: OutboundEnvelope): string {
  return JSON.stringify(envelope);
}

// ─────────────────────────────────────────────────────────────────────────────
// Envelope parsers
// ─────────────────────────────────────────────────────────────────────────────

function parseMediaEnvelope(
  msg: Record<string, unknown>,
  raw: string,
): MediaEnvelope {
  return {
    kind: "media",
    data: requireString(msg, "data", raw),
    mime_type: requireString(msg, "mime_type", raw),
  };
}

function parseTextEnvelope(
  msg: Record<string, unknown>,
  raw: string,
): TextEnvelope {
  const text = requireString(msg, "text", raw);
  if (text.trim().length === 0) {
    throw new MalformedEnvelopeError("Empty 'text' field", raw);
  }
  return { kind: "text", text };
}

function requireString(
  msg: Record<string, unknown>,
  field: string,
  raw: string,
): string {
  const value = msg[field];
  if (typeof value !== "string") {
    throw new MalformedEnvelopeError(`Missing or invalid '${field}' field`, raw);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Envelope builders
// ─────────────────────────────────────────────────────────────────────────────

export function buildTextEnvelope(text: string): TextOutEnvelope {
  return { text };
}

export function buildInterruptedEnvelope(): InterruptedEnvelope {
  return { interrupted: true };
}

export function buildTurnCompleteEnvelope(): TurnCompleteEnvelope {
  return { turn_complete: true };
}

export function buildErrorEnvelope(code: string, message: string): ErrorEnvelope {
  return { error: code, message };
}
