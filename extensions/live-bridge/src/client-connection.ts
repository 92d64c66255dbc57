/**
 * Client Connection Handle
 *
 * Owns one client-facing WebSocket and exposes it as a pull-style reader
 * plus a flush-confirmed writer. Parse failures surface as read errors,
 * never as throws from the socket's event handlers.
 */

import { WebSocket, type RawData } from "ws";
import type { Logger } from "./bridge.js";
import type { ClientRead, OutboundEnvelope } from "./types.js";
import {
  DEFAULT_MAX_MESSAGE_SIZE,
  parseClientEnvelope,
  serializeOutboundEnvelope,
} from "./envelope-codec.js";
import { MalformedEnvelopeError, ReadError, WriteError } from "./errors.js";
import { CancellationError, onAbort } from "./cancellation-token.js";
import { MessageQueue } from "./message-queue.js";

/**
 * The client leg as seen by a session.
 */
export interface ClientLeg {
  readonly id: string;
  readonly remoteAddress?: string;
  /** Wait for the next envelope, the close, an error, or cancellation */
  readEnvelope(signal?: AbortSignal): Promise<ClientRead>;
  /** Resolves once the frame is flushed; throws WriteError or CancellationError */
  writeEnvelope(envelope: OutboundEnvelope, signal?: AbortSignal): Promise<void>;
  isOpen(): boolean;
  /** Idempotent */
  close(code?: number, reason?: string): void;
}

/**
 * Options for creating a ClientConnection.
 */
export interface ClientConnectionOptions {
  id: string;
  remoteAddress?: string;
  /** Max inbound message size in bytes (default: 1MB) */
  maxMessageBytes?: number;
  /** Undelivered messages held before the socket is paused (default: 64) */
  highWaterMark?: number;
  /** Grace period for the close handshake before terminating (default: 2000) */
  closeTimeoutMs?: number;
  logger?: Logger;
}

type ClientItem = Extract<ClientRead, { type: "envelope" | "error" }>;
type ClientEnd = Extract<ClientRead, { type: "closed" }>;

/** Max close reason length in bytes (RFC 6455) */
const MAX_CLOSE_REASON_BYTES = 123;

/**
 * Client connection over a server-side WebSocket.
 */
export class ClientConnection implements ClientLeg {
  readonly id: string;
  readonly remoteAddress?: string;
  private readonly ws: WebSocket;
  private readonly queue: MessageQueue<ClientItem, ClientEnd>;
  private readonly maxMessageBytes: number;
  private readonly closeTimeoutMs: number;
  private readonly logger?: Logger;
  private closeRequested = false;
  private closeTimer?: NodeJS.Timeout;

  constructor(ws: WebSocket, options: ClientConnectionOptions) {
    this.ws = ws;
    this.id = options.id;
    this.remoteAddress = options.remoteAddress;
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_SIZE;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 2000;
    this.logger = options.logger;

    this.queue = new MessageQueue({
      name: `client:${this.id}`,
      highWaterMark: options.highWaterMark,
      logger: options.logger,
      onHigh: () => ws.pause(),
      onLow: () => ws.resume(),
    });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      this.handleMessage(data, isBinary);
    });

    ws.on("close", (code: number, reason: Buffer) => {
      if (this.closeTimer) {
        clearTimeout(this.closeTimer);
        this.closeTimer = undefined;
      }
      this.queue.end({ type: "closed", code, reason: reason.toString() });
    });

    ws.on("error", (error: Error) => {
      this.logger?.warn(`[ClientConnection] Socket error on ${this.id}:`, error.message);
      this.queue.push({
        type: "error",
        error: new ReadError(`Client socket error: ${error.message}`, { cause: error }),
      });
    });
  }

  async readEnvelope(signal?: AbortSignal): Promise<ClientRead> {
    const result = await this.queue.next(signal);
    switch (result.type) {
      case "item":
        return result.item;
      case "ended":
        return result.final;
      case "cancelled":
        return { type: "cancelled" };
    }
  }

  async writeEnvelope(envelope: OutboundEnvelope, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancellationError("Write cancelled");
    }
    if (!this.isOpen()) {
      throw new WriteError(`Client socket not open (state: ${this.ws.readyState})`);
    }

    const payload = serializeOutboundEnvelope(envelope);

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const detach = onAbort(signal, () => {
        if (settled) return;
        settled = true;
        reject(new CancellationError("Write cancelled"));
      });

      this.ws.send(payload, (err?: Error) => {
        detach();
        if (settled) return;
        settled = true;
        if (err) {
          reject(new WriteError(`Client write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  isOpen(): boolean {
    return !this.closeRequested && this.ws.readyState === WebSocket.OPEN;
  }

  close(code = 1000, reason = ""): void {
    if (this.closeRequested) return;
    this.closeRequested = true;

    const state = this.ws.readyState;
    if (state === WebSocket.CLOSED) return;
    if (state === WebSocket.CONNECTING) {
      this.ws.terminate();
      return;
    }
    if (state === WebSocket.OPEN) {
      this.ws.close(code, truncateCloseReason(reason));
    }

    // Peer did not answer the close handshake in time
    this.closeTimer = setTimeout(() => {
      this.logger?.debug(`[ClientConnection] Close handshake timed out for ${this.id}, terminating`);
      this.ws.terminate();
    }, this.closeTimeoutMs);
    this.closeTimer.unref();
  }

  private handleMessage(data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.queue.push({
        type: "error",
        error: new ReadError("Binary frames are not supported", {
          cause: new MalformedEnvelopeError("Binary frame"),
        }),
      });
      return;
    }

    try {
      const envelope = parseClientEnvelope(rawDataToString(data), this.maxMessageBytes);
      this.queue.push({ type: "envelope", envelope });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.queue.push({
        type: "error",
        error: new ReadError(`Unreadable client message: ${message}`, { cause: err }),
      });
    }
  }
}

/**
 * Decode a ws message payload as UTF-8 text.
 */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Trim a close reason to the protocol limit without splitting a character.
 */
export function truncateCloseReason(reason: string): string {
  if (Buffer.byteLength(reason, "utf8") <= MAX_CLOSE_REASON_BYTES) {
    return reason;
  }
  let out = "";
  for (const ch of reason) {
    if (Buffer.byteLength(out + ch, "utf8") > MAX_CLOSE_REASON_BYTES) break;
    out += ch;
  }
  return out;
}
