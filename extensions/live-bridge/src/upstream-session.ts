/**
 * Gemini Live Upstream Session
 *
 * WebSocket session against the Gemini Live BidiGenerateContent endpoint.
 * Hides the upstream framing behind send()/receive():
 *
 *   open:    ws connect → { setup } → wait for { setupComplete }
 *   send:    MediaChunk → { realtimeInput: { audio | video | mediaChunks } }
 *   receive: { serverContent } → chunk / text / interrupted /
 *            generation-complete / turn-boundary, in message order
 *
 * One session per bridge session; there is no reconnection.
 */

import { WebSocket, type RawData } from "ws";
import type { Logger } from "./bridge.js";
import {
  createMediaChunk,
  type MediaChunk,
  type SessionSignal,
  type UpstreamEvent,
} from "./types.js";
import { ConnectError, ReceiveError, SendError } from "./errors.js";
import { CancellationError, onAbort } from "./cancellation-token.js";
import { MessageQueue } from "./message-queue.js";
import { isBase64 } from "./envelope-codec.js";
import { rawDataToString } from "./client-connection.js";
import {
  DEFAULT_OUTPUT_MEDIA_TYPE,
  isAudioMediaType,
  isVisualMediaType,
  normalizeInputMediaType,
} from "./audio-utils.js";

export const DEFAULT_GEMINI_LIVE_URL =
  "wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent";
export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash-native-audio-preview-12-2025";

/**
 * The upstream leg as seen by a session.
 */
export interface UpstreamSession {
  readonly id: string;
  /** Forward one chunk; throws SendError or CancellationError. Never retried. */
  send(chunk: MediaChunk, signal?: AbortSignal): Promise<void>;
  /** Forward one complete user text turn */
  sendText(text: string, signal?: AbortSignal): Promise<void>;
  /** The only blocking point on the upstream leg */
  receive(signal?: AbortSignal): Promise<UpstreamEvent>;
  isOpen(): boolean;
  /** Idempotent; a pending receive() resolves "closed" */
  close(): void;
}

export interface UpstreamOpenOptions {
  sessionId: string;
  /** Aborts a handshake in progress */
  signal?: AbortSignal;
}

/**
 * Opens upstream sessions. open() throws ConnectError on failure.
 */
export interface UpstreamConnector {
  open(options: UpstreamOpenOptions): Promise<UpstreamSession>;
}

/**
 * Configuration for Gemini Live sessions.
 */
export interface GeminiLiveConfig {
  /** Gemini API key */
  apiKey: string;
  /** Endpoint URL (default: public BidiGenerateContent endpoint) */
  url?: string;
  /** Model to use; "models/" prefix is added when missing */
  model?: string;
  /** Response modalities (default: ["AUDIO"]) */
  responseModalities?: Array<"AUDIO" | "TEXT">;
  /** Prebuilt voice name */
  voice?: string;
  /** System instructions */
  systemInstruction?: string;
  /** Setup handshake timeout in ms (default: 10000) */
  handshakeTimeoutMs?: number;
  /** Undelivered upstream events held before the socket is paused (default: 64) */
  highWaterMark?: number;
  /** Logger for debug output */
  logger?: Logger;
}

/**
 * Connector for Gemini Live sessions.
 */
export class GeminiLiveConnector implements UpstreamConnector {
  private readonly config: GeminiLiveConfig;

  constructor(config: GeminiLiveConfig) {
    if (!config.apiKey) {
      throw new Error("Gemini API key required for Live sessions");
    }
    this.config = config;
  }

  async open(options: UpstreamOpenOptions): Promise<UpstreamSession> {
    const session = new GeminiLiveSession(options.sessionId, this.config);
    await session.connect(options.signal);
    return session;
  }
}

type UpstreamItem = Extract<UpstreamEvent, { type: "chunk" | "signal" }>;
type UpstreamEnd = Extract<UpstreamEvent, { type: "closed" | "error" }>;

/**
 * Close codes that end an upstream session cleanly.
 */
const NORMAL_CLOSE_CODES = new Set([1000, 1005]);

/**
 * One Gemini Live session.
 *
 * Usage:
 * 1. connect() performs the setup handshake
 * 2. send()/sendText() from a single writer
 * 3. receive() from a single reader until "closed" or "error"
 * 4. close() when done
 */
export class GeminiLiveSession implements UpstreamSession {
  readonly id: string;
  private ws: WebSocket | null = null;
  private ready = false;
  private closed = false;
  private readonly config: Required<Omit<GeminiLiveConfig, "logger" | "voice" | "systemInstruction">> &
    Pick<GeminiLiveConfig, "voice" | "systemInstruction">;
  private readonly queue: MessageQueue<UpstreamItem, UpstreamEnd>;
  private readonly logger?: Logger;
  private chunksSent = 0;
  private chunksReceived = 0;

  constructor(id: string, config: GeminiLiveConfig) {
    this.id = id;
    this.config = {
      apiKey: config.apiKey,
      url: config.url ?? DEFAULT_GEMINI_LIVE_URL,
      model: config.model ?? DEFAULT_GEMINI_MODEL,
      responseModalities: config.responseModalities ?? ["AUDIO"],
      voice: config.voice,
      systemInstruction: config.systemInstruction,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? 10000,
      highWaterMark: config.highWaterMark ?? 64,
    };
    this.logger = config.logger;
    this.queue = new MessageQueue({
      name: `upstream:${id}`,
      highWaterMark: this.config.highWaterMark,
      logger: config.logger,
      onHigh: () => this.ws?.pause(),
      onLow: () => this.ws?.resume(),
    });
  }

  /**
   * Connect and complete the setup handshake.
   *
   * @throws ConnectError on network failure, HTTP rejection, early close or timeout
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.ws) {
      throw new Error("Already connected");
    }
    if (signal?.aborted) {
      this.closed = true;
      throw new ConnectError("connect aborted");
    }

    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        const url = new URL(this.config.url);
        url.searchParams.set("key", this.config.apiKey);
        ws = new WebSocket(url.toString());
      } catch (err) {
        this.closed = true;
        reject(new ConnectError(`invalid upstream url: ${this.config.url}`, { cause: err }));
        return;
      }
      this.ws = ws;

      let settled = false;
      const fail = (reason: string, cause?: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(handshakeTimeout);
        detach();
        this.logger?.warn(`[GeminiLive] Connect failed for ${this.id}: ${reason}`);
        this.closed = true;
        ws.terminate();
        reject(new ConnectError(reason, { cause }));
      };

      const handshakeTimeout = setTimeout(() => {
        fail(`handshake timed out after ${this.config.handshakeTimeoutMs}ms`);
      }, this.config.handshakeTimeoutMs);

      const detach = onAbort(signal, () => fail("connect aborted"));

      ws.on("open", () => {
        this.logger?.debug(`[GeminiLive] Socket open for ${this.id}, sending setup`);
        ws.send(JSON.stringify(this.buildSetupMessage()), (err?: Error) => {
          if (err) fail(`setup send failed: ${err.message}`, err);
        });
      });

      ws.on("message", (data: RawData) => {
        if (this.ready) {
          this.handleMessage(data);
          return;
        }
        if (settled) return;

        const msg = parseJsonObject(rawDataToString(data));
        const error = msg?.error;
        if (msg && "setupComplete" in msg) {
          settled = true;
          clearTimeout(handshakeTimeout);
          detach();
          this.ready = true;
          this.logger?.info(`[GeminiLive] Session ${this.id} ready (model: ${this.modelName()})`);
          resolve();
          return;
        }
        if (isRecord(error)) {
          fail(`setup rejected: ${describeUpstreamError(error)}`);
          return;
        }
        this.logger?.debug(`[GeminiLive] Ignoring pre-setup message for ${this.id}`);
      });

      ws.on("error", (error: Error) => {
        if (!settled) {
          fail(error.message, error);
          return;
        }
        this.logger?.error(`[GeminiLive] Socket error on ${this.id}:`, error.message);
        this.queue.end({
          type: "error",
          error: new ReceiveError(`Upstream socket error: ${error.message}`, { cause: error }),
        });
      });

      ws.on("close", (code: number, reason: Buffer) => {
        const reasonStr = reason.toString();
        if (!settled) {
          fail(`closed during setup (code: ${code}, reason: ${reasonStr || "none"})`);
          return;
        }
        this.handleClose(code, reasonStr);
      });
    });
  }

  async send(chunk: MediaChunk, signal?: AbortSignal): Promise<void> {
    await this.sendJson(this.buildRealtimeInput(chunk), signal);
    this.chunksSent++;
  }

  async sendText(text: string, signal?: AbortSignal): Promise<void> {
    await this.sendJson(
      {
        clientContent: {
          turns: [{ role: "user", parts: [{ text }] }],
          turnComplete: true,
        },
      },
      signal,
    );
  }

  async receive(signal?: AbortSignal): Promise<UpstreamEvent> {
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

  isOpen(): boolean {
    return this.ready && !this.closed && this.ws?.readyState === WebSocket.OPEN;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const { depth } = this.queue.getMetrics();
    this.logger?.debug(
      `[GeminiLive] Closing ${this.id} (chunks sent: ${this.chunksSent}, received: ${this.chunksReceived}, ` +
        `undelivered: ${depth})`,
    );
    this.queue.end({ type: "closed", code: 1000, reason: "closed by bridge" });

    const ws = this.ws;
    if (!ws) return;
    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000);
      const terminateTimer = setTimeout(() => ws.terminate(), 2000);
      terminateTimer.unref();
      ws.once("close", () => clearTimeout(terminateTimer));
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Outbound framing
  // ─────────────────────────────────────────────────────────────────────────────

  private buildSetupMessage(): Record<string, unknown> {
    const generationConfig: Record<string, unknown> = {
      responseModalities: this.config.responseModalities,
    };
    if (this.config.voice) {
      generationConfig.speechConfig = {
        voiceConfig: { prebuiltVoiceConfig: { voiceName: this.config.voice } },
      };
    }

    const setup: Record<string, unknown> = {
      model: this.modelName(),
      generationConfig,
    };
    if (this.config.systemInstruction) {
      setup.systemInstruction = { parts: [{ text: this.config.systemInstruction }] };
    }
    return { setup };
  }

  private buildRealtimeInput(chunk: MediaChunk): Record<string, unknown> {
    const blob = {
      mimeType: normalizeInputMediaType(chunk.mediaType),
      data: chunk.payload.toString("base64"),
    };
    if (isAudioMediaType(chunk.mediaType)) {
      return { realtimeInput: { audio: blob } };
    }
    if (isVisualMediaType(chunk.mediaType)) {
      return { realtimeInput: { video: blob } };
    }
    return { realtimeInput: { mediaChunks: [blob] } };
  }

  private async sendJson(message: Record<string, unknown>, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancellationError("Send cancelled");
    }
    const ws = this.ws;
    if (!ws || !this.isOpen()) {
      throw new SendError(`Upstream socket not open for ${this.id}`);
    }

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const detach = onAbort(signal, () => {
        if (settled) return;
        settled = true;
        reject(new CancellationError("Send cancelled"));
      });

      ws.send(JSON.stringify(message), (err?: Error) => {
        detach();
        if (settled) return;
        settled = true;
        if (err) {
          reject(new SendError(`Upstream write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  private modelName(): string {
    const model = this.config.model;
    return model.startsWith("models/") ? model : `models/${model}`;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Inbound framing
  // ─────────────────────────────────────────────────────────────────────────────

  private handleMessage(data: RawData): void {
    const msg = parseJsonObject(rawDataToString(data));
    if (!msg) {
      this.logger?.error(`[GeminiLive] Unparseable upstream message on ${this.id}`);
      this.queue.end({
        type: "error",
        error: new ReceiveError("Upstream sent an unparseable message"),
      });
      return;
    }

    const { serverContent, goAway, error } = msg;

    if (isRecord(serverContent)) {
      this.handleServerContent(serverContent);
    }

    if (isRecord(goAway)) {
      const timeLeft = goAway.timeLeft;
      this.pushSignal({ type: "go-away", timeLeft: typeof timeLeft === "string" ? timeLeft : undefined });
    }

    if (isRecord(error)) {
      this.pushSignal({ type: "upstream-error", reason: describeUpstreamError(error) });
    }

    if (
      !("serverContent" in msg) &&
      !("goAway" in msg) &&
      !("error" in msg)
    ) {
      this.logger?.debug(
        `[GeminiLive] Event: ${Object.keys(msg).join(",")} ${JSON.stringify(msg).slice(0, 200)}`,
      );
    }
  }

  private handleServerContent(content: Record<string, unknown>): void {
    const modelTurn = content.modelTurn;
    const parts: unknown = isRecord(modelTurn) ? modelTurn.parts : undefined;
    if (Array.isArray(parts)) {
      for (const part of parts) {
        if (!isRecord(part)) continue;

        const inline = part.inlineData;
        const data = isRecord(inline) ? inline.data : undefined;
        // Parts without audio bytes carry nothing to relay
        if (isRecord(inline) && typeof data === "string" && data.length > 0) {
          if (!isBase64(data)) {
            this.queue.end({
              type: "error",
              error: new ReceiveError("Upstream sent invalid base64 media"),
            });
            return;
          }
          const mimeType = inline.mimeType;
          const mediaType =
            typeof mimeType === "string" && mimeType.length > 0 ? mimeType : DEFAULT_OUTPUT_MEDIA_TYPE;
          this.chunksReceived++;
          this.queue.push({
            type: "chunk",
            chunk: createMediaChunk(Buffer.from(data, "base64"), mediaType, "outbound"),
          });
        }

        const text = part.text;
        if (typeof text === "string" && text.length > 0) {
          this.pushSignal({ type: "text", text });
        }
      }
    }

    if (content.interrupted === true) {
      this.pushSignal({ type: "interrupted" });
    }
    if (content.generationComplete === true) {
      this.pushSignal({ type: "generation-complete" });
    }
    if (content.turnComplete === true) {
      this.pushSignal({ type: "turn-boundary" });
    }
  }

  private pushSignal(signal: SessionSignal): void {
    this.queue.push({ type: "signal", signal });
  }

  private handleClose(code: number, reason: string): void {
    this.ready = false;
    if (this.closed || NORMAL_CLOSE_CODES.has(code)) {
      this.logger?.debug(`[GeminiLive] ${this.id} closed (code: ${code}, reason: ${reason || "none"})`);
      this.queue.end({ type: "closed", code, reason });
      return;
    }
    this.logger?.warn(`[GeminiLive] ${this.id} closed abnormally (code: ${code}, reason: ${reason || "none"})`);
    this.queue.end({
      type: "error",
      error: new ReceiveError(`Upstream closed with code ${code}${reason ? `: ${reason}` : ""}`),
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function describeUpstreamError(error: Record<string, unknown>): string {
  if (typeof error.message === "string") {
    return typeof error.code === "number" || typeof error.code === "string"
      ? `${error.message} (code: ${error.code})`
      : error.message;
  }
  return JSON.stringify(error).slice(0, 200);
}
