/**
 * Mock Live Client for Testing
 *
 * Simulates a client application: connects to the bridge, sends media and
 * text envelopes, and records every envelope the bridge sends back.
 */

import WebSocket from "ws";
import { chunkAudio } from "./audio-utils.js";
import { rawDataToString } from "./client-connection.js";

/**
 * Configuration for the mock client.
 */
export interface MockClientConfig {
  /** Host to connect to (default: 127.0.0.1) */
  host?: string;
  /** Port to connect to */
  port: number;
  /** WebSocket path (default: /ws) */
  path?: string;
  /** Shared secret, sent as x-bridge-secret */
  secret?: string;
  /** Simulate network latency in ms between frames (default: 0) */
  responseDelay?: number;
}

export type ReceivedKind = "audio" | "text" | "interrupted" | "turn_complete" | "error" | "unknown";

/**
 * Recorded message for test assertions.
 */
export interface RecordedMessage {
  kind: ReceivedKind;
  data: Record<string, unknown>;
  timestamp: number;
}

export interface CloseInfo {
  code: number;
  reason: string;
}

/**
 * Mock client for end-to-end bridge tests.
 */
export class MockLiveClient {
  private config: Required<Omit<MockClientConfig, "secret">> & { secret?: string };
  private ws: WebSocket | null = null;
  private closeInfo: CloseInfo | null = null;
  private closeWaiters: Array<(info: CloseInfo) => void> = [];

  /** Messages received from the bridge */
  public receivedMessages: RecordedMessage[] = [];
  /** Raw frames sent to the bridge */
  public sentMessages: string[] = [];

  constructor(config: MockClientConfig) {
    this.config = {
      host: config.host ?? "127.0.0.1",
      port: config.port,
      path: config.path ?? "/ws",
      secret: config.secret,
      responseDelay: config.responseDelay ?? 0,
    };
  }

  /**
   * Connect to the bridge.
   */
  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const url = `ws://${this.config.host}:${this.config.port}${this.config.path}`;
      const headers: Record<string, string> = {};
      if (this.config.secret !== undefined) {
        headers["X-Bridge-Secret"] = this.config.secret;
      }

      const ws = new WebSocket(url, { headers });
      this.ws = ws;
      let opened = false;

      const connectTimeout = setTimeout(() => {
        if (!opened) {
          reject(new Error("Connection timeout"));
          ws.terminate();
        }
      }, 5000);

      ws.on("open", () => {
        clearTimeout(connectTimeout);
        opened = true;
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        this.recordReceived(rawDataToString(data));
      });

      ws.on("error", (error) => {
        clearTimeout(connectTimeout);
        if (!opened) {
          reject(error);
        }
      });

      ws.on("close", (code: number, reason: Buffer) => {
        const info = { code, reason: reason.toString() };
        this.closeInfo = info;
        for (const waiter of this.closeWaiters) {
          waiter(info);
        }
        this.closeWaiters = [];
      });
    });
  }

  /**
   * Check if connected to the bridge.
   */
  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  /**
   * Close the connection.
   */
  async close(code = 1000): Promise<CloseInfo> {
    const ws = this.ws;
    if (ws && ws.readyState === WebSocket.OPEN) {
      ws.close(code);
    }
    return this.waitForClose();
  }

  /**
   * Drop the connection without a close handshake.
   */
  terminate(): void {
    this.ws?.terminate();
  }

  /**
   * Resolve once the bridge closes the connection.
   */
  async waitForClose(timeoutMs = 5000): Promise<CloseInfo> {
    if (this.closeInfo) return this.closeInfo;
    if (!this.ws) throw new Error("Never connected");

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error("Timeout waiting for close"));
      }, timeoutMs);
      this.closeWaiters.push((info) => {
        clearTimeout(timer);
        resolve(info);
      });
    });
  }

  getCloseInfo(): CloseInfo | null {
    return this.closeInfo;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Simulation methods (what a client application would send)
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Send one media envelope.
   */
  async sendMedia(payload: Buffer, mimeType = "audio/pcm"): Promise<void> {
    await this.applyDelay();
    this.sendRaw(JSON.stringify({ data: payload.toString("base64"), mime_type: mimeType }));
  }

  /**
   * Send one text turn.
   */
  async sendText(text: string): Promise<void> {
    await this.applyDelay();
    this.sendRaw(JSON.stringify({ text }));
  }

  /**
   * Stream audio as 640-byte (20ms @ 16kHz) media envelopes.
   */
  async streamAudio(pcm16kData: Buffer, mimeType = "audio/pcm;rate=16000"): Promise<number> {
    let frames = 0;
    for (const chunk of chunkAudio(pcm16kData, 640)) {
      await this.sendMedia(chunk, mimeType);
      frames++;
    }
    return frames;
  }

  /**
   * Send an arbitrary frame, e.g. a malformed one.
   */
  sendRaw(frame: string): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new Error("Not connected to bridge");
    }
    ws.send(frame);
    this.sentMessages.push(frame);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Assertion helpers
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Decoded payloads of every audio envelope received, in order.
   */
  getReceivedAudio(): Buffer[] {
    const frames: Buffer[] = [];
    for (const msg of this.receivedMessages) {
      const audio = msg.data.audio;
      if (msg.kind === "audio" && typeof audio === "string") {
        frames.push(Buffer.from(audio, "base64"));
      }
    }
    return frames;
  }

  getReceivedOfKind(kind: ReceivedKind): RecordedMessage[] {
    return this.receivedMessages.filter((m) => m.kind === kind);
  }

  /**
   * Wait for a specific message kind to be received.
   */
  async waitForMessage(kind: ReceivedKind, timeoutMs = 5000): Promise<RecordedMessage> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
      const msg = this.receivedMessages.find((m) => m.kind === kind);
      if (msg) return msg;
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    throw new Error(`Timeout waiting for ${kind} message`);
  }

  /**
   * Wait until at least `count` messages of a kind have been received.
   */
  async waitForCount(kind: ReceivedKind, count: number, timeoutMs = 5000): Promise<RecordedMessage[]> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
      const matches = this.getReceivedOfKind(kind);
      if (matches.length >= count) return matches;
      await new Promise((resolve) => setTimeout(resolve, 20));
    }
    throw new Error(`Timeout waiting for ${count} ${kind} message(s)`);
  }

  /**
   * Clear all recorded messages.
   */
  clearMessages(): void {
    this.receivedMessages = [];
    this.sentMessages = [];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private recordReceived(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      console.error("[MockLiveClient] Failed to parse message:", e);
      return;
    }
    if (!isRecord(parsed)) {
      console.error("[MockLiveClient] Unexpected non-object message:", raw.slice(0, 100));
      return;
    }
    this.receivedMessages.push({ kind: classify(parsed), data: parsed, timestamp: Date.now() });
  }

  private async applyDelay(): Promise<void> {
    if (this.config.responseDelay > 0) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.config.responseDelay),
      );
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function classify(data: Record<string, unknown>): ReceivedKind {
  if ("error" in data) return "error";
  if ("audio" in data) return "audio";
  if ("text" in data) return "text";
  if (data.interrupted === true) return "interrupted";
  if (data.turn_complete === true) return "turn_complete";
  return "unknown";
}

/**
 * Create a mock client with default test configuration.
 */
export function createTestMockClient(
  port: number,
  options?: Partial<MockClientConfig>,
): MockLiveClient {
  return new MockLiveClient({
    port,
    ...options,
  });
}
