import type { ClientLeg } from "../client-connection.js";
import type { UpstreamConnector, UpstreamOpenOptions, UpstreamSession } from "../upstream-session.js";
import {
  createMediaChunk,
  type ClientEnvelope,
  type ClientRead,
  type MediaChunk,
  type OutboundEnvelope,
  type SessionSignal,
  type UpstreamEvent,
} from "../types.js";
import { ConnectError, ReadError, ReceiveError, SendError, WriteError } from "../errors.js";
import { CancellationError, onAbort } from "../cancellation-token.js";
import { MessageQueue } from "../message-queue.js";

type UpstreamItem = Extract<UpstreamEvent, { type: "chunk" | "signal" }>;
type UpstreamEnd = Extract<UpstreamEvent, { type: "closed" | "error" }>;
type ClientItem = Extract<ClientRead, { type: "envelope" | "error" }>;
type ClientEnd = Extract<ClientRead, { type: "closed" }>;

/**
 * In-process upstream leg driven by the test.
 */
export class FakeUpstream implements UpstreamSession {
  readonly sent: MediaChunk[] = [];
  readonly texts: string[] = [];
  /** Every accepted send, in call order */
  readonly calls: Array<"media" | "text"> = [];
  sendAttempts = 0;
  closeCalls = 0;
  /** 1-based send attempt that fails with SendError */
  failOnSend?: number;
  private readonly queue = new MessageQueue<UpstreamItem, UpstreamEnd>();
  private open = true;

  constructor(readonly id = "upstream-1") {}

  emitChunk(payload: Buffer, mediaType = "audio/pcm;rate=24000"): void {
    this.queue.push({ type: "chunk", chunk: createMediaChunk(payload, mediaType, "outbound") });
  }

  emitSignal(signal: SessionSignal): void {
    this.queue.push({ type: "signal", signal });
  }

  /** The upstream peer closes the connection */
  hangUp(code = 1000, reason = ""): void {
    this.open = false;
    this.queue.end({ type: "closed", code, reason });
  }

  failReceive(message: string): void {
    this.open = false;
    this.queue.end({ type: "error", error: new ReceiveError(message) });
  }

  async send(chunk: MediaChunk, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancellationError("Send cancelled");
    this.sendAttempts++;
    if (this.failOnSend === this.sendAttempts) {
      throw new SendError("fake send failure");
    }
    if (!this.open) throw new SendError("not open");
    this.sent.push(chunk);
    this.calls.push("media");
  }

  async sendText(text: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancellationError("Send cancelled");
    if (!this.open) throw new SendError("not open");
    this.texts.push(text);
    this.calls.push("text");
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
    return this.open;
  }

  close(): void {
    this.closeCalls++;
    this.open = false;
    this.queue.end({ type: "closed", code: 1000, reason: "closed by bridge" });
  }
}

/**
 * In-process client leg driven by the test.
 */
export class FakeClient implements ClientLeg {
  readonly written: OutboundEnvelope[] = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  /** Every write fails with WriteError */
  failWrites = false;
  /** Writes never complete until cancelled */
  stallWrites = false;
  private readonly queue = new MessageQueue<ClientItem, ClientEnd>();
  private open = true;

  constructor(
    readonly id = "client-1",
    readonly remoteAddress = "127.0.0.1",
  ) {}

  deliver(envelope: ClientEnvelope): void {
    this.queue.push({ type: "envelope", envelope });
  }

  deliverMedia(data: string, mimeType = "audio/pcm"): void {
    this.deliver({ kind: "media", data, mime_type: mimeType });
  }

  deliverError(error: ReadError): void {
    this.queue.push({ type: "error", error });
  }

  /** The client peer goes away */
  disconnect(code = 1000, reason = ""): void {
    this.open = false;
    this.queue.end({ type: "closed", code, reason });
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
    if (signal?.aborted) throw new CancellationError("Write cancelled");
    if (!this.open || this.failWrites) throw new WriteError("fake write failure");
    if (this.stallWrites) {
      await new Promise<void>((_resolve, reject) => {
        onAbort(signal, () => reject(new CancellationError("Write cancelled")));
      });
    }
    this.written.push(envelope);
  }

  isOpen(): boolean {
    return this.open;
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.open = false;
  }
}

/**
 * Connector handing out FakeUpstream sessions, or failing.
 */
export class FakeConnector implements UpstreamConnector {
  readonly opened: FakeUpstream[] = [];
  openCalls = 0;
  failWith?: string;
  /** Delay before the handshake completes */
  delayMs = 0;

  async open(options: UpstreamOpenOptions): Promise<UpstreamSession> {
    this.openCalls++;
    if (this.delayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.delayMs);
        onAbort(options.signal, () => {
          clearTimeout(timer);
          reject(new ConnectError("connect aborted"));
        });
      });
    }
    if (this.failWith) {
      throw new ConnectError(this.failWith);
    }
    const upstream = new FakeUpstream(options.sessionId);
    this.opened.push(upstream);
    return upstream;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll until the predicate holds.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!predicate()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error("Timeout waiting for condition");
    }
    await sleep(10);
  }
}
