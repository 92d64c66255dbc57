/**
 * Session Bridge
 *
 * Pairs one client leg with one upstream leg and runs two relay loops:
 *
 *   inbound:  client.readEnvelope → decodeInbound → upstream.send
 *   outbound: upstream.receive → encodeOutbound / signal table → client.writeEnvelope
 *
 * Joint shutdown: the first loop or timer to see a terminal condition moves
 * the session active → closing and cancels the session token. The token's
 * signal unblocks whatever the other loop is waiting on. Only after both
 * loops have returned are the legs released (upstream first, then the
 * client, with an optional diagnostic frame), and the session becomes closed.
 *
 * Single-writer: the outbound loop is the only writer on the client leg
 * while the loops run, the inbound loop the only writer on the upstream leg.
 */

import type { Logger } from "./bridge.js";
import type { ClientLeg } from "./client-connection.js";
import type { UpstreamSession } from "./upstream-session.js";
import type {
  EndReason,
  OutboundEnvelope,
  SessionSignal,
  SessionSnapshot,
  SessionState,
} from "./types.js";
import {
  DEFAULT_MAX_CHUNK_BYTES,
  buildErrorEnvelope,
  buildInterruptedEnvelope,
  buildTextEnvelope,
  buildTurnCompleteEnvelope,
  decodeInbound,
  encodeOutbound,
} from "./envelope-codec.js";
import {
  MalformedEnvelopeError,
  SendError,
  UnencodableChunkError,
  WriteError,
  describeError,
} from "./errors.js";
import { CancellationError, CancellationToken } from "./cancellation-token.js";

/**
 * Which upstream signals reach the client.
 */
export interface SignalForwarding {
  /** Model text parts → {"text"} (default: true) */
  forwardText: boolean;
  /** Barge-in → {"interrupted": true} (default: true) */
  forwardInterrupted: boolean;
  /** Turn boundary → {"turn_complete": true} (default: false) */
  forwardTurnComplete: boolean;
}

export const DEFAULT_SIGNAL_FORWARDING: SignalForwarding = {
  forwardText: true,
  forwardInterrupted: true,
  forwardTurnComplete: false,
};

/**
 * Options for creating a BridgeSession.
 */
export interface BridgeSessionOptions {
  id: string;
  client: ClientLeg;
  upstream: UpstreamSession;
  logger?: Logger;
  /** Close after this long without traffic on either leg; 0 disables (default: 0) */
  idleTimeoutMs?: number;
  /** Close after this long regardless of traffic; 0 disables (default: 0) */
  maxDurationMs?: number;
  /** Largest upstream payload forwarded to the client (default: 1MB) */
  maxOutboundChunkBytes?: number;
  /** How long the final diagnostic frame may take to flush (default: 1000) */
  diagnosticTimeoutMs?: number;
  signals?: Partial<SignalForwarding>;
}

/**
 * What the outbound loop does with one upstream signal.
 */
export type SignalAction =
  | { kind: "forward"; envelope: OutboundEnvelope }
  | { kind: "drop" }
  | { kind: "shutdown"; reason: EndReason; error: Error };

/**
 * Fixed signal mapping table. Anything not forwarded is dropped.
 */
export function mapSessionSignal(
  signal: SessionSignal,
  forwarding: SignalForwarding,
): SignalAction {
  switch (signal.type) {
    case "text":
      return forwarding.forwardText
        ? { kind: "forward", envelope: buildTextEnvelope(signal.text) }
        : { kind: "drop" };
    case "interrupted":
      return forwarding.forwardInterrupted
        ? { kind: "forward", envelope: buildInterruptedEnvelope() }
        : { kind: "drop" };
    case "turn-boundary":
      return forwarding.forwardTurnComplete
        ? { kind: "forward", envelope: buildTurnCompleteEnvelope() }
        : { kind: "drop" };
    case "upstream-error":
      return {
        kind: "shutdown",
        reason: "upstream-error",
        error: new Error(`Upstream error: ${signal.reason}`),
      };
    case "generation-complete":
    case "go-away":
      return { kind: "drop" };
    default:
      return { kind: "drop" };
  }
}

/**
 * Close code and optional diagnostic frame per end reason.
 */
const END_REASON_POLICY: Record<EndReason, { closeCode: number; diagnostic?: string }> = {
  "client-closed": { closeCode: 1000 },
  "client-error": { closeCode: 1011 },
  "malformed-envelope": { closeCode: 1007, diagnostic: "malformed_envelope" },
  "send-failed": { closeCode: 1011, diagnostic: "send_failed" },
  "receive-failed": { closeCode: 1011, diagnostic: "receive_failed" },
  "write-failed": { closeCode: 1011 },
  "unencodable-chunk": { closeCode: 1011, diagnostic: "unencodable_chunk" },
  "upstream-closed": { closeCode: 1011, diagnostic: "upstream_closed" },
  "upstream-error": { closeCode: 1011, diagnostic: "upstream_error" },
  "idle-timeout": { closeCode: 1000, diagnostic: "idle_timeout" },
  "max-duration": { closeCode: 1000, diagnostic: "max_duration" },
  "server-shutdown": { closeCode: 1001, diagnostic: "server_shutdown" },
};

export function closeCodeForReason(reason: EndReason): number {
  return END_REASON_POLICY[reason].closeCode;
}

/**
 * One client ↔ upstream pairing and its two relay loops.
 */
export class BridgeSession {
  readonly id: string;
  private readonly client: ClientLeg;
  private readonly upstream: UpstreamSession;
  private readonly logger?: Logger;
  private readonly idleTimeoutMs: number;
  private readonly maxDurationMs: number;
  private readonly maxOutboundChunkBytes: number;
  private readonly diagnosticTimeoutMs: number;
  private readonly forwarding: SignalForwarding;
  private readonly token = new CancellationToken<EndReason>();

  private state: SessionState = "active";
  private endError?: unknown;
  private runPromise: Promise<SessionSnapshot> | null = null;
  private idleTimer?: NodeJS.Timeout;
  private durationTimer?: NodeJS.Timeout;

  private readonly startedAt = Date.now();
  private lastActivityAt = this.startedAt;
  private endedAt?: number;
  private chunksIn = 0;
  private chunksOut = 0;

  constructor(options: BridgeSessionOptions) {
    this.id = options.id;
    this.client = options.client;
    this.upstream = options.upstream;
    this.logger = options.logger;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
    this.maxDurationMs = options.maxDurationMs ?? 0;
    this.maxOutboundChunkBytes = options.maxOutboundChunkBytes ?? DEFAULT_MAX_CHUNK_BYTES;
    this.diagnosticTimeoutMs = options.diagnosticTimeoutMs ?? 1000;
    this.forwarding = { ...DEFAULT_SIGNAL_FORWARDING, ...options.signals };
  }

  /**
   * Run both relay loops. Resolves once the session is closed.
   * Calling it again returns the same promise.
   */
  run(): Promise<SessionSnapshot> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /**
   * Request joint shutdown. Only the first request has an effect.
   *
   * @returns true if this call initiated the shutdown
   */
  shutdown(reason: EndReason, error?: unknown): boolean {
    if (this.state !== "active") {
      return false;
    }
    this.state = "closing";
    this.endError = error;
    this.token.cancel(reason);

    const detail = error === undefined ? "" : `: ${describeError(error)}`;
    if (END_REASON_POLICY[reason].closeCode === 1011) {
      this.logger?.warn(`[BridgeSession] ${this.id} closing (${reason})${detail}`);
    } else {
      this.logger?.info(`[BridgeSession] ${this.id} closing (${reason})${detail}`);
    }
    return true;
  }

  getState(): SessionState {
    return this.state;
  }

  getSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      state: this.state,
      remoteAddress: this.client.remoteAddress,
      startedAt: this.startedAt,
      lastActivityAt: this.lastActivityAt,
      endedAt: this.endedAt,
      chunksIn: this.chunksIn,
      chunksOut: this.chunksOut,
      endReason: this.token.reason,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal methods
  // ─────────────────────────────────────────────────────────────────────────────

  private async execute(): Promise<SessionSnapshot> {
    this.logger?.info(
      `[BridgeSession] ${this.id} started (client: ${this.client.remoteAddress ?? "unknown"})`,
    );
    this.startTimers();

    try {
      await Promise.all([this.runInboundLoop(), this.runOutboundLoop()]);
    } finally {
      this.stopTimers();
      await this.finalize();
    }

    return this.getSnapshot();
  }

  /**
   * client → upstream. The only writer on the upstream leg.
   */
  private async runInboundLoop(): Promise<void> {
    const signal = this.token.signal;

    try {
      while (!this.token.isCancelled()) {
        const read = await this.client.readEnvelope(signal);

        if (read.type === "cancelled") {
          return;
        }
        if (read.type === "closed") {
          this.shutdown("client-closed");
          return;
        }
        if (read.type === "error") {
          const cause = read.error.cause;
          if (cause instanceof MalformedEnvelopeError) {
            this.shutdown("malformed-envelope", cause);
          } else {
            this.shutdown("client-error", read.error);
          }
          return;
        }

        this.touch();
        const envelope = read.envelope;
        if (envelope.kind === "text") {
          await this.upstream.sendText(envelope.text, signal);
          continue;
        }

        const chunk = decodeInbound(envelope);
        await this.upstream.send(chunk, signal);
        this.chunksIn++;
        if (envelope.text !== undefined) {
          await this.upstream.sendText(envelope.text, signal);
        }
      }
    } catch (err) {
      if (CancellationError.isCancellation(err)) {
        return;
      }
      if (err instanceof MalformedEnvelopeError) {
        this.shutdown("malformed-envelope", err);
      } else if (err instanceof SendError) {
        this.shutdown("send-failed", err);
      } else {
        this.logger?.error(`[BridgeSession] ${this.id} inbound loop failed:`, err);
        this.shutdown("send-failed", err);
      }
    }
  }

  /**
   * upstream → client. The only writer on the client leg while running.
   */
  private async runOutboundLoop(): Promise<void> {
    const signal = this.token.signal;

    try {
      while (!this.token.isCancelled()) {
        const event = await this.upstream.receive(signal);

        switch (event.type) {
          case "cancelled":
            return;

          case "closed":
            this.shutdown("upstream-closed");
            return;

          case "error":
            this.shutdown("receive-failed", event.error);
            return;

          case "chunk": {
            this.touch();
            const envelope = encodeOutbound(event.chunk, this.maxOutboundChunkBytes);
            await this.client.writeEnvelope(envelope, signal);
            this.chunksOut++;
            break;
          }

          case "signal": {
            this.touch();
            const action = mapSessionSignal(event.signal, this.forwarding);
            if (action.kind === "forward") {
              await this.client.writeEnvelope(action.envelope, signal);
            } else if (action.kind === "shutdown") {
              this.shutdown(action.reason, action.error);
              return;
            } else {
              this.logDroppedSignal(event.signal);
            }
            break;
          }
        }
      }
    } catch (err) {
      if (CancellationError.isCancellation(err)) {
        return;
      }
      if (err instanceof UnencodableChunkError) {
        this.shutdown("unencodable-chunk", err);
      } else if (err instanceof WriteError) {
        this.shutdown("write-failed", err);
      } else {
        this.logger?.error(`[BridgeSession] ${this.id} outbound loop failed:`, err);
        this.shutdown("write-failed", err);
      }
    }
  }

  /**
   * Release both legs. Runs once, after both loops have returned.
   */
  private async finalize(): Promise<void> {
    // A loop can only return without a shutdown request if it threw past its
    // own handler; treat that as the server ending the session.
    if (this.state === "active") {
      this.shutdown("server-shutdown");
    }
    const reason = this.token.reason ?? "server-shutdown";
    const policy = END_REASON_POLICY[reason];

    this.upstream.close();

    if (policy.diagnostic && this.client.isOpen()) {
      const message = this.endError instanceof Error ? this.endError.message : reason;
      try {
        await this.client.writeEnvelope(
          buildErrorEnvelope(policy.diagnostic, message),
          AbortSignal.timeout(this.diagnosticTimeoutMs),
        );
      } catch (err) {
        this.logger?.debug(
          `[BridgeSession] ${this.id} diagnostic frame not delivered: ${describeError(err)}`,
        );
      }
    }

    this.client.close(policy.closeCode, policy.diagnostic ?? reason);
    this.state = "closed";
    this.endedAt = Date.now();

    this.logger?.info(
      `[BridgeSession] ${this.id} closed (${reason}, in: ${this.chunksIn}, out: ${this.chunksOut}, ` +
        `duration: ${this.endedAt - this.startedAt}ms)`,
    );
  }

  private startTimers(): void {
    if (this.idleTimeoutMs > 0) {
      this.idleTimer = setTimeout(() => this.shutdown("idle-timeout"), this.idleTimeoutMs);
      this.idleTimer.unref();
    }
    if (this.maxDurationMs > 0) {
      this.durationTimer = setTimeout(() => this.shutdown("max-duration"), this.maxDurationMs);
      this.durationTimer.unref();
    }
  }

  private stopTimers(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = undefined;
    }
    if (this.durationTimer) {
      clearTimeout(this.durationTimer);
      this.durationTimer = undefined;
    }
  }

  private touch(): void {
    this.lastActivityAt = Date.now();
    this.idleTimer?.refresh();
  }

  private logDroppedSignal(signal: SessionSignal): void {
    if (signal.type === "go-away") {
      this.logger?.warn(
        `[BridgeSession] ${this.id} upstream announced go-away (time left: ${signal.timeLeft ?? "unknown"})`,
      );
      return;
    }
    this.logger?.debug(`[BridgeSession] ${this.id} dropped signal: ${signal.type}`);
  }
}
