/**
 * Live Bridge Server
 *
 * WebSocket server for client connections. Each accepted connection gets
 * one upstream Live session and one BridgeSession relaying between them.
 */

import { WebSocket, WebSocketServer } from "ws";
import type { IncomingMessage } from "http";
import { EventEmitter } from "events";
import { randomUUID, timingSafeEqual } from "crypto";
import type { SessionSnapshot } from "./types.js";
import type { UpstreamConnector, UpstreamSession } from "./upstream-session.js";
import { buildErrorEnvelope, DEFAULT_MAX_MESSAGE_SIZE, DEFAULT_MAX_CHUNK_BYTES } from "./envelope-codec.js";
import { CapacityExceededError, ConnectError, describeError } from "./errors.js";
import { ClientConnection } from "./client-connection.js";
import { BridgeSession } from "./session-bridge.js";
import { SessionRegistry, type Reservation } from "./session-registry.js";

/**
 * Logger interface for injected logging.
 */
export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Per-session settings applied to every accepted connection.
 */
export interface SessionSettings {
  /** 0 disables */
  idleTimeoutMs: number;
  /** 0 disables */
  maxDurationMs: number;
  maxInboundMessageBytes: number;
  maxOutboundChunkBytes: number;
  /** Undelivered client messages held before the socket is paused */
  queueHighWaterMark: number;
  forwardText: boolean;
  forwardInterrupted: boolean;
  forwardTurnComplete: boolean;
}

/**
 * Bridge server configuration.
 */
export interface BridgeConfig {
  /** Port to listen on (0 picks a free port) */
  port: number;
  /** Bind address (default: 127.0.0.1) */
  bind?: string;
  /** WebSocket path (default: /ws) */
  path?: string;
  /** Shared secret; when unset, connections are not authenticated */
  secret?: string;
  /** Max upgrade attempts per minute per IP (default: 30) */
  maxConnectAttemptsPerMinute?: number;
  /** Ping interval in ms; 0 disables (default: 30000) */
  keepaliveIntervalMs?: number;
  session?: Partial<SessionSettings>;
  /** Optional logger for structured logging */
  logger?: Logger;
}

export interface BridgeDependencies {
  connector: UpstreamConnector;
  /** Defaults to a registry admitting 50 sessions */
  registry?: SessionRegistry;
}

export interface SessionStartedEvent {
  sessionId: string;
  remoteAddress?: string;
}

export interface SessionRejectedEvent {
  sessionId: string;
  remoteAddress?: string;
  /** Error code sent to the client */
  reason: string;
  message: string;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  idleTimeoutMs: 120_000,
  maxDurationMs: 900_000,
  maxInboundMessageBytes: DEFAULT_MAX_MESSAGE_SIZE,
  maxOutboundChunkBytes: DEFAULT_MAX_CHUNK_BYTES,
  queueHighWaterMark: 64,
  forwardText: true,
  forwardInterrupted: true,
  forwardTurnComplete: false,
};

/**
 * Rate limiting tracker for connection attempts.
 */
export interface RateLimitEntry {
  count: number;
  resetAt: number;
}

interface TrackedConnection {
  ws: WebSocket;
  client: ClientConnection;
}

type ResolvedBridgeConfig = Required<Omit<BridgeConfig, "logger" | "secret" | "session">> & {
  secret?: string;
};

/**
 * Live Bridge - WebSocket server pairing clients with upstream Live sessions.
 *
 * Events:
 * - sessionStarted (SessionStartedEvent)
 * - sessionEnded (SessionSnapshot)
 * - sessionRejected (SessionRejectedEvent)
 */
export class LiveBridgeServer extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private readonly config: ResolvedBridgeConfig;
  private readonly settings: SessionSettings;
  private readonly connector: UpstreamConnector;
  private readonly registry: SessionRegistry;
  private readonly logger?: Logger;
  private readonly connections = new Map<string, TrackedConnection>();
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private stopping = false;

  // Rate limiting state
  private connectionAttempts: Map<string, RateLimitEntry> = new Map();

  // Ping interval for health monitoring
  private pingInterval?: NodeJS.Timeout;

  constructor(config: BridgeConfig, deps: BridgeDependencies) {
    super();
    this.config = {
      port: config.port,
      bind: config.bind ?? "127.0.0.1",
      path: config.path ?? "/ws",
      secret: config.secret,
      maxConnectAttemptsPerMinute: config.maxConnectAttemptsPerMinute ?? 30,
      keepaliveIntervalMs: config.keepaliveIntervalMs ?? 30_000,
    };
    this.settings = { ...DEFAULT_SESSION_SETTINGS, ...config.session };
    this.connector = deps.connector;
    this.registry = deps.registry ?? new SessionRegistry({ maxSessions: 50, logger: config.logger });
    this.logger = config.logger;
  }

  /**
   * Start the WebSocket server.
   */
  async start(): Promise<void> {
    if (this.wss) {
      throw new Error("Bridge already started");
    }
    this.stopping = false;

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.config.port,
        host: this.config.bind,
        path: this.config.path,
        // Oversized envelopes up to twice the limit get a 1007 from the codec;
        // beyond that ws refuses the frame itself.
        maxPayload: this.settings.maxInboundMessageBytes * 2,
        verifyClient: (info, callback) => {
          const rejection = this.verifyUpgrade(info.req);
          if (rejection) {
            callback(false, rejection.status, rejection.message);
            return;
          }
          callback(true);
        },
      });
      this.wss = wss;

      wss.on("connection", (ws, req) => {
        this.handleConnection(ws, req);
      });

      wss.once("listening", () => {
        wss.off("error", reject);
        wss.on("error", (error) => {
          this.logger?.error("[LiveBridge] Server error:", error.message);
        });
        this.startKeepalive(wss);
        this.logger?.info(
          `[LiveBridge] Listening on ${this.config.bind}:${this.getPort()}${this.config.path}`,
        );
        resolve();
      });

      wss.once("error", reject);
    });
  }

  /**
   * Stop accepting connections, shut every session down and close the server.
   */
  async stop(): Promise<void> {
    this.stopping = true;

    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = undefined;
    }

    const ended = await this.registry.shutdownAll("server-shutdown");
    if (ended.length > 0) {
      this.logger?.info(`[LiveBridge] Closed ${ended.length} session(s) on shutdown`);
    }

    // Connections still waiting on their upstream handshake
    const remaining = [...this.connections.values()];
    for (const { client } of remaining) {
      client.close(1001, "server_shutdown");
    }
    await Promise.all(remaining.map(({ ws }) => waitForClose(ws)));

    this.connectionAttempts.clear();

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      this.wss = null;
      this.logger?.info("[LiveBridge] Stopped");
    }
  }

  /**
   * Port the server is bound to (resolves port 0 once listening).
   */
  getPort(): number {
    const address = this.wss?.address();
    if (address && typeof address === "object") {
      return address.port;
    }
    return this.config.port;
  }

  getSession(sessionId: string): SessionSnapshot | undefined {
    return this.registry.get(sessionId)?.getSnapshot();
  }

  getActiveSessionCount(): number {
    return this.registry.size();
  }

  getRegistry(): SessionRegistry {
    return this.registry;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection handling
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Rate limit and authenticate an upgrade request.
   */
  private verifyUpgrade(req: IncomingMessage): { status: number; message: string } | null {
    const ip = req.socket.remoteAddress ?? "unknown";

    if (this.stopping) {
      return { status: 503, message: "Service Unavailable" };
    }

    // Rate limiting check
    const now = Date.now();
    pruneRateLimits(this.connectionAttempts, now);
    const attempts = this.connectionAttempts.get(ip);

    if (attempts && attempts.count >= this.config.maxConnectAttemptsPerMinute) {
      this.logger?.warn(`[LiveBridge] Rate limit exceeded for IP: ${ip}`);
      return { status: 429, message: "Too Many Requests" };
    }

    // Update rate limit counter
    if (!attempts) {
      this.connectionAttempts.set(ip, { count: 1, resetAt: now + 60000 });
    } else {
      attempts.count++;
    }

    const expected = this.config.secret;
    if (expected === undefined) {
      return null;
    }

    // Timing-safe secret comparison
    const secret = readSecret(req);
    if (typeof secret !== "string" ||
        secret.length !== expected.length ||
        !timingSafeEqual(Buffer.from(secret), Buffer.from(expected))) {
      this.logger?.warn(`[LiveBridge] Unauthorized connection attempt from IP: ${ip}`);
      return { status: 401, message: "Unauthorized" };
    }

    return null;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const sessionId = randomUUID();
    const remoteAddress = req.socket.remoteAddress;
    this.logger?.info(`[LiveBridge] New connection ${sessionId} from ${remoteAddress ?? "unknown"}`);

    this.alive.set(ws, true);
    ws.on("pong", () => {
      this.alive.set(ws, true);
    });

    // Created immediately so nothing the client sends during the upstream
    // handshake is lost.
    const client = new ClientConnection(ws, {
      id: sessionId,
      remoteAddress,
      maxMessageBytes: this.settings.maxInboundMessageBytes,
      highWaterMark: this.settings.queueHighWaterMark,
      logger: this.logger,
    });

    this.connections.set(sessionId, { ws, client });
    ws.once("close", () => {
      this.connections.delete(sessionId);
    });

    this.acceptSession(ws, client).catch((err) => {
      this.logger?.error(`[LiveBridge] Session ${sessionId} failed:`, err);
      client.close(1011, "internal_error");
    });
  }

  /**
   * reserve → open upstream → commit → run → unregister.
   */
  private async acceptSession(ws: WebSocket, client: ClientConnection): Promise<void> {
    const sessionId = client.id;

    let reservation: Reservation;
    try {
      reservation = this.registry.reserve(sessionId);
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        await this.rejectConnection(client, err.code, err.message, 1013);
        return;
      }
      throw err;
    }

    // A client that leaves during the handshake aborts it
    const handshake = new AbortController();
    const abortHandshake = () => handshake.abort();
    ws.once("close", abortHandshake);

    let upstream: UpstreamSession;
    try {
      upstream = await this.connector.open({ sessionId, signal: handshake.signal });
    } catch (err) {
      reservation.release();
      const error = err instanceof ConnectError ? err : new ConnectError(describeError(err), { cause: err });
      this.logger?.warn(`[LiveBridge] Upstream unavailable for ${sessionId}: ${error.message}`);
      await this.rejectConnection(client, error.code, error.message, 1011);
      return;
    } finally {
      ws.off("close", abortHandshake);
    }

    if (this.stopping) {
      upstream.close();
      reservation.release();
      await this.rejectConnection(client, "server_shutdown", "Bridge is shutting down", 1001);
      return;
    }

    const session = new BridgeSession({
      id: sessionId,
      client,
      upstream,
      logger: this.logger,
      idleTimeoutMs: this.settings.idleTimeoutMs,
      maxDurationMs: this.settings.maxDurationMs,
      maxOutboundChunkBytes: this.settings.maxOutboundChunkBytes,
      signals: {
        forwardText: this.settings.forwardText,
        forwardInterrupted: this.settings.forwardInterrupted,
        forwardTurnComplete: this.settings.forwardTurnComplete,
      },
    });
    reservation.commit(session);

    const started: SessionStartedEvent = { sessionId, remoteAddress: client.remoteAddress };
    this.emit("sessionStarted", started);

    let snapshot: SessionSnapshot;
    try {
      snapshot = await session.run();
    } finally {
      this.registry.unregister(sessionId);
    }
    this.emit("sessionEnded", snapshot);
  }

  /**
   * Send a diagnostic frame to a connection that never became a session, then close it.
   */
  private async rejectConnection(
    client: ClientConnection,
    reason: string,
    message: string,
    closeCode: number,
  ): Promise<void> {
    const event: SessionRejectedEvent = {
      sessionId: client.id,
      remoteAddress: client.remoteAddress,
      reason,
      message,
    };
    this.emit("sessionRejected", event);

    try {
      await client.writeEnvelope(buildErrorEnvelope(reason, message), AbortSignal.timeout(1000));
    } catch (err) {
      this.logger?.debug(`[LiveBridge] Rejection frame not delivered to ${client.id}: ${describeError(err)}`);
    }
    client.close(closeCode, reason);
  }

  private startKeepalive(wss: WebSocketServer): void {
    if (this.config.keepaliveIntervalMs <= 0) {
      return;
    }
    this.pingInterval = setInterval(() => {
      wss.clients.forEach((ws) => {
        if (this.alive.get(ws) === false) {
          this.logger?.warn("[LiveBridge] Terminating unresponsive WebSocket");
          ws.terminate();
          return;
        }
        this.alive.set(ws, false);
        ws.ping();
      });
    }, this.config.keepaliveIntervalMs);
    this.pingInterval.unref();
  }
}

/**
 * Drop rate limit entries whose window has passed.
 */
export function pruneRateLimits(attempts: Map<string, RateLimitEntry>, now: number): void {
  for (const [ip, entry] of attempts) {
    if (now >= entry.resetAt) {
      attempts.delete(ip);
    }
  }
}

/**
 * Read the shared secret from the x-bridge-secret header or the token query parameter.
 */
function readSecret(req: IncomingMessage): string | undefined {
  const header = req.headers["x-bridge-secret"];
  if (typeof header === "string") {
    return header;
  }
  const url = new URL(req.url ?? "/", "http://localhost");
  return url.searchParams.get("token") ?? undefined;
}

function waitForClose(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    ws.once("close", () => resolve());
  });
}
