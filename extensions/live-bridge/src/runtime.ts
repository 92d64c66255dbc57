/**
 * Live Bridge Runtime
 *
 * Creates and wires the bridge components:
 * - SessionRegistry (admission)
 * - GeminiLiveConnector (upstream sessions)
 * - LiveBridgeServer (client WebSocket server)
 */

import {
  LiveBridgeServer,
  type Logger,
  type SessionRejectedEvent,
  type SessionStartedEvent,
} from "./bridge.js";
import type { LiveBridgeConfig, LogLevel } from "./config.js";
import { SessionRegistry } from "./session-registry.js";
import { GeminiLiveConnector, type UpstreamConnector } from "./upstream-session.js";
import type { SessionSnapshot } from "./types.js";

/**
 * Runtime initialization parameters.
 */
export interface LiveBridgeRuntimeParams {
  config: LiveBridgeConfig;
  /** Defaults to a console logger at config.logLevel */
  logger?: Logger;
  /** Defaults to a Gemini Live connector; tests inject their own */
  connector?: UpstreamConnector;
  /** Environment for the API key fallback (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Runtime instance containing all components.
 */
export interface LiveBridgeRuntime {
  config: LiveBridgeConfig;
  server: LiveBridgeServer;
  registry: SessionRegistry;
  start(): Promise<void>;
  stop(): Promise<void>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger writing to the console, dropping messages below `level`.
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (msgLevel: LogLevel) => LEVEL_ORDER[msgLevel] >= threshold;

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(msg, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.info(msg, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(msg, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(msg, ...args);
    },
  };
}

/**
 * Create the Live Bridge runtime.
 */
export function createLiveBridgeRuntime(params: LiveBridgeRuntimeParams): LiveBridgeRuntime {
  const { config } = params;
  const env = params.env ?? process.env;
  const logger = params.logger ?? createConsoleLogger(config.logLevel);

  let connector = params.connector;
  if (!connector) {
    // Determine Gemini API key
    const apiKey = config.upstream.apiKey || env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error(
        "[LiveBridge] Gemini API key required - set upstream.apiKey or GEMINI_API_KEY env var",
      );
    }
    connector = new GeminiLiveConnector({
      apiKey,
      url: config.upstream.url,
      model: config.upstream.model,
      responseModalities: config.upstream.responseModalities,
      voice: config.upstream.voice,
      systemInstruction: config.upstream.systemInstruction,
      handshakeTimeoutMs: config.upstream.handshakeTimeoutMs,
      highWaterMark: config.session.queueHighWaterMark,
      logger,
    });
  }

  const registry = new SessionRegistry({
    maxSessions: config.session.maxConcurrentSessions,
    logger,
  });

  const server = new LiveBridgeServer(
    {
      port: config.serve.port,
      bind: config.serve.bind,
      path: config.serve.path,
      secret: config.auth.secret,
      maxConnectAttemptsPerMinute: config.auth.maxConnectAttemptsPerMinute,
      keepaliveIntervalMs: config.keepaliveIntervalMs,
      session: {
        idleTimeoutMs: config.session.idleTimeoutMs,
        maxDurationMs: config.session.maxDurationMs,
        maxInboundMessageBytes: config.session.maxInboundMessageBytes,
        maxOutboundChunkBytes: config.session.maxOutboundChunkBytes,
        queueHighWaterMark: config.session.queueHighWaterMark,
        forwardText: config.session.forwardText,
        forwardInterrupted: config.session.forwardInterrupted,
        forwardTurnComplete: config.session.forwardTurnComplete,
      },
      logger,
    },
    { connector, registry },
  );

  const sessionStartedHandler = (evt: SessionStartedEvent) => {
    logger.debug(`[LiveBridge] Session started: ${evt.sessionId}`);
  };
  const sessionEndedHandler = (snapshot: SessionSnapshot) => {
    logger.debug(
      `[LiveBridge] Session ended: ${snapshot.id} (${snapshot.endReason ?? "unknown"})`,
    );
  };
  const sessionRejectedHandler = (evt: SessionRejectedEvent) => {
    logger.info(`[LiveBridge] Session rejected: ${evt.sessionId} (${evt.reason})`);
  };

  return {
    config,
    server,
    registry,
    async start() {
      server.on("sessionStarted", sessionStartedHandler);
      server.on("sessionEnded", sessionEndedHandler);
      server.on("sessionRejected", sessionRejectedHandler);
      await server.start();
    },
    async stop() {
      await server.stop();

      // Remove event listeners so the runtime can be restarted
      server.removeListener("sessionStarted", sessionStartedHandler);
      server.removeListener("sessionEnded", sessionEndedHandler);
      server.removeListener("sessionRejected", sessionRejectedHandler);
      logger.info("[LiveBridge] Runtime stopped");
    },
  };
}
