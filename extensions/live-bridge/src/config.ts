/**
 * Live Bridge Configuration
 *
 * Defines Zod schemas for bridge configuration.
 */

import { z } from "zod";
import { DEFAULT_GEMINI_LIVE_URL, DEFAULT_GEMINI_MODEL } from "./upstream-session.js";

const ONE_MIB = 1024 * 1024;

export const DEFAULT_SYSTEM_INSTRUCTION = "You are a helpful and friendly AI assistant.";

/**
 * WebSocket server configuration.
 */
export const ServeConfigSchema = z.object({
  /** Port to listen on; 0 picks a free port (default: 8080) */
  port: z.number().int().min(0).max(65535).default(8080),
  /** Bind address (default: 127.0.0.1) */
  bind: z.string().default("127.0.0.1"),
  /** WebSocket path (default: /ws) */
  path: z.string().startsWith("/").default("/ws"),
});

/**
 * Client authentication configuration.
 */
export const AuthConfigSchema = z.object({
  /**
   * Shared secret (min 32 chars). When unset, clients are not authenticated.
   * Generate with: openssl rand -base64 32
   */
  secret: z.string().min(32).optional(),
  /** Max upgrade attempts per minute per IP (default: 30) */
  maxConnectAttemptsPerMinute: z.number().int().min(1).max(10000).default(30),
});

/**
 * Gemini Live upstream configuration.
 */
export const UpstreamConfigSchema = z.object({
  /** Gemini API key (uses GEMINI_API_KEY env if not set) */
  apiKey: z.string().optional(),
  /** BidiGenerateContent endpoint */
  url: z.string().url().default(DEFAULT_GEMINI_LIVE_URL),
  /** Live model */
  model: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
  /** Modalities the model answers with (default: AUDIO) */
  responseModalities: z.array(z.enum(["AUDIO", "TEXT"])).min(1).default(["AUDIO"]),
  /** Prebuilt voice name, e.g. "Puck" */
  voice: z.string().optional(),
  /** System instruction sent with setup */
  systemInstruction: z.string().default(DEFAULT_SYSTEM_INSTRUCTION),
  /** Setup handshake timeout in ms (default: 10000) */
  handshakeTimeoutMs: z.number().int().min(1000).max(60000).default(10000),
});

/**
 * Per-session limits and signal forwarding.
 */
export const SessionConfigSchema = z.object({
  /** Max concurrent sessions; 0 rejects every connection (default: 50) */
  maxConcurrentSessions: z.number().int().min(0).max(10000).default(50),
  /** Close after this long without traffic; 0 disables (default: 120000) */
  idleTimeoutMs: z.number().int().min(0).default(120000),
  /** Hard session limit; 0 disables (default: 900000 = 15 minutes) */
  maxDurationMs: z.number().int().min(0).default(900000),
  /** Max inbound envelope size in bytes (default: 1MiB) */
  maxInboundMessageBytes: z.number().int().min(1024).default(ONE_MIB),
  /** Max upstream payload forwarded to the client (default: 1MiB) */
  maxOutboundChunkBytes: z.number().int().min(1024).default(ONE_MIB),
  /** Undelivered messages per leg before the socket is paused (default: 64) */
  queueHighWaterMark: z.number().int().min(1).max(4096).default(64),
  /** Forward model text as {"text"} (default: true) */
  forwardText: z.boolean().default(true),
  /** Forward barge-in as {"interrupted": true} (default: true) */
  forwardInterrupted: z.boolean().default(true),
  /** Forward turn boundaries as {"turn_complete": true} (default: false) */
  forwardTurnComplete: z.boolean().default(false),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Complete Live Bridge configuration.
 */
export const LiveBridgeConfigSchema = z.object({
  /** WebSocket server settings */
  serve: ServeConfigSchema.default({}),

  /** Client authentication */
  auth: AuthConfigSchema.default({}),

  /** Gemini Live settings */
  upstream: UpstreamConfigSchema.default({}),

  /** Session limits */
  session: SessionConfigSchema.default({}),

  /** Ping interval for client sockets in ms; 0 disables (default: 30000) */
  keepaliveIntervalMs: z.number().int().min(0).default(30000),

  /** Console log level when no host logger is given (default: info) */
  logLevel: LogLevelSchema.default("info"),
});

/**
 * Inferred TypeScript type for the config.
 */
export type LiveBridgeConfig = z.infer<typeof LiveBridgeConfigSchema>;
export type LiveBridgeConfigInput = z.input<typeof LiveBridgeConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Validate and parse a raw config object.
 */
export function parseLiveBridgeConfig(raw: unknown): LiveBridgeConfig {
  return LiveBridgeConfigSchema.parse(raw);
}

/**
 * Build a config from environment variables.
 *
 * LIVE_BRIDGE_PORT, LIVE_BRIDGE_BIND, LIVE_BRIDGE_PATH, LIVE_BRIDGE_SECRET,
 * LIVE_BRIDGE_MAX_SESSIONS, LIVE_BRIDGE_LOG_LEVEL, GEMINI_API_KEY,
 * GEMINI_MODEL, GEMINI_SYSTEM_INSTRUCTION
 */
export function loadLiveBridgeConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LiveBridgeConfig {
  const serve: Record<string, unknown> = {};
  const auth: Record<string, unknown> = {};
  const upstream: Record<string, unknown> = {};
  const session: Record<string, unknown> = {};
  const raw: Record<string, unknown> = { serve, auth, upstream, session };

  if (env.LIVE_BRIDGE_PORT) serve.port = parseIntegerEnv("LIVE_BRIDGE_PORT", env.LIVE_BRIDGE_PORT);
  if (env.LIVE_BRIDGE_BIND) serve.bind = env.LIVE_BRIDGE_BIND;
  if (env.LIVE_BRIDGE_PATH) serve.path = env.LIVE_BRIDGE_PATH;
  if (env.LIVE_BRIDGE_SECRET) auth.secret = env.LIVE_BRIDGE_SECRET;
  if (env.LIVE_BRIDGE_MAX_SESSIONS) {
    session.maxConcurrentSessions = parseIntegerEnv("LIVE_BRIDGE_MAX_SESSIONS", env.LIVE_BRIDGE_MAX_SESSIONS);
  }
  if (env.LIVE_BRIDGE_LOG_LEVEL) raw.logLevel = env.LIVE_BRIDGE_LOG_LEVEL;
  if (env.GEMINI_API_KEY) upstream.apiKey = env.GEMINI_API_KEY;
  if (env.GEMINI_MODEL) upstream.model = env.GEMINI_MODEL;
  if (env.GEMINI_SYSTEM_INSTRUCTION) upstream.systemInstruction = env.GEMINI_SYSTEM_INSTRUCTION;

  return parseLiveBridgeConfig(raw);
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): LiveBridgeConfig {
  return LiveBridgeConfigSchema.parse({});
}

function parseIntegerEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}
