/**
 * Live Bridge
 *
 * Relays a client WebSocket carrying JSON media envelopes to a Gemini Live
 * session and streams the model's audio and signals back.
 */

import {
  loadLiveBridgeConfigFromEnv,
  parseLiveBridgeConfig,
  type LiveBridgeConfig,
} from "./src/config.js";
import {
  createLiveBridgeRuntime,
  type LiveBridgeRuntime,
  type LiveBridgeRuntimeParams,
} from "./src/runtime.js";

export {
  LiveBridgeServer,
  DEFAULT_SESSION_SETTINGS,
  type BridgeConfig,
  type BridgeDependencies,
  type Logger,
  type SessionRejectedEvent,
  type SessionSettings,
  type SessionStartedEvent,
} from "./src/bridge.js";
export {
  BridgeSession,
  DEFAULT_SIGNAL_FORWARDING,
  closeCodeForReason,
  mapSessionSignal,
  type BridgeSessionOptions,
  type SignalAction,
  type SignalForwarding,
} from "./src/session-bridge.js";
export { SessionRegistry, type Reservation, type SessionRegistryOptions } from "./src/session-registry.js";
export {
  GeminiLiveConnector,
  GeminiLiveSession,
  DEFAULT_GEMINI_LIVE_URL,
  DEFAULT_GEMINI_MODEL,
  type GeminiLiveConfig,
  type UpstreamConnector,
  type UpstreamOpenOptions,
  type UpstreamSession,
} from "./src/upstream-session.js";
export { ClientConnection, type ClientConnectionOptions, type ClientLeg } from "./src/client-connection.js";
export {
  parseClientEnvelope,
  decodeInbound,
  encodeOutbound,
  serializeOutboundEnvelope,
  buildErrorEnvelope,
  DEFAULT_MAX_CHUNK_BYTES,
  DEFAULT_MAX_MESSAGE_SIZE,
} from "./src/envelope-codec.js";
export * from "./src/errors.js";
export * from "./src/types.js";
export {
  LiveBridgeConfigSchema,
  getDefaultConfig,
  loadLiveBridgeConfigFromEnv,
  parseLiveBridgeConfig,
  type LiveBridgeConfig,
  type LiveBridgeConfigInput,
  type LogLevel,
} from "./src/config.js";
export {
  createConsoleLogger,
  createLiveBridgeRuntime,
  type LiveBridgeRuntime,
  type LiveBridgeRuntimeParams,
} from "./src/runtime.js";

/**
 * Service lifecycle around a lazily created runtime.
 */
export interface LiveBridgeService {
  id: string;
  start(): Promise<LiveBridgeRuntime>;
  stop(): Promise<void>;
}

export interface LiveBridgeServiceOptions extends Omit<LiveBridgeRuntimeParams, "config"> {
  /** Raw config; read from the environment when omitted */
  config?: unknown;
}

/**
 * Create the bridge service. The runtime is built on first start() and
 * discarded on stop(), so the service can be started again.
 */
export function createLiveBridgeService(options: LiveBridgeServiceOptions = {}): LiveBridgeService {
  const { config: rawConfig, ...runtimeParams } = options;
  const cfg: LiveBridgeConfig =
    rawConfig === undefined
      ? loadLiveBridgeConfigFromEnv(runtimeParams.env)
      : parseLiveBridgeConfig(rawConfig);

  let runtime: LiveBridgeRuntime | null = null;

  const ensureRuntime = () => {
    if (!runtime) {
      runtime = createLiveBridgeRuntime({ ...runtimeParams, config: cfg });
    }
    return runtime;
  };

  return {
    id: "live-bridge",
    async start() {
      const rt = ensureRuntime();
      await rt.start();
      return rt;
    },
    async stop() {
      if (runtime) {
        const rt = runtime;
        runtime = null;
        await rt.stop();
      }
    },
  };
}
