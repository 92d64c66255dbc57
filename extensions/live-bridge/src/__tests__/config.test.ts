import { describe, it, expect, vi, afterEach } from "vitest";
import {
  parseLiveBridgeConfig,
  loadLiveBridgeConfigFromEnv,
  getDefaultConfig,
  DEFAULT_SYSTEM_INSTRUCTION,
} from "../config.js";
import { createConsoleLogger, createLiveBridgeRuntime } from "../runtime.js";
import { DEFAULT_GEMINI_LIVE_URL, DEFAULT_GEMINI_MODEL } from "../upstream-session.js";
import { createTestMockClient } from "../mock-client.js";
import { FakeConnector, waitFor } from "./fakes.js";

const TEST_SECRET = "test-secret-12345678901234567890123456789012";

describe("config", () => {
  it("fills every default from an empty object", () => {
    const config = getDefaultConfig();

    expect(config.serve).toEqual({ port: 8080, bind: "127.0.0.1", path: "/ws" });
    expect(config.auth).toEqual({ maxConnectAttemptsPerMinute: 30 });
    expect(config.upstream).toEqual({
      url: DEFAULT_GEMINI_LIVE_URL,
      model: DEFAULT_GEMINI_MODEL,
      responseModalities: ["AUDIO"],
      systemInstruction: DEFAULT_SYSTEM_INSTRUCTION,
      handshakeTimeoutMs: 10000,
    });
    expect(config.session).toEqual({
      maxConcurrentSessions: 50,
      idleTimeoutMs: 120000,
      maxDurationMs: 900000,
      maxInboundMessageBytes: 1048576,
      maxOutboundChunkBytes: 1048576,
      queueHighWaterMark: 64,
      forwardText: true,
      forwardInterrupted: true,
      forwardTurnComplete: false,
    });
    expect(config.keepaliveIntervalMs).toBe(30000);
    expect(config.logLevel).toBe("info");
  });

  it("keeps explicit values next to defaults", () => {
    const config = parseLiveBridgeConfig({
      serve: { port: 9000 },
      session: { maxConcurrentSessions: 0, forwardTurnComplete: true },
    });

    expect(config.serve).toEqual({ port: 9000, bind: "127.0.0.1", path: "/ws" });
    expect(config.session.maxConcurrentSessions).toBe(0);
    expect(config.session.forwardTurnComplete).toBe(true);
    expect(config.session.idleTimeoutMs).toBe(120000);
  });

  it("rejects a short secret", () => {
    expect(() => parseLiveBridgeConfig({ auth: { secret: "short" } })).toThrow();
  });

  it("rejects a path without a leading slash", () => {
    expect(() => parseLiveBridgeConfig({ serve: { path: "ws" } })).toThrow();
  });

  it("rejects an unknown response modality", () => {
    expect(() => parseLiveBridgeConfig({ upstream: { responseModalities: ["VIDEO"] } })).toThrow();
  });

  it("reads overrides from the environment", () => {
    const config = loadLiveBridgeConfigFromEnv({
      LIVE_BRIDGE_PORT: "9100",
      LIVE_BRIDGE_BIND: "0.0.0.0",
      LIVE_BRIDGE_PATH: "/live",
      LIVE_BRIDGE_SECRET: TEST_SECRET,
      LIVE_BRIDGE_MAX_SESSIONS: "3",
      LIVE_BRIDGE_LOG_LEVEL: "debug",
      GEMINI_API_KEY: "test-key",
      GEMINI_MODEL: "gemini-test",
      GEMINI_SYSTEM_INSTRUCTION: "Answer in one sentence.",
    });

    expect(config.serve).toEqual({ port: 9100, bind: "0.0.0.0", path: "/live" });
    expect(config.auth.secret).toBe(TEST_SECRET);
    expect(config.session.maxConcurrentSessions).toBe(3);
    expect(config.logLevel).toBe("debug");
    expect(config.upstream.apiKey).toBe("test-key");
    expect(config.upstream.model).toBe("gemini-test");
    expect(config.upstream.systemInstruction).toBe("Answer in one sentence.");
  });

  it("rejects a non-numeric port in the environment", () => {
    expect(() => loadLiveBridgeConfigFromEnv({ LIVE_BRIDGE_PORT: "eighty" })).toThrow(
      'LIVE_BRIDGE_PORT must be an integer, got "eighty"',
    );
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("warn");

    logger.debug("[Test] hidden");
    logger.warn("[Test] shown", 1);

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Test] shown", 1);
  });

  it("logs nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("silent").error("[Test] hidden");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("createLiveBridgeRuntime", () => {
  const quiet = createConsoleLogger("silent");

  it("requires an API key without an injected connector", () => {
    expect(() =>
      createLiveBridgeRuntime({ config: getDefaultConfig(), logger: quiet, env: {} }),
    ).toThrow("[LiveBridge] Gemini API key required - set upstream.apiKey or GEMINI_API_KEY env var");
  });

  it("takes the API key from the environment", () => {
    const runtime = createLiveBridgeRuntime({
      config: getDefaultConfig(),
      logger: quiet,
      env: { GEMINI_API_KEY: "test-key" },
    });
    expect(runtime.registry.getMaxSessions()).toBe(50);
  });

  it("wires config into a working server", async () => {
    const connector = new FakeConnector();
    const runtime = createLiveBridgeRuntime({
      config: parseLiveBridgeConfig({
        serve: { port: 0 },
        session: { maxConcurrentSessions: 1 },
        keepaliveIntervalMs: 0,
      }),
      logger: quiet,
      connector,
    });
    await runtime.start();

    try {
      const first = createTestMockClient(runtime.server.getPort());
      await first.connect();
      await waitFor(() => runtime.registry.size() === 1);

      const second = createTestMockClient(runtime.server.getPort());
      await second.connect();
      expect(await second.waitForClose()).toEqual({ code: 1013, reason: "capacity_exceeded" });

      await first.close();
    } finally {
      await runtime.stop();
    }
  });
});
