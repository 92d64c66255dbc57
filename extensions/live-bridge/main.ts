/**
 * Process entry point: reads config from the environment, runs until
 * SIGINT/SIGTERM.
 */

import { createLiveBridgeService } from "./index.js";

const service = createLiveBridgeService();

let stopping = false;
const shutdown = (signal: string) => {
  if (stopping) return;
  stopping = true;
  console.info(`[LiveBridge] ${signal} received, stopping`);
  service.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error("[LiveBridge] Stop failed:", err);
      process.exit(1);
    },
  );
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

service.start().catch((err: unknown) => {
  console.error("[LiveBridge] Start failed:", err);
  process.exit(1);
});
