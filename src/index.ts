#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { startServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const running = await startServer(config);

  console.error(`personal-log-server running on ${running.url} (data: ${config.root})`);

  const shutdown = (signal: NodeJS.Signals): void => {
    console.error(`\n${signal} received, shutting down...`);
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      },
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
