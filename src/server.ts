import fs from "fs";
import path from "path";
import pino from "pino";

import { loadConfig, loadDotenv } from "./config.js";
import { SqliteStore } from "./store/sqlite.js";
import { createQueue } from "./plugin/createQueue.js";
import { startScheduler } from "./maintenance/scheduler.js";
import { makeApp } from "./api/app.js";

loadDotenv();
const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
const store = new SqliteStore(config.dbPath);

async function main() {
  await store.init();

  const queue = createQueue({ store, defaultMaxRetries: config.defaultMaxRetries, logger: log });
  const app = makeApp({ queue, sweeps: { store, logger: log }, config, logger: log });

  const scheduler = config.schedulerEnabled
    ? startScheduler({ store, config, logger: log })
    : undefined;

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DB_PATH: config.dbPath,
        DEFAULT_MAX_RETRIES: config.defaultMaxRetries,
        MAX_PROCESSING_MINUTES: config.maxProcessingMinutes,
        SCHEDULER_ENABLED: config.schedulerEnabled,
        API_KEY_CONFIGURED: Boolean(config.apiKey)
      },
      "prqueue running (SqliteStore)"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    scheduler?.stop();
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err) => {
          log.error({ err }, "store close failed");
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
