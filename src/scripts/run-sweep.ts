import pino from "pino";
import { SqliteStore } from "../store/sqlite.js";
import { loadConfig, loadDotenv } from "../config.js";
import { runReclaim } from "../maintenance/reclaim.js";
import { runHealthCheck } from "../maintenance/health.js";
import { runRetention } from "../maintenance/retention.js";

// One-shot entry for cron: run-sweep reclaim | health | retention [daysToKeep]
loadDotenv();
const config = loadConfig();
const log = pino({ level: config.logLevel });
const [task, daysArg] = process.argv.slice(2);

async function main() {
  const store = new SqliteStore(config.dbPath);
  await store.init();
  const ctx = { store, logger: log };

  try {
    let out: { ok: boolean };
    if (task === "reclaim") out = await runReclaim({ ...ctx, maxProcessingMinutes: config.maxProcessingMinutes });
    else if (task === "health") out = await runHealthCheck(ctx);
    else if (task === "retention") out = await runRetention(ctx, daysArg === undefined ? config.retentionDays : Number(daysArg));
    else throw new Error(`unknown task "${task ?? ""}" (expected reclaim, health or retention)`);

    console.log(JSON.stringify(out));
    if (!out.ok) process.exitCode = 1;
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  log.error({ err }, "sweep failed");
  process.exit(1);
});
