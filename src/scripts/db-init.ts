import fs from "fs";
import path from "path";
import { SqliteStore } from "../store/sqlite.js";
import { loadConfig, loadDotenv } from "../config.js";

loadDotenv();
const { dbPath } = loadConfig();
fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
const store = new SqliteStore(dbPath);

store.init().then(() => store.close()).then(() => {
  console.log("ok: db initialized", dbPath);
}).catch((e) => {
  console.error("db init failed", e);
  process.exit(1);
});
