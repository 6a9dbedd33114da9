import "dotenv/config";
import { loadConfig } from "../src/config.js";
import { createContext } from "../src/context.js";
import { openDatabase } from "../src/db.js";
import { logError, logInfo, setLogLevel } from "../src/logger.js";

// Scripts never sign tokens, so the secret only has to satisfy validation.
const config = loadConfig({ JWT_ACCESS_SECRET: "unused-by-scripts", ...process.env });
setLogLevel(config.logLevel);

try {
  const db = openDatabase(config.databasePath);
  const ctx = createContext(config, db);
  logInfo("Database tables created/verified", {
    path: config.databasePath,
    users: ctx.users.countAll(),
    activities: ctx.activity.count(),
  });
  db.close();
} catch (e) {
  logError("Database initialization failed", { error: e instanceof Error ? e.message : String(e) });
  process.exitCode = 1;
}
