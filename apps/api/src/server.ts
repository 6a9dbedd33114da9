import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { openDatabase } from "./db.js";
import { logError, logInfo, setLogLevel } from "./logger.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const db = openDatabase(config.databasePath);
const ctx = createContext(config, db);
const app = createApp(ctx);

const server = app.listen(config.port, (err?: Error) => {
  if (err) {
    logError("Failed to start HTTP server", { error: err.message });
    db.close();
    process.exit(1);
  }
  logInfo(`API running on http://localhost:${config.port}`, {
    users: ctx.users.countAll(),
    activities: ctx.activity.count(),
  });
});

let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) {
    logError("Shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shuttingDown = true;
  logInfo(`Received ${signal}, shutting down`);

  server.close((err) => {
    db.close();
    if (err) {
      logError("Error while closing HTTP server", { error: err.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
