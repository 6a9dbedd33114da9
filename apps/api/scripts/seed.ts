import "dotenv/config";
import { loadConfig } from "../src/config.js";
import { openDatabase } from "../src/db.js";
import { logError, logInfo, setLogLevel } from "../src/logger.js";
import { loadSeedUsers, seedDatabase } from "../src/seed.js";

// Scripts never sign tokens, so the secret only has to satisfy validation.
const config = loadConfig({ JWT_ACCESS_SECRET: "unused-by-scripts", ...process.env });
setLogLevel(config.logLevel);

const db = openDatabase(config.databasePath);

async function main() {
  const seedUsers = loadSeedUsers();
  const summary = await seedDatabase(db, seedUsers, {
    adminPassword: process.env.SEED_ADMIN_PASSWORD ?? "change-me-admin",
    userPassword: process.env.SEED_USER_PASSWORD ?? "change-me-user",
    bcryptRounds: config.bcryptRounds,
    now: new Date(),
  });

  logInfo("Database seeded", { ...summary });

  const admin = seedUsers.find((u) => u.role === "ADMIN");
  const regular = seedUsers.find((u) => u.role === "USER" && u.isActive);
  if (admin) logInfo(`Admin login: ${admin.email} (password from SEED_ADMIN_PASSWORD)`);
  if (regular) logInfo(`Sample user login: ${regular.email} (password from SEED_USER_PASSWORD)`);
}

main()
  .catch((e: unknown) => {
    logError("Seeding failed", { error: e instanceof Error ? e.message : String(e) });
    process.exitCode = 1;
  })
  .finally(() => {
    db.close();
  });
