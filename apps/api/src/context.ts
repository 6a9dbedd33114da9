import { ActivityLog } from "./activityLog.js";
import type { AppConfig } from "./config.js";
import type { Db } from "./db.js";
import { UserStore } from "./userStore.js";

/** Everything a router needs; built once per process (or per test). */
export interface AppContext {
  config: AppConfig;
  db: Db;
  users: UserStore;
  activity: ActivityLog;
  clock: () => Date;
}

export function createContext(config: AppConfig, db: Db, clock: () => Date = () => new Date()): AppContext {
  return {
    config,
    db,
    users: new UserStore(db, clock),
    activity: new ActivityLog(db, clock),
    clock,
  };
}
