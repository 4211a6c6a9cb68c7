import type { Api } from "grammy";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import cron from "node-cron";
import type { AppEnv } from "../config.js";
import { archiveExpiredPhotos, dispatchNotifications, finalizePendingDays } from "./tasks.js";
import { captureException } from "../monitoring/sentry.js";

type Deps = {
  env: AppEnv;
  db: BetterSQLite3Database;
  api: Api;
  now?: () => number;
};

export function startScheduler(deps: Deps) {
  const now = deps.now ?? (() => Date.now());
  let running = false;
  const tick = async () => {
    // не даём двум тикам наложиться, если рассылка затянулась
    if (running) return;
    running = true;
    try {
      archiveExpiredPhotos({ db: deps.db, env: deps.env, now });
      finalizePendingDays({ db: deps.db, env: deps.env, now });
      await dispatchNotifications({ db: deps.db, api: deps.api, env: deps.env, now });
    } catch (e) {
      console.error("[scheduler] error", e);
      captureException(e, { area: "scheduler" });
    } finally {
      running = false;
    }
  };

  const task = cron.schedule("* * * * *", () => void tick(), {
    timezone: deps.env.BOT_TIMEZONE
  });

  const initial = setTimeout(() => void tick(), 5000);

  return {
    tick,
    stop: () => {
      clearTimeout(initial);
      task.stop();
    }
  };
}
