import "dotenv/config";
import { getEnv } from "./config.js";
import { createAppDb } from "./db/client.js";
import { createGlowshotBot } from "./bot/createBot.js";
import { startScheduler } from "./scheduler/scheduler.js";
import { initSentry } from "./monitoring/sentry.js";

const env = getEnv();
await initSentry(env);

if (!env.BOT_TOKEN) {
  throw new Error("BOT_TOKEN не задан. Укажите BOT_TOKEN в окружении.");
}

const appDb = createAppDb(env.DATABASE_URL);
const bot = createGlowshotBot({
  token: env.BOT_TOKEN,
  env,
  db: appDb.db
});

console.log(`GlowShot: bot starting (tz ${env.BOT_TIMEZONE})…`);
const scheduler = startScheduler({ env, db: appDb.db, api: bot.api });

const shutdown = () => {
  scheduler.stop();
  void bot.stop().finally(() => appDb.close());
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

await bot.start();
