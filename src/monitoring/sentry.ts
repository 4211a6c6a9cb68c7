import type { AppEnv } from "../config.js";

let sentry: typeof import("@sentry/node") | null = null;

// Динамический импорт: без SENTRY_DSN модуль не грузится вовсе.
export async function initSentry(env: AppEnv) {
  if (!env.SENTRY_DSN) return;
  const mod = await import("@sentry/node");
  mod.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    initialScope: { tags: { timezone: env.BOT_TIMEZONE } }
  });
  sentry = mod;
}

export function captureException(err: unknown, extra?: Record<string, unknown>) {
  if (!sentry) return;
  try {
    sentry.captureException(err, extra ? { extra } : undefined);
  } catch (e) {
    console.error("[sentry] capture failed", e);
  }
}
