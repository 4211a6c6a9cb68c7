import type { Api } from "grammy";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { resultsPolicyFromEnv, type AppEnv } from "../config.js";
import { captureException } from "../monitoring/sentry.js";
import { dequeueDue, markFailed, markSent, retryPolicy, type NotificationEntry } from "../services/notifications.js";
import { archiveExpired } from "../services/photos.js";
import { finalizeDay, listDaysAwaitingNotifications, listUnfinalizedDays } from "../services/results.js";
import { renderNotification } from "../bot/texts.js";

type Deps = {
  db: BetterSQLite3Database;
  api: Api;
  env: AppEnv;
  now: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function archiveExpiredPhotos(deps: Pick<Deps, "db" | "env" | "now">) {
  const archived = archiveExpired({ db: deps.db, timeZone: deps.env.BOT_TIMEZONE, now: deps.now });
  if (archived > 0) console.log(`[lifecycle] archived ${archived} expired photo(s)`);
  return archived;
}

export function finalizePendingDays(deps: Pick<Deps, "db" | "env" | "now" | "random">) {
  const days = [...listUnfinalizedDays(deps.db), ...listDaysAwaitingNotifications(deps.db)];
  const finalized: string[] = [];
  for (const day of days) {
    const res = finalizeDay(
      {
        db: deps.db,
        timeZone: deps.env.BOT_TIMEZONE,
        now: deps.now,
        policy: resultsPolicyFromEnv(deps.env),
        random: deps.random
      },
      day
    );
    if (res.status === "finalized") {
      finalized.push(day);
      console.log(
        `[results] ${day} finalized: ${res.results.payload.items.length} photo(s), ${res.notificationsEnqueued} notification(s)`
      );
    } else if (res.status === "already_finalized" && res.notificationsEnqueued > 0) {
      console.log(`[results] ${day} notifications re-enqueued: ${res.notificationsEnqueued}`);
    }
  }
  return finalized;
}

export type DispatchSummary = { sent: number; retried: number; failed: number };

export async function dispatchNotifications(deps: Omit<Deps, "random">): Promise<DispatchSummary> {
  const policy = retryPolicy(deps.env.NOTIFY_MAX_ATTEMPTS);
  const due = dequeueDue(deps.db, { now: deps.now(), limit: deps.env.NOTIFY_BATCH_SIZE });
  const summary: DispatchSummary = { sent: 0, retried: 0, failed: 0 };
  const pause = deps.sleep ?? sleep;
  // пауза перед следующей отправкой, чтобы не упираться в лимиты Telegram
  let nextDelay = 0;

  for (const entry of due) {
    const text = renderNotification(entry);
    if (text === undefined) {
      // повторять бессмысленно: такой payload не отрисуется и в следующий раз
      const res = markFailed(deps.db, {
        id: entry.id,
        error: `unsupported notification: ${entry.type}`,
        now: deps.now(),
        policy: { ...policy, maxAttempts: 1 }
      });
      if (res.status === "failed") {
        summary.failed += 1;
        await reportPermanentFailure(deps, entry, new Error(`unsupported notification: ${entry.type}`));
      }
      continue;
    }

    if (nextDelay > 0) await pause(nextDelay);
    try {
      await deps.api.sendMessage(entry.userId, text);
      nextDelay = deps.env.NOTIFY_SEND_DELAY_MS;
    } catch (e) {
      nextDelay = deps.env.NOTIFY_FAILURE_DELAY_MS;
      const res = markFailed(deps.db, { id: entry.id, error: errorMessage(e), now: deps.now(), policy });
      if (res.status === "pending") {
        summary.retried += 1;
        console.warn(`[notify] #${entry.id} to ${entry.userId} failed (attempt ${res.attempts}), retry later`);
      } else if (res.status === "failed") {
        summary.failed += 1;
        await reportPermanentFailure(deps, entry, e);
      }
      continue;
    }
    if (markSent(deps.db, entry.id, deps.now())) summary.sent += 1;
  }

  return summary;
}

async function reportPermanentFailure(deps: Pick<Deps, "api" | "env">, entry: NotificationEntry, error: unknown) {
  console.error(`[notify] #${entry.id} to ${entry.userId} gave up`, error);
  captureException(error, { area: "notify", notificationId: entry.id, userId: entry.userId, type: entry.type });

  const adminId = deps.env.ADMIN_TELEGRAM_ID;
  if (!adminId) return;
  try {
    await deps.api.sendMessage(
      adminId,
      `⚠️ Уведомление #${entry.id} (${entry.type}) пользователю ${entry.userId} не доставлено: ${errorMessage(error)}`
    );
  } catch (e) {
    console.error("[notify] admin alert failed", e);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
