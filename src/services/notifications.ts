import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, eq, lte, sql } from "drizzle-orm";
import { notificationQueue } from "../db/schema.js";

export type NotificationRow = typeof notificationQueue.$inferSelect;
type NotificationInsert = typeof notificationQueue.$inferInsert;

export type NotificationEntry = Omit<NotificationRow, "payload"> & { payload: unknown };

export type RetryPolicy = {
  maxAttempts: number;
  backoffMs: (attempts: number) => number;
};

// 30 секунд .. 15 минут, растёт на минуту с каждой попыткой
export function defaultBackoffMs(attempts: number): number {
  return Math.min(900, Math.max(30, attempts * 60)) * 1000;
}

export function retryPolicy(maxAttempts: number): RetryPolicy {
  return { maxAttempts, backoffMs: defaultBackoffMs };
}

export function notificationValues(input: {
  userId: number;
  type: string;
  payload: unknown;
  runAfter: number;
  now: number;
}): NotificationInsert {
  return {
    userId: input.userId,
    type: input.type,
    payload: JSON.stringify(input.payload ?? {}),
    runAfter: input.runAfter,
    status: "pending",
    attempts: 0,
    createdAt: input.now,
    updatedAt: input.now
  };
}

export function enqueueNotification(
  db: BetterSQLite3Database,
  input: { userId: number; type: string; payload: unknown; runAfter?: number; now: number }
): number {
  return db
    .insert(notificationQueue)
    .values(notificationValues({ ...input, runAfter: input.runAfter ?? input.now }))
    .returning({ id: notificationQueue.id })
    .get().id;
}

export function dequeueDue(db: BetterSQLite3Database, opts: { now: number; limit: number }): NotificationEntry[] {
  return db
    .select()
    .from(notificationQueue)
    .where(and(eq(notificationQueue.status, "pending"), lte(notificationQueue.runAfter, opts.now)))
    .orderBy(asc(notificationQueue.runAfter), asc(notificationQueue.id))
    .limit(opts.limit)
    .all()
    .map((row) => ({ ...row, payload: parsePayload(row.payload) }));
}

/** Успешная отправка тоже считается попыткой. */
export function markSent(db: BetterSQLite3Database, id: number, now: number): boolean {
  const res = db
    .update(notificationQueue)
    .set({ status: "sent", attempts: sql`${notificationQueue.attempts} + 1`, updatedAt: now })
    .where(and(eq(notificationQueue.id, id), eq(notificationQueue.status, "pending")))
    .run();
  return res.changes > 0;
}

export type MarkFailedResult =
  | { status: "pending"; attempts: number; runAfter: number }
  | { status: "failed"; attempts: number }
  | { status: "not_pending" };

export function markFailed(
  db: BetterSQLite3Database,
  opts: { id: number; error: string; now: number; policy: RetryPolicy }
): MarkFailedResult {
  return db.transaction((tx): MarkFailedResult => {
    const row = tx
      .select({ attempts: notificationQueue.attempts, status: notificationQueue.status })
      .from(notificationQueue)
      .where(eq(notificationQueue.id, opts.id))
      .get();
    if (!row || row.status !== "pending") return { status: "not_pending" };

    const attempts = row.attempts + 1;
    const lastError = opts.error.slice(0, 1000);
    if (attempts >= opts.policy.maxAttempts) {
      tx.update(notificationQueue)
        .set({ status: "failed", attempts, lastError, updatedAt: opts.now })
        .where(eq(notificationQueue.id, opts.id))
        .run();
      return { status: "failed", attempts };
    }

    const runAfter = opts.now + opts.policy.backoffMs(attempts);
    tx.update(notificationQueue)
      .set({ attempts, lastError, runAfter, updatedAt: opts.now })
      .where(eq(notificationQueue.id, opts.id))
      .run();
    return { status: "pending", attempts, runAfter };
  });
}

function parsePayload(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}
