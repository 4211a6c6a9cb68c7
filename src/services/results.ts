import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, count, desc, eq, isNull, ne, notInArray } from "drizzle-orm";
import { z } from "zod";
import type { ResultsPolicy } from "../config.js";
import { dailyResultNotificationType } from "../constants.js";
import type { AppTransaction } from "../db/client.js";
import { dailyResultsCache, notificationQueue, photos, resultRanks } from "../db/schema.js";
import { isDateKey, photoExpiresAt } from "./clock.js";
import { notificationValues } from "./notifications.js";

export type RankingDeps = {
  db: BetterSQLite3Database;
  timeZone: string;
  now: () => number;
  policy: ResultsPolicy;
  random?: () => number;
};

export type RankInput = {
  photoId: number;
  userId: number;
  sumScore: number;
  votesCount: number;
  avgScore: number;
  viewsCount: number;
  submittedAt: number;
};

const rankedPhotoSchema = z.object({
  rank: z.number().int().positive(),
  photoId: z.number().int(),
  userId: z.number().int(),
  sumScore: z.number().int(),
  votesCount: z.number().int(),
  avgScore: z.number(),
  viewsCount: z.number().int(),
  isTop: z.boolean()
});

const resultsPayloadSchema = z.object({
  submitDay: z.string(),
  participantsCount: z.number().int(),
  topThreshold: z.number().int(),
  items: z.array(rankedPhotoSchema)
});

export type RankedPhoto = z.infer<typeof rankedPhotoSchema>;
export type DailyResultsPayload = z.infer<typeof resultsPayloadSchema>;

export const dailyResultNotificationSchema = z.object({
  submitDay: z.string(),
  participantsCount: z.number().int(),
  photos: z.array(rankedPhotoSchema.pick({ photoId: true, rank: true, sumScore: true, votesCount: true, isTop: true }))
});

export type DailyResultNotification = z.infer<typeof dailyResultNotificationSchema>;

export type DailyResults = {
  submitDay: string;
  participantsCount: number;
  topThreshold: number;
  publishedAt: number;
  notificationsEnqueuedAt: number | null;
  payloadJson: string;
  payload: DailyResultsPayload;
};

export type FinalizeResult =
  | { status: "finalized"; results: DailyResults; notificationsEnqueued: number }
  | { status: "already_finalized"; results: DailyResults; notificationsEnqueued: number }
  | { status: "too_early"; activePhotos: number }
  | { status: "invalid_day" };

/**
 * Distinct ranks 1..N: sum of scores, then number of votes, then the earlier
 * submission wins. The photo id settles identical timestamps.
 */
export function rankPhotos(rows: RankInput[]): Array<RankInput & { rank: number }> {
  return [...rows]
    .sort(
      (a, b) =>
        b.sumScore - a.sumScore ||
        b.votesCount - a.votesCount ||
        a.submittedAt - b.submittedAt ||
        a.photoId - b.photoId
    )
    .map((row, idx) => ({ ...row, rank: idx + 1 }));
}

export function buildResultsPayload(
  submitDay: string,
  rows: RankInput[],
  policy: Pick<ResultsPolicy, "topSize" | "minVotesForTop">
): DailyResultsPayload {
  const ranked = rankPhotos(rows);
  const items: RankedPhoto[] = ranked.map((r) => ({
    rank: r.rank,
    photoId: r.photoId,
    userId: r.userId,
    sumScore: r.sumScore,
    votesCount: r.votesCount,
    avgScore: r.avgScore,
    viewsCount: r.viewsCount,
    isTop: r.rank <= policy.topSize && r.votesCount >= policy.minVotesForTop
  }));
  const top = items.filter((i) => i.isTop);
  return {
    submitDay,
    participantsCount: new Set(items.map((i) => i.userId)).size,
    topThreshold: top.length > 0 ? Math.min(...top.map((i) => i.sumScore)) : 0,
    items
  };
}

export function finalizeDay(deps: RankingDeps, day: string): FinalizeResult {
  if (!isDateKey(day)) return { status: "invalid_day" };

  const ts = deps.now();
  const random = deps.random ?? Math.random;

  return deps.db.transaction((tx): FinalizeResult => {
    const cached = tx.select().from(dailyResultsCache).where(eq(dailyResultsCache.submitDay, day)).get();
    if (cached) {
      if (cached.notificationsEnqueuedAt != null) {
        return { status: "already_finalized", results: toDailyResults(cached), notificationsEnqueued: 0 };
      }
      // упали между публикацией и постановкой уведомлений в очередь
      const enqueued = enqueueResultNotifications(tx, cached, ts, deps, random);
      return {
        status: "already_finalized",
        results: toDailyResults({ ...cached, notificationsEnqueuedAt: ts }),
        notificationsEnqueued: enqueued
      };
    }

    const active = tx
      .select({ c: count() })
      .from(photos)
      .where(and(eq(photos.submitDay, day), eq(photos.status, "active")))
      .get();
    const activePhotos = active?.c ?? 0;
    if (ts <= photoExpiresAt(day, deps.timeZone) || activePhotos > 0) {
      return { status: "too_early", activePhotos };
    }

    const rows = tx
      .select({
        photoId: photos.id,
        userId: photos.userId,
        sumScore: photos.sumScore,
        votesCount: photos.votesCount,
        avgScore: photos.avgScore,
        viewsCount: photos.viewsCount,
        submittedAt: photos.submittedAt
      })
      .from(photos)
      .where(and(eq(photos.submitDay, day), ne(photos.status, "deleted")))
      .all();

    const payload = buildResultsPayload(day, rows, deps.policy);
    if (payload.items.length > 0) {
      tx.insert(resultRanks)
        .values(payload.items.map((i) => ({ photoId: i.photoId, submitDay: day, finalRank: i.rank, finalizedAt: ts })))
        .onConflictDoNothing({ target: [resultRanks.photoId, resultRanks.submitDay] })
        .run();
    }

    const payloadJson = JSON.stringify(payload);
    tx.insert(dailyResultsCache)
      .values({
        submitDay: day,
        participantsCount: payload.participantsCount,
        topThreshold: payload.topThreshold,
        payload: payloadJson,
        publishedAt: ts,
        createdAt: ts,
        updatedAt: ts
      })
      .onConflictDoNothing({ target: dailyResultsCache.submitDay })
      .run();

    const row = tx.select().from(dailyResultsCache).where(eq(dailyResultsCache.submitDay, day)).get();
    if (!row) throw new Error(`daily_results_cache row for ${day} was not written`);
    const enqueued = enqueueResultNotifications(tx, row, ts, deps, random);
    return {
      status: "finalized",
      results: toDailyResults({ ...row, notificationsEnqueuedAt: ts }),
      notificationsEnqueued: enqueued
    };
  });
}

function enqueueResultNotifications(
  tx: AppTransaction,
  row: typeof dailyResultsCache.$inferSelect,
  ts: number,
  deps: Pick<RankingDeps, "policy">,
  random: () => number
): number {
  const payload = resultsPayloadSchema.parse(JSON.parse(row.payload));
  const byUser = new Map<number, RankedPhoto[]>();
  for (const item of payload.items) {
    const list = byUser.get(item.userId) ?? [];
    list.push(item);
    byUser.set(item.userId, list);
  }

  const values = [...byUser.entries()].map(([userId, items]) => {
    const body: DailyResultNotification = {
      submitDay: payload.submitDay,
      participantsCount: payload.participantsCount,
      photos: items.map((i) => ({
        photoId: i.photoId,
        rank: i.rank,
        sumScore: i.sumScore,
        votesCount: i.votesCount,
        isTop: i.isTop
      }))
    };
    // разносим отправку по окну, чтобы не упереться в лимиты Telegram
    const jitter = Math.floor(random() * (deps.policy.notifyJitterMs / 1000)) * 1000;
    return notificationValues({
      userId,
      type: dailyResultNotificationType,
      payload: body,
      runAfter: ts + jitter,
      now: ts
    });
  });
  if (values.length > 0) tx.insert(notificationQueue).values(values).run();

  tx.update(dailyResultsCache)
    .set({ notificationsEnqueuedAt: ts, updatedAt: ts })
    .where(and(eq(dailyResultsCache.submitDay, row.submitDay), isNull(dailyResultsCache.notificationsEnqueuedAt)))
    .run();
  return values.length;
}

function toDailyResults(row: typeof dailyResultsCache.$inferSelect): DailyResults {
  return {
    submitDay: row.submitDay,
    participantsCount: row.participantsCount,
    topThreshold: row.topThreshold,
    publishedAt: row.publishedAt,
    notificationsEnqueuedAt: row.notificationsEnqueuedAt,
    payloadJson: row.payload,
    payload: resultsPayloadSchema.parse(JSON.parse(row.payload))
  };
}

export function getDailyResults(db: BetterSQLite3Database, day: string): DailyResults | undefined {
  const row = db.select().from(dailyResultsCache).where(eq(dailyResultsCache.submitDay, day)).get();
  return row ? toDailyResults(row) : undefined;
}

export function getLatestDailyResults(db: BetterSQLite3Database): DailyResults | undefined {
  const row = db.select().from(dailyResultsCache).orderBy(desc(dailyResultsCache.submitDay)).get();
  return row ? toDailyResults(row) : undefined;
}

export function getFinalRanks(db: BetterSQLite3Database, day: string) {
  return db
    .select({ photoId: resultRanks.photoId, finalRank: resultRanks.finalRank })
    .from(resultRanks)
    .where(eq(resultRanks.submitDay, day))
    .orderBy(asc(resultRanks.finalRank))
    .all();
}

/** Days that have photos but no published results yet, oldest first. */
export function listUnfinalizedDays(db: BetterSQLite3Database): string[] {
  const finalized = db.select({ day: dailyResultsCache.submitDay }).from(dailyResultsCache);
  return db
    .selectDistinct({ day: photos.submitDay })
    .from(photos)
    .where(and(ne(photos.status, "deleted"), notInArray(photos.submitDay, finalized)))
    .orderBy(asc(photos.submitDay))
    .all()
    .map((r) => r.day);
}

/** Published days whose result notifications never made it into the queue. */
export function listDaysAwaitingNotifications(db: BetterSQLite3Database): string[] {
  return db
    .select({ day: dailyResultsCache.submitDay })
    .from(dailyResultsCache)
    .where(isNull(dailyResultsCache.notificationsEnqueuedAt))
    .orderBy(asc(dailyResultsCache.submitDay))
    .all()
    .map((r) => r.day);
}
