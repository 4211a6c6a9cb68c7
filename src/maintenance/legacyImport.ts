import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, eq } from "drizzle-orm";
import { z } from "zod";
import { legacyReferralRewardVersion, referralRewardType } from "../constants.js";
import { photoStatusEvents, photoStatuses, photos, referralRewards } from "../db/schema.js";
import { getDateKey, isDateKey, photoExpiresAt } from "../services/clock.js";
import { ensureUserStats } from "../services/userStats.js";

const dayKeyPattern = /^\d{4}-\d{2}-\d{2}$/;
const timestampPattern = /^\d{4}-\d{2}-\d{2}/;

const blankToNull = (v: unknown) => (typeof v === "string" && v.trim() === "" ? null : v);
const legacyText = z.preprocess(blankToNull, z.string().nullish());

export const legacyPhotoSchema = z.object({
  userId: z.number().int(),
  fileId: z.string().min(1),
  title: legacyText,
  submitDay: legacyText,
  dayKey: legacyText,
  createdAt: legacyText,
  status: z.enum(photoStatuses).optional(),
  deletedReason: legacyText,
  votesCount: z.number().int().nonnegative().default(0),
  sumScore: z.number().int().nonnegative().default(0),
  viewsCount: z.number().int().nonnegative().default(0)
});

export const legacyReferralSchema = z.object({
  invitedUserId: z.number().int(),
  inviterUserId: z.number().int(),
  qualified: z.union([z.boolean(), z.literal(0), z.literal(1)]).transform((v) => v === true || v === 1),
  qualifiedAt: legacyText
});

export const legacyExportSchema = z.object({
  photos: z.array(legacyPhotoSchema).default([]),
  referrals: z.array(legacyReferralSchema).default([])
});

export type LegacyPhoto = z.input<typeof legacyPhotoSchema>;
export type LegacyReferral = z.input<typeof legacyReferralSchema>;
export type LegacyExport = z.infer<typeof legacyExportSchema>;

export type LegacyDeps = {
  db: BetterSQLite3Database;
  timeZone: string;
  now: () => number;
};

function parseTimestamp(value: string | null | undefined): number | undefined {
  if (!value || !timestampPattern.test(value.trim())) return undefined;
  const ts = Date.parse(value.trim());
  return Number.isFinite(ts) ? ts : undefined;
}

/**
 * День публикации для старых записей: явный submitDay, затем dayKey,
 * затем календарный день createdAt, иначе сегодняшний день.
 */
export function resolveLegacySubmitDay(
  row: { submitDay?: string | null; dayKey?: string | null; createdAt?: string | null },
  now: number,
  timeZone: string
): string {
  if (row.submitDay && isDateKey(row.submitDay)) return row.submitDay;
  const dayKey = row.dayKey?.trim();
  if (dayKey && dayKeyPattern.test(dayKey) && isDateKey(dayKey)) return dayKey;
  const createdAt = parseTimestamp(row.createdAt);
  if (createdAt !== undefined) return getDateKey(createdAt, timeZone);
  return getDateKey(now, timeZone);
}

// Неразборчивую дату не выдумываем, берём момент импорта.
export function resolveLegacyRewardedAt(qualifiedAt: string | null | undefined, now: number): number {
  return parseTimestamp(qualifiedAt) ?? now;
}

export type ImportSummary = { imported: number; skipped: number };

/** Повторный импорт того же файла ничего не дублирует: ключ (userId, fileId). */
export function importLegacyPhotos(deps: LegacyDeps, rows: LegacyPhoto[]): ImportSummary {
  const ts = deps.now();
  const parsed = rows.map((r) => legacyPhotoSchema.parse(r));

  return deps.db.transaction((tx): ImportSummary => {
    let imported = 0;
    for (const row of parsed) {
      const exists = tx
        .select({ id: photos.id })
        .from(photos)
        .where(and(eq(photos.userId, row.userId), eq(photos.fileId, row.fileId)))
        .get();
      if (exists) continue;

      const submitDay = resolveLegacySubmitDay(row, ts, deps.timeZone);
      const expiresAt = photoExpiresAt(submitDay, deps.timeZone);
      const submittedAt = parseTimestamp(row.createdAt) ?? ts;
      const status = row.status === "deleted" ? "deleted" : expiresAt <= ts ? "archived" : "active";

      ensureUserStats(tx, row.userId, ts);
      const { id } = tx
        .insert(photos)
        .values({
          userId: row.userId,
          fileId: row.fileId,
          title: row.title ?? null,
          submitDay,
          submittedAt,
          expiresAt,
          status,
          votesCount: row.votesCount,
          sumScore: row.sumScore,
          avgScore: row.votesCount > 0 ? Math.round((row.sumScore / row.votesCount) * 1000) / 1000 : 0,
          viewsCount: row.viewsCount,
          archivedAt: status === "archived" ? ts : null,
          deletedAt: status === "deleted" ? ts : null,
          deletedReason: status === "deleted" ? (row.deletedReason ?? "legacy") : null
        })
        .returning({ id: photos.id })
        .get();
      tx.insert(photoStatusEvents)
        .values({ photoId: id, fromStatus: null, toStatus: status, reason: "legacy_import", createdAt: ts })
        .run();
      imported += 1;
    }
    return { imported, skipped: parsed.length - imported };
  });
}

/** Только квалифицированные рефералы, без начисления кредитов. */
export function importLegacyReferrals(deps: Omit<LegacyDeps, "timeZone">, rows: LegacyReferral[]): ImportSummary {
  const ts = deps.now();
  const parsed = rows.map((r) => legacyReferralSchema.parse(r));

  return deps.db.transaction((tx): ImportSummary => {
    let imported = 0;
    for (const row of parsed) {
      if (!row.qualified || row.invitedUserId === row.inviterUserId) continue;
      const res = tx
        .insert(referralRewards)
        .values({
          invitedUserId: row.invitedUserId,
          inviterUserId: row.inviterUserId,
          rewardedAt: resolveLegacyRewardedAt(row.qualifiedAt, ts),
          rewardType: referralRewardType,
          rewardVersion: legacyReferralRewardVersion
        })
        .onConflictDoNothing({ target: referralRewards.invitedUserId })
        .run();
      imported += res.changes;
    }
    return { imported, skipped: parsed.length - imported };
  });
}
