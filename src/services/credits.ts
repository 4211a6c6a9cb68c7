import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, eq, isNull, ne, or, sql } from "drizzle-orm";
import { z } from "zod";
import type { CreditsPolicy } from "../config.js";
import { referralRewardNotificationType, referralRewardType, referralRewardVersion } from "../constants.js";
import type { AppTransaction } from "../db/client.js";
import { notificationQueue, referralRewards, userStats } from "../db/schema.js";
import { isDateKey } from "./clock.js";
import { notificationValues } from "./notifications.js";
import { ensureUserStats } from "./userStats.js";

export type CreditsDeps = {
  db: BetterSQLite3Database;
  now: () => number;
  policy: CreditsPolicy;
};

export type DailyGrantResult =
  | { status: "granted"; credits: number }
  | { status: "already_granted"; credits: number }
  | { status: "invalid_day" };

/** Не больше одного начисления за календарный день. */
export function grantDailyCredits(deps: CreditsDeps, userId: number, day: string): DailyGrantResult {
  if (!isDateKey(day)) return { status: "invalid_day" };
  const ts = deps.now();

  return deps.db.transaction((tx): DailyGrantResult => {
    ensureUserStats(tx, userId, ts);
    const res = tx
      .update(userStats)
      .set({
        credits: sql`${userStats.credits} + ${deps.policy.dailyCredits}`,
        lastDailyGrantDay: day,
        lastActiveAt: ts
      })
      .where(
        and(
          eq(userStats.userId, userId),
          or(isNull(userStats.lastDailyGrantDay), ne(userStats.lastDailyGrantDay, day))
        )
      )
      .run();
    const credits = currentCredits(tx, userId);
    return res.changes > 0 ? { status: "granted", credits } : { status: "already_granted", credits };
  });
}

export const referralRewardNotificationSchema = z.object({
  invitedUserId: z.number().int(),
  credits: z.number().int()
});

export type ReferralRewardNotification = z.infer<typeof referralRewardNotificationSchema>;

export type ReferralRejection = "self_referral" | "unknown_inviter";

export type LinkReferralResult =
  | { status: "linked" }
  | { status: "rejected"; reason: ReferralRejection | "existing_user" };

/**
 * Запоминает пригласившего для нового пользователя. Новым считается тот,
 * у кого ещё нет строки user_stats: ни фото, ни оценок, ни бонусов.
 */
export function linkReferral(
  deps: Pick<CreditsDeps, "db" | "now">,
  input: { invitedUserId: number; inviterUserId: number }
): LinkReferralResult {
  if (input.inviterUserId === input.invitedUserId) return { status: "rejected", reason: "self_referral" };
  const ts = deps.now();

  return deps.db.transaction((tx): LinkReferralResult => {
    if (!hasUserStats(tx, input.inviterUserId)) return { status: "rejected", reason: "unknown_inviter" };
    const inserted = tx
      .insert(userStats)
      .values({ userId: input.invitedUserId, referredBy: input.inviterUserId, createdAt: ts })
      .onConflictDoNothing()
      .run();
    return inserted.changes > 0 ? { status: "linked" } : { status: "rejected", reason: "existing_user" };
  });
}

export type ReferralResult =
  | { status: "rewarded"; credits: number }
  | { status: "already_rewarded"; inviterUserId: number }
  | { status: "rejected"; reason: ReferralRejection };

/**
 * Приглашённый пользователь приносит награду ровно один раз, кто бы ни
 * пытался засчитать его повторно. Кредиты получают оба, пригласившему
 * уходит уведомление.
 */
export function rewardReferral(
  deps: CreditsDeps,
  input: { invitedUserId: number; inviterUserId: number; qualifiedAt?: number }
): ReferralResult {
  if (input.inviterUserId === input.invitedUserId) return { status: "rejected", reason: "self_referral" };
  const ts = deps.now();
  const credits = deps.policy.referralCredits;

  return deps.db.transaction((tx): ReferralResult => {
    const existing = findReferral(tx, input.invitedUserId);
    if (existing) return { status: "already_rewarded", inviterUserId: existing.inviterUserId };
    if (!hasUserStats(tx, input.inviterUserId)) return { status: "rejected", reason: "unknown_inviter" };

    const inserted = tx
      .insert(referralRewards)
      .values({
        invitedUserId: input.invitedUserId,
        inviterUserId: input.inviterUserId,
        rewardedAt: input.qualifiedAt ?? ts,
        rewardType: referralRewardType,
        rewardVersion: referralRewardVersion
      })
      .onConflictDoNothing({ target: referralRewards.invitedUserId })
      .run();
    if (inserted.changes === 0) {
      return {
        status: "already_rewarded",
        inviterUserId: findReferral(tx, input.invitedUserId)?.inviterUserId ?? input.inviterUserId
      };
    }

    for (const userId of [input.inviterUserId, input.invitedUserId]) {
      ensureUserStats(tx, userId, ts);
      if (credits > 0) {
        tx.update(userStats)
          .set({ credits: sql`${userStats.credits} + ${credits}` })
          .where(eq(userStats.userId, userId))
          .run();
      }
    }
    if (credits > 0) {
      const payload: ReferralRewardNotification = { invitedUserId: input.invitedUserId, credits };
      tx.insert(notificationQueue)
        .values(
          notificationValues({
            userId: input.inviterUserId,
            type: referralRewardNotificationType,
            payload,
            runAfter: ts,
            now: ts
          })
        )
        .run();
    }
    return { status: "rewarded", credits };
  });
}

export type QualifyReferralResult = ReferralResult | { status: "not_referred" };

/** Вызывается после принятой оценки: первая оценка приглашённого засчитывает приглашение. */
export function qualifyReferral(deps: CreditsDeps, invitedUserId: number): QualifyReferralResult {
  const stats = deps.db
    .select({ referredBy: userStats.referredBy })
    .from(userStats)
    .where(eq(userStats.userId, invitedUserId))
    .get();
  const inviterUserId = stats?.referredBy;
  if (inviterUserId == null) return { status: "not_referred" };
  return rewardReferral(deps, { invitedUserId, inviterUserId });
}

export function getReferral(db: BetterSQLite3Database, invitedUserId: number) {
  return db.select().from(referralRewards).where(eq(referralRewards.invitedUserId, invitedUserId)).get();
}

function currentCredits(tx: AppTransaction, userId: number): number {
  const row = tx.select({ credits: userStats.credits }).from(userStats).where(eq(userStats.userId, userId)).get();
  return row?.credits ?? 0;
}

function findReferral(tx: AppTransaction, invitedUserId: number) {
  return tx
    .select({ inviterUserId: referralRewards.inviterUserId })
    .from(referralRewards)
    .where(eq(referralRewards.invitedUserId, invitedUserId))
    .get();
}

function hasUserStats(tx: AppTransaction, userId: number): boolean {
  return tx.select({ userId: userStats.userId }).from(userStats).where(eq(userStats.userId, userId)).get() !== undefined;
}
