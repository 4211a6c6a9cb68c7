import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, eq, sql } from "drizzle-orm";
import type { VotingPolicy } from "../config.js";
import { maxScore, minScore } from "../constants.js";
import { dailyAuthorVotes, photoViews, photos, userStats, votes } from "../db/schema.js";
import { getDateKey, isHappyHour } from "./clock.js";
import { transitionPhoto } from "./photos.js";
import { photoStateOf } from "./photoState.js";
import { ensureUserStats } from "./userStats.js";

export type VotingDeps = {
  db: BetterSQLite3Database;
  timeZone: string;
  now: () => number;
  policy: VotingPolicy;
};

export type VoteRejection =
  | "invalid_score"
  | "photo_not_found"
  | "own_photo"
  | "photo_not_active"
  | "already_voted"
  | "daily_limit"
  | "author_daily_limit";

export type CastVoteResult =
  | { accepted: true; votesCount: number; sumScore: number; avgScore: number }
  | { accepted: false; reason: VoteRejection };

export function castVote(
  deps: VotingDeps,
  input: { voterId: number; photoId: number; score: number }
): CastVoteResult {
  const { voterId, photoId, score } = input;
  if (!Number.isInteger(score) || score < minScore || score > maxScore) {
    return { accepted: false, reason: "invalid_score" };
  }

  const ts = deps.now();
  const day = getDateKey(ts, deps.timeZone);
  const happy = isHappyHour(ts, deps.policy.happyHour, deps.timeZone);

  return deps.db.transaction((tx): CastVoteResult => {
    const photo = tx.select().from(photos).where(eq(photos.id, photoId)).get();
    if (!photo) return { accepted: false, reason: "photo_not_found" };
    if (photo.userId === voterId) return { accepted: false, reason: "own_photo" };
    const state = photoStateOf(photo);
    if (state.kind !== "active") return { accepted: false, reason: "photo_not_active" };
    if (state.expiresAt <= ts) {
      transitionPhoto(tx, photo, "archived", { now: ts, reason: "expired" });
      return { accepted: false, reason: "photo_not_active" };
    }

    const existing = tx
      .select({ id: votes.id })
      .from(votes)
      .where(and(eq(votes.photoId, photoId), eq(votes.voterId, voterId)))
      .get();
    if (existing) return { accepted: false, reason: "already_voted" };

    const stats = ensureUserStats(tx, voterId, ts);
    const votesToday = stats.votesDay === day ? stats.votesGivenToday : 0;
    if (votesToday >= deps.policy.dailyVoteLimit) return { accepted: false, reason: "daily_limit" };

    const perAuthor = tx
      .select({ cnt: dailyAuthorVotes.cnt })
      .from(dailyAuthorVotes)
      .where(
        and(
          eq(dailyAuthorVotes.day, day),
          eq(dailyAuthorVotes.voterId, voterId),
          eq(dailyAuthorVotes.authorId, photo.userId)
        )
      )
      .get();
    if ((perAuthor?.cnt ?? 0) >= deps.policy.authorDailyVoteLimit) {
      return { accepted: false, reason: "author_daily_limit" };
    }

    const inserted = tx
      .insert(votes)
      .values({ photoId, voterId, score, day, createdAt: ts })
      .onConflictDoNothing({ target: [votes.photoId, votes.voterId] })
      .run();
    if (inserted.changes === 0) return { accepted: false, reason: "already_voted" };

    tx.update(photos)
      .set({
        votesCount: sql`${photos.votesCount} + 1`,
        sumScore: sql`${photos.sumScore} + ${score}`,
        avgScore: sql`ROUND(CAST(${photos.sumScore} + ${score} AS REAL) / (${photos.votesCount} + 1), 3)`
      })
      .where(eq(photos.id, photoId))
      .run();

    tx.insert(dailyAuthorVotes)
      .values({ day, voterId, authorId: photo.userId, cnt: 1 })
      .onConflictDoUpdate({
        target: [dailyAuthorVotes.day, dailyAuthorVotes.voterId, dailyAuthorVotes.authorId],
        set: { cnt: sql`${dailyAuthorVotes.cnt} + 1` }
      })
      .run();

    const happyToday = stats.votesDay === day ? stats.votesGivenHappyhourToday : 0;
    tx.update(userStats)
      .set({
        votesDay: day,
        votesGivenToday: votesToday + 1,
        votesGivenHappyhourToday: happy ? happyToday + 1 : happyToday,
        showTokens: sql`${userStats.showTokens} + ${happy ? deps.policy.showTokensHappy : deps.policy.showTokensBase}`,
        lastActiveAt: ts
      })
      .where(eq(userStats.userId, voterId))
      .run();

    const after = tx
      .select({ votesCount: photos.votesCount, sumScore: photos.sumScore, avgScore: photos.avgScore })
      .from(photos)
      .where(eq(photos.id, photoId))
      .get();
    if (!after) throw new Error(`photo ${photoId} disappeared during vote`);
    return { accepted: true, ...after };
  });
}

export type RecordViewResult =
  | { kind: "first_view"; viewsCount: number }
  | { kind: "repeat" }
  | { kind: "photo_not_found" };

/**
 * Counts a view once per (photo, viewer). Budget admission is the caller's
 * job, see `nextPhotoForViewer`.
 */
export function recordView(
  deps: Omit<VotingDeps, "policy">,
  input: { viewerId: number; photoId: number }
): RecordViewResult {
  const ts = deps.now();
  const viewDay = getDateKey(ts, deps.timeZone);

  return deps.db.transaction((tx): RecordViewResult => {
    const photo = tx.select({ id: photos.id }).from(photos).where(eq(photos.id, input.photoId)).get();
    if (!photo) return { kind: "photo_not_found" };

    const inserted = tx
      .insert(photoViews)
      .values({ photoId: input.photoId, viewerId: input.viewerId, viewDay, createdAt: ts })
      .onConflictDoNothing({ target: [photoViews.photoId, photoViews.viewerId] })
      .run();
    if (inserted.changes === 0) return { kind: "repeat" };

    tx.update(photos)
      .set({ viewsCount: sql`${photos.viewsCount} + 1` })
      .where(eq(photos.id, input.photoId))
      .run();
    const updated = tx.select({ viewsCount: photos.viewsCount }).from(photos).where(eq(photos.id, input.photoId)).get();
    return { kind: "first_view", viewsCount: updated?.viewsCount ?? 1 };
  });
}
