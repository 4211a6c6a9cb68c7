import { describe, expect, it } from "vitest";
import type { VotingPolicy } from "../config.js";
import { createAppDb } from "../db/client.js";
import { getPhoto, softDeletePhoto, submitPhoto } from "./photos.js";
import { getUserStats } from "./userStats.js";
import { castVote, recordView } from "./votes.js";

const tz = "Europe/Moscow";
const submittedAt = Date.UTC(2026, 1, 14, 7, 0); // 10:00 MSK
const morning = Date.UTC(2026, 1, 14, 7, 30); // 10:30 MSK
const happyHour = Date.UTC(2026, 1, 14, 12, 30); // 15:30 MSK

const policy: VotingPolicy = {
  dailyVoteLimit: 300,
  authorDailyVoteLimit: 5,
  happyHour: { start: "15:00", end: "16:00" },
  showTokensBase: 2,
  showTokensHappy: 4
};

function setup(overrides?: Partial<VotingPolicy>) {
  const appDb = createAppDb(":memory:");
  let now = submittedAt;
  const clock = {
    set: (ts: number) => {
      now = ts;
    }
  };
  const lifecycle = { db: appDb.db, timeZone: tz, now: () => now };
  const voting = { ...lifecycle, policy: { ...policy, ...overrides } };
  return { ...appDb, clock, lifecycle, voting };
}

describe("castVote", () => {
  it("accumulates votes and rejects a repeat voter", () => {
    const { db, close, clock, lifecycle, voting } = setup();
    try {
      const { photoId } = submitPhoto(lifecycle, { userId: 10, fileId: "p1" });
      clock.set(morning);

      expect(castVote(voting, { voterId: 20, photoId, score: 5 })).toEqual({
        accepted: true,
        votesCount: 1,
        sumScore: 5,
        avgScore: 5
      });
      expect(castVote(voting, { voterId: 21, photoId, score: 3 })).toEqual({
        accepted: true,
        votesCount: 2,
        sumScore: 8,
        avgScore: 4
      });
      expect(castVote(voting, { voterId: 20, photoId, score: 9 })).toEqual({ accepted: false, reason: "already_voted" });

      const row = getPhoto(db, photoId);
      expect(row?.votesCount).toBe(2);
      expect(row?.sumScore).toBe(8);
      expect(row?.avgScore).toBe(4);
    } finally {
      close();
    }
  });

  it("validates score, ownership and existence", () => {
    const { close, clock, lifecycle, voting } = setup();
    try {
      const { photoId } = submitPhoto(lifecycle, { userId: 10, fileId: "p1" });
      clock.set(morning);

      for (const score of [0, 11, 2.5]) {
        expect(castVote(voting, { voterId: 20, photoId, score })).toEqual({ accepted: false, reason: "invalid_score" });
      }
      expect(castVote(voting, { voterId: 10, photoId, score: 7 })).toEqual({ accepted: false, reason: "own_photo" });
      expect(castVote(voting, { voterId: 20, photoId: 999, score: 7 })).toEqual({
        accepted: false,
        reason: "photo_not_found"
      });
    } finally {
      close();
    }
  });

  it("enforces the daily quota", () => {
    const { close, clock, lifecycle, voting } = setup({ dailyVoteLimit: 2 });
    try {
      const ids = [1, 2, 3].map((n) => submitPhoto(lifecycle, { userId: 10 + n, fileId: `p${n}` }).photoId);
      clock.set(morning);

      expect(castVote(voting, { voterId: 20, photoId: ids[0] ?? 0, score: 6 }).accepted).toBe(true);
      expect(castVote(voting, { voterId: 20, photoId: ids[1] ?? 0, score: 6 }).accepted).toBe(true);
      expect(castVote(voting, { voterId: 20, photoId: ids[2] ?? 0, score: 6 })).toEqual({
        accepted: false,
        reason: "daily_limit"
      });

      // на следующий день счётчик начинается заново
      clock.set(morning + 24 * 60 * 60 * 1000);
      expect(castVote(voting, { voterId: 20, photoId: ids[2] ?? 0, score: 6 }).accepted).toBe(true);
      expect(getUserStats(voting.db, 20)?.votesDay).toBe("2026-02-15");
      expect(getUserStats(voting.db, 20)?.votesGivenToday).toBe(1);
    } finally {
      close();
    }
  });

  it("limits votes for one author per day", () => {
    const { close, clock, lifecycle, voting } = setup({ authorDailyVoteLimit: 1 });
    try {
      const first = submitPhoto(lifecycle, { userId: 10, fileId: "a" }).photoId;
      const second = submitPhoto(lifecycle, { userId: 10, fileId: "b" }).photoId;
      const other = submitPhoto(lifecycle, { userId: 11, fileId: "c" }).photoId;
      clock.set(morning);

      expect(castVote(voting, { voterId: 20, photoId: first, score: 8 }).accepted).toBe(true);
      expect(castVote(voting, { voterId: 20, photoId: second, score: 8 })).toEqual({
        accepted: false,
        reason: "author_daily_limit"
      });
      expect(castVote(voting, { voterId: 20, photoId: other, score: 8 }).accepted).toBe(true);
    } finally {
      close();
    }
  });

  it("refuses votes once the photo is past its window or deleted", () => {
    const { db, close, clock, lifecycle, voting } = setup();
    try {
      const { photoId, expiresAt } = submitPhoto(lifecycle, { userId: 10, fileId: "p1" });
      const deleted = submitPhoto(lifecycle, { userId: 11, fileId: "p2" }).photoId;
      softDeletePhoto(lifecycle, deleted, "author_request");

      expect(castVote(voting, { voterId: 20, photoId: deleted, score: 5 })).toEqual({
        accepted: false,
        reason: "photo_not_active"
      });

      clock.set(expiresAt);
      expect(castVote(voting, { voterId: 20, photoId, score: 5 })).toEqual({
        accepted: false,
        reason: "photo_not_active"
      });
      expect(getPhoto(db, photoId)?.status).toBe("archived");
      expect(getPhoto(db, photoId)?.votesCount).toBe(0);

      // уже в архиве: отказ без повторного перехода
      expect(castVote(voting, { voterId: 21, photoId, score: 5 })).toEqual({
        accepted: false,
        reason: "photo_not_active"
      });
      expect(getPhoto(db, photoId)?.status).toBe("archived");
    } finally {
      close();
    }
  });

  it("counts happy hour votes and awards show tokens", () => {
    const { db, close, clock, lifecycle, voting } = setup();
    try {
      const a = submitPhoto(lifecycle, { userId: 10, fileId: "a" }).photoId;
      const b = submitPhoto(lifecycle, { userId: 11, fileId: "b" }).photoId;

      clock.set(morning);
      castVote(voting, { voterId: 20, photoId: a, score: 7 });
      clock.set(happyHour);
      castVote(voting, { voterId: 20, photoId: b, score: 7 });

      const stats = getUserStats(db, 20);
      expect(stats?.votesGivenToday).toBe(2);
      expect(stats?.votesGivenHappyhourToday).toBe(1);
      expect(stats?.showTokens).toBe(6);
      expect(stats?.lastActiveAt).toBe(happyHour);
    } finally {
      close();
    }
  });
});

describe("recordView", () => {
  it("counts a viewer once per photo", () => {
    const { db, close, clock, lifecycle } = setup();
    try {
      const { photoId } = submitPhoto(lifecycle, { userId: 10, fileId: "p1" });
      clock.set(morning);

      expect(recordView(lifecycle, { viewerId: 20, photoId })).toEqual({ kind: "first_view", viewsCount: 1 });
      expect(recordView(lifecycle, { viewerId: 20, photoId })).toEqual({ kind: "repeat" });
      expect(recordView(lifecycle, { viewerId: 21, photoId })).toEqual({ kind: "first_view", viewsCount: 2 });
      expect(recordView(lifecycle, { viewerId: 21, photoId: 999 })).toEqual({ kind: "photo_not_found" });
      expect(getPhoto(db, photoId)?.viewsCount).toBe(2);
    } finally {
      close();
    }
  });
});
