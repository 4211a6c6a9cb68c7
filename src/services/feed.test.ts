import { describe, expect, it } from "vitest";
import { createAppDb } from "../db/client.js";
import { nextPhotoForViewer } from "./feed.js";
import { submitPhoto } from "./photos.js";
import { castVote, recordView } from "./votes.js";

const base = Date.UTC(2026, 1, 14, 7, 0); // 10:00 MSK

describe("nextPhotoForViewer", () => {
  it("skips own, seen and voted photos, least viewed first", () => {
    const { db, close } = createAppDb(":memory:");
    try {
      const deps = { db, timeZone: "Europe/Moscow", now: () => base + 60_000 };
      const a = submitPhoto(deps, { userId: 10, fileId: "a", submittedAt: base }).photoId;
      const b = submitPhoto(deps, { userId: 11, fileId: "b", submittedAt: base + 1_000 }).photoId;

      expect(nextPhotoForViewer(deps, 20)?.id).toBe(a);
      recordView(deps, { viewerId: 20, photoId: a });
      expect(nextPhotoForViewer(deps, 20)?.id).toBe(b);
      recordView(deps, { viewerId: 20, photoId: b });
      expect(nextPhotoForViewer(deps, 20)).toBeUndefined();

      // у A и B по одному просмотру, своё фото автору не показываем
      expect(nextPhotoForViewer(deps, 10)?.id).toBe(b);

      const voting = {
        ...deps,
        policy: {
          dailyVoteLimit: 300,
          authorDailyVoteLimit: 5,
          happyHour: { start: "15:00", end: "16:00" },
          showTokensBase: 2,
          showTokensHappy: 4
        }
      };
      expect(castVote(voting, { voterId: 21, photoId: a, score: 6 }).accepted).toBe(true);
      expect(nextPhotoForViewer(deps, 21)?.id).toBe(b);
    } finally {
      close();
    }
  });

  it("respects the daily views budget", () => {
    const { db, close } = createAppDb(":memory:");
    try {
      const deps = { db, timeZone: "Europe/Moscow", now: () => base };
      const limited = submitPhoto(deps, { userId: 10, fileId: "a", dailyViewsBudget: 1 }).photoId;

      expect(nextPhotoForViewer(deps, 30)?.id).toBe(limited);
      recordView(deps, { viewerId: 30, photoId: limited });
      expect(nextPhotoForViewer(deps, 31)).toBeUndefined();

      // бюджет дневной: на следующий день фото снова в ленте
      const nextDay = { ...deps, now: () => base + 24 * 60 * 60 * 1000 };
      expect(nextPhotoForViewer(nextDay, 31)?.id).toBe(limited);
    } finally {
      close();
    }
  });

  it("never offers expired photos", () => {
    const { db, close } = createAppDb(":memory:");
    try {
      const deps = { db, timeZone: "Europe/Moscow", now: () => base };
      const { expiresAt } = submitPhoto(deps, { userId: 10, fileId: "a" });
      expect(nextPhotoForViewer({ ...deps, now: () => expiresAt }, 20)).toBeUndefined();
    } finally {
      close();
    }
  });
});
