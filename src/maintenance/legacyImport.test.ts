import { describe, expect, it } from "vitest";
import { createAppDb } from "../db/client.js";
import { photos } from "../db/schema.js";
import { getReferral, rewardReferral } from "../services/credits.js";
import { getUserStats } from "../services/userStats.js";
import {
  importLegacyPhotos,
  importLegacyReferrals,
  legacyExportSchema,
  resolveLegacyRewardedAt,
  resolveLegacySubmitDay
} from "./legacyImport.js";

const tz = "Europe/Moscow";
const now = Date.UTC(2026, 1, 14, 9, 0); // 12:00 MSK

describe("resolveLegacySubmitDay", () => {
  it("prefers submitDay, then dayKey, then createdAt", () => {
    expect(resolveLegacySubmitDay({ submitDay: "2026-02-10", dayKey: "2026-02-11" }, now, tz)).toBe("2026-02-10");
    expect(resolveLegacySubmitDay({ submitDay: "bad", dayKey: "2026-02-11" }, now, tz)).toBe("2026-02-11");
    expect(
      resolveLegacySubmitDay({ dayKey: "2026-02-11 extra", createdAt: "2026-02-12T22:30:00Z" }, now, tz)
    ).toBe("2026-02-13");
  });

  it("falls back to today for unusable values", () => {
    expect(resolveLegacySubmitDay({ createdAt: "yesterday" }, now, tz)).toBe("2026-02-14");
    expect(resolveLegacySubmitDay({ createdAt: "2026-13-45" }, now, tz)).toBe("2026-02-14");
    expect(resolveLegacySubmitDay({}, now, tz)).toBe("2026-02-14");
  });
});

describe("resolveLegacyRewardedAt", () => {
  it("keeps parseable dates and never invents one", () => {
    expect(resolveLegacyRewardedAt("2026-02-01T10:00:00Z", now)).toBe(Date.UTC(2026, 1, 1, 10));
    expect(resolveLegacyRewardedAt("", now)).toBe(now);
    expect(resolveLegacyRewardedAt(null, now)).toBe(now);
    expect(resolveLegacyRewardedAt("soon", now)).toBe(now);
  });
});

describe("legacy import", () => {
  it("imports photos once with lifecycle fields filled in", () => {
    const { db, close } = createAppDb(":memory:");
    try {
      const deps = { db, timeZone: tz, now: () => now };
      const rows = [
        { userId: 1, fileId: "old", dayKey: "2026-02-01", votesCount: 3, sumScore: 20 },
        { userId: 2, fileId: "fresh", createdAt: "2026-02-14T08:00:00Z", title: "  " },
        { userId: 3, fileId: "gone", submitDay: "2026-02-13", status: "deleted" as const }
      ];

      expect(importLegacyPhotos(deps, rows)).toEqual({ imported: 3, skipped: 0 });
      expect(importLegacyPhotos(deps, rows)).toEqual({ imported: 0, skipped: 3 });

      const imported = db.select().from(photos).orderBy(photos.id).all();
      expect(imported.map((p) => [p.fileId, p.submitDay, p.status])).toEqual([
        ["old", "2026-02-01", "archived"],
        ["fresh", "2026-02-14", "active"],
        ["gone", "2026-02-13", "deleted"]
      ]);
      expect(imported[0]?.avgScore).toBe(6.667);
      expect(imported[1]?.submittedAt).toBe(Date.UTC(2026, 1, 14, 8));
      expect(imported[1]?.expiresAt).toBe(Date.UTC(2026, 1, 15, 21) - 1);
      expect(imported[1]?.title).toBeNull();
      expect(imported[2]?.deletedReason).toBe("legacy");
    } finally {
      close();
    }
  });

  it("backfills qualified referrals without crediting anyone", () => {
    const { db, close } = createAppDb(":memory:");
    try {
      const deps = { db, now: () => now };
      const rows = [
        { invitedUserId: 20, inviterUserId: 10, qualified: 1 as const, qualifiedAt: "2026-01-05T12:00:00Z" },
        { invitedUserId: 21, inviterUserId: 10, qualified: false },
        { invitedUserId: 22, inviterUserId: 11, qualified: true, qualifiedAt: "garbage" },
        { invitedUserId: 23, inviterUserId: 23, qualified: true }
      ];

      expect(importLegacyReferrals(deps, rows)).toEqual({ imported: 2, skipped: 2 });
      expect(importLegacyReferrals(deps, rows)).toEqual({ imported: 0, skipped: 4 });

      expect(getReferral(db, 20)?.rewardedAt).toBe(Date.UTC(2026, 0, 5, 12));
      expect(getReferral(db, 20)?.rewardVersion).toBe("legacy_pre_v2");
      expect(getReferral(db, 22)?.rewardedAt).toBe(now);
      expect(getReferral(db, 21)).toBeUndefined();
      expect(getUserStats(db, 10)).toBeUndefined();

      const policy = { dailyCredits: 1, referralCredits: 2 };
      expect(rewardReferral({ db, now: () => now, policy }, { invitedUserId: 20, inviterUserId: 10 }).status).toBe(
        "already_rewarded"
      );
    } finally {
      close();
    }
  });

  it("validates an export file", () => {
    const data = legacyExportSchema.parse({
      photos: [{ userId: 1, fileId: "f", createdAt: "" }],
      referrals: [{ invitedUserId: 2, inviterUserId: 1, qualified: 0 }]
    });
    expect(data.photos[0]?.createdAt).toBeNull();
    expect(data.photos[0]?.votesCount).toBe(0);
    expect(data.referrals[0]?.qualified).toBe(false);
    expect(() => legacyExportSchema.parse({ photos: [{ userId: "x", fileId: "f" }] })).toThrow();
  });
});
