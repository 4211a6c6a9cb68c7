import { describe, expect, it } from "vitest";
import { createAppDb } from "./client.js";
import { photos, votes } from "./schema.js";

describe("db", () => {
  it("creates every table", () => {
    const { sqlite, close } = createAppDb(":memory:");
    try {
      const rows = sqlite
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
        .all();
      const names = rows.map((r) => (typeof r === "object" && r !== null && "name" in r ? r.name : null));
      expect(names).toEqual([
        "daily_author_votes",
        "daily_results_cache",
        "notification_queue",
        "photo_status_events",
        "photo_views",
        "photos",
        "referral_rewards",
        "result_ranks",
        "user_stats",
        "votes"
      ]);
    } finally {
      close();
    }
  });

  it("keeps one named index per uniqueness rule", () => {
    const { sqlite, close } = createAppDb(":memory:");
    try {
      const indexNames = (table: string) =>
        sqlite
          .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? ORDER BY name")
          .all(table)
          .map((r) => (typeof r === "object" && r !== null && "name" in r ? r.name : null));
      expect(indexNames("votes")).toEqual(["votes_photo_voter_uniq", "votes_voter_created_idx"]);
      expect(indexNames("referral_rewards")).toEqual(["referral_rewards_invited_uniq", "referral_rewards_inviter_idx"]);
      expect(indexNames("daily_author_votes")).toEqual(["daily_author_votes_uniq"]);
    } finally {
      close();
    }
  });

  it("rejects a second vote row and cascades on hard delete", () => {
    const { db, sqlite, close } = createAppDb(":memory:");
    try {
      const photoId = db
        .insert(photos)
        .values({
          userId: 1,
          fileId: "f",
          submitDay: "2026-02-14",
          submittedAt: 1,
          expiresAt: 2,
          status: "active"
        })
        .returning({ id: photos.id })
        .get().id;

      db.insert(votes).values({ photoId, voterId: 2, score: 5, day: "2026-02-14", createdAt: 1 }).run();
      expect(() =>
        db.insert(votes).values({ photoId, voterId: 2, score: 7, day: "2026-02-14", createdAt: 2 }).run()
      ).toThrow(/UNIQUE/);

      sqlite.prepare("DELETE FROM photos WHERE id = ?").run(photoId);
      expect(db.select().from(votes).all()).toEqual([]);
    } finally {
      close();
    }
  });
});
