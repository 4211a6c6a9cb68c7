import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, eq, gt, ne, notExists, sql } from "drizzle-orm";
import { photoViews, photos, votes } from "../db/schema.js";
import { getDateKey } from "./clock.js";
import type { PhotoRow } from "./photoState.js";

export type FeedDeps = {
  db: BetterSQLite3Database;
  timeZone: string;
  now: () => number;
};

/**
 * Next photo to show: active, not the viewer's own, not seen or voted by them,
 * and still inside its daily views budget (0 means no limit).
 */
export function nextPhotoForViewer(deps: FeedDeps, viewerId: number): PhotoRow | undefined {
  const ts = deps.now();
  const today = getDateKey(ts, deps.timeZone);

  const viewsToday = sql<number>`(SELECT COUNT(*) FROM photo_views pv WHERE pv.photo_id = ${photos.id} AND pv.view_day = ${today})`;

  return deps.db
    .select()
    .from(photos)
    .where(
      and(
        eq(photos.status, "active"),
        gt(photos.expiresAt, ts),
        ne(photos.userId, viewerId),
        notExists(
          deps.db
            .select({ one: sql`1` })
            .from(photoViews)
            .where(and(eq(photoViews.photoId, photos.id), eq(photoViews.viewerId, viewerId)))
        ),
        notExists(
          deps.db
            .select({ one: sql`1` })
            .from(votes)
            .where(and(eq(votes.photoId, photos.id), eq(votes.voterId, viewerId)))
        ),
        sql`(${photos.dailyViewsBudget} = 0 OR ${viewsToday} < ${photos.dailyViewsBudget})`
      )
    )
    .orderBy(asc(photos.viewsCount), asc(photos.submittedAt), asc(photos.id))
    .get();
}
