import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, eq, lte } from "drizzle-orm";
import type { AppTransaction } from "../db/client.js";
import { photoStatusEvents, photos } from "../db/schema.js";
import { getDateKey, photoExpiresAt } from "./clock.js";
import { canTransition, type PhotoRow, type PhotoStatus } from "./photoState.js";
import { ensureUserStats } from "./userStats.js";

export type LifecycleDeps = {
  db: BetterSQLite3Database;
  timeZone: string;
  now: () => number;
};

export type SubmitPhotoInput = {
  userId: number;
  fileId: string;
  title?: string | null;
  submittedAt?: number;
  dailyViewsBudget?: number;
};

export type SubmittedPhoto = {
  photoId: number;
  submitDay: string;
  expiresAt: number;
};

export function submitPhoto(deps: LifecycleDeps, input: SubmitPhotoInput): SubmittedPhoto {
  const submittedAt = input.submittedAt ?? deps.now();
  const submitDay = getDateKey(submittedAt, deps.timeZone);
  const expiresAt = photoExpiresAt(submitDay, deps.timeZone);

  return deps.db.transaction((tx) => {
    ensureUserStats(tx, input.userId, submittedAt);
    const { id } = tx
      .insert(photos)
      .values({
        userId: input.userId,
        fileId: input.fileId,
        title: input.title ?? null,
        submitDay,
        submittedAt,
        expiresAt,
        status: "active",
        dailyViewsBudget: input.dailyViewsBudget ?? 0
      })
      .returning({ id: photos.id })
      .get();
    tx.insert(photoStatusEvents)
      .values({ photoId: id, fromStatus: null, toStatus: "active", reason: "submitted", createdAt: submittedAt })
      .run();
    return { photoId: id, submitDay, expiresAt };
  });
}

export function getPhoto(db: BetterSQLite3Database, photoId: number): PhotoRow | undefined {
  return db.select().from(photos).where(eq(photos.id, photoId)).get();
}

/**
 * Moves a photo to `to` if the state machine allows it and nobody changed the
 * status in between. Returns false when the transition did not happen.
 */
export function transitionPhoto(
  tx: AppTransaction,
  row: Pick<PhotoRow, "id" | "status">,
  to: PhotoStatus,
  opts: { now: number; reason: string }
): boolean {
  if (!canTransition(row.status, to)) return false;

  const stamp =
    to === "archived"
      ? { archivedAt: opts.now }
      : to === "deleted"
        ? { deletedAt: opts.now, deletedReason: opts.reason }
        : {};
  const res = tx
    .update(photos)
    .set({ status: to, ...stamp })
    .where(and(eq(photos.id, row.id), eq(photos.status, row.status)))
    .run();
  if (res.changes === 0) return false;

  tx.insert(photoStatusEvents)
    .values({ photoId: row.id, fromStatus: row.status, toStatus: to, reason: opts.reason, createdAt: opts.now })
    .run();
  return true;
}

export function archiveExpired(deps: LifecycleDeps): number {
  const ts = deps.now();
  return deps.db.transaction((tx) => {
    const due = tx
      .select({ id: photos.id, status: photos.status })
      .from(photos)
      .where(and(eq(photos.status, "active"), lte(photos.expiresAt, ts)))
      .all();
    let archived = 0;
    for (const row of due) {
      if (transitionPhoto(tx, row, "archived", { now: ts, reason: "expired" })) archived += 1;
    }
    return archived;
  });
}

export type SoftDeleteResult = { ok: true } | { ok: false; reason: "not_found" | "already_deleted" };

export function softDeletePhoto(deps: LifecycleDeps, photoId: number, reason: string): SoftDeleteResult {
  const ts = deps.now();
  return deps.db.transaction((tx): SoftDeleteResult => {
    const row = tx.select({ id: photos.id, status: photos.status }).from(photos).where(eq(photos.id, photoId)).get();
    if (!row) return { ok: false, reason: "not_found" };
    if (!transitionPhoto(tx, row, "deleted", { now: ts, reason })) {
      return { ok: false, reason: "already_deleted" };
    }
    return { ok: true };
  });
}
