import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { eq } from "drizzle-orm";
import type { AppTransaction } from "../db/client.js";
import { userStats } from "../db/schema.js";

export type UserStatsRow = typeof userStats.$inferSelect;

export function ensureUserStats(tx: AppTransaction, userId: number, now: number): UserStatsRow {
  tx.insert(userStats).values({ userId, createdAt: now }).onConflictDoNothing().run();
  const row = tx.select().from(userStats).where(eq(userStats.userId, userId)).get();
  if (!row) throw new Error(`user_stats row for ${userId} was not created`);
  return row;
}

export function getUserStats(db: BetterSQLite3Database, userId: number): UserStatsRow | undefined {
  return db.select().from(userStats).where(eq(userStats.userId, userId)).get();
}
