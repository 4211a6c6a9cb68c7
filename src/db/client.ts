import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

export type AppDb = {
  sqlite: Database.Database;
  db: BetterSQLite3Database;
  close: () => void;
};

export type AppTransaction = Parameters<Parameters<BetterSQLite3Database["transaction"]>[0]>[0];

export function createAppDb(databaseUrl: string): AppDb {
  const filename = sqliteFilenameFromUrl(databaseUrl);
  if (filename !== ":memory:") {
    const dir = path.dirname(filename);
    fs.mkdirSync(dir, { recursive: true });
  }

  const sqlite = new Database(filename);
  sqlite.pragma("foreign_keys = ON");
  if (filename !== ":memory:") sqlite.pragma("journal_mode = WAL");
  applySchema(sqlite);

  const db = drizzle(sqlite);

  return { sqlite, db, close: () => sqlite.close() };
}

function sqliteFilenameFromUrl(databaseUrl: string): string {
  if (!databaseUrl) return "data/glowshot.db";

  if (databaseUrl === ":memory:" || databaseUrl === "file::memory:") return ":memory:";

  if (databaseUrl.startsWith("file:")) {
    const filepath = databaseUrl.slice("file:".length);
    return filepath || "data/glowshot.db";
  }

  return databaseUrl;
}

function applySchema(sqlite: Database.Database) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS photos (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      file_id TEXT NOT NULL,
      title TEXT,
      submit_day TEXT NOT NULL,
      submitted_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'active',
      votes_count INTEGER NOT NULL DEFAULT 0,
      sum_score INTEGER NOT NULL DEFAULT 0,
      avg_score REAL NOT NULL DEFAULT 0,
      views_count INTEGER NOT NULL DEFAULT 0,
      daily_views_budget INTEGER NOT NULL DEFAULT 0,
      archived_at INTEGER,
      deleted_at INTEGER,
      deleted_reason TEXT
    );
    CREATE INDEX IF NOT EXISTS photos_user_id_idx ON photos(user_id);
    CREATE INDEX IF NOT EXISTS photos_status_expires_idx ON photos(status, expires_at);
    CREATE INDEX IF NOT EXISTS photos_submit_day_status_idx ON photos(submit_day, status);

    CREATE TABLE IF NOT EXISTS photo_status_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      photo_id INTEGER NOT NULL REFERENCES photos(id) ON DELETE CASCADE,
      from_status TEXT,
      to_status TEXT NOT NULL,
      reason TEXT,
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS photo_status_events_photo_id_idx ON photo_status_events(photo_id);

    CREATE TABLE IF NOT EXISTS votes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      photo_id INTEGER NOT NULL REFERENCES photos(id) ON DELETE CASCADE,
      voter_id INTEGER NOT NULL,
      score INTEGER NOT NULL,
      day TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS votes_photo_voter_uniq ON votes(photo_id, voter_id);
    CREATE INDEX IF NOT EXISTS votes_voter_created_idx ON votes(voter_id, created_at);

    CREATE TABLE IF NOT EXISTS photo_views (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      photo_id INTEGER NOT NULL REFERENCES photos(id) ON DELETE CASCADE,
      viewer_id INTEGER NOT NULL,
      view_day TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS photo_views_photo_viewer_uniq ON photo_views(photo_id, viewer_id);
    CREATE INDEX IF NOT EXISTS photo_views_photo_day_idx ON photo_views(photo_id, view_day);

    CREATE TABLE IF NOT EXISTS daily_author_votes (
      day TEXT NOT NULL,
      voter_id INTEGER NOT NULL,
      author_id INTEGER NOT NULL,
      cnt INTEGER NOT NULL DEFAULT 0
    );
    CREATE UNIQUE INDEX IF NOT EXISTS daily_author_votes_uniq ON daily_author_votes(day, voter_id, author_id);

    CREATE TABLE IF NOT EXISTS result_ranks (
      photo_id INTEGER NOT NULL REFERENCES photos(id) ON DELETE CASCADE,
      submit_day TEXT NOT NULL,
      final_rank INTEGER NOT NULL,
      finalized_at INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS result_ranks_photo_day_uniq ON result_ranks(photo_id, submit_day);
    CREATE INDEX IF NOT EXISTS result_ranks_day_rank_idx ON result_ranks(submit_day, final_rank);

    CREATE TABLE IF NOT EXISTS daily_results_cache (
      submit_day TEXT PRIMARY KEY,
      participants_count INTEGER NOT NULL DEFAULT 0,
      top_threshold INTEGER NOT NULL DEFAULT 0,
      payload TEXT NOT NULL,
      published_at INTEGER NOT NULL,
      notifications_enqueued_at INTEGER,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS daily_results_cache_published_idx ON daily_results_cache(published_at);

    CREATE TABLE IF NOT EXISTS user_stats (
      user_id INTEGER PRIMARY KEY,
      credits INTEGER NOT NULL DEFAULT 0,
      show_tokens INTEGER NOT NULL DEFAULT 0,
      last_active_at INTEGER,
      votes_day TEXT,
      votes_given_today INTEGER NOT NULL DEFAULT 0,
      votes_given_happyhour_today INTEGER NOT NULL DEFAULT 0,
      last_daily_grant_day TEXT,
      referred_by INTEGER,
      public_portfolio INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS user_stats_daily_grant_idx ON user_stats(last_daily_grant_day);

    CREATE TABLE IF NOT EXISTS referral_rewards (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      invited_user_id INTEGER NOT NULL,
      inviter_user_id INTEGER NOT NULL,
      rewarded_at INTEGER NOT NULL,
      reward_type TEXT NOT NULL,
      reward_version TEXT NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS referral_rewards_invited_uniq ON referral_rewards(invited_user_id);
    CREATE INDEX IF NOT EXISTS referral_rewards_inviter_idx ON referral_rewards(inviter_user_id);

    CREATE TABLE IF NOT EXISTS notification_queue (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      type TEXT NOT NULL,
      payload TEXT NOT NULL,
      run_after INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS notification_queue_status_run_idx ON notification_queue(status, run_after);
  `);
}
