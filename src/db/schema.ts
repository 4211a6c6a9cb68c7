import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  uniqueIndex
} from "drizzle-orm/sqlite-core";

export const photoStatuses = ["active", "archived", "deleted"] as const;
export const notificationStatuses = ["pending", "sent", "failed"] as const;

export const photos = sqliteTable(
  "photos",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id").notNull(),
    fileId: text("file_id").notNull(),
    title: text("title"),

    submitDay: text("submit_day").notNull(), // YYYY-MM-DD в таймзоне бота
    submittedAt: integer("submitted_at").notNull(),
    expiresAt: integer("expires_at").notNull(),
    status: text("status", { enum: photoStatuses }).notNull(),

    votesCount: integer("votes_count").notNull().default(0),
    sumScore: integer("sum_score").notNull().default(0),
    avgScore: real("avg_score").notNull().default(0),
    viewsCount: integer("views_count").notNull().default(0),
    dailyViewsBudget: integer("daily_views_budget").notNull().default(0), // 0: без лимита

    archivedAt: integer("archived_at"),
    deletedAt: integer("deleted_at"),
    deletedReason: text("deleted_reason")
  },
  (t) => ({
    userIdx: index("photos_user_id_idx").on(t.userId),
    statusExpiresIdx: index("photos_status_expires_idx").on(t.status, t.expiresAt),
    submitStatusIdx: index("photos_submit_day_status_idx").on(t.submitDay, t.status)
  })
);

export const photoStatusEvents = sqliteTable(
  "photo_status_events",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    photoId: integer("photo_id")
      .notNull()
      .references(() => photos.id, { onDelete: "cascade" }),
    fromStatus: text("from_status", { enum: photoStatuses }),
    toStatus: text("to_status", { enum: photoStatuses }).notNull(),
    reason: text("reason"),
    createdAt: integer("created_at").notNull()
  },
  (t) => ({
    photoIdx: index("photo_status_events_photo_id_idx").on(t.photoId)
  })
);

export const votes = sqliteTable(
  "votes",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    photoId: integer("photo_id")
      .notNull()
      .references(() => photos.id, { onDelete: "cascade" }),
    voterId: integer("voter_id").notNull(),
    score: integer("score").notNull(),
    day: text("day").notNull(),
    createdAt: integer("created_at").notNull()
  },
  (t) => ({
    uniqPhotoVoter: uniqueIndex("votes_photo_voter_uniq").on(t.photoId, t.voterId),
    voterCreatedIdx: index("votes_voter_created_idx").on(t.voterId, t.createdAt)
  })
);

export const photoViews = sqliteTable(
  "photo_views",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    photoId: integer("photo_id")
      .notNull()
      .references(() => photos.id, { onDelete: "cascade" }),
    viewerId: integer("viewer_id").notNull(),
    viewDay: text("view_day").notNull(),
    createdAt: integer("created_at").notNull()
  },
  (t) => ({
    uniqPhotoViewer: uniqueIndex("photo_views_photo_viewer_uniq").on(t.photoId, t.viewerId),
    photoDayIdx: index("photo_views_photo_day_idx").on(t.photoId, t.viewDay)
  })
);

export const dailyAuthorVotes = sqliteTable(
  "daily_author_votes",
  {
    day: text("day").notNull(),
    voterId: integer("voter_id").notNull(),
    authorId: integer("author_id").notNull(),
    cnt: integer("cnt").notNull().default(0)
  },
  (t) => ({
    uniqDayVoterAuthor: uniqueIndex("daily_author_votes_uniq").on(t.day, t.voterId, t.authorId)
  })
);

export const resultRanks = sqliteTable(
  "result_ranks",
  {
    photoId: integer("photo_id")
      .notNull()
      .references(() => photos.id, { onDelete: "cascade" }),
    submitDay: text("submit_day").notNull(),
    finalRank: integer("final_rank").notNull(),
    finalizedAt: integer("finalized_at").notNull()
  },
  (t) => ({
    uniqPhotoDay: uniqueIndex("result_ranks_photo_day_uniq").on(t.photoId, t.submitDay),
    dayRankIdx: index("result_ranks_day_rank_idx").on(t.submitDay, t.finalRank)
  })
);

export const dailyResultsCache = sqliteTable(
  "daily_results_cache",
  {
    submitDay: text("submit_day").primaryKey(),
    participantsCount: integer("participants_count").notNull().default(0),
    topThreshold: integer("top_threshold").notNull().default(0),
    payload: text("payload").notNull(), // JSON
    publishedAt: integer("published_at").notNull(),
    notificationsEnqueuedAt: integer("notifications_enqueued_at"),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull()
  },
  (t) => ({
    publishedIdx: index("daily_results_cache_published_idx").on(t.publishedAt)
  })
);

export const userStats = sqliteTable(
  "user_stats",
  {
    userId: integer("user_id").primaryKey(),
    credits: integer("credits").notNull().default(0),
    showTokens: integer("show_tokens").notNull().default(0),
    lastActiveAt: integer("last_active_at"),

    votesDay: text("votes_day"), // день, к которому относятся счётчики ниже
    votesGivenToday: integer("votes_given_today").notNull().default(0),
    votesGivenHappyhourToday: integer("votes_given_happyhour_today").notNull().default(0),

    lastDailyGrantDay: text("last_daily_grant_day"),
    referredBy: integer("referred_by"), // кто пригласил; награда после первой оценки
    publicPortfolio: integer("public_portfolio", { mode: "boolean" }).notNull().default(false),
    createdAt: integer("created_at").notNull()
  },
  (t) => ({
    dailyGrantIdx: index("user_stats_daily_grant_idx").on(t.lastDailyGrantDay)
  })
);

export const referralRewards = sqliteTable(
  "referral_rewards",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    invitedUserId: integer("invited_user_id").notNull(),
    inviterUserId: integer("inviter_user_id").notNull(),
    rewardedAt: integer("rewarded_at").notNull(),
    rewardType: text("reward_type").notNull(),
    rewardVersion: text("reward_version").notNull()
  },
  (t) => ({
    uniqInvited: uniqueIndex("referral_rewards_invited_uniq").on(t.invitedUserId),
    inviterIdx: index("referral_rewards_inviter_idx").on(t.inviterUserId)
  })
);

export const notificationQueue = sqliteTable(
  "notification_queue",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userId: integer("user_id").notNull(),
    type: text("type").notNull(), // daily_result | ...
    payload: text("payload").notNull(), // JSON
    runAfter: integer("run_after").notNull(),
    status: text("status", { enum: notificationStatuses }).notNull(),
    attempts: integer("attempts").notNull().default(0),
    lastError: text("last_error"),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull()
  },
  (t) => ({
    statusRunIdx: index("notification_queue_status_run_idx").on(t.status, t.runAfter)
  })
);
