import { z } from "zod";

const intFromEnv = (fallback: string) =>
  z
    .string()
    .transform((v) => Number(v))
    .pipe(z.number().int().nonnegative())
    .default(fallback);

const positiveIntFromEnv = (fallback: string) =>
  z
    .string()
    .transform((v) => Number(v))
    .pipe(z.number().int().positive())
    .default(fallback);

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "ожидается время в формате HH:MM");

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, "BOT_TOKEN обязателен").optional(),
  DATABASE_URL: z.string().min(1).default("file:./data/glowshot.db"),
  SENTRY_DSN: z.string().min(1).optional(),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  ADMIN_TELEGRAM_ID: z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : undefined))
    .pipe(z.number().int().positive().optional()),
  BOT_TIMEZONE: z
    .string()
    .min(1)
    .refine(isValidTimeZone, "ожидается часовой пояс IANA, например Europe/Moscow")
    .default("Europe/Moscow"),
  DAILY_VOTE_LIMIT: positiveIntFromEnv("300"),
  AUTHOR_DAILY_VOTE_LIMIT: positiveIntFromEnv("5"),
  HAPPY_HOUR_START: clockTime.default("15:00"),
  HAPPY_HOUR_END: clockTime.default("16:00"),
  VOTE_SHOW_TOKENS_BASE: intFromEnv("2"),
  VOTE_SHOW_TOKENS_HAPPY: intFromEnv("4"),
  DAILY_CREDITS: positiveIntFromEnv("1"),
  REFERRAL_REWARD_CREDITS: intFromEnv("2"),
  PHOTO_DAILY_VIEWS_BUDGET: intFromEnv("0"),
  RESULTS_TOP_SIZE: positiveIntFromEnv("10"),
  RESULTS_MIN_VOTES_FOR_TOP: intFromEnv("7"),
  RESULTS_NOTIFY_JITTER_SECONDS: intFromEnv("900"),
  NOTIFY_MAX_ATTEMPTS: positiveIntFromEnv("5"),
  NOTIFY_BATCH_SIZE: positiveIntFromEnv("50"),
  NOTIFY_SEND_DELAY_MS: intFromEnv("300"),
  NOTIFY_FAILURE_DELAY_MS: intFromEnv("1000")
});

export type AppEnv = z.infer<typeof envSchema>;

export const envKeys = Object.keys(envSchema.shape);

export function getEnv(overrides?: Record<string, string | undefined>): AppEnv {
  const input: Record<string, string | undefined> = {};
  for (const key of envKeys) {
    const value = overrides && key in overrides ? overrides[key] : process.env[key];
    // Пустые строки из .env считаем незаданными
    input[key] = value === "" ? undefined : value;
  }
  return envSchema.parse(input);
}

export type HappyHourWindow = { start: string; end: string };

export type VotingPolicy = {
  dailyVoteLimit: number;
  authorDailyVoteLimit: number;
  happyHour: HappyHourWindow;
  showTokensBase: number;
  showTokensHappy: number;
};

export type ResultsPolicy = {
  topSize: number;
  minVotesForTop: number;
  notifyJitterMs: number;
};

export type CreditsPolicy = {
  dailyCredits: number;
  referralCredits: number;
};

export function votingPolicyFromEnv(env: AppEnv): VotingPolicy {
  return {
    dailyVoteLimit: env.DAILY_VOTE_LIMIT,
    authorDailyVoteLimit: env.AUTHOR_DAILY_VOTE_LIMIT,
    happyHour: { start: env.HAPPY_HOUR_START, end: env.HAPPY_HOUR_END },
    showTokensBase: env.VOTE_SHOW_TOKENS_BASE,
    showTokensHappy: env.VOTE_SHOW_TOKENS_HAPPY
  };
}

export function resultsPolicyFromEnv(env: AppEnv): ResultsPolicy {
  return {
    topSize: env.RESULTS_TOP_SIZE,
    minVotesForTop: env.RESULTS_MIN_VOTES_FOR_TOP,
    notifyJitterMs: env.RESULTS_NOTIFY_JITTER_SECONDS * 1000
  };
}

export function creditsPolicyFromEnv(env: AppEnv): CreditsPolicy {
  return { dailyCredits: env.DAILY_CREDITS, referralCredits: env.REFERRAL_REWARD_CREDITS };
}
