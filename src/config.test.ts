import { describe, expect, it } from "vitest";
import { getEnv, resultsPolicyFromEnv, votingPolicyFromEnv } from "./config.js";

describe("config", () => {
  it("parses defaults", () => {
    const env = getEnv({
      NODE_ENV: "test",
      BOT_TOKEN: "x",
      ADMIN_TELEGRAM_ID: "123",
      DATABASE_URL: undefined,
      BOT_TIMEZONE: undefined,
      DAILY_VOTE_LIMIT: undefined,
      AUTHOR_DAILY_VOTE_LIMIT: undefined,
      HAPPY_HOUR_START: undefined,
      HAPPY_HOUR_END: undefined,
      RESULTS_NOTIFY_JITTER_SECONDS: undefined
    });
    expect(env.DATABASE_URL).toBe("file:./data/glowshot.db");
    expect(env.BOT_TIMEZONE).toBe("Europe/Moscow");
    expect(env.DAILY_VOTE_LIMIT).toBe(300);
    expect(env.AUTHOR_DAILY_VOTE_LIMIT).toBe(5);
    expect(env.ADMIN_TELEGRAM_ID).toBe(123);

    expect(votingPolicyFromEnv(env).happyHour).toEqual({ start: "15:00", end: "16:00" });
    expect(resultsPolicyFromEnv(env).notifyJitterMs).toBe(900_000);
  });

  it("treats empty values as unset", () => {
    const env = getEnv({ NODE_ENV: "test", ADMIN_TELEGRAM_ID: "", SENTRY_DSN: "" });
    expect(env.ADMIN_TELEGRAM_ID).toBeUndefined();
    expect(env.SENTRY_DSN).toBeUndefined();
  });

  it("rejects an unknown time zone", () => {
    expect(() => getEnv({ NODE_ENV: "test", BOT_TIMEZONE: "Europe/Moskva" })).toThrow(/часовой пояс IANA/);
    expect(getEnv({ NODE_ENV: "test", BOT_TIMEZONE: "Asia/Yekaterinburg" }).BOT_TIMEZONE).toBe("Asia/Yekaterinburg");
  });

  it("rejects malformed happy hour bounds", () => {
    expect(() => getEnv({ NODE_ENV: "test", HAPPY_HOUR_START: "25:00" })).toThrow();
  });
});
