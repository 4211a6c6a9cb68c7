import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { ApiClientOptions, Bot } from "grammy";
import { envKeys, getEnv, type AppEnv } from "../config.js";
import { createAppDb } from "../db/client.js";
import { createGlowshotBot } from "./createBot.js";

export type ApiCall = { method: string; payload: Record<string, unknown> };

// Окружение процесса в тестах не читаем: только значения по умолчанию.
export function testEnv(overrides?: Partial<AppEnv>): AppEnv {
  const unset = Object.fromEntries(envKeys.map((key) => [key, undefined]));
  return {
    ...getEnv({
      ...unset,
      NODE_ENV: "test",
      DATABASE_URL: ":memory:",
      BOT_TOKEN: "test",
      NOTIFY_SEND_DELAY_MS: "0",
      NOTIFY_FAILURE_DELAY_MS: "0"
    }),
    ...overrides
  };
}

export function createTestBot(opts?: {
  env?: Partial<AppEnv>;
  now?: () => number;
  /** Чаты, куда sendMessage отвечает ошибкой 403. */
  blockedChats?: number[];
}): {
  bot: Bot;
  db: BetterSQLite3Database;
  env: AppEnv;
  apiCalls: ApiCall[];
  close: () => void;
} {
  const apiCalls: ApiCall[] = [];
  const env = testEnv(opts?.env);

  const appDb = createAppDb(":memory:");
  const bot = createGlowshotBot({
    token: "test",
    env,
    db: appDb.db,
    now: opts?.now,
    botInfo: {
      id: 999,
      is_bot: true,
      first_name: "GlowShot",
      username: "glowshot_test_bot",
      can_join_groups: true,
      can_read_all_group_messages: false,
      supports_inline_queries: false,
      can_connect_to_business: false,
      has_main_web_app: false
    },
    client: {
      fetch: createApiFetchStub(apiCalls, new Set(opts?.blockedChats ?? []))
    }
  });

  return {
    bot,
    db: appDb.db,
    env,
    apiCalls,
    close: appDb.close
  };
}

export function callsOf(apiCalls: ApiCall[], method: string) {
  return apiCalls.filter((c) => c.method === method).map((c) => c.payload);
}

function createApiFetchStub(apiCalls: ApiCall[], blocked: Set<number>): ApiClientOptions["fetch"] {
  return async (url: string | URL, init?: RequestInit) => {
    const method = String(url).split("/").pop() ?? "";
    const payload = parseBody(init?.body);
    apiCalls.push({ method, payload });
    const json = fakeApiResponse(method, payload, blocked);
    return new Response(JSON.stringify(json), {
      status: 200,
      headers: { "content-type": "application/json" }
    });
  };
}

function parseBody(body: unknown): Record<string, unknown> {
  if (typeof body !== "string" || !body) return {};
  const parsed: unknown = JSON.parse(body);
  return isRecord(parsed) ? parsed : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fakeApiResponse(method: string, payload: Record<string, unknown>, blocked: Set<number>) {
  const chatId = payload.chat_id;
  if ((method === "sendMessage" || method === "sendPhoto") && typeof chatId === "number" && blocked.has(chatId)) {
    return { ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" };
  }
  const message = {
    message_id: 1,
    date: Math.floor(Date.now() / 1000),
    chat: { id: chatId, type: typeof chatId === "number" && chatId < 0 ? "group" : "private" }
  };
  if (method === "sendMessage") return { ok: true, result: { ...message, text: payload.text } };
  if (method === "sendPhoto") {
    return {
      ok: true,
      result: {
        ...message,
        caption: payload.caption,
        photo: [{ file_id: payload.photo, file_unique_id: `${String(payload.photo)}_u`, width: 1, height: 1 }]
      }
    };
  }
  return { ok: true, result: true };
}
