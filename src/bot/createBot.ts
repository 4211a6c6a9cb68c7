import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { Bot, InlineKeyboard } from "grammy";
import type { ApiClientOptions } from "grammy";
import type { UserFromGetMe } from "grammy/types";
import {
  creditsPolicyFromEnv,
  votingPolicyFromEnv,
  type AppEnv
} from "../config.js";
import { maxScore, minScore } from "../constants.js";
import { captureException } from "../monitoring/sentry.js";
import { getDateKey, isDateKey } from "../services/clock.js";
import { grantDailyCredits, linkReferral, qualifyReferral } from "../services/credits.js";
import { nextPhotoForViewer } from "../services/feed.js";
import { getPhoto, softDeletePhoto, submitPhoto } from "../services/photos.js";
import { getDailyResults, getLatestDailyResults } from "../services/results.js";
import { getUserStats } from "../services/userStats.js";
import { castVote, recordView } from "../services/votes.js";
import { formatDeadline, formatResults, helpText, photoCaption, voteRejectionText } from "./texts.js";

type CreateBotDeps = {
  token: string;
  env: AppEnv;
  db: BetterSQLite3Database;
  now?: () => number;
  botInfo?: UserFromGetMe;
  client?: ApiClientOptions;
};

export function voteKeyboard(photoId: number) {
  const kb = new InlineKeyboard();
  for (let score = minScore; score <= maxScore; score++) {
    kb.text(String(score), `vote_${photoId}_${score}`);
    if (score === 5) kb.row();
  }
  return kb;
}

export function createGlowshotBot(deps: CreateBotDeps) {
  const bot = new Bot(deps.token, {
    botInfo: deps.botInfo,
    client: deps.client
  });
  const now = deps.now ?? (() => Date.now());
  const timeZone = deps.env.BOT_TIMEZONE;
  const creditsDeps = { db: deps.db, now, policy: creditsPolicyFromEnv(deps.env) };
  const resultsListSize = Math.max(deps.env.RESULTS_TOP_SIZE, 10);

  if (deps.env.NODE_ENV !== "test") {
    bot.use(async (ctx, next) => {
      const kind =
        Object.keys(ctx.update).filter((k) => k !== "update_id")[0] ?? "update";
      const chatId = ctx.chat?.id ?? "-";
      console.log(`[update] ${kind} chat=${chatId} from=${ctx.from?.id ?? "-"}`);
      await next();
    });
  }

  bot.command("help", (ctx) => ctx.reply(helpText, { parse_mode: "Markdown" }));

  // Участие, оценки и статистика доступны только в личке.
  const pm = bot.chatType("private");

  pm.command("start", async (ctx) => {
    if (!ctx.from) return;
    const userId = ctx.from.id;
    const lines = ["Добро пожаловать в GlowShot! 📸", "", helpText];

    // ссылку запоминаем до бонуса: бонус заводит строку user_stats
    const ref = /^ref_(\d+)$/.exec(ctx.match.trim());
    if (ref) {
      const res = linkReferral(creditsDeps, { invitedUserId: userId, inviterUserId: Number(ref[1]) });
      if (res.status === "linked") {
        lines.push("", "Вы пришли по приглашению. Поставьте первую оценку через /rate, и вы с другом получите бонус.");
      } else if (res.reason === "self_referral") {
        lines.push("", "Нельзя пригласить самого себя.");
      }
    }

    const grant = grantDailyCredits(creditsDeps, userId, getDateKey(now(), timeZone));
    if (grant.status === "granted") {
      lines.push("", `Ежедневный бонус начислен. Кредитов: ${grant.credits}.`);
    }
    await ctx.reply(lines.join("\n"), { parse_mode: "Markdown" });
  });

  pm.on("message:photo", async (ctx) => {
    const sizes = ctx.message.photo;
    const largest = sizes[sizes.length - 1];
    if (!ctx.from || !largest) return;

    const res = submitPhoto(
      { db: deps.db, timeZone, now },
      {
        userId: ctx.from.id,
        fileId: largest.file_id,
        title: ctx.message.caption?.trim() || null,
        dailyViewsBudget: deps.env.PHOTO_DAILY_VIEWS_BUDGET
      }
    );
    await ctx.reply(
      `Фото #${res.photoId} принято в конкурс за ${res.submitDay}. Голосование открыто до ${formatDeadline(res.expiresAt, timeZone)}.`
    );
  });

  pm.command("rate", async (ctx) => {
    if (!ctx.from) return;
    const viewerId = ctx.from.id;
    grantDailyCredits(creditsDeps, viewerId, getDateKey(now(), timeZone));

    const photo = nextPhotoForViewer({ db: deps.db, timeZone, now }, viewerId);
    if (!photo) {
      await ctx.reply("Новых фото для оценки пока нет. Загляните позже!");
      return;
    }
    recordView({ db: deps.db, timeZone, now }, { viewerId, photoId: photo.id });
    await ctx.replyWithPhoto(photo.fileId, {
      caption: photoCaption(photo),
      parse_mode: "Markdown",
      reply_markup: voteKeyboard(photo.id)
    });
  });

  pm.callbackQuery(/^vote_(\d+)_(\d+)$/, async (ctx) => {
    const photoId = Number(ctx.match[1]);
    const score = Number(ctx.match[2]);

    const res = castVote(
      { db: deps.db, timeZone, now, policy: votingPolicyFromEnv(deps.env) },
      { voterId: ctx.from.id, photoId, score }
    );
    if (!res.accepted) {
      await ctx.answerCallbackQuery({ text: voteRejectionText[res.reason], show_alert: true });
      return;
    }

    const referral = qualifyReferral(creditsDeps, ctx.from.id);
    const bonus = referral.status === "rewarded" ? ` Бонус за приглашение: +${referral.credits} кредит(а).` : "";
    await ctx.answerCallbackQuery({ text: `Оценка ${score} учтена!${bonus}` });
    try {
      await ctx.editMessageReplyMarkup();
    } catch (e) {
      console.warn("[update] could not drop vote keyboard", e);
    }
  });

  bot.command("results", async (ctx) => {
    const arg = ctx.match.trim();
    if (arg && !isDateKey(arg)) {
      await ctx.reply("Укажите дату в формате YYYY-MM-DD.");
      return;
    }
    const results = arg ? getDailyResults(deps.db, arg) : getLatestDailyResults(deps.db);
    if (!results) {
      await ctx.reply(arg ? `Итоги за ${arg} ещё не опубликованы.` : "Итогов пока нет.");
      return;
    }
    await ctx.reply(formatResults(results, resultsListSize), { parse_mode: "Markdown" });
  });

  pm.command("me", async (ctx) => {
    if (!ctx.from) return;
    const stats = getUserStats(deps.db, ctx.from.id);
    const today = getDateKey(now(), timeZone);
    const votesToday = stats && stats.votesDay === today ? stats.votesGivenToday : 0;
    await ctx.reply(
      [
        `Кредиты: ${stats?.credits ?? 0}`,
        `Показы: ${stats?.showTokens ?? 0}`,
        `Оценок сегодня: ${votesToday} из ${deps.env.DAILY_VOTE_LIMIT}`
      ].join("\n")
    );
  });

  pm.command("delete", async (ctx) => {
    if (!ctx.from) return;
    const photoId = Number(ctx.match.trim());
    const photo = Number.isInteger(photoId) && photoId > 0 ? getPhoto(deps.db, photoId) : undefined;
    if (!photo || photo.userId !== ctx.from.id) {
      await ctx.reply("Фото не найдено.");
      return;
    }
    const res = softDeletePhoto({ db: deps.db, timeZone, now }, photoId, "author_request");
    await ctx.reply(res.ok ? `Фото #${photoId} удалено.` : "Фото уже удалено.");
  });

  bot.catch(async (err) => {
    console.error("[bot error]", err.error);
    captureException(err.error, {
      update_id: err.ctx.update.update_id,
      chat_id: err.ctx.chat?.id,
      from_id: err.ctx.from?.id
    });
    try {
      if (err.ctx.chat) {
        await err.ctx.reply("Произошла ошибка. Попробуйте ещё раз позже.");
      }
    } catch (e) {
      console.error("[bot error] reply failed", e);
    }
  });

  return bot;
}
