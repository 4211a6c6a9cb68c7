import { dailyResultNotificationType, referralRewardNotificationType } from "../constants.js";
import { referralRewardNotificationSchema } from "../services/credits.js";
import type { NotificationEntry } from "../services/notifications.js";
import { dailyResultNotificationSchema, type DailyResults } from "../services/results.js";
import type { VoteRejection } from "../services/votes.js";

export const helpText = [
  "*GlowShot* — ежедневный фотоконкурс.",
  "",
  "Пришлите фото, чтобы участвовать в сегодняшнем дне.",
  "/rate — оценивать фото других участников",
  "/results — итоги последнего дня (или /results YYYY-MM-DD)",
  "/me — ваши кредиты и показы",
  "/delete <id> — убрать своё фото"
].join("\n");

export const voteRejectionText: Record<VoteRejection, string> = {
  invalid_score: "Оценка должна быть от 1 до 10.",
  photo_not_found: "Фото не найдено.",
  own_photo: "Нельзя оценивать своё фото.",
  photo_not_active: "Голосование за это фото уже закрыто.",
  already_voted: "Вы уже оценили это фото.",
  daily_limit: "Лимит оценок на сегодня исчерпан.",
  author_daily_limit: "Сегодня вы уже много раз оценили этого автора."
};

export function formatDeadline(expiresAt: number, timeZone: string): string {
  return new Intl.DateTimeFormat("ru-RU", {
    timeZone,
    day: "2-digit",
    month: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).format(new Date(expiresAt + 1));
}

// Экранирование для parse_mode "Markdown" (не MarkdownV2).
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, (ch) => `\\${ch}`);
}

export function photoCaption(photo: { id: number; title: string | null }): string {
  const title = photo.title ? `*${escapeMarkdown(photo.title)}*\n` : "";
  return `${title}Фото #${photo.id}. Ваша оценка?`;
}

export function formatResults(results: DailyResults, limit: number): string {
  const { payload } = results;
  if (payload.items.length === 0) {
    return `Итоги ${payload.submitDay}: в этот день фото не было.`;
  }
  const lines = [`*Итоги ${payload.submitDay}*`, `Участников: ${payload.participantsCount}`, ""];
  for (const item of payload.items.slice(0, limit)) {
    const mark = item.isTop ? "🏆 " : "";
    lines.push(`${mark}${item.rank}. фото #${item.photoId}: ${item.sumScore} (${item.votesCount} гол.)`);
  }
  if (payload.topThreshold > 0) {
    lines.push("", `Порог топа: ${payload.topThreshold}`);
  }
  return lines.join("\n");
}

/** Текст уведомления из очереди; undefined для неизвестного типа или битого payload. */
export function renderNotification(entry: Pick<NotificationEntry, "type" | "payload">): string | undefined {
  if (entry.type === referralRewardNotificationType) {
    const reward = referralRewardNotificationSchema.safeParse(entry.payload);
    if (!reward.success) return undefined;
    return `Приглашённый вами друг поставил первую оценку. Вам начислено +${reward.data.credits} кредит(а).`;
  }
  if (entry.type !== dailyResultNotificationType) return undefined;
  const parsed = dailyResultNotificationSchema.safeParse(entry.payload);
  if (!parsed.success) return undefined;

  const { submitDay, participantsCount, photos } = parsed.data;
  const lines = [`Итоги ${submitDay} готовы. Участников: ${participantsCount}.`];
  for (const p of photos) {
    const top = p.isTop ? " — в топе дня 🏆" : "";
    lines.push(`Фото #${p.photoId}: ${p.rank} место, ${p.sumScore} баллов, ${p.votesCount} голосов${top}`);
  }
  return lines.join("\n");
}
