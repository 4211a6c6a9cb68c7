/**
 * Импорт выгрузки из старой версии бота.
 * Usage: npm run build && npm run import:legacy -- ./legacy-export.json
 *
 * Повторный запуск с тем же файлом безопасен.
 */

import "dotenv/config";
import fs from "node:fs";
import { getEnv } from "../config.js";
import { createAppDb } from "../db/client.js";
import { importLegacyPhotos, importLegacyReferrals, legacyExportSchema } from "../maintenance/legacyImport.js";

function main() {
  const file = process.argv[2];
  if (!file) {
    throw new Error("Укажите путь к JSON-выгрузке: import:legacy -- <file.json>");
  }

  const env = getEnv();
  const data = legacyExportSchema.parse(JSON.parse(fs.readFileSync(file, "utf8")));
  const { db, close } = createAppDb(env.DATABASE_URL);
  try {
    const now = () => Date.now();
    const photos = importLegacyPhotos({ db, timeZone: env.BOT_TIMEZONE, now }, data.photos);
    console.log(`[legacy] photos: imported ${photos.imported}, skipped ${photos.skipped}`);
    const referrals = importLegacyReferrals({ db, now }, data.referrals);
    console.log(`[legacy] referrals: imported ${referrals.imported}, skipped ${referrals.skipped}`);
  } finally {
    close();
  }
}

try {
  main();
} catch (e) {
  console.error("[legacy] import failed", e);
  process.exitCode = 1;
}
