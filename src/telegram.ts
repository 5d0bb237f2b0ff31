import { Telegraf } from 'telegraf';
import fs from 'node:fs/promises';
import path from 'node:path';
import { ValidationError } from './errors.js';
import type { AppConfig } from './config.js';

export type TelegramEnv = {
  botToken: string;
  chatId: string;
};

export function getTelegramEnv(config: Pick<AppConfig, 'telegram'>): TelegramEnv {
  const botToken = (config.telegram?.botToken || '').trim();
  const chatId = (config.telegram?.chatId || '').trim();
  if (!botToken) {
    throw new ValidationError('Missing CARDQR__TELEGRAM_BOT_TOKEN');
  }
  if (!chatId) {
    throw new ValidationError('Missing CARDQR__TELEGRAM_CHAT_ID');
  }
  return { botToken, chatId };
}

export type ImageSender = (filePath: string, caption?: string) => Promise<void>;

export function telegramSender(env: TelegramEnv): ImageSender {
  return async (filePath, caption) => {
    const bot = new Telegraf(env.botToken);
    const source = await fs.readFile(filePath);
    const extra = typeof caption === 'string' ? { caption } : {};
    if (path.extname(filePath).toLowerCase() === '.gif') {
      await bot.telegram.sendDocument(env.chatId, { source, filename: path.basename(filePath) }, extra);
      return;
    }
    await bot.telegram.sendPhoto(env.chatId, { source }, extra);
  };
}
