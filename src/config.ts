import { z } from 'zod';
import { ValidationError } from './errors.js';
import { parseTokenRule, type TokenRule } from './extract.js';

const optionalText = z
  .string()
  .optional()
  .transform(v => {
    const s = (v ?? '').trim();
    return s ? s : undefined;
  });

const EnvSchema = z.object({
  CARDQR__BASE_URL: z.string().trim().url().default('https://mon-espace.izly.fr'),
  CARDQR__PROFILE_PATH: z
    .string()
    .trim()
    .startsWith('/')
    .refine(p => !/^\/[/\\]/.test(p), 'must be a path on the portal host')
    .default('/Home/Index'),
  CARDQR__TOKEN_RULE: z.string().trim().min(1).default('attr:data-card-token'),
  CARDQR__TOKEN_FORMAT: z.string().trim().min(1).default('^[0-9A-Za-z]+$'),
  CARDQR__TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(15_000),
  CARDQR__USERNAME: optionalText,
  CARDQR__PASSWORD: z.string().optional().transform(v => (v ? v : undefined)),
  CARDQR__TELEGRAM_BOT_TOKEN: optionalText,
  CARDQR__TELEGRAM_CHAT_ID: optionalText,
});

export type AppConfig = {
  baseUrl: string;
  profilePath: string;
  tokenRule: TokenRule;
  tokenFormat: RegExp;
  timeoutMs: number;
  username?: string;
  password?: string;
  telegram?: { botToken?: string; chatId?: string };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'environment';
    throw new ValidationError(`invalid configuration ${where}: ${issue?.message ?? 'unknown issue'}`);
  }
  const e = parsed.data;
  let tokenFormat: RegExp;
  try {
    tokenFormat = new RegExp(e.CARDQR__TOKEN_FORMAT);
  } catch (err) {
    throw new ValidationError(`invalid configuration CARDQR__TOKEN_FORMAT: ${e.CARDQR__TOKEN_FORMAT}`, { cause: err });
  }
  const config: AppConfig = {
    baseUrl: e.CARDQR__BASE_URL,
    profilePath: e.CARDQR__PROFILE_PATH,
    tokenRule: parseTokenRule(e.CARDQR__TOKEN_RULE),
    tokenFormat,
    timeoutMs: e.CARDQR__TIMEOUT_MS,
  };
  if (e.CARDQR__USERNAME) config.username = e.CARDQR__USERNAME;
  if (e.CARDQR__PASSWORD) config.password = e.CARDQR__PASSWORD;
  if (e.CARDQR__TELEGRAM_BOT_TOKEN || e.CARDQR__TELEGRAM_CHAT_ID) {
    config.telegram = {};
    if (e.CARDQR__TELEGRAM_BOT_TOKEN) config.telegram.botToken = e.CARDQR__TELEGRAM_BOT_TOKEN;
    if (e.CARDQR__TELEGRAM_CHAT_ID) config.telegram.chatId = e.CARDQR__TELEGRAM_CHAT_ID;
  }
  return config;
}
