#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, USAGE } from './cli.js';
import { loadConfig } from './config.js';
import { resolveCredentials } from './credentials.js';
import { CardQrError, errorMessage } from './errors.js';
import { IzlyPortal } from './portals/izly.js';
import { generateCardQr } from './run.js';
import { consoleReporter } from './status.js';
import { getTelegramEnv, telegramSender } from './telegram.js';

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    process.stdout.write(USAGE);
    return;
  }
  const options = command.options;
  const config = loadConfig(process.env);
  const send = options.telegram ? telegramSender(getTelegramEnv(config)) : undefined;

  const portal = new IzlyPortal({
    baseUrl: config.baseUrl,
    profilePath: config.profilePath,
    tokenRule: config.tokenRule,
    tokenFormat: config.tokenFormat,
    timeoutMs: config.timeoutMs,
  });
  await generateCardQr(options, {
    portal,
    credentials: () => resolveCredentials(options, config),
    reporter: consoleReporter(),
    send,
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = err instanceof CardQrError ? err.exitCode : 1;
});
