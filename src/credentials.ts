import { ValidationError } from './errors.js';
import { askHidden, askLine } from './prompt.js';
import type { Credentials } from './portals/types.js';

export type Asker = {
  interactive: boolean;
  line(question: string): Promise<string>;
  hidden(question: string): Promise<string>;
};

export const ttyAsker: Asker = {
  get interactive() {
    return Boolean(process.stdin.isTTY);
  },
  line: askLine,
  hidden: askHidden,
};

export function assertCredentials(credentials: Credentials): Credentials {
  if (!credentials.username.trim() || !credentials.password) {
    throw new ValidationError('username and password are required');
  }
  return credentials;
}

/** Flag value first, then the environment, then an interactive prompt. */
export async function resolveCredentials(
  given: { username?: string | undefined; password?: string | undefined },
  fallback: { username?: string | undefined; password?: string | undefined },
  asker: Asker = ttyAsker
): Promise<Credentials> {
  let username = (given.username ?? fallback.username ?? '').trim();
  let password = given.password ?? fallback.password ?? '';
  if (!username) {
    if (!asker.interactive) throw new ValidationError('missing username: pass -u or set CARDQR__USERNAME');
    username = (await asker.line('Username: ')).trim();
  }
  if (!password) {
    if (!asker.interactive) throw new ValidationError('missing password: pass -p or set CARDQR__PASSWORD');
    password = await asker.hidden('Password: ');
  }
  return assertCredentials({ username, password });
}
