import { z } from 'zod';
import { AuthenticationError, ParseError, PortalError, ValidationError, errorMessage } from '../errors.js';
import { DEFAULT_TOKEN_FORMAT, extractToken, findInputValue, type TokenRule } from '../extract.js';
import { HttpSession, type Fetcher } from '../http.js';
import type { Credentials, PortalClient, PortalQrImage } from './types.js';

export const IZLY_BASE_URL = 'https://mon-espace.izly.fr';
export const AUTH_COOKIE = '.ASPXAUTH';

const PATHS = {
  logon: '/Home/Logon',
  createQrCodes: '/Home/CreateQrCodeImg',
} as const;

const CSRF_FIELD = '__RequestVerificationToken';

const QrCodesResponse = z.array(z.object({ Src: z.string().min(1) }).passthrough());

function loginUnreachable(e: unknown): AuthenticationError {
  return new AuthenticationError(`portal unreachable: ${errorMessage(e)}`, { cause: e });
}

export type IzlyPortalOptions = {
  baseUrl?: string;
  profilePath?: string;
  tokenRule: TokenRule;
  tokenFormat?: RegExp;
  timeoutMs?: number;
  fetch?: Fetcher;
};

export class IzlyPortal implements PortalClient {
  readonly session: HttpSession;
  private readonly profilePath: string;
  private readonly tokenRule: TokenRule;
  private readonly tokenFormat: RegExp;
  private authenticated = false;

  constructor(opts: IzlyPortalOptions) {
    this.session = new HttpSession({
      baseUrl: opts.baseUrl ?? IZLY_BASE_URL,
      timeoutMs: opts.timeoutMs,
      fetch: opts.fetch,
    });
    this.profilePath = opts.profilePath ?? '/Home/Index';
    this.tokenRule = opts.tokenRule;
    this.tokenFormat = opts.tokenFormat ?? DEFAULT_TOKEN_FORMAT;
  }

  async fetchCsrf(): Promise<string> {
    const { res, body } = await this.read(() => this.session.get(PATHS.logon), loginUnreachable);
    if (res.status !== 200) {
      throw new AuthenticationError(`can't get the login form (HTTP ${res.status})`);
    }
    const csrf = findInputValue(body, CSRF_FIELD);
    if (!csrf) throw new ParseError(`login form has no ${CSRF_FIELD} field`);
    return csrf;
  }

  /** Signs in with `csrf` from a prior `fetchCsrf()`, or fetches one first. */
  async login(credentials: Credentials, csrf?: string): Promise<void> {
    if (!credentials.username.trim() || !credentials.password) {
      throw new ValidationError('username and password are required');
    }
    const formToken = csrf ?? (await this.fetchCsrf());
    const { res } = await this.read(
      () =>
        this.session.postForm(
          PATHS.logon,
          { [CSRF_FIELD]: formToken, UserName: credentials.username.trim(), Password: credentials.password },
          { redirect: 'manual' }
        ),
      loginUnreachable
    );
    // The portal answers 200 with the form again on bad credentials, 302 on success.
    if (res.status !== 302 || !this.session.jar.has(AUTH_COOKIE)) {
      throw new AuthenticationError('invalid credentials');
    }
    this.authenticated = true;
  }

  async fetchProfilePage(): Promise<string> {
    this.assertAuthenticated();
    const { res, body } = await this.read(() => this.session.get(this.profilePath, { redirect: 'manual' }));
    this.assertSessionAccepted(res);
    if (res.status !== 200) {
      throw new PortalError(`can't get ${this.profilePath} (HTTP ${res.status})`, res.status);
    }
    return body;
  }

  async fetchToken(): Promise<string> {
    const html = await this.fetchProfilePage();
    return extractToken(html, this.tokenRule, this.tokenFormat);
  }

  async fetchQrImages(count: number): Promise<PortalQrImage[]> {
    this.assertAuthenticated();
    const { res, body } = await this.read(() =>
      this.session.postForm(PATHS.createQrCodes, { nbrOfQrCode: String(count) }, { redirect: 'manual' })
    );
    this.assertSessionAccepted(res);
    if (res.status !== 200) {
      throw new PortalError(`can't get the qrcode (HTTP ${res.status})`, res.status);
    }
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (e) {
      throw new ParseError('qrcode response is not JSON', { cause: e });
    }
    const parsed = QrCodesResponse.safeParse(json);
    if (!parsed.success) {
      throw new ParseError(`unexpected qrcode response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    if (parsed.data.length !== count) {
      throw new ParseError(`portal returned ${parsed.data.length} qrcode(s), expected ${count}`);
    }
    return parsed.data.map(item => ({ src: item.Src }));
  }

  private assertAuthenticated(): void {
    if (!this.authenticated) throw new AuthenticationError('not logged in');
  }

  private assertSessionAccepted(res: Response): void {
    if (res.status === 401 || res.status === 403 || (res.status >= 300 && res.status < 400)) {
      throw new AuthenticationError(`session rejected by the portal (HTTP ${res.status})`);
    }
  }

  // Reads the body under the same request timeout.
  private async read(
    fn: () => Promise<Response>,
    onError?: (e: unknown) => Error
  ): Promise<{ res: Response; body: string }> {
    try {
      const res = await fn();
      return { res, body: await res.text() };
    } catch (e) {
      if (onError) throw onError(e);
      throw new PortalError(`portal unreachable: ${errorMessage(e)}`, undefined, { cause: e });
    }
  }
}
