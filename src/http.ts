export type Fetcher = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpSessionOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: Fetcher;
};

export class CookieJar {
  private readonly cookies = new Map<string, string>();

  // Only name=value and Max-Age matter here: the session talks to a single host.
  store(setCookie: string): void {
    const [pair = '', ...attrs] = setCookie.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) return;
    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    const expired = attrs.some(a => {
      const [k = '', v = ''] = a.split('=');
      return k.trim().toLowerCase() === 'max-age' && Number(v.trim()) <= 0;
    });
    if (!value || expired) {
      this.cookies.delete(name);
      return;
    }
    this.cookies.set(name, value);
  }

  storeAll(res: Response): string[] {
    const lines = res.headers.getSetCookie();
    for (const line of lines) this.store(line);
    return lines;
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  has(name: string): boolean {
    return this.cookies.has(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  header(): string {
    return Array.from(this.cookies, ([k, v]) => `${k}=${v}`).join('; ');
  }
}

export class HttpSession {
  readonly jar = new CookieJar();
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: Fetcher;

  constructor(opts: HttpSessionOptions) {
    this.baseUrl = opts.baseUrl;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  url(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  async request(path: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    const cookie = this.jar.header();
    if (cookie) headers.set('cookie', cookie);
    const res = await this.fetchImpl(this.url(path), {
      ...init,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    this.jar.storeAll(res);
    return res;
  }

  async get(path: string, init: RequestInit = {}): Promise<Response> {
    return this.request(path, { ...init, method: 'GET' });
  }

  async postForm(path: string, fields: Record<string, string>, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('content-type', 'application/x-www-form-urlencoded');
    return this.request(path, {
      ...init,
      method: 'POST',
      headers,
      body: new URLSearchParams(fields).toString(),
    });
  }
}
