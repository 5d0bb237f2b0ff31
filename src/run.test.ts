import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import QRCode from 'qrcode';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, ParseError, ValidationError } from './errors.js';
import { IzlyPortal } from './portals/izly.js';
import { generateCardQr, type RunOptions } from './run.js';
import type { Reporter } from './status.js';
import { FAKE_BASE_URL, fakePortal, type FakePortalOptions } from './testing/fakePortal.js';
import { decodeQr } from './testing/decode.js';

let dir = '';

beforeAll(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cardqr-run-'));
});

afterAll(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function setup(opts: FakePortalOptions = {}) {
  const fake = fakePortal(opts);
  const portal = new IzlyPortal({
    baseUrl: FAKE_BASE_URL,
    tokenRule: { kind: 'attribute', attribute: 'data-card-token' },
    fetch: fake.fetch,
  });
  const credentials = vi.fn(async () => ({ username: 'alice', password: 'test-secret' }));
  return { fake, portal, credentials };
}

function options(overrides: Partial<RunOptions> = {}): RunOptions {
  return { codes: 1, size: 200, output: path.join(dir, 'qrcode.png'), source: 'token', indexed: false, ...overrides };
}

async function exists(file: string): Promise<boolean> {
  return fs.access(file).then(() => true, () => false);
}

describe('generateCardQr', () => {
  it('signs in, encodes the card token and writes one image', async () => {
    const { portal, credentials } = setup();
    const output = path.join(dir, 'two.png');

    const result = await generateCardQr(options({ codes: 2, output }), { portal, credentials });

    expect(result).toMatchObject({ output, width: 500, height: 250, payloads: ['4F7A9C21', '4F7A9C21'] });
    const written = await fs.readFile(output);
    expect(await decodeQr(written, { left: 0, top: 0, width: 250, height: 250 })).toBe('4F7A9C21');
    expect(await decodeQr(written, { left: 250, top: 0, width: 250, height: 250 })).toBe('4F7A9C21');
  });

  it('widens the image with the number of codes', async () => {
    const widths: number[] = [];
    for (const codes of [1, 2, 3]) {
      const { portal, credentials } = setup();
      const r = await generateCardQr(options({ codes, output: path.join(dir, `n${codes}.png`) }), { portal, credentials });
      widths.push(r.width);
      expect(r.height).toBe(250);
    }
    expect(widths).toEqual([250, 500, 750]);
  });

  it('produces identical files for the same token and count', async () => {
    const a = path.join(dir, 'same-a.png');
    const b = path.join(dir, 'same-b.png');
    const first = setup();
    await generateCardQr(options({ codes: 3, output: a }), { portal: first.portal, credentials: first.credentials });
    const second = setup();
    await generateCardQr(options({ codes: 3, output: b }), { portal: second.portal, credentials: second.credentials });
    expect((await fs.readFile(a)).equals(await fs.readFile(b))).toBe(true);
  });

  it('suffixes payloads with --indexed', async () => {
    const { portal, credentials } = setup();
    const r = await generateCardQr(options({ codes: 2, indexed: true, output: path.join(dir, 'indexed.png') }), { portal, credentials });
    expect(r.payloads).toEqual(['4F7A9C21-1', '4F7A9C21-2']);
  });

  it('rejects a count outside 1..3 before touching the network', async () => {
    const { fake, portal, credentials } = setup();
    await expect(generateCardQr(options({ codes: 4 }), { portal, credentials })).rejects.toBeInstanceOf(ValidationError);
    expect(credentials).not.toHaveBeenCalled();
    expect(fake.calls).toEqual([]);
  });

  it('rejects an unsupported output format before touching the network', async () => {
    const { fake, portal, credentials } = setup();
    await expect(generateCardQr(options({ output: path.join(dir, 'x.tiff') }), { portal, credentials })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(fake.calls).toEqual([]);
  });

  it('reports each step in order', async () => {
    const { portal, credentials } = setup();
    const labels: string[] = [];
    const reporter: Reporter = {
      step<T>(label: string, fn: () => Promise<T>): Promise<T> {
        labels.push(label);
        return fn();
      },
      info(): void {},
    };
    await generateCardQr(options({ output: path.join(dir, 'steps.png') }), { portal, credentials, reporter });
    expect(labels).toEqual(['Getting CSRF', 'Logging in', 'Getting card token', 'Encoding QrCode', 'Saving QrCode']);
  });

  it('rejects empty credentials before touching the network', async () => {
    const { fake, portal } = setup();
    await expect(
      generateCardQr(options(), { portal, credentials: async () => ({ username: 'alice', password: '' }) })
    ).rejects.toThrow(new ValidationError('username and password are required'));
    expect(fake.calls).toEqual([]);
  });

  it('writes nothing when the credentials are rejected', async () => {
    const { portal } = setup({ password: 'another-secret' });
    const output = path.join(dir, 'denied.png');
    await expect(
      generateCardQr(options({ output }), { portal, credentials: async () => ({ username: 'alice', password: 'test-secret' }) })
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(await exists(output)).toBe(false);
  });

  it('writes nothing when the token is missing from the page', async () => {
    const { portal, credentials } = setup({ profileHtml: '<html><body>Maintenance</body></html>' });
    const output = path.join(dir, 'layout.png');
    await expect(generateCardQr(options({ output }), { portal, credentials })).rejects.toBeInstanceOf(ParseError);
    expect(await exists(output)).toBe(false);
  });

  it('composites the codes the portal renders', async () => {
    const rendered = await QRCode.toDataURL('PORTAL-CODE', { width: 200, margin: 1 });
    const { fake, portal, credentials } = setup({ qrImages: [rendered] });
    const output = path.join(dir, 'portal.png');

    const r = await generateCardQr(options({ codes: 2, source: 'portal', output }), { portal, credentials });

    expect([r.width, r.height]).toEqual([500, 250]);
    expect(r.payloads).toEqual([]);
    expect(fake.calls.map(c => c.path)).toEqual(['/Home/Logon', '/Home/Logon', '/Home/CreateQrCodeImg']);
    expect(await decodeQr(await fs.readFile(output), { left: 250, top: 0, width: 250, height: 250 })).toBe('PORTAL-CODE');
  });

  it('fails with ParseError when a portal-rendered code is not an image', async () => {
    const { portal, credentials } = setup({ qrImages: ['data:image/png;base64,aGVsbG8='] });
    const output = path.join(dir, 'not-an-image.png');

    const err = await generateCardQr(options({ source: 'portal', output }), { portal, credentials }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ParseError);
    expect(err).toHaveProperty('message', expect.stringMatching(/^qrcode image 1 is not a readable image: /));
    expect(await exists(output)).toBe(false);
  });

  it('hands the written file to the sender', async () => {
    const { portal, credentials } = setup();
    const output = path.join(dir, 'sent.jpg');
    const send = vi.fn(async (_file: string, _caption?: string) => {});
    await generateCardQr(options({ codes: 2, output }), { portal, credentials, send });
    expect(send).toHaveBeenCalledWith(output, '2 QR code(s)');
  });
});
