import type { CliOptions } from './cli.js';
import { assertReadableImage, composeGrid, outputFormat, writeImage, type Composite } from './composite.js';
import { assertCredentials } from './credentials.js';
import type { Credentials, PortalClient } from './portals/types.js';
import { assertCodeCount, decodeDataUrl, encodeQrCodes } from './qr.js';
import { silentReporter, type Reporter } from './status.js';
import type { ImageSender } from './telegram.js';

export type RunOptions = Pick<CliOptions, 'codes' | 'size' | 'output' | 'source' | 'indexed'>;

export type RunDeps = {
  portal: PortalClient;
  credentials: () => Promise<Credentials>;
  reporter?: Reporter;
  send?: ImageSender;
};

export type RunResult = Composite & {
  output: string;
  payloads: string[];
};

export async function generateCardQr(opts: RunOptions, deps: RunDeps): Promise<RunResult> {
  const reporter = deps.reporter ?? silentReporter;
  assertCodeCount(opts.codes);
  outputFormat(opts.output);

  const credentials = assertCredentials(await deps.credentials());
  const csrf = await reporter.step('Getting CSRF', () => deps.portal.fetchCsrf());
  await reporter.step('Logging in', () => deps.portal.login(credentials, csrf));

  let images: Buffer[];
  let payloads: string[] = [];
  if (opts.source === 'portal') {
    images = await reporter.step('Getting QrCode', async () => {
      const rendered = await deps.portal.fetchQrImages(opts.codes);
      const decoded = rendered.map(r => decodeDataUrl(r.src));
      for (const [i, image] of decoded.entries()) {
        await assertReadableImage(image, `qrcode image ${i + 1}`);
      }
      return decoded;
    });
  } else {
    const token = await reporter.step('Getting card token', () => deps.portal.fetchToken());
    const codes = await reporter.step('Encoding QrCode', () =>
      encodeQrCodes(token, { count: opts.codes, size: opts.size, indexed: opts.indexed })
    );
    images = codes.map(c => c.png);
    payloads = codes.map(c => c.payload);
  }

  const composite = await reporter.step('Saving QrCode', async () => {
    const c = await composeGrid(images, { size: opts.size });
    await writeImage(c.png, opts.output);
    return c;
  });
  reporter.info(`wrote ${opts.output} (${composite.width}x${composite.height})`);

  const send = deps.send;
  if (send) {
    await reporter.step('Sending to Telegram', () => send(opts.output, `${opts.codes} QR code(s)`));
  }
  return { ...composite, output: opts.output, payloads };
}
