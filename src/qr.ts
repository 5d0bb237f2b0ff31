import QRCode from 'qrcode';
import { ParseError, ValidationError } from './errors.js';

export const MIN_CODES = 1;
export const MAX_CODES = 3;

export type ErrorCorrectionLevel = 'L' | 'M' | 'Q' | 'H';

export type QrImage = {
  index: number;
  payload: string;
  png: Buffer;
};

export type EncodeOptions = {
  count?: number;
  size?: number;
  indexed?: boolean;
  errorCorrectionLevel?: ErrorCorrectionLevel;
};

export function assertCodeCount(count: number): void {
  if (!Number.isInteger(count) || count < MIN_CODES || count > MAX_CODES) {
    throw new ValidationError(`number of codes must be one of ${MIN_CODES}..${MAX_CODES}, got ${count}`);
  }
}

export function buildPayloads(token: string, count: number, indexed: boolean = false): string[] {
  assertCodeCount(count);
  if (!token) throw new ValidationError('token is empty');
  return Array.from({ length: count }, (_, i) => (indexed ? `${token}-${i + 1}` : token));
}

export async function encodeQrCodes(token: string, opts: EncodeOptions = {}): Promise<QrImage[]> {
  const payloads = buildPayloads(token, opts.count ?? 1, opts.indexed ?? false);
  const size = opts.size ?? 200;
  const images: QrImage[] = [];
  for (const [index, payload] of payloads.entries()) {
    const png = await QRCode.toBuffer(payload, {
      type: 'png',
      errorCorrectionLevel: opts.errorCorrectionLevel ?? 'M',
      width: size,
      margin: 1,
    });
    images.push({ index, payload, png });
  }
  return images;
}

export function decodeDataUrl(src: string): Buffer {
  const m = src.match(/base64,(.*)$/s);
  const body = (m?.[1] ?? '').replace(/\s+/g, '');
  if (!body) throw new ParseError('qrcode image is not a base64 data URL');
  return Buffer.from(body, 'base64');
}
