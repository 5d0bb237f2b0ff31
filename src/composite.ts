import sharp from 'sharp';
import path from 'node:path';
import { IOError, ParseError, ValidationError, errorMessage } from './errors.js';

export type OutputFormat = 'png' | 'jpeg' | 'gif';

const FORMATS: Record<string, OutputFormat> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.gif': 'gif',
};

export type GridOptions = {
  size: number;
  columns?: number;
};

export type GridLayout = {
  margin: number;
  cell: number;
  columns: number;
  rows: number;
  width: number;
  height: number;
};

export type Composite = {
  png: Buffer;
  width: number;
  height: number;
};

export function gridLayout(count: number, opts: GridOptions): GridLayout {
  if (count < 1) throw new ValidationError('nothing to composite');
  if (!Number.isInteger(opts.size) || opts.size < 1) throw new ValidationError(`invalid image size ${opts.size}`);
  const margin = Math.floor(opts.size / 8);
  const cell = opts.size + margin * 2;
  const columns = Math.min(count, Math.max(1, Math.floor(opts.columns ?? count)));
  const rows = Math.ceil(count / columns);
  return { margin, cell, columns, rows, width: columns * cell, height: rows * cell };
}

/** Lays the images out row by row on a white canvas, each scaled to `size` × `size`. */
export async function composeGrid(images: Buffer[], opts: GridOptions): Promise<Composite> {
  const layout = gridLayout(images.length, opts);
  const tiles: sharp.OverlayOptions[] = [];
  for (const [i, image] of images.entries()) {
    const input = await sharp(image).resize(opts.size, opts.size, { kernel: 'nearest', fit: 'fill' }).png().toBuffer();
    tiles.push({
      input,
      left: layout.margin + (i % layout.columns) * layout.cell,
      top: layout.margin + Math.floor(i / layout.columns) * layout.cell,
    });
  }
  const png = await sharp({
    create: { width: layout.width, height: layout.height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .composite(tiles)
    .png()
    .toBuffer();
  return { png, width: layout.width, height: layout.height };
}

/** Checks that `image` is a raster sharp can read; `label` names it in the error. */
export async function assertReadableImage(image: Buffer, label: string): Promise<void> {
  try {
    await sharp(image).metadata();
  } catch (e) {
    throw new ParseError(`${label} is not a readable image: ${errorMessage(e)}`, { cause: e });
  }
}

export function outputFormat(file: string): OutputFormat {
  const format = FORMATS[path.extname(file).toLowerCase()];
  if (!format) {
    throw new ValidationError(`invalid output format "${file}": expected .png, .jpg, .jpeg or .gif`);
  }
  return format;
}

export async function writeImage(png: Buffer, file: string): Promise<void> {
  const format = outputFormat(file);
  try {
    await sharp(png).toFormat(format).toFile(file);
  } catch (e) {
    throw new IOError(`can't write ${file}: ${errorMessage(e)}`, { cause: e });
  }
}
