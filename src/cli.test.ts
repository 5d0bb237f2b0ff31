import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './cli.js';
import { ValidationError } from './errors.js';

describe('parseCliArgs', () => {
  it('applies the defaults', () => {
    expect(parseCliArgs([])).toEqual({
      kind: 'run',
      options: { codes: 1, size: 200, output: './qrcode.png', source: 'token', indexed: false, telegram: false },
    });
  });

  it('returns help for -h and --help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help', '-q', '9'])).toEqual({ kind: 'help' });
  });

  it('reads every option', () => {
    const command = parseCliArgs([
      '-q', '3',
      '-u', 'alice',
      '-p', 'test-secret',
      '-o', 'out/codes.JPG',
      '-s', '120',
      '--source', 'token',
      '--indexed',
      '--telegram',
    ]);
    expect(command).toEqual({
      kind: 'run',
      options: {
        codes: 3,
        username: 'alice',
        password: 'test-secret',
        output: 'out/codes.JPG',
        size: 120,
        source: 'token',
        indexed: true,
        telegram: true,
      },
    });
  });

  it.each([['0'], ['4'], ['2.5'], ['two']])('rejects -q %s', (codes) => {
    expect(() => parseCliArgs(['-q', codes])).toThrow(ValidationError);
  });

  it('names the offending flag', () => {
    expect(() => parseCliArgs(['--codes', '4'])).toThrow(/^invalid --codes: /);
  });

  it('rejects --indexed with codes rendered by the portal', () => {
    expect(() => parseCliArgs(['--source', 'portal', '--indexed'])).toThrow(
      new ValidationError('invalid --indexed: the portal renders its own codes, use --source token')
    );
    expect(parseCliArgs(['--source', 'portal'])).toMatchObject({ kind: 'run', options: { source: 'portal', indexed: false } });
  });

  it('rejects an output format it cannot write', () => {
    expect(() => parseCliArgs(['-o', 'codes.bmp'])).toThrow('invalid output format "codes.bmp": expected .png, .jpg, .jpeg or .gif');
  });

  it('rejects unknown options, positionals and sources', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['extra'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['--source', 'browser'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['-s', '10'])).toThrow(ValidationError);
  });
});
