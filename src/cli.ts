import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ValidationError, errorMessage } from './errors.js';
import { outputFormat } from './composite.js';
import { MAX_CODES, MIN_CODES } from './qr.js';

export const USAGE = `usage: cardqr [-h] [-q {1,2,3}] [-u USERNAME] [-p PASSWORD] [-o OUTPUT] [-s SIZE]
              [--source {token,portal}] [--indexed] [--telegram]

Sign in to the payment portal and save the balance card QR code(s) as one image.

options:
  -h, --help            show this help message and exit
  -q, --codes {1,2,3}   number of QR codes to generate, default: 1
  -u, --username USERNAME
                        portal username, default: $CARDQR__USERNAME, else asked for
  -p, --password PASSWORD
                        portal password, default: $CARDQR__PASSWORD, else asked for
  -o, --output OUTPUT   output image (.png, .jpg, .jpeg, .gif), default: ./qrcode.png
  -s, --size SIZE       size of each QR code in pixels, default: 200
  --source {token,portal}
                        token: read the card token and encode it locally (default)
                        portal: let the portal render the codes
  --indexed             append -1, -2, ... to each encoded token (--source token only)
  --telegram            also send the image to the configured Telegram chat
`;

export const CliArgs = z.object({
  codes: z.coerce.number().int().min(MIN_CODES).max(MAX_CODES).default(1),
  size: z.coerce.number().int().min(50).max(1000).default(200),
  output: z.string().trim().min(1).default('./qrcode.png'),
  username: z.string().optional(),
  password: z.string().optional(),
  source: z.enum(['token', 'portal']).default('token'),
  indexed: z.boolean().default(false),
  telegram: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliArgs>;

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        help: { type: 'boolean', short: 'h' },
        codes: { type: 'string', short: 'q' },
        username: { type: 'string', short: 'u' },
        password: { type: 'string', short: 'p' },
        output: { type: 'string', short: 'o' },
        size: { type: 'string', short: 's' },
        source: { type: 'string' },
        indexed: { type: 'boolean' },
        telegram: { type: 'boolean' },
      },
    }).values;
  } catch (e) {
    throw new ValidationError(errorMessage(e), { cause: e });
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { help, ...rest } = readArgs(argv);
  if (help) return { kind: 'help' };

  const parsed = CliArgs.safeParse(rest);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = issue?.path[0] !== undefined ? `--${String(issue.path[0])}` : 'arguments';
    throw new ValidationError(`invalid ${flag}: ${issue?.message ?? 'invalid value'}`);
  }
  if (parsed.data.indexed && parsed.data.source === 'portal') {
    throw new ValidationError('invalid --indexed: the portal renders its own codes, use --source token');
  }
  outputFormat(parsed.data.output);
  return { kind: 'run', options: parsed.data };
}
