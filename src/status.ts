const GREEN = '\u001b[92m';
const RED = '\u001b[31m';
const RESET = '\u001b[0m';

export type Reporter = {
  step<T>(label: string, fn: () => Promise<T>): Promise<T>;
  info(message: string): void;
};

export type ReporterStreams = {
  out: { write(chunk: string): unknown; isTTY?: boolean };
  err: { write(chunk: string): unknown };
};

/**
 * Prints `label ..... [OK]` / `[ERROR]` around each step.
 * On a TTY the pending line is rewritten in place; elsewhere only the outcome is printed.
 */
export function consoleReporter(streams: ReporterStreams = { out: process.stdout, err: process.stderr }): Reporter {
  const { out, err } = streams;
  return {
    async step<T>(label: string, fn: () => Promise<T>): Promise<T> {
      if (out.isTTY) out.write(`${label} ..... \r`);
      try {
        const result = await fn();
        out.write(`${label} ..... ${GREEN}[OK]${RESET}\n`);
        return result;
      } catch (e) {
        if (out.isTTY) out.write('\n');
        err.write(`${label} ..... ${RED}[ERROR]${RESET}\n`);
        throw e;
      }
    },
    info(message: string): void {
      out.write(`[cardqr] ${message}\n`);
    },
  };
}

export const silentReporter: Reporter = {
  step<T>(_label: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  },
  info(): void {},
};
