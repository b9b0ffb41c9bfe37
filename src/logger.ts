type LoggerOptions = {
  quiet?: boolean;
};

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(options: LoggerOptions = {}) {
  const quiet = Boolean(options.quiet);
  const log = (...args: unknown[]) => {
    if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const warn = (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.warn(...args);
  };
  const error = (...args: unknown[]) => {
    // eslint-disable-next-line no-console
    console.error(...args);
  };
  const transition = (from: string, to: string) => {
    log(`▶ ${from} → ${to}`);
  };
  const replaced = (original: string, replacement: string, count: number) => {
    log(`✔ "${original}" → "${replacement}": ${count} replacement(s)`);
  };
  const skipped = (original: string, reason: string) => {
    log(`✖ "${original}" skipped (${reason})`);
  };
  return {
    log,
    warn,
    error,
    transition,
    replaced,
    skipped
  };
}
