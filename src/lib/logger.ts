import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export type ConsoleLoggerOptions = {
  verbose?: boolean;
  /** Send info and debug to stderr too, leaving stdout for machine-readable output. */
  stderr?: boolean;
};

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const verbose = Boolean(opts.verbose);
  const out = (message: string) => (opts.stderr ? console.error(message) : console.log(message));
  return {
    info: (message) => out(message),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
    debug: (message) => {
      if (verbose) out(chalk.gray(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
