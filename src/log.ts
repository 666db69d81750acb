import chalk from 'chalk';

export interface Logger {
  step(message: string): void;
  detail(message: string): void;
  debug(message: string): void;
}

// Progress goes to stderr so stdout stays parseable when piped.
export function createLogger(opts: { debug?: boolean; silent?: boolean } = {}): Logger {
  const write = (line: string) => {
    if (!opts.silent) console.error(line);
  };
  return {
    step: (message) => write(chalk.bold(message)),
    detail: (message) => write(`  ${message}`),
    debug: (message) => {
      if (opts.debug) write(chalk.dim(`  ${message}`));
    },
  };
}

export const silentLogger: Logger = createLogger({ silent: true });
