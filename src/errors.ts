import chalk from 'chalk';

export class UsageError extends Error {
  constructor(
    message: string,
    public usage: string = ''
  ) {
    super(message);
  }

  display(): string {
    const lines = [chalk.red(`Error: ${this.message}`)];
    if (this.usage) lines.push('', this.usage);
    return lines.join('\n');
  }

  get exitCode(): number { return 1; }
}

export class InvocationFailure extends Error {
  constructor(
    public command: string,
    public status: number | null,
    public stderr: string
  ) {
    super(`Benchmark run failed (${status === null ? 'no exit status' : `exit ${status}`}): ${command}`);
  }

  display(): string {
    return [
      chalk.red('*** Error while executing the benchmarks'),
      chalk.dim(`  Command: ${this.command}`),
      chalk.dim(`  Status: ${this.status === null ? 'no exit status' : this.status}`),
      '',
      this.stderr.trimEnd(),
    ].join('\n');
  }

  get exitCode(): number { return 1; }
}

export class MalformedRowError extends Error {
  constructor(
    public file: string,
    public line: number,
    public reason: string
  ) {
    super(`Malformed row in ${file}:${line}: ${reason}`);
  }

  display(): string {
    return [
      chalk.red(`Error: ${this.reason}`),
      chalk.dim(`  At: ${this.file}:${this.line}`),
      chalk.dim('  No chart was written.'),
    ].join('\n');
  }

  get exitCode(): number { return 1; }
}

export interface ReportErrorOptions {
  json?: boolean;
  debug?: boolean;
}

/**
 * Prints an error the way the CLI reports it and returns the exit code.
 * Usage errors go to stdout with the usage text; every other error goes to
 * stderr, as a JSON object in JSON mode.
 */
export function reportError(err: unknown, opts: ReportErrorOptions = {}): number {
  if (err instanceof UsageError) {
    console.log(err.display());
    return err.exitCode;
  }
  if (err instanceof InvocationFailure) {
    if (opts.json) {
      console.error(JSON.stringify({ error: true, type: 'invocation_failure', status: err.status, message: err.stderr }));
    } else {
      console.error(err.display());
    }
    return err.exitCode;
  }
  if (err instanceof MalformedRowError) {
    if (opts.json) {
      console.error(JSON.stringify({ error: true, type: 'malformed_row', file: err.file, line: err.line, message: err.reason }));
    } else {
      console.error(err.display());
    }
    if (opts.debug) console.error(err.stack);
    return err.exitCode;
  }
  if (err instanceof Error) {
    if (opts.json) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (opts.debug) console.error(err.stack);
    }
  } else {
    console.error(chalk.red('An unexpected error occurred'));
  }
  return 1;
}
