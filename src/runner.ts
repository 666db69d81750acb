import { InvocationFailure } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import { runCommand, type CommandRunner } from './process.js';
import type { Intensity } from './types.js';

export const INTENSITY_FLAGS: Record<Intensity, string[]> = {
  default: [],
  long: ['-l'],
  longest: ['-ll'],
};

export interface BenchmarkRunOptions {
  binary: string;
  testFilter: string;
  intensity: Intensity;
  dir: string;
}

export function benchmarkArgs(opts: Pick<BenchmarkRunOptions, 'testFilter' | 'intensity'>): string[] {
  return [`-tc=${opts.testFilter}`, ...INTENSITY_FLAGS[opts.intensity]];
}

/**
 * Runs the native benchmark executable, which writes its CSV results into
 * the working directory. Throws on a non-zero exit so no report is built
 * from a partial run.
 */
export function runBenchmarks(
  opts: BenchmarkRunOptions,
  run: CommandRunner = runCommand,
  log: Logger = silentLogger,
): void {
  const args = benchmarkArgs(opts);
  const commandLine = [opts.binary, ...args].join(' ');
  log.debug(`→ ${commandLine} (in ${opts.dir})`);

  const result = run(opts.binary, args, { cwd: opts.dir });
  if (result.error) {
    throw new InvocationFailure(commandLine, null, result.error.message);
  }
  if (result.status !== 0) {
    throw new InvocationFailure(commandLine, result.status, result.stderr);
  }
  log.debug(`← exit 0`);
}
