import { Command, CommanderError } from 'commander';
import { resolveSettings, type Settings } from './config.js';
import { UsageError } from './errors.js';
import { detectFormat, type OutputFormat } from './output.js';
import type { Intensity } from './types.js';

export type RunConfig = Readonly<Settings & {
  help: boolean;
  intensity: Intensity;
  skipRun: boolean;
  format: OutputFormat;
}>;

export type ProgramOptions = {
  help?: boolean;
  long?: boolean;
  longest?: boolean;
  skipRun?: boolean;
  dir?: string;
  bin?: string;
  filter?: string;
  files?: string;
  engine?: string;
  json?: boolean;
  table?: boolean;
  csv?: boolean;
  quiet?: boolean;
  debug?: boolean;
};

// Single-dash spellings that commander would otherwise split into short flags.
const ARG_ALIASES: Record<string, string> = {
  '-help': '--help',
  '-ll': '--longest',
};

export function normalizeArgs(args: string[]): string[] {
  return args.map(arg => ARG_ALIASES[arg] ?? arg);
}

export function defineOptions(program: Command): Command {
  return program
    .helpOption(false)
    .allowExcessArguments(false)
    .option('-h, --help', 'Show this help')
    .option('-l, --long', 'Longer run with more precise data')
    .option('--longest', 'Longest run with even more precise data (alias: -ll)')
    .option('-n, --skip-run', 'No run, use the CSV files already on disk')
    .option('-d, --dir <path>', 'Working directory holding the CSV files and charts')
    .option('--bin <path>', 'Benchmark executable, relative to the working directory')
    .option('--filter <pattern>', 'Benchmark test-name filter')
    .option('--files <glob>', 'Glob of the result files to collect')
    .option('--engine <name>', 'Storage engine name shown in chart titles')
    .option('--json', 'Force JSON summary')
    .option('--table', 'Force table summary')
    .option('--csv', 'Force CSV summary')
    .option('-q, --quiet', 'Only print the written chart paths')
    .option('--debug', 'Print debug details and stack traces to stderr');
}

export function toRunConfig(opts: ProgramOptions, env: NodeJS.ProcessEnv = process.env): RunConfig {
  if (opts.long && opts.longest) {
    throw new UsageError('Options -l and -ll cannot be combined; pick one intensity');
  }
  const intensity: Intensity = opts.longest ? 'longest' : opts.long ? 'long' : 'default';
  return Object.freeze({
    ...resolveSettings(opts, env),
    help: opts.help === true,
    intensity,
    skipRun: opts.skipRun === true,
    format: detectFormat(opts),
  });
}

/** Parses raw arguments (without node and script) into a run configuration. */
export function parseRunConfig(args: string[], env: NodeJS.ProcessEnv = process.env): RunConfig {
  const program = defineOptions(new Command().name('kvbench-report'))
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });
  try {
    program.parse(normalizeArgs(args), { from: 'user' });
  } catch (err) {
    throw toUsageError(err, program);
  }
  return toRunConfig(program.opts<ProgramOptions>(), env);
}

export function toUsageError(err: unknown, program: Command): unknown {
  if (err instanceof CommanderError) {
    return new UsageError(err.message.replace(/^error: /, ''), program.helpInformation());
  }
  return err;
}
