#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { isTruthy } from '../src/config.js';
import { reportError } from '../src/errors.js';
import { normalizeArgs, toUsageError } from '../src/options.js';
import { register as registerReport } from '../src/commands/report.js';

function loadCliVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' && packageJson !== null &&
      'version' in packageJson && typeof packageJson.version === 'string' && packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to static default.
  }
  return '0.1.0';
}

const program = new Command();

// Global error handler
function handleError(raw: unknown): never {
  if (raw instanceof CommanderError && raw.code === 'commander.version') {
    process.exit(raw.exitCode);
  }
  const opts = program.opts();
  process.exit(reportError(toUsageError(raw, program), {
    json: opts.json === true,
    debug: opts.debug === true || isTruthy(process.env.KVBENCH_DEBUG),
  }));
}

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
}

program
  .name('kvbench-report')
  .version(loadCliVersion(), '-V, --version')
  .description('Run the storage engine benchmarks and chart their throughput results.')
  .option('--no-color', 'Disable colors')
  .exitOverride()
  .configureOutput({ writeErr: () => undefined });

registerReport(program);

try {
  program.parse(normalizeArgs(process.argv.slice(2)), { from: 'user' });
} catch (err) {
  handleError(err);
}
