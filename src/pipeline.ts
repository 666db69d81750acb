import { collect } from './collector.js';
import { silentLogger, type Logger } from './log.js';
import type { RunConfig } from './options.js';
import type { Plotter } from './plot.js';
import { platformCpuProbe, probeMachine, type CpuProbe } from './probe.js';
import { runCommand, type CommandRunner } from './process.js';
import { renderReport, type SeriesSummary } from './report.js';
import { runBenchmarks } from './runner.js';
import { SvgPlotter } from './svg.js';

export type PipelineConfig = Pick<
  RunConfig,
  'dir' | 'binary' | 'testFilter' | 'filePattern' | 'engineName' | 'intensity' | 'skipRun'
>;

export interface PipelineDeps {
  runCommand?: CommandRunner;
  probeCpu?: CpuProbe;
  plotter?: Plotter;
  log?: Logger;
}

/**
 * Invoke (optional) → collect → probe → derive and render each chart family.
 * Every step is synchronous. Errors from invocation, collection or probing
 * are thrown before the first chart is saved.
 */
export function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): SeriesSummary[] {
  const log = deps.log ?? silentLogger;

  if (config.skipRun) {
    log.step('Skipping benchmark run, using existing result files');
  } else {
    log.step(`Running benchmarks (${config.intensity})`);
    runBenchmarks(config, deps.runCommand ?? runCommand, log);
  }

  log.step(`Collecting result files in ${config.dir}`);
  const dataset = collect(config.filePattern, config.dir, log);
  log.debug(`${dataset.length} samples`);

  log.step('Collecting info on the machine');
  const machine = probeMachine(deps.probeCpu ?? platformCpuProbe());
  log.detail(machine);

  log.step('Creating graphs');
  return renderReport(dataset, {
    dir: config.dir,
    engineName: config.engineName,
    machine,
    plotter: deps.plotter ?? new SvgPlotter(),
    log,
  });
}
