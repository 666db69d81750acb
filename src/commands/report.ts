import { Command } from 'commander';
import { createLogger } from '../log.js';
import { defineOptions, toRunConfig, type ProgramOptions } from '../options.js';
import { printSummary } from '../output.js';
import { runPipeline, type PipelineDeps } from '../pipeline.js';

export function register(program: Command, deps: PipelineDeps = {}): void {
  defineOptions(program)
    .action(function (this: Command) {
      const config = toRunConfig(this.opts<ProgramOptions>());

      if (config.help) {
        console.log(this.helpInformation());
        process.exitCode = 1;
        return;
      }

      const log = deps.log ?? createLogger({ debug: config.debug });
      const summary = runPipeline(config, { ...deps, log });

      printSummary(summary, config.format);
    });
}
