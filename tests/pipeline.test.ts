import assert from 'node:assert/strict';
import { existsSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { InvocationFailure, MalformedRowError } from '../src/errors.js';
import { runPipeline, type PipelineConfig } from '../src/pipeline.js';
import { noCpuProbe } from '../src/probe.js';
import { SvgPlotter } from '../src/svg.js';
import { createResultDir, csv, fakeRunner, recordingPlotter } from './cli-test-helpers.js';

const ROWS = [
  'Monothread,1,8,8,100,1000000,500000,0,0',
  'Monothread,1,8,256,0,1000,1000,1,0',
  'Monothread,1,16,8,95,2000,1000,0,0',
  'Multithread,4,8,256,95,250000,400000,0,0',
];

function config(dir: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    dir,
    binary: './bin/kv_test',
    testFilter: '*thread performance',
    filePattern: 'benchmark*.csv',
    engineName: 'KV store',
    intensity: 'default',
    skipRun: true,
    ...overrides,
  };
}

test('skip mode renders the three chart families from the CSV files', () => {
  const dir = createResultDir({ 'benchmark_perf.csv': csv(...ROWS) });
  const plotter = recordingPlotter();
  const runner = fakeRunner(() => ({ status: 0, stdout: '', stderr: '' }));

  const summary = runPipeline(config(dir), { plotter, probeCpu: noCpuProbe, runCommand: runner.run });

  assert.equal(runner.calls.length, 0);
  assert.deepEqual(plotter.saved.map(s => s.filePath), [
    join(dir, 'kv_benchmark_throughput_monothread.svg'),
    join(dir, 'kv_benchmark_throughput_keysize.svg'),
    join(dir, 'kv_benchmark_throughput_multithread.svg'),
  ]);
  assert.equal(plotter.saved[0].figure.footer, `${os.type()} ${os.release()}`);
  assert.deepEqual(plotter.saved[0].figure.panels[0].series[0].points, [{ x: 8, y: 2 }]);
  assert.deepEqual(plotter.saved[2].figure.panels[0].series[1].points, [{ x: 4, y: 2.5 }]);

  // value-size: 2 panels x 3 mixes, key-size and thread-count: 1 panel x 3 mixes
  assert.equal(summary.length, 12);
  assert.deepEqual(summary[0], {
    chart: 'kv_benchmark_throughput_monothread.svg',
    panel: 'Operation throughput',
    series: 'Read 100%',
    points: 1,
    peak: 2,
    file: join(dir, 'kv_benchmark_throughput_monothread.svg'),
  });
});

test('two skip-mode runs over the same files plot identical series', () => {
  const dir = createResultDir({ 'benchmark_perf.csv': csv(...ROWS) });
  const first = recordingPlotter();
  const second = recordingPlotter();
  runPipeline(config(dir), { plotter: first, probeCpu: noCpuProbe });
  runPipeline(config(dir), { plotter: second, probeCpu: noCpuProbe });
  assert.deepEqual(second.saved, first.saved);
});

test('a malformed row aborts the run before any chart is written', () => {
  const dir = createResultDir({
    'benchmark_a.csv': csv(...ROWS),
    'benchmark_b.csv': csv('Monothread,1,8,8,100,fast,500000,0,0'),
  });
  const plotter = recordingPlotter();

  assert.throws(() => runPipeline(config(dir), { plotter, probeCpu: noCpuProbe }), MalformedRowError);
  assert.equal(plotter.saved.length, 0);

  assert.throws(() => runPipeline(config(dir), { plotter: new SvgPlotter(), probeCpu: noCpuProbe }), MalformedRowError);
  assert.equal(existsSync(join(dir, 'kv_benchmark_throughput_monothread.svg')), false);
  assert.equal(existsSync(join(dir, 'kv_benchmark_throughput_keysize.svg')), false);
  assert.equal(existsSync(join(dir, 'kv_benchmark_throughput_multithread.svg')), false);
});

test('a failed benchmark run aborts before collecting', () => {
  const dir = createResultDir({ 'benchmark_perf.csv': csv(...ROWS) });
  const plotter = recordingPlotter();
  const runner = fakeRunner(() => ({ status: 1, stdout: '', stderr: 'test case failed' }));

  assert.throws(
    () => runPipeline(config(dir, { skipRun: false }), { plotter, probeCpu: noCpuProbe, runCommand: runner.run }),
    (err: unknown) => err instanceof InvocationFailure && err.stderr === 'test case failed',
  );
  assert.equal(plotter.saved.length, 0);
});

test('a successful benchmark run is followed by collection of the files it wrote', () => {
  const dir = createResultDir();
  const plotter = recordingPlotter();
  const runner = fakeRunner(() => {
    writeFileSync(join(dir, 'benchmark_perf.csv'), csv(...ROWS));
    return { status: 0, stdout: '', stderr: '' };
  });

  runPipeline(config(dir, { skipRun: false, intensity: 'longest' }), { plotter, probeCpu: noCpuProbe, runCommand: runner.run });

  assert.deepEqual(runner.calls, [{ command: './bin/kv_test', args: ['-tc=*thread performance', '-ll'], cwd: dir }]);
  assert.equal(plotter.saved.length, 3);
  assert.deepEqual(plotter.saved[0].figure.panels[0].series[0].points, [{ x: 8, y: 2 }]);
});
