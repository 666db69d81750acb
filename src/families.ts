import { aggregateRate, axisBound, memoryThroughput, operationRate, type Metric } from './metrics.js';
import type { Figure, Panel, Point } from './plot.js';
import type { Dataset, PerformanceSample } from './types.js';

/** Read percentages plotted as series, in legend order. 0 means 100% writes. */
export const READ_MIXES = [100, 95, 0] as const;

export type FilterField = 'description' | 'threadCount' | 'keySize' | 'valueSize' | 'readPercent';
export type SweepField = 'valueSize' | 'keySize' | 'threadCount';

export interface FieldEquals {
  field: FilterField;
  equals: string | number;
}

export interface PanelSpec {
  title: string;
  xLabel: string;
  yLabel: string;
  metric: Metric;
  yTickCount: number;
}

export interface ChartFamily {
  id: string;
  fileName: string;
  heading: string;
  subtitle: string;
  filter: FieldEquals[];
  sweep: SweepField;
  width: number;
  height: number;
  panels: PanelSpec[];
}

const ACCESS_PATTERN = 'Values in cache - Zipf-1.0 access distribution';

export const CHART_FAMILIES: readonly ChartFamily[] = [
  {
    id: 'value-size',
    fileName: 'kv_benchmark_throughput_monothread.svg',
    heading: 'Monothread',
    subtitle: `1M entries - 8 bytes key - ${ACCESS_PATTERN}`,
    filter: [
      { field: 'description', equals: 'Monothread' },
      { field: 'keySize', equals: 8 },
    ],
    sweep: 'valueSize',
    width: 1500,
    height: 600,
    panels: [
      { title: 'Operation throughput', xLabel: 'Value size', yLabel: 'Mop/s', metric: operationRate, yTickCount: 15 },
      { title: 'Memory throughput', xLabel: 'Value size', yLabel: 'MB/s', metric: memoryThroughput, yTickCount: 15 },
    ],
  },
  {
    id: 'key-size',
    fileName: 'kv_benchmark_throughput_keysize.svg',
    heading: 'Monothread',
    subtitle: `1M entries - 8 bytes values - ${ACCESS_PATTERN}`,
    filter: [
      { field: 'description', equals: 'Monothread' },
      { field: 'valueSize', equals: 8 },
    ],
    sweep: 'keySize',
    width: 800,
    height: 600,
    panels: [
      { title: 'Varying key size', xLabel: 'Key size', yLabel: 'Mop/s', metric: operationRate, yTickCount: 15 },
    ],
  },
  {
    id: 'thread-count',
    fileName: 'kv_benchmark_throughput_multithread.svg',
    heading: 'Multithread',
    subtitle: `1M entries - 8 bytes keys - 256 bytes values - ${ACCESS_PATTERN}`,
    filter: [{ field: 'description', equals: 'Multithread' }],
    sweep: 'threadCount',
    width: 800,
    height: 600,
    panels: [
      { title: 'Varying threads', xLabel: 'Thread qty', yLabel: 'Mop/s', metric: aggregateRate, yTickCount: 20 },
    ],
  },
];

export function mixLabel(readPercent: number): string {
  return readPercent === 0 ? 'Write 100%' : `Read ${readPercent}%`;
}

export function matchesFilter(sample: PerformanceSample, filter: FieldEquals[]): boolean {
  return filter.every(clause => sample[clause.field] === clause.equals);
}

/** Samples feeding a family: its fixed parameters, restricted to the plotted mixes. */
export function selectFamilySamples(dataset: Dataset, family: ChartFamily): Dataset {
  const mixes: readonly number[] = READ_MIXES;
  return dataset.filter(s => matchesFilter(s, family.filter) && mixes.includes(s.readPercent));
}

function seriesPoints(samples: Dataset, sweep: SweepField, metric: Metric): Point[] {
  // Array.prototype.sort is stable, so equal x keep their file order.
  return samples
    .map(s => ({ x: s[sweep], y: metric(s) }))
    .sort((a, b) => a.x - b.x);
}

export function buildPanel(subset: Dataset, family: ChartFamily, panelSpec: PanelSpec): Panel {
  return {
    title: panelSpec.title,
    xLabel: panelSpec.xLabel,
    yLabel: panelSpec.yLabel,
    yMax: axisBound(subset.map(panelSpec.metric)),
    yTickCount: panelSpec.yTickCount,
    series: READ_MIXES.map(mix => ({
      label: mixLabel(mix),
      points: seriesPoints(subset.filter(s => s.readPercent === mix), family.sweep, panelSpec.metric),
    })),
  };
}

export function buildFigure(
  dataset: Dataset,
  family: ChartFamily,
  opts: { engineName: string; machine: string },
): Figure {
  const subset = selectFamilySamples(dataset, family);
  return {
    title: `${opts.engineName} throughput - ${family.heading}`,
    subtitle: family.subtitle,
    footer: opts.machine,
    width: family.width,
    height: family.height,
    panels: family.panels.map(panelSpec => buildPanel(subset, family, panelSpec)),
  };
}
