import { join } from 'path';
import { buildFigure, CHART_FAMILIES, type ChartFamily } from './families.js';
import { silentLogger, type Logger } from './log.js';
import type { Plotter } from './plot.js';
import type { Dataset } from './types.js';

export interface SeriesSummary {
  chart: string;
  panel: string;
  series: string;
  points: number;
  peak: number;
  file: string;
}

export interface ReportOptions {
  dir: string;
  engineName: string;
  machine: string;
  plotter: Plotter;
  families?: readonly ChartFamily[];
  log?: Logger;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Builds and saves one figure per chart family, returning what was plotted. */
export function renderReport(dataset: Dataset, opts: ReportOptions): SeriesSummary[] {
  const log = opts.log ?? silentLogger;
  const summary: SeriesSummary[] = [];

  for (const family of opts.families ?? CHART_FAMILIES) {
    const figure = buildFigure(dataset, family, { engineName: opts.engineName, machine: opts.machine });
    const file = join(opts.dir, family.fileName);
    opts.plotter.save(figure, file);
    log.detail(family.fileName);

    for (const panel of figure.panels) {
      log.debug(`${family.id} / ${panel.title}: y axis 0..${round(panel.yMax)}`);
      for (const series of panel.series) {
        const peak = series.points.reduce((max, p) => Math.max(max, p.y), 0);
        summary.push({
          chart: family.fileName,
          panel: panel.title,
          series: series.label,
          points: series.points.length,
          peak: round(peak),
          file,
        });
      }
    }
  }
  return summary;
}
