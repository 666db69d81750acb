import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Figure, Panel, Plotter, Point } from './plot.js';

const SERIES_COLORS = ['#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd', '#8c564b'];

const MARGIN = { top: 0.2, bottom: 0.15, left: 80, right: 40, gap: 100 };

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function niceStep(range: number, count: number): number {
  const raw = range / Math.max(1, count);
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  const nice = residual <= 1 ? 1 : residual <= 2 ? 2 : residual <= 2.5 ? 2.5 : residual <= 5 ? 5 : 10;
  return nice * magnitude;
}

/** Round-valued tick positions covering [min, max], roughly `count` of them. */
export function niceTicks(min: number, max: number, count: number): number[] {
  if (!(max > min)) return [min];
  const step = niceStep(max - min, count);
  const ticks: number[] = [];
  for (let i = Math.ceil(min / step); i * step <= max + step * 1e-9; i++) {
    ticks.push(Number((i * step).toPrecision(12)));
  }
  return ticks;
}

export function formatTick(value: number): string {
  return String(Number(value.toPrecision(10)));
}

function xDomain(panel: Panel): [number, number] {
  const xs = panel.series.flatMap(s => s.points.map(p => p.x));
  if (xs.length === 0) return [0, 1];
  const lo = xs.reduce((a, b) => Math.min(a, b));
  const hi = xs.reduce((a, b) => Math.max(a, b));
  if (lo === hi) return [lo - 1, hi + 1];
  const pad = (hi - lo) * 0.05;
  return [lo - pad, hi + pad];
}

function renderPanel(panel: Panel, box: { x: number; y: number; w: number; h: number }): string {
  const [x0, x1] = xDomain(panel);
  const yTop = panel.yMax > 0 ? panel.yMax : 1;
  const sx = (x: number) => box.x + ((x - x0) / (x1 - x0)) * box.w;
  const sy = (y: number) => box.y + box.h - (y / yTop) * box.h;
  const out: string[] = [];

  out.push(`<text class="panel-title" x="${box.x + box.w / 2}" y="${box.y - 14}" text-anchor="middle">${escapeXml(panel.title)}</text>`);

  for (const t of niceTicks(0, yTop, panel.yTickCount)) {
    const y = sy(t).toFixed(1);
    out.push(`<line class="grid-line" x1="${box.x}" y1="${y}" x2="${box.x + box.w}" y2="${y}"/>`);
    out.push(`<text class="tick" x="${box.x - 6}" y="${y}" text-anchor="end" dominant-baseline="middle">${formatTick(t)}</text>`);
  }
  for (const t of niceTicks(x0, x1, 8)) {
    const x = sx(t).toFixed(1);
    out.push(`<line class="grid-line" x1="${x}" y1="${box.y}" x2="${x}" y2="${box.y + box.h}"/>`);
    out.push(`<text class="tick" x="${x}" y="${box.y + box.h + 16}" text-anchor="middle">${formatTick(t)}</text>`);
  }

  out.push(`<rect class="axes" x="${box.x}" y="${box.y}" width="${box.w}" height="${box.h}"/>`);
  out.push(`<text class="axis-label" x="${box.x + box.w / 2}" y="${box.y + box.h + 40}" text-anchor="middle">${escapeXml(panel.xLabel)}</text>`);
  out.push(`<text class="axis-label" transform="translate(${box.x - 55} ${box.y + box.h / 2}) rotate(-90)" text-anchor="middle">${escapeXml(panel.yLabel)}</text>`);

  panel.series.forEach((series, i) => {
    const color = SERIES_COLORS[i % SERIES_COLORS.length];
    if (series.points.length > 0) {
      const coords = series.points.map((p: Point) => `${sx(p.x).toFixed(1)},${sy(p.y).toFixed(1)}`);
      out.push(`<polyline fill="none" stroke="${color}" stroke-width="2" points="${coords.join(' ')}"/>`);
      for (const c of coords) {
        const [cx, cy] = c.split(',');
        out.push(`<circle cx="${cx}" cy="${cy}" r="3.5" fill="${color}"/>`);
      }
    }
    // Empty series still get a legend entry.
    const ly = box.y + 18 + i * 18;
    const lx = box.x + box.w - 110;
    out.push(`<line x1="${lx}" y1="${ly}" x2="${lx + 24}" y2="${ly}" stroke="${color}" stroke-width="2"/>`);
    out.push(`<text class="legend" x="${lx + 30}" y="${ly}" dominant-baseline="middle">${escapeXml(series.label)}</text>`);
  });

  return out.join('\n  ');
}

export function renderSvg(figure: Figure): string {
  const { width, height, panels } = figure;
  const plotTop = height * MARGIN.top;
  const plotHeight = height * (1 - MARGIN.top - MARGIN.bottom);
  const n = Math.max(1, panels.length);
  const panelWidth = (width - MARGIN.left - MARGIN.right - MARGIN.gap * (n - 1)) / n;

  const body = panels.map((panel, i) => renderPanel(panel, {
    x: MARGIN.left + i * (panelWidth + MARGIN.gap),
    y: plotTop,
    w: panelWidth,
    h: plotHeight,
  }));

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="DejaVu Sans, system-ui, sans-serif">
  <rect width="100%" height="100%" fill="white"/>
  <style>
    .title { font-size: 18px; font-weight: bold; fill: #1f2937; }
    .subtitle { font-size: 12px; fill: #374151; }
    .footer { font-size: 8px; fill: #4b5563; }
    .panel-title { font-size: 15px; fill: #111827; }
    .axis-label { font-size: 12px; fill: #111827; }
    .tick { font-size: 9px; fill: #374151; }
    .legend { font-size: 10px; fill: #111827; }
    .grid-line { stroke: #e5e7eb; stroke-width: 1; }
    .axes { fill: none; stroke: #111827; stroke-width: 1; }
  </style>
  <text class="title" x="${width / 2}" y="${height * 0.06}" text-anchor="middle">${escapeXml(figure.title)}</text>
  <text class="subtitle" x="${width / 2}" y="${height * 0.12}" text-anchor="middle">${escapeXml(figure.subtitle)}</text>
  ${body.join('\n  ')}
  <text class="footer" x="${width * 0.02}" y="${height * 0.98}">${escapeXml(figure.footer)}</text>
</svg>
`;
}

export class SvgPlotter implements Plotter {
  save(figure: Figure, filePath: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, renderSvg(figure));
  }
}
