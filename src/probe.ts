import os from 'os';
import { runCommand, type CommandRunner } from './process.js';
import type { CpuInfo } from './types.js';

export type CpuProbe = () => CpuInfo | null;

function labelValue(lines: string[], label: string): string | null {
  for (const line of lines) {
    const sep = line.indexOf(':');
    if (sep === -1) continue;
    if (line.slice(0, sep).trim() === label) return line.slice(sep + 1).trim();
  }
  return null;
}

// "192 KiB (6 instances)" -> "192 KiB"
function cacheValue(lines: string[], label: string): string | null {
  const value = labelValue(lines, `${label} cache`) ?? labelValue(lines, label);
  return value === null ? null : value.split('(')[0].trim();
}

/** Reads the fields we annotate charts with from `lscpu` output. */
export function parseLscpu(output: string): CpuInfo | null {
  const lines = output.split('\n');
  const model = labelValue(lines, 'Model name');
  const logicalCpus = labelValue(lines, 'CPU(s)');
  const l1d = cacheValue(lines, 'L1d');
  const l2 = cacheValue(lines, 'L2');
  const l3 = cacheValue(lines, 'L3');
  if (!model || !logicalCpus || !l1d || !l2 || !l3) return null;
  return { model, logicalCpus, l1d, l2, l3 };
}

function formatBytes(raw: string): string | null {
  const bytes = Number(raw);
  if (!Number.isFinite(bytes) || bytes <= 0) return null;
  if (bytes % (1024 * 1024) === 0) return `${bytes / (1024 * 1024)} MiB`;
  if (bytes % 1024 === 0) return `${bytes / 1024} KiB`;
  return `${bytes} B`;
}

/** Reads `sysctl -n` output for the brand string, cpu count and cache sizes, one value per line. */
export function parseSysctl(output: string): CpuInfo | null {
  const [model, logicalCpus, l1dRaw, l2Raw, l3Raw] = output.split('\n').map(l => l.trim());
  if (!model || !logicalCpus) return null;
  const l1d = formatBytes(l1dRaw ?? '');
  const l2 = formatBytes(l2Raw ?? '');
  const l3 = formatBytes(l3Raw ?? '');
  if (!l1d || !l2 || !l3) return null;
  return { model, logicalCpus, l1d, l2, l3 };
}

export function linuxCpuProbe(run: CommandRunner = runCommand): CpuProbe {
  return () => {
    const result = run('lscpu', []);
    if (result.error || result.status !== 0) return null;
    return parseLscpu(result.stdout);
  };
}

export function darwinCpuProbe(run: CommandRunner = runCommand): CpuProbe {
  return () => {
    const result = run('sysctl', [
      '-n',
      'machdep.cpu.brand_string',
      'hw.logicalcpu',
      'hw.l1dcachesize',
      'hw.l2cachesize',
      'hw.l3cachesize',
    ]);
    if (result.error || result.status !== 0) return null;
    return parseSysctl(result.stdout);
  };
}

export const noCpuProbe: CpuProbe = () => null;

export function platformCpuProbe(platform: NodeJS.Platform = process.platform): CpuProbe {
  if (platform === 'linux') return linuxCpuProbe();
  if (platform === 'darwin') return darwinCpuProbe();
  return noCpuProbe;
}

export function describeMachine(system: string, osRelease: string, cpu: CpuInfo | null): string {
  const base = `${system} ${osRelease}`;
  if (!cpu) return base;
  return `${base}    CPU(${cpu.logicalCpus}): ${cpu.model}     L1 / L2 / L3 = ${cpu.l1d} / ${cpu.l2} / ${cpu.l3}`;
}

export function probeMachine(probeCpu: CpuProbe = platformCpuProbe()): string {
  return describeMachine(os.type(), os.release(), probeCpu());
}
