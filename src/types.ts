export interface PerformanceSample {
  description: string;
  threadCount: number;
  keySize: number;
  valueSize: number;
  readPercent: number;
  operationCount: number;
  durationMicros: number;
  forcedWriteSync: boolean;
  customValue: number;
  source: string;
  line: number;
}

export type Dataset = PerformanceSample[];

export type Intensity = 'default' | 'long' | 'longest';

export interface CpuInfo {
  model: string;
  logicalCpus: string;
  l1d: string;
  l2: string;
  l3: string;
}

export interface OutputOptions {
  json?: boolean;
  table?: boolean;
  csv?: boolean;
  quiet?: boolean;
}
