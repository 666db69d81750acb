import { readFileSync } from 'fs';
import { join } from 'path';
import { globSync } from 'glob';
import { MalformedRowError } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import type { Dataset, PerformanceSample } from './types.js';

export const CSV_COLUMNS = [
  'description',
  'threadQty',
  'keySize',
  'valueSize',
  'readPercent',
  'operationQty',
  'durationUs',
  'forcedWriteSync',
  'customValue',
] as const;

/** Splits one CSV line on commas, honouring double-quoted fields. */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

// Plain decimal notation only: Number() would also take 0x10, 0b1 and 0o7.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Upstream sometimes prints integers as floats ("1000.0"), so parse then truncate.
function parseIntegerField(raw: string, column: string, source: string, line: number): number {
  const text = raw.trim();
  const value = DECIMAL.test(text) ? Number(text) : NaN;
  if (!Number.isFinite(value)) {
    throw new MalformedRowError(source, line, `Field "${column}" is not numeric: "${raw}"`);
  }
  return Math.trunc(value) || 0;
}

export function parseRow(fields: string[], source: string, line: number): PerformanceSample {
  if (fields.length !== CSV_COLUMNS.length) {
    throw new MalformedRowError(
      source,
      line,
      `Expected ${CSV_COLUMNS.length} fields, found ${fields.length}`,
    );
  }
  const [description, ...rest] = fields;
  const [
    threadCount,
    keySize,
    valueSize,
    readPercent,
    operationCount,
    durationMicros,
    forcedWriteSync,
    customValue,
  ] = rest.map((raw, i) => parseIntegerField(raw, CSV_COLUMNS[i + 1], source, line));

  return {
    description,
    threadCount,
    keySize,
    valueSize,
    readPercent,
    operationCount,
    durationMicros,
    forcedWriteSync: forcedWriteSync !== 0,
    customValue,
    source,
    line,
  };
}

/**
 * Parses one result file. The first line is the header and is discarded.
 * Every other line must be a well-formed row, blank ones included; only the
 * empty remainder after a final newline is not a row.
 */
export function parseCsvContent(content: string, source: string): PerformanceSample[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  const samples: PerformanceSample[] = [];
  for (let i = 1; i < lines.length; i++) {
    const fields = lines[i] === '' ? [] : splitCsvLine(lines[i]);
    samples.push(parseRow(fields, source, i + 1));
  }
  return samples;
}

export function findResultFiles(filePattern: string, dir: string): string[] {
  return globSync(filePattern, { cwd: dir, nodir: true }).sort();
}

export function collect(filePattern: string, dir: string, log: Logger = silentLogger): Dataset {
  const dataset: Dataset = [];
  for (const file of findResultFiles(filePattern, dir)) {
    log.detail(file);
    let content: string;
    try {
      content = readFileSync(join(dir, file), 'utf-8');
    } catch (err) {
      log.debug(`skipping unreadable file ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const samples = parseCsvContent(content, file);
    if (samples.length === 0) log.debug(`no samples in ${file}`);
    for (const sample of samples) dataset.push(sample);
  }
  return dataset;
}
