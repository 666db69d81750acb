import { resolve } from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

export const DEFAULT_BINARY = './bin/kv_test';
export const DEFAULT_TEST_FILTER = '*thread performance';
export const DEFAULT_FILE_PATTERN = 'benchmark*.csv';
export const DEFAULT_ENGINE_NAME = 'KV store';

export interface Settings {
  dir: string;
  binary: string;
  testFilter: string;
  filePattern: string;
  engineName: string;
  debug: boolean;
}

export interface SettingFlags {
  dir?: string;
  bin?: string;
  filter?: string;
  files?: string;
  engine?: string;
  debug?: boolean;
}

/**
 * Resolution order for every setting:
 * 1. command-line flag
 * 2. KVBENCH_* environment variable (a .env file is loaded first)
 * 3. built-in default
 */
export function resolveSettings(flags: SettingFlags, env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    dir: resolve(flags.dir || env.KVBENCH_DIR || process.cwd()),
    binary: flags.bin || env.KVBENCH_BIN || DEFAULT_BINARY,
    testFilter: flags.filter || env.KVBENCH_TEST_FILTER || DEFAULT_TEST_FILTER,
    filePattern: flags.files || env.KVBENCH_FILES || DEFAULT_FILE_PATTERN,
    engineName: flags.engine || env.KVBENCH_ENGINE || DEFAULT_ENGINE_NAME,
    debug: flags.debug === true || isTruthy(env.KVBENCH_DEBUG),
  };
}

export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false';
}
