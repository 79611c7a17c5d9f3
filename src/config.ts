import path from 'path';
import { DEFAULT_CAPACITY } from './batchManager.js';
import { InvalidConfigError } from './errors.js';
import { parseLogLevel, type LogLevel } from './logger.js';
import type { UnknownUnitPolicy } from './types.js';

export type ReferenceSearchStrategy = 'pointer' | 'newest';

export interface TrackerConfig {
  baseDir: string;
  capacity: number;
  unknownUnitPolicy: UnknownUnitPolicy;
  artifactRoot: string;
  artifactPrefix: string;
  historyFile: string;
  referenceDir: string;
  referencePointerFile: string;
  referencePattern: RegExp;
  referenceSearch: ReferenceSearchStrategy[];
  customersFile: string;
  archiveRoot: string;
  archiveAfterDays: number;
  panelTypes: string[];
  logLevel: LogLevel;
}

export const MAX_CAPACITY = 1000;
export const DEFAULT_REFERENCE_PATTERN = '^BUILD.*\\.(xlsx|csv)$';
export const DEFAULT_PANEL_TYPES = ['200WT', '220WT', '330WT', '450WT', '450BT'];

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidConfigError(key, raw, `an integer between ${min} and ${max}`);
  }
  return value;
}

function readPath(env: NodeJS.ProcessEnv, key: string, baseDir: string, fallback: string): string {
  const raw = env[key]?.trim();
  return path.resolve(baseDir, raw || fallback);
}

function readList(env: NodeJS.ProcessEnv, key: string): string[] | null {
  const raw = env[key]?.trim();
  if (!raw) {
    return null;
  }
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean);
}

function readPolicy(env: NodeJS.ProcessEnv): UnknownUnitPolicy {
  const raw = env.UNKNOWN_UNIT_POLICY?.trim().toLowerCase();
  if (!raw || raw === 'reject') {
    return 'reject';
  }
  if (raw === 'warn') {
    return 'warn';
  }
  throw new InvalidConfigError('UNKNOWN_UNIT_POLICY', raw, '"reject" or "warn"');
}

function readSearch(env: NodeJS.ProcessEnv): ReferenceSearchStrategy[] {
  const entries = readList(env, 'REFERENCE_SEARCH');
  if (!entries) {
    return ['pointer', 'newest'];
  }
  const strategies: ReferenceSearchStrategy[] = [];
  for (const entry of entries) {
    const value = entry.toLowerCase();
    if (value === 'pointer' || value === 'newest') {
      if (!strategies.includes(value)) {
        strategies.push(value);
      }
      continue;
    }
    throw new InvalidConfigError('REFERENCE_SEARCH', env.REFERENCE_SEARCH ?? '', 'a list of "pointer" and "newest"');
  }
  return strategies;
}

function readPattern(env: NodeJS.ProcessEnv): RegExp {
  const raw = env.REFERENCE_PATTERN?.trim() || DEFAULT_REFERENCE_PATTERN;
  try {
    return new RegExp(raw, 'i');
  } catch {
    throw new InvalidConfigError('REFERENCE_PATTERN', raw, 'a valid regular expression');
  }
}

/**
 * Resolves the tracker configuration from environment variables. Relative
 * paths resolve against `baseDir` (the working directory by default).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, baseDir: string = process.cwd()): TrackerConfig {
  const logLevelRaw = env.LOG_LEVEL?.trim();
  const logLevel = parseLogLevel(logLevelRaw) ?? (logLevelRaw ? null : 'info');
  if (!logLevel) {
    throw new InvalidConfigError('LOG_LEVEL', logLevelRaw ?? '', 'debug, info, warn, error or silent');
  }

  const artifactRoot = readPath(env, 'ARTIFACT_ROOT', baseDir, 'PALLETS');
  const referenceDir = readPath(env, 'REFERENCE_DIR', baseDir, 'EXCEL');

  return {
    baseDir,
    capacity: readInt(env, 'PALLET_CAPACITY', DEFAULT_CAPACITY, 1, MAX_CAPACITY),
    unknownUnitPolicy: readPolicy(env),
    artifactRoot,
    artifactPrefix: env.ARTIFACT_PREFIX?.trim() || 'PALLET',
    historyFile: readPath(env, 'HISTORY_FILE', baseDir, path.join(artifactRoot, 'pallet_history.json')),
    referenceDir,
    referencePointerFile: readPath(env, 'REFERENCE_POINTER_FILE', baseDir, path.join(referenceDir, 'reference.txt')),
    referencePattern: readPattern(env),
    referenceSearch: readSearch(env),
    customersFile: readPath(env, 'CUSTOMERS_FILE', baseDir, path.join('CUSTOMERS', 'customers.xlsx')),
    archiveRoot: readPath(env, 'ARCHIVE_ROOT', baseDir, path.join('ARCHIVE', 'old_pallets')),
    archiveAfterDays: readInt(env, 'ARCHIVE_AFTER_DAYS', 90, 1, 36500),
    panelTypes: readList(env, 'PANEL_TYPES') ?? DEFAULT_PANEL_TYPES,
    logLevel
  };
}
