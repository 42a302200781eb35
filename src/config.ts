/**
 * Configuration for the packaging services and CLI.
 * Loaded from environment variables with defaults suited to Canvas imports.
 */

import { isLogLevel, LogLevel } from './logging/logger';
import { isTargetDialect, TargetDialect } from './transformers/notation-transformer';

export interface Config {
  /** Log level */
  logLevel: LogLevel;
  /** Math delimiter dialect written into packages */
  targetDialect: TargetDialect;
  /** Similarity above which questions from different sources are reported as duplicates */
  duplicateThreshold: number;
  /** Fewest choice columns written to CSV, even when no question has that many */
  minChoiceColumns: number;
  /** Assessment title used when a collection has no subject */
  defaultTitle: string;
  /** Environment variables whose values were rejected, with the default used instead */
  rejected: string[];
}

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, name: string, defaultValue: string): string {
  return env[name] ?? defaultValue;
}

function parseNumber(
  env: Env,
  name: string,
  defaultValue: number,
  accept: (value: number) => boolean,
  rejected: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !accept(value)) {
    rejected.push(name);
    return defaultValue;
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const rejected: string[] = [];

  const logLevelRaw = getEnvOrDefault(env, 'QBANK_LOG_LEVEL', 'warn').toLowerCase();
  let logLevel: LogLevel = 'warn';
  if (isLogLevel(logLevelRaw)) {
    logLevel = logLevelRaw;
  } else {
    rejected.push('QBANK_LOG_LEVEL');
  }

  const dialectRaw = getEnvOrDefault(env, 'QBANK_TARGET_DIALECT', 'canvas').toLowerCase();
  let targetDialect: TargetDialect = 'canvas';
  if (isTargetDialect(dialectRaw)) {
    targetDialect = dialectRaw;
  } else {
    rejected.push('QBANK_TARGET_DIALECT');
  }

  return {
    logLevel,
    targetDialect,
    duplicateThreshold: parseNumber(
      env,
      'QBANK_DUPLICATE_THRESHOLD',
      0.8,
      v => v >= 0 && v <= 1,
      rejected
    ),
    minChoiceColumns: parseNumber(
      env,
      'QBANK_MIN_CHOICE_COLUMNS',
      4,
      v => Number.isInteger(v) && v >= 0,
      rejected
    ),
    defaultTitle: getEnvOrDefault(env, 'QBANK_DEFAULT_TITLE', 'Question Package'),
    rejected,
  };
}
