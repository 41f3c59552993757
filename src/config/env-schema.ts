/**
 * Environment Variable Schema & Validation
 *
 * The environment variables read at start-up, with validation, a CLI summary
 * and the logging configuration they produce.
 */

import {
  isLogFormat,
  isLogLevel,
  type LogFormat,
  type LoggerConfig,
  type LogLevel,
} from '../utils/logger.js';

export interface EnvVarDef {
  name: string;
  default: string;
  description: string;
  /** Returns a warning when a non-empty raw value is malformed */
  check(raw: string): string | null;
}

export type Env = Record<string, string | undefined>;

const BOOLEAN_VALUES = ['true', 'false', '1', '0'];

function oneOf(name: string, allowed: readonly string[]): (raw: string) => string | null {
  return raw =>
    allowed.includes(raw.toLowerCase())
      ? null
      : `${name}="${raw}" should be one of: ${allowed.join(', ')}`;
}

export const ENV_SCHEMA: readonly EnvVarDef[] = [
  {
    name: 'LOG_LEVEL',
    default: 'info',
    description: 'Logging level (debug, info, warn, error)',
    check: oneOf('LOG_LEVEL', ['debug', 'info', 'warn', 'error']),
  },
  {
    name: 'LOG_FORMAT',
    default: 'text',
    description: 'Log output format (text or json)',
    check: oneOf('LOG_FORMAT', ['text', 'json']),
  },
  {
    name: 'NO_COLOR',
    default: 'false',
    description: 'Disable color output (standard NO_COLOR convention)',
    check: raw =>
      BOOLEAN_VALUES.includes(raw.toLowerCase())
        ? null
        : `NO_COLOR should be a boolean (true/false) but got "${raw}"`,
  },
];

export interface ValidationResult {
  valid: boolean;
  warnings: string[];
}

/**
 * Every variable has a default, so malformed values are only warnings.
 */
export function validateEnv(env: Env = process.env): ValidationResult {
  const warnings: string[] = [];
  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];
    const warning = raw ? def.check(raw) : null;
    if (warning) warnings.push(warning);
  }
  return { valid: warnings.length === 0, warnings };
}

export interface ResolvedLoggingConfig {
  config: Pick<LoggerConfig, 'level' | 'format' | 'colors'>;
  warnings: string[];
}

/**
 * Derive logger settings from the environment. Invalid values fall back to
 * their defaults and are reported in `warnings`.
 */
export function resolveLoggingConfig(env: Env = process.env): ResolvedLoggingConfig {
  const { warnings } = validateEnv(env);

  const rawLevel = env.LOG_LEVEL?.toLowerCase();
  const level: LogLevel = rawLevel && isLogLevel(rawLevel) ? rawLevel : 'info';

  const rawFormat = env.LOG_FORMAT?.toLowerCase();
  const format: LogFormat = rawFormat && isLogFormat(rawFormat) ? rawFormat : 'text';

  const noColor = ['true', '1'].includes((env.NO_COLOR ?? '').toLowerCase());
  // Whether a line is actually colored depends on its stream, see ConsoleSink
  const colors = format === 'text' && !noColor;

  return { config: { level, format, colors }, warnings };
}

/**
 * One `NAME=value` line per variable (`*` marks a set value), then any warnings.
 */
export function getEnvSummary(env: Env = process.env): string {
  const lines = ['Pattern Drills Environment Configuration', ''];

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];
    const value = raw ? raw : `(default: ${def.default})`;
    lines.push(`  ${raw ? '*' : ' '} ${def.name}=${value}`, `    ${def.description}`);
  }

  const { warnings } = validateEnv(env);
  if (warnings.length > 0) {
    lines.push('', 'Warnings:', ...warnings.map(w => `  - ${w}`));
  }

  return lines.join('\n');
}
