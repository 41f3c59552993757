/**
 * Logger
 *
 * Leveled logger shared by every module. Messages carry an optional
 * structured context and are routed to a pluggable sink so tests and
 * alternative front-ends can capture them.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  scope: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Destination for rendered log lines.
 */
export interface LogSink {
  write(line: string, entry: LogEntry): void;
  /** Whether lines of this level land on a terminal that renders ANSI colors */
  supportsColor?(level: LogLevel): boolean;
}

/**
 * Default sink: debug/info to stdout, warn/error to stderr.
 */
export class ConsoleSink implements LogSink {
  write(line: string, entry: LogEntry): void {
    this.streamFor(entry.level).write(line + '\n');
  }

  supportsColor(level: LogLevel): boolean {
    return Boolean(this.streamFor(level).isTTY);
  }

  private streamFor(level: LogLevel): NodeJS.WriteStream {
    return level === 'warn' || level === 'error' ? process.stderr : process.stdout;
  }
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Allow colors; each line is colored only if the sink reports a color terminal for it */
  colors: boolean;
  sink: LogSink;
}

export const DEFAULT_SCOPE = 'pattern-drills';

function defaultConfig(): LoggerConfig {
  return {
    level: 'info',
    format: 'text',
    colors: false,
    sink: new ConsoleSink(),
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function isLogFormat(value: string): value is LogFormat {
  return value === 'text' || value === 'json';
}

/**
 * Render an entry as a single line in the given format.
 */
export function formatEntry(entry: LogEntry, format: LogFormat, colors = false): string {
  if (format === 'json') {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      scope: entry.scope,
      message: entry.message,
      ...(entry.context ? { context: entry.context } : {}),
    });
  }

  const label = entry.level.toUpperCase();
  const levelText = colors ? `${LEVEL_COLORS[entry.level]}${label}${RESET}` : label;
  const contextText = entry.context && Object.keys(entry.context).length > 0
    ? ` ${JSON.stringify(entry.context)}`
    : '';
  return `${entry.timestamp.toISOString()} - ${entry.scope} - ${levelText} - ${entry.message}${contextText}`;
}

export class Logger {
  constructor(
    private readonly state: { config: LoggerConfig },
    public readonly scope: string = DEFAULT_SCOPE
  ) {}

  get level(): LogLevel {
    return this.state.config.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.state.config.level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Logger writing under `<scope>.<name>` with the same configuration and sink.
   */
  child(name: string): Logger {
    return new Logger(this.state, `${this.scope}.${name}`);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const { format, colors, sink } = this.state.config;
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      scope: this.scope,
      message,
      context,
    };
    const colored = colors && (sink.supportsColor?.(level) ?? false);
    sink.write(formatEntry(entry, format, colored), entry);
  }
}

const sharedState: { config: LoggerConfig } = { config: defaultConfig() };

export const logger = new Logger(sharedState);

/**
 * Apply logging configuration process-wide. Unspecified fields keep their
 * current value.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  sharedState.config = { ...sharedState.config, ...config };
}

export function resetLogger(): void {
  sharedState.config = defaultConfig();
}
