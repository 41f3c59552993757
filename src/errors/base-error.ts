/**
 * Base class for errors raised by the CLI itself. `code` is stable and
 * machine-readable; `context` carries the values that caused the failure.
 */
export class PatternDrillsError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: { cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'PatternDrillsError';
    this.code = code;
    this.context = options.context;
  }
}
