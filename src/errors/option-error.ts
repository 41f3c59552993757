import { PatternDrillsError } from './base-error.js';

/**
 * A command-line option carried a value outside its allowed set
 */
export class UnsupportedOptionError extends PatternDrillsError {
  public readonly option: string;
  public readonly value: string;
  public readonly allowed: readonly string[];

  constructor(option: string, value: string, allowed: readonly string[]) {
    super(
      'UNSUPPORTED_OPTION',
      `Unsupported ${option} "${value}" (expected one of: ${allowed.join(', ')})`,
      { context: { option, value, allowed: [...allowed] } }
    );
    this.name = 'UnsupportedOptionError';
    this.option = option;
    this.value = value;
    this.allowed = allowed;
  }
}
