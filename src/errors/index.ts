/**
 * Error exports
 */

export { PatternDrillsError } from './base-error.js';
export { UnsupportedOptionError } from './option-error.js';

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}
