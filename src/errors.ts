export type BarChartErrorCode = 'INVALID_ARGUMENT' | 'NULL_ERROR' | 'INVALID_FORMAT';

/**
 * Error thrown for precondition violations.
 *
 * `operation` names the public call that rejected its input (e.g. `'add'`, `'draw'`).
 */
export class BarChartError extends Error {
  readonly code: BarChartErrorCode;
  readonly operation: string;

  constructor(message: string, code: BarChartErrorCode, operation: string) {
    super(message);
    this.name = 'BarChartError';
    this.code = code;
    this.operation = operation;
  }
}

export const invalidArgument = (operation: string, message: string): BarChartError =>
  new BarChartError(`${operation}: ${message}`, 'INVALID_ARGUMENT', operation);

/** Positive and exactly representable (at most `Number.MAX_SAFE_INTEGER`). */
export const isPositiveInteger = (v: unknown): v is number =>
  typeof v === 'number' && Number.isSafeInteger(v) && v > 0;
