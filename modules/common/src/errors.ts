/**
 * modules/common/src/errors.ts
 *
 * @file Error types raised for invalid input. Missing or duplicate dialog keys are never errors.
 */

/**
 * Raised when a dialog or display reports a size that is not a positive integer in both dimensions.
 */
export class InvalidDimensionsError extends Error {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number, subject = 'dialog') {
    super(`Invalid ${subject} dimensions ${width}x${height}, expected positive integers`);
    this.name = 'InvalidDimensionsError';
    this.width = width;
    this.height = height;
  }
}

/**
 * Raised when placement configuration overrides are out of range.
 */
export class InvalidConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid placement config '${key}': ${message}`);
    this.name = 'InvalidConfigError';
    this.key = key;
  }
}
