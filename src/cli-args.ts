import { InvalidArgumentError } from 'commander';

/** Option parser for whole-number flags such as --interval and --days */
export function positiveInt(value: string): number {
  const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}
