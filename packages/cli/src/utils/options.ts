import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for non-negative integers such as `-p 1`.
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Commander argument parser for a positive number of seconds.
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number of seconds.');
  }
  return parsed;
}
