import { ValidationError } from '../types/errors.js';

/** Splits `items` into consecutive groups of at most `size`, preserving order. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError('Batch size must be a positive integer', { size });
  }

  const batches: T[][] = [];
  for (let offset = 0; offset < items.length; offset += size) {
    batches.push(items.slice(offset, offset + size));
  }
  return batches;
}
