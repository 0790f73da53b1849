import { expect } from 'vitest';

import { PreconditionError, isPreconditionError, type PreconditionCode } from '@/lib/errors';

export function expectPrecondition(fn: () => unknown, code: PreconditionCode): PreconditionError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(PreconditionError);
  if (!isPreconditionError(caught)) throw new Error(`expected a PreconditionError (${code})`);
  expect(caught.code).toBe(code);
  return caught;
}
