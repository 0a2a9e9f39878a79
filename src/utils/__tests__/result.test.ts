import { describe, expect, test } from 'vitest';
import { failure, success, type Result } from '../result';

function parsePositive(value: number): Result<number, string> {
  return value > 0 ? success(value) : failure('not positive');
}

describe('Result', () => {
  test('success carries the value', () => {
    expect(parsePositive(3)).toEqual({ ok: true, value: 3 });
  });

  test('failure carries the error', () => {
    const result = parsePositive(-1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('not positive');
    }
  });
});
