import { describe, it, expect } from 'vitest';
import { captureStackTrace } from '../stack-trace.js';
import { InvalidMaskError, RangeViolationError } from '../errors.js';

describe('captureStackTrace', () => {
  it('should not throw with or without a constructor', () => {
    const error = new Error('test');
    expect(() => captureStackTrace(error, Error)).not.toThrow();
    expect(() => captureStackTrace(error)).not.toThrow();
    expect(typeof error.stack).toBe('string');
  });

  it('should omit the error constructor frames', () => {
    const error = new RangeViolationError(16, 15);
    expect(error.stack).toBeDefined();
    expect(error.stack).not.toContain('at new RangeViolationError');
    expect(error.stack).not.toContain('at new PointPackError');
  });

  it('should keep the factory frame for errors built by static helpers', () => {
    const error = InvalidMaskError.zero();
    expect(error.stack).toContain('.zero');
    expect(error.stack).not.toContain('at new InvalidMaskError');
  });
});
