import { describe, it, expect } from 'vitest';
import { RenderError, isRenderError } from '../core/RenderError.js';

describe('RenderError', () => {
  it('describes out-of-bounds writes', () => {
    const err = RenderError.drawOutOfBounds({ x: 4, y: 0 }, { width: 4, height: 3 });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('RenderError');
    expect(err.kind).toBe('DrawOOB');
    expect(err.message).toBe('Point (4, 0) out of bounds for 4×3 bitmap');
  });

  it('chains the underlying failure of a memory error', () => {
    const failure = new RangeError('Array buffer allocation failed');
    const err = RenderError.memory('allocation failed', failure);
    expect(err.kind).toBe('MemoryError');
    expect(err.cause).toBe(failure);
  });

  it('leaves cause unset when none is given', () => {
    expect(RenderError.memory('gone').cause).toBeUndefined();
  });

  describe('isRenderError', () => {
    it('matches any kind when none is given', () => {
      expect(isRenderError(RenderError.memory('x'))).toBe(true);
      expect(isRenderError(new Error('x'))).toBe(false);
      expect(isRenderError('DrawOOB')).toBe(false);
    });

    it('filters by kind', () => {
      const oob = RenderError.drawOutOfBounds({ x: 0, y: 9 }, { width: 1, height: 1 });
      expect(isRenderError(oob, 'DrawOOB')).toBe(true);
      expect(isRenderError(oob, 'MemoryError')).toBe(false);
    });
  });
});
