import { describe, expect, it } from 'vitest';
import { createStripSegment, describeSegment } from './StripSegment';
import { ConstructionError, InvalidRangeError } from './errors';

describe('createStripSegment', () => {
  it.each([
    [0, 1],
    [0, 60],
    [30, 60],
    [7, 8],
  ])('[%i, %i) has length end - start', (start, end) => {
    const strip = createStripSegment(start, end);
    expect(strip.start).toBe(start);
    expect(strip.end).toBe(end);
    expect(strip.length()).toBe(end - start);
  });

  it.each([
    [-1, 5],
    [5, 5],
    [10, 3],
    [0.5, 4],
  ])('rejects [%s, %s)', (start, end) => {
    expect(() => createStripSegment(start, end)).toThrow(InvalidRangeError);
  });

  it('reports the failure as a construction error', () => {
    try {
      createStripSegment(4, 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConstructionError);
      expect(err).toMatchObject({ code: 'INVALID_RANGE', start: 4, end: 2 });
    }
  });

  it('is immutable', () => {
    const strip = createStripSegment(0, 10);
    expect(Object.isFrozen(strip)).toBe(true);
    expect(describeSegment(strip)).toBe('0-10');
  });
});
