import { describe, expect, it } from 'vitest';

import { square, squareArea, squareDistance, squareNeighbors } from './square.js';

describe('square coordinates', () => {
  it('lists side and corner neighbours', () => {
    const neighbors = squareNeighbors(square(2, 3));
    expect(neighbors).toHaveLength(8);
    expect(neighbors).toEqual(
      expect.arrayContaining([
        square(2, 2),
        square(3, 3),
        square(2, 4),
        square(1, 3),
        square(3, 2),
        square(3, 4),
        square(1, 4),
        square(1, 2)
      ])
    );
  });

  it('measures Chebyshev distance', () => {
    expect(squareDistance(square(0, 0), square(3, -5))).toBe(5);
    expect(squareDistance(square(1, 1), square(2, 2))).toBe(1);
  });

  it('covers a square area', () => {
    const area = squareArea(square(0, 0), 1);
    expect(area).toHaveLength(9);
    expect(area[0]).toEqual(square(-1, -1));
    expect(area[8]).toEqual(square(1, 1));
  });
});
