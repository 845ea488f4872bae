import { describe, expect, it } from 'vitest';

import { axial } from './axial.js';
import { axialToDoubled, doubled, doubledDistance, doubledNeighbors, doubledToAxial } from './doubled.js';
import { CoordinateError } from './types.js';

describe('doubled coordinates', () => {
  it('rejects coordinates with an odd col + row', () => {
    expect(() => doubled(1, 0)).toThrow(CoordinateError);
  });

  it('lists the neighbours of the origin', () => {
    expect(doubledNeighbors(doubled(0, 0))).toEqual(
      expect.arrayContaining([
        doubled(2, 0),
        doubled(1, 1),
        doubled(-1, 1),
        doubled(-2, 0),
        doubled(-1, -1),
        doubled(1, -1)
      ])
    );
  });

  it('lists the neighbours of an off-centre coordinate', () => {
    const neighbors = doubledNeighbors(doubled(3, 1));
    expect(neighbors).toHaveLength(6);
    expect(neighbors).toEqual(
      expect.arrayContaining([
        doubled(5, 1),
        doubled(4, 0),
        doubled(2, 0),
        doubled(1, 1),
        doubled(2, 2),
        doubled(4, 2)
      ])
    );
  });

  it('converts to and from axial coordinates', () => {
    expect(doubledToAxial(doubled(3, 1))).toEqual(axial(1, 1));
    expect(axialToDoubled(axial(1, 1))).toEqual(doubled(3, 1));
    expect(axialToDoubled(axial(-2, 1))).toEqual(doubled(-3, 1));
  });

  it('measures distance', () => {
    expect(doubledDistance(doubled(0, 0), doubled(3, 1))).toBe(2);
    expect(doubledDistance(doubled(0, 0), doubled(0, 4))).toBe(4);
    expect(doubledDistance(doubled(0, 0), doubled(6, 0))).toBe(3);
  });
});
