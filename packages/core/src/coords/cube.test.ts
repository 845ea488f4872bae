import { describe, expect, it } from 'vitest';

import { axial } from './axial.js';
import { cube, cubeDistance, cubeFromAxial, cubeNeighbors, cubeToAxial } from './cube.js';
import { CoordinateError } from './types.js';

describe('cube coordinates', () => {
  it('rejects coordinates off the q + r + s = 0 plane', () => {
    expect(() => cube(1, 1, 1)).toThrow(CoordinateError);
    expect(cube(2, -3, 1)).toEqual({ q: 2, r: -3, s: 1 });
  });

  it('lists the neighbours of an off-centre coordinate', () => {
    const neighbors = cubeNeighbors(cube(2, -3, 1));
    expect(neighbors).toHaveLength(6);
    expect(neighbors).toEqual(
      expect.arrayContaining([
        cube(3, -3, 0),
        cube(2, -2, 0),
        cube(1, -2, 1),
        cube(1, -3, 2),
        cube(2, -4, 2),
        cube(3, -4, 1)
      ])
    );
  });

  it('converts from axial coordinates', () => {
    expect(cubeFromAxial(axial(0, 0))).toEqual(cube(0, 0, 0));
    expect(cubeFromAxial(axial(1, -1))).toEqual(cube(1, -1, 0));
    expect(cubeFromAxial(axial(-1, 0))).toEqual(cube(-1, 0, 1));
    expect(cubeFromAxial(axial(2, -1))).toEqual(cube(2, -1, -1));
    expect(cubeFromAxial(axial(-2, 2))).toEqual(cube(-2, 2, 0));
    expect(cubeFromAxial(axial(1, -2))).toEqual(cube(1, -2, 1));
  });

  it('converts back to axial and measures distance', () => {
    expect(cubeToAxial(cube(-1, 2, -1))).toEqual(axial(-1, 2));
    expect(cubeDistance(cube(0, 0, 0), cube(2, -4, 2))).toBe(4);
  });
});
