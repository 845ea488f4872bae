import type { AxialCoordinate } from './axial.js';
import { CoordinateError } from './types.js';
import type { CoordinateSystem } from './types.js';

/**
 * Cube hex coordinate. Every valid value satisfies `q + r + s === 0`.
 */
export interface CubeCoordinate {
  q: number;
  r: number;
  s: number;
}

export function cube(q: number, r: number, s: number): CubeCoordinate {
  if (q + r + s !== 0) {
    throw new CoordinateError(`Cube coordinate (${q}, ${r}, ${s}) does not satisfy q + r + s = 0`);
  }
  return { q, r, s };
}

export const cubeDirections: ReadonlyArray<CubeCoordinate> = [
  { q: 1, r: -1, s: 0 },
  { q: 1, r: 0, s: -1 },
  { q: 0, r: 1, s: -1 },
  { q: -1, r: 1, s: 0 },
  { q: -1, r: 0, s: 1 },
  { q: 0, r: -1, s: 1 }
];

export const cubeKey = (coordinate: CubeCoordinate) => `${coordinate.q},${coordinate.r},${coordinate.s}`;

export function cubeAdd(a: CubeCoordinate, b: CubeCoordinate): CubeCoordinate {
  return { q: a.q + b.q, r: a.r + b.r, s: a.s + b.s };
}

export function cubeDistance(a: CubeCoordinate, b: CubeCoordinate): number {
  return Math.max(Math.abs(a.q - b.q), Math.abs(a.r - b.r), Math.abs(a.s - b.s));
}

export function cubeNeighbors(coordinate: CubeCoordinate): CubeCoordinate[] {
  return cubeDirections.map((direction) => cubeAdd(coordinate, direction));
}

export function cubeFromAxial(coordinate: AxialCoordinate): CubeCoordinate {
  return { q: coordinate.q, r: coordinate.r, s: 0 - coordinate.q - coordinate.r };
}

export function cubeToAxial(coordinate: CubeCoordinate): AxialCoordinate {
  return { q: coordinate.q, r: coordinate.r };
}

export function cubeLerp(a: CubeCoordinate, b: CubeCoordinate, t: number): CubeCoordinate {
  return {
    q: a.q + (b.q - a.q) * t,
    r: a.r + (b.r - a.r) * t,
    s: a.s + (b.s - a.s) * t
  };
}

export const cubeSystem: CoordinateSystem<CubeCoordinate> = {
  key: cubeKey,
  equals: (a, b) => a.q === b.q && a.r === b.r && a.s === b.s,
  adjacent: cubeNeighbors,
  distance: cubeDistance
};
