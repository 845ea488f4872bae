import type { CoordinateSystem } from './types.js';

export interface AxialCoordinate {
  q: number;
  r: number;
}

export const axialDirections: ReadonlyArray<AxialCoordinate> = [
  { q: 1, r: 0 },
  { q: 1, r: -1 },
  { q: 0, r: -1 },
  { q: -1, r: 0 },
  { q: -1, r: 1 },
  { q: 0, r: 1 }
];

export const axial = (q: number, r: number): AxialCoordinate => ({ q, r });

export const axialKey = ({ q, r }: AxialCoordinate) => `${q},${r}`;

export const axialAdd = (a: AxialCoordinate, b: AxialCoordinate): AxialCoordinate => axial(a.q + b.q, a.r + b.r);

export const axialScale = ({ q, r }: AxialCoordinate, factor: number): AxialCoordinate => axial(q * factor, r * factor);

// Cube distance with s = -q - r folded in
export function axialDistance(a: AxialCoordinate, b: AxialCoordinate): number {
  const dq = a.q - b.q;
  const dr = a.r - b.r;
  return Math.max(Math.abs(dq), Math.abs(dr), Math.abs(dq + dr));
}

export function axialNeighbors(coordinate: AxialCoordinate): AxialCoordinate[] {
  return axialDirections.map((direction) => axialAdd(coordinate, direction));
}

export const isAxialNeighbor = (a: AxialCoordinate, b: AxialCoordinate) => axialDistance(a, b) === 1;

export const axialSystem: CoordinateSystem<AxialCoordinate> = {
  key: axialKey,
  equals: (a, b) => a.q === b.q && a.r === b.r,
  adjacent: axialNeighbors,
  distance: axialDistance
};
