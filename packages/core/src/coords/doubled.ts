import type { AxialCoordinate } from './axial.js';
import { CoordinateError } from './types.js';
import type { CoordinateSystem } from './types.js';

/**
 * "Doubled width" hex coordinate: columns advance by two per hex, so `col + row` is
 * always even. Gives rectangular maps without the per-row parity rules of offset
 * coordinates.
 */
export interface DoubledCoordinate {
  col: number;
  row: number;
}

export const doubledDirections: ReadonlyArray<DoubledCoordinate> = [
  { col: 2, row: 0 },
  { col: 1, row: -1 },
  { col: -1, row: -1 },
  { col: -2, row: 0 },
  { col: -1, row: 1 },
  { col: 1, row: 1 }
];

export function doubled(col: number, row: number): DoubledCoordinate {
  if ((col + row) % 2 !== 0) {
    throw new CoordinateError(`Doubled coordinate (${col}, ${row}) must have an even col + row`);
  }
  return { col, row };
}

export const doubledKey = (coordinate: DoubledCoordinate) => `${coordinate.col},${coordinate.row}`;

export function doubledToAxial(coordinate: DoubledCoordinate): AxialCoordinate {
  return { q: (coordinate.col - coordinate.row) / 2, r: coordinate.row };
}

export function axialToDoubled(coordinate: AxialCoordinate): DoubledCoordinate {
  return { col: 2 * coordinate.q + coordinate.r, row: coordinate.r };
}

export function doubledNeighbors(coordinate: DoubledCoordinate): DoubledCoordinate[] {
  return doubledDirections.map((d) => ({ col: coordinate.col + d.col, row: coordinate.row + d.row }));
}

export function doubledDistance(a: DoubledCoordinate, b: DoubledCoordinate): number {
  const dcol = Math.abs(a.col - b.col);
  const drow = Math.abs(a.row - b.row);
  return drow + Math.max(0, (dcol - drow) / 2);
}

export const doubledSystem: CoordinateSystem<DoubledCoordinate> = {
  key: doubledKey,
  equals: (a, b) => a.col === b.col && a.row === b.row,
  adjacent: doubledNeighbors,
  distance: doubledDistance
};
