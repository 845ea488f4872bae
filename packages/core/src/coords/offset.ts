import type { AxialCoordinate } from './axial.js';
import { axialDistance } from './axial.js';
import type { CoordinateSystem } from './types.js';

// "odd-r" layout: pointy-top hexes, every odd row shoved half a hex to the right
export interface OffsetCoordinate {
  col: number;
  row: number;
}

const evenRowDirections: ReadonlyArray<OffsetCoordinate> = [
  { col: 1, row: 0 },
  { col: 0, row: -1 },
  { col: -1, row: -1 },
  { col: -1, row: 0 },
  { col: -1, row: 1 },
  { col: 0, row: 1 }
];

const oddRowDirections: ReadonlyArray<OffsetCoordinate> = [
  { col: 1, row: 0 },
  { col: 1, row: -1 },
  { col: 0, row: -1 },
  { col: -1, row: 0 },
  { col: 0, row: 1 },
  { col: 1, row: 1 }
];

export const offset = (col: number, row: number): OffsetCoordinate => ({ col, row });

export const offsetKey = (coordinate: OffsetCoordinate) => `${coordinate.col},${coordinate.row}`;

const isOddRow = (row: number) => (row & 1) === 1;

export function offsetToAxial(coordinate: OffsetCoordinate): AxialCoordinate {
  const { col, row } = coordinate;
  return { q: col - (row - (row & 1)) / 2, r: row };
}

export function axialToOffset(coordinate: AxialCoordinate): OffsetCoordinate {
  const { q, r } = coordinate;
  return { col: q + (r - (r & 1)) / 2, row: r };
}

export function offsetNeighbors(coordinate: OffsetCoordinate): OffsetCoordinate[] {
  const directions = isOddRow(coordinate.row) ? oddRowDirections : evenRowDirections;
  return directions.map((d) => ({ col: coordinate.col + d.col, row: coordinate.row + d.row }));
}

export function offsetDistance(a: OffsetCoordinate, b: OffsetCoordinate): number {
  return axialDistance(offsetToAxial(a), offsetToAxial(b));
}

export const offsetSystem: CoordinateSystem<OffsetCoordinate> = {
  key: offsetKey,
  equals: (a, b) => a.col === b.col && a.row === b.row,
  adjacent: offsetNeighbors,
  distance: offsetDistance
};
