import type { CoordinateSystem } from './types.js';

export interface SquareCoordinate {
  x: number;
  y: number;
}

// 4 side neighbours followed by the 4 corner neighbours
export const squareDirections8: ReadonlyArray<SquareCoordinate> = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: -1 },
  { x: 1, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: -1 }
] as const;

export const square = (x: number, y: number): SquareCoordinate => ({ x, y });

export const squareKey = (c: SquareCoordinate) => `${c.x},${c.y}`;

// Diagonal steps cost the same as straight ones
export function squareDistance(a: SquareCoordinate, b: SquareCoordinate): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function squareNeighbors(c: SquareCoordinate): SquareCoordinate[] {
  return squareDirections8.map((d) => ({ x: c.x + d.x, y: c.y + d.y }));
}

// Cells within Chebyshev radius, row by row
export function squareArea(center: SquareCoordinate, radius: number): SquareCoordinate[] {
  const res: SquareCoordinate[] = [];
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      res.push({ x: center.x + dx, y: center.y + dy });
    }
  }
  return res;
}

export const squareSystem: CoordinateSystem<SquareCoordinate> = {
  key: squareKey,
  equals: (a, b) => a.x === b.x && a.y === b.y,
  adjacent: squareNeighbors,
  distance: squareDistance
};
