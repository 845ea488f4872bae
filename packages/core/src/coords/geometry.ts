import type { AxialCoordinate } from './axial.js';
import { axialAdd, axialDirections, axialDistance, axialScale } from './axial.js';
import { cubeFromAxial, cubeLerp, cubeToAxial } from './cube.js';
import { cubeRound } from './rounding.js';

/** Every coordinate within `radius` steps of `center`, centre included. */
export function hexArea(center: AxialCoordinate, radius: number): AxialCoordinate[] {
  const results: AxialCoordinate[] = [];
  for (let dq = -radius; dq <= radius; dq++) {
    for (let dr = Math.max(-radius, -dq - radius); dr <= Math.min(radius, -dq + radius); dr++) {
      results.push({ q: center.q + dq, r: center.r + dr });
    }
  }
  return results;
}

/** Coordinates exactly `radius` steps from `center`, walked counter-clockwise. */
export function hexRing(center: AxialCoordinate, radius: number): AxialCoordinate[] {
  if (radius === 0) {
    return [center];
  }

  const results: AxialCoordinate[] = [];
  let cursor = axialAdd(center, axialScale(axialDirections[4], radius));
  for (const direction of axialDirections) {
    for (let step = 0; step < radius; step++) {
      results.push(cursor);
      cursor = axialAdd(cursor, direction);
    }
  }
  return results;
}

export function hexLine(from: AxialCoordinate, to: AxialCoordinate): AxialCoordinate[] {
  const start = cubeFromAxial(from);
  const end = cubeFromAxial(to);
  const distance = axialDistance(from, to);

  const results: AxialCoordinate[] = [];
  for (let i = 0; i <= distance; i++) {
    const t = distance === 0 ? 0 : i / distance;
    results.push(cubeToAxial(cubeRound(cubeLerp(start, end, t))));
  }
  return results;
}
