import type { AxialCoordinate } from './axial.js';
import type { CubeCoordinate } from './cube.js';

/**
 * Rounds fractional cube coordinates to the nearest hex. The component with the
 * largest rounding error is recomputed from the other two, so the result always
 * satisfies `q + r + s === 0`.
 */
export function cubeRound(cube: CubeCoordinate): CubeCoordinate {
  let rq = Math.round(cube.q);
  let rr = Math.round(cube.r);
  let rs = Math.round(cube.s);

  const qDiff = Math.abs(rq - cube.q);
  const rDiff = Math.abs(rr - cube.r);
  const sDiff = Math.abs(rs - cube.s);

  if (qDiff > rDiff && qDiff > sDiff) {
    rq = -rr - rs;
  } else if (rDiff > sDiff) {
    rr = -rq - rs;
  } else {
    rs = -rq - rr;
  }

  // `|| 0` collapses -0
  return { q: rq || 0, r: rr || 0, s: rs || 0 };
}

export function axialRound(coordinate: AxialCoordinate): AxialCoordinate {
  const rounded = cubeRound({ q: coordinate.q, r: coordinate.r, s: -coordinate.q - coordinate.r });
  return { q: rounded.q, r: rounded.r };
}
