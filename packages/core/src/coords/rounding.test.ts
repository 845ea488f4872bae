import { describe, expect, it } from 'vitest';

import { axialRound, cubeRound } from './rounding.js';

describe('cubeRound', () => {
  it('rounds fractional cube coordinates to a valid hex', () => {
    expect(cubeRound({ q: 0, r: 0, s: 0 })).toEqual({ q: 0, r: 0, s: 0 });
    expect(cubeRound({ q: 0.4, r: -0.4, s: 0 })).toEqual({ q: 0, r: 0, s: 0 });
    expect(cubeRound({ q: 0.6, r: -0.4, s: 0 })).toEqual({ q: 1, r: -1, s: 0 });
    expect(cubeRound({ q: 0.6, r: -0.6, s: 0 })).toEqual({ q: 1, r: -1, s: 0 });
    expect(cubeRound({ q: 1.4, r: -1.4, s: 0 })).toEqual({ q: 1, r: -1, s: 0 });
    expect(cubeRound({ q: 2, r: -1, s: 0 })).toEqual({ q: 2, r: -1, s: -1 });
    expect(cubeRound({ q: 3, r: -2, s: 0 })).toEqual({ q: 3, r: -2, s: -1 });
    expect(cubeRound({ q: -1, r: 4, s: 0 })).toEqual({ q: -1, r: 4, s: -3 });
  });

  it('rounds axial coordinates through cube space', () => {
    expect(axialRound({ q: 0.6, r: 0.6 })).toEqual({ q: 1, r: 0 });
    expect(axialRound({ q: -2, r: 1 })).toEqual({ q: -2, r: 1 });
  });
});
