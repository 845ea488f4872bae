export interface CoordinateSystem<C> {
  key(coordinate: C): string;
  equals(a: C, b: C): boolean;
  adjacent(coordinate: C): C[];
  distance(a: C, b: C): number;
}

export class CoordinateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoordinateError';
  }
}
