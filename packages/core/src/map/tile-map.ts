import type { CoordinateSystem } from '../coords/types.js';

interface TileEntry<C, T> {
  coordinate: C;
  tile: T;
}

/**
 * Sparse map of tiles at arbitrary coordinates. Coordinates are compared through
 * the coordinate system's `key`, so plain object literals can be used for lookups.
 */
export class TileMap<C, T> {
  private readonly entriesByKey = new Map<string, TileEntry<C, T>>();

  constructor(readonly system: CoordinateSystem<C>) {}

  static fromCoordinates<C, T>(
    system: CoordinateSystem<C>,
    coordinates: Iterable<C>,
    makeTile: (coordinate: C) => T
  ): TileMap<C, T> {
    const map = new TileMap<C, T>(system);
    for (const coordinate of coordinates) {
      map.insert(coordinate, makeTile(coordinate));
    }
    return map;
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(coordinate: C): T | undefined {
    return this.entriesByKey.get(this.system.key(coordinate))?.tile;
  }

  contains(coordinate: C): boolean {
    return this.entriesByKey.has(this.system.key(coordinate));
  }

  /** Stores `tile` at `coordinate`, returning the tile it replaced, if any. */
  insert(coordinate: C, tile: T): T | undefined {
    const key = this.system.key(coordinate);
    const previous = this.entriesByKey.get(key);
    this.entriesByKey.set(key, { coordinate, tile });
    return previous?.tile;
  }

  remove(coordinate: C): T | undefined {
    const key = this.system.key(coordinate);
    const previous = this.entriesByKey.get(key);
    this.entriesByKey.delete(key);
    return previous?.tile;
  }

  getAdjacent(coordinate: C): T[] {
    const tiles: T[] = [];
    for (const neighbor of this.system.adjacent(coordinate)) {
      const tile = this.get(neighbor);
      if (tile !== undefined) {
        tiles.push(tile);
      }
    }
    return tiles;
  }

  *coordinates(): IterableIterator<C> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.coordinate;
    }
  }

  *entries(): IterableIterator<[C, T]> {
    for (const entry of this.entriesByKey.values()) {
      yield [entry.coordinate, entry.tile];
    }
  }
}
