import type { CoordinateSystem } from '../coords/types.js';
import { logger } from '../logger.js';
import { tilePathfindCost } from './tile.js';
import type { PathfindTile } from './tile.js';
import type { TileMap } from './tile-map.js';
import type { PathFailureReason, PathfindingOptions, PathfindNode, PathResult } from './types.js';

interface NodeRecord<C> extends PathfindNode<C> {
  coordinate: C;
}

type SearchOutcome<C> = { path: C[]; cost: number } | { reason: PathFailureReason };

const log = logger.child({ module: 'pathfinder' });

/**
 * Raised when the search bookkeeping references a coordinate it never recorded.
 * This is a bug in the pathfinder, not a property of the map.
 */
export class PathfindingInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PathfindingInvariantError';
  }
}

/**
 * Uniform-cost search over a {@link TileMap}. Entering a tile costs that tile's
 * `pathfindCost`; coordinates without a tile are not traversable.
 *
 * An instance can be reused: all search state is reset at the start of each call.
 * Finalized coordinates are never reopened, which is only correct because tile
 * costs are non-negative.
 */
export class Pathfinder<C> {
  private readonly frontier = new Set<string>();
  private readonly finalized = new Set<string>();
  private readonly nodes = new Map<string, NodeRecord<C>>();

  /**
   * Returns the cheapest path from `start` to `end`, both included, or `undefined`
   * when `end` cannot be reached. `start` needs no tile of its own.
   */
  findPath<T extends PathfindTile>(
    map: TileMap<C, T>,
    start: C,
    end: C,
    options: PathfindingOptions = {}
  ): C[] | undefined {
    const outcome = this.search(map, start, end, options);
    return 'path' in outcome ? outcome.path : undefined;
  }

  planPath<T extends PathfindTile>(
    map: TileMap<C, T>,
    start: C,
    end: C,
    options: PathfindingOptions = {}
  ): PathResult<C> {
    const outcome = this.search(map, start, end, options);
    if ('path' in outcome) {
      return { success: true, path: outcome.path, cost: outcome.cost };
    }
    return { success: false, path: [], cost: Number.POSITIVE_INFINITY, reason: outcome.reason };
  }

  private search<T extends PathfindTile>(
    map: TileMap<C, T>,
    start: C,
    end: C,
    options: PathfindingOptions
  ): SearchOutcome<C> {
    const { system } = map;
    const maxCost = options.maxCost ?? Number.POSITIVE_INFINITY;

    this.frontier.clear();
    this.finalized.clear();
    this.nodes.clear();
    this.nodes.set(system.key(start), { coordinate: start, totalCost: 0 });

    let current: C | undefined = start;
    while (current !== undefined) {
      if (options.signal?.aborted) {
        log.debug({ start: system.key(start), end: system.key(end) }, 'path search aborted');
        return { reason: 'aborted' };
      }

      const currentKey = system.key(current);
      const currentNode = this.requireNode(currentKey);

      if (system.equals(current, end)) {
        const path = this.reconstruct(system, current);
        log.debug(
          { start: system.key(start), end: currentKey, cost: currentNode.totalCost, expanded: this.finalized.size },
          'path found'
        );
        return { path, cost: currentNode.totalCost };
      }

      this.frontier.delete(currentKey);
      this.finalized.add(currentKey);

      for (const neighbor of system.adjacent(current)) {
        const tile = map.get(neighbor);
        if (tile === undefined) {
          continue;
        }
        const neighborKey = system.key(neighbor);
        if (this.finalized.has(neighborKey)) {
          continue;
        }

        const tentativeCost = currentNode.totalCost + tilePathfindCost(tile);
        if (tentativeCost > maxCost) {
          continue;
        }

        const existing = this.nodes.get(neighborKey);
        if (!existing) {
          this.nodes.set(neighborKey, { coordinate: neighbor, totalCost: tentativeCost, predecessor: current });
          this.frontier.add(neighborKey);
        } else if (tentativeCost < existing.totalCost) {
          existing.totalCost = tentativeCost;
          existing.predecessor = current;
        }
      }

      current = this.popCheapest();
    }

    log.debug({ start: system.key(start), end: system.key(end), expanded: this.finalized.size }, 'no path');
    return { reason: 'unreachable' };
  }

  // Linear scan; the first of several equally cheap candidates wins
  private popCheapest(): C | undefined {
    let best: NodeRecord<C> | undefined;
    for (const key of this.frontier) {
      const node = this.requireNode(key);
      if (!best || node.totalCost < best.totalCost) {
        best = node;
      }
    }
    return best?.coordinate;
  }

  private reconstruct(system: CoordinateSystem<C>, end: C): C[] {
    const path: C[] = [];
    let cursor: C | undefined = end;
    while (cursor !== undefined) {
      path.push(cursor);
      cursor = this.requireNode(system.key(cursor)).predecessor;
    }
    return path.reverse();
  }

  private requireNode(key: string): NodeRecord<C> {
    const node = this.nodes.get(key);
    if (!node) {
      throw new PathfindingInvariantError(`No search node recorded for ${key}`);
    }
    return node;
  }
}

export function findPath<C, T extends PathfindTile>(
  map: TileMap<C, T>,
  start: C,
  end: C,
  options: PathfindingOptions = {}
): C[] | undefined {
  return new Pathfinder<C>().findPath(map, start, end, options);
}

export function planPath<C, T extends PathfindTile>(
  map: TileMap<C, T>,
  start: C,
  end: C,
  options: PathfindingOptions = {}
): PathResult<C> {
  return new Pathfinder<C>().planPath(map, start, end, options);
}

/** Cost of walking `path`: the sum of every entered tile's cost, the first tile excluded. */
export function pathCost<C, T extends PathfindTile>(map: TileMap<C, T>, path: C[]): number {
  let cost = 0;
  for (const coordinate of path.slice(1)) {
    const tile = map.get(coordinate);
    if (tile === undefined) {
      throw new Error(`Path leaves the map at ${map.system.key(coordinate)}`);
    }
    cost += tilePathfindCost(tile);
  }
  return cost;
}
