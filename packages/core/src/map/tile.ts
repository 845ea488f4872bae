/**
 * Anything stored in a {@link TileMap} that the pathfinder can walk onto.
 * `pathfindCost` is the cost of entering the tile; it must be non-negative and
 * defaults to 1.
 */
export interface PathfindTile {
  pathfindCost?: number;
}

export const DEFAULT_PATHFIND_COST = 1;

export function tilePathfindCost(tile: PathfindTile): number {
  return tile.pathfindCost ?? DEFAULT_PATHFIND_COST;
}
