import { z } from 'zod';
import { nanoid } from 'nanoid';

import {
  axialSystem,
  cubeSystem,
  doubledSystem,
  hexArea,
  offsetSystem,
  planPath,
  squareSystem,
  TileMap
} from '@tilegrid/core';
import type {
  AxialCoordinate,
  CoordinateSystem,
  CubeCoordinate,
  DoubledCoordinate,
  OffsetCoordinate,
  PathfindingOptions,
  PathResult,
  SquareCoordinate
} from '@tilegrid/core';

export class MapDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MapDocumentError';
  }
}

export type MapLayout = 'axial' | 'cube' | 'offset' | 'doubled' | 'square';

export interface MapTile {
  pathfindCost: number;
  terrain?: string;
}

export interface TileSpec<C> {
  at: C;
  cost?: number;
  terrain?: string;
}

interface MapDocumentBase {
  id?: string;
  name?: string;
  /** Cost applied to tiles that do not set their own */
  defaultCost?: number;
}

export type MapDocument =
  | (MapDocumentBase & { layout: 'axial'; tiles: TileSpec<AxialCoordinate>[] })
  | (MapDocumentBase & { layout: 'cube'; tiles: TileSpec<CubeCoordinate>[] })
  | (MapDocumentBase & { layout: 'offset'; tiles: TileSpec<OffsetCoordinate>[] })
  | (MapDocumentBase & { layout: 'doubled'; tiles: TileSpec<DoubledCoordinate>[] })
  | (MapDocumentBase & { layout: 'square'; tiles: TileSpec<SquareCoordinate>[] });

export type LoadedMap =
  | { id: string; layout: 'axial'; map: TileMap<AxialCoordinate, MapTile> }
  | { id: string; layout: 'cube'; map: TileMap<CubeCoordinate, MapTile> }
  | { id: string; layout: 'offset'; map: TileMap<OffsetCoordinate, MapTile> }
  | { id: string; layout: 'doubled'; map: TileMap<DoubledCoordinate, MapTile> }
  | { id: string; layout: 'square'; map: TileMap<SquareCoordinate, MapTile> };

// Coordinates stay within the safe integer range so distinct inputs stay distinct
const gridIndex = () => z.number().int().safe();

export const axialCoordinateSchema = z.object({
  q: gridIndex(),
  r: gridIndex()
});

export const cubeCoordinateSchema = z
  .object({
    q: gridIndex(),
    r: gridIndex(),
    s: gridIndex()
  })
  .refine((c) => c.q + c.r + c.s === 0, { message: 'cube coordinates must satisfy q + r + s = 0' });

export const offsetCoordinateSchema = z.object({
  col: gridIndex(),
  row: gridIndex()
});

export const doubledCoordinateSchema = z
  .object({
    col: gridIndex(),
    row: gridIndex()
  })
  .refine((c) => (c.col + c.row) % 2 === 0, { message: 'doubled coordinates must have an even col + row' });

export const squareCoordinateSchema = z.object({
  x: gridIndex(),
  y: gridIndex()
});

const tileSpecSchema = <S extends z.ZodTypeAny>(at: S) =>
  z.object({
    at,
    cost: z.number().nonnegative().optional(),
    terrain: z.string().optional()
  });

const documentBase = {
  id: z.string().min(1).optional(),
  name: z.string().optional(),
  defaultCost: z.number().nonnegative().optional()
};

const mapDocumentSchema = z.discriminatedUnion('layout', [
  z.object({ ...documentBase, layout: z.literal('axial'), tiles: z.array(tileSpecSchema(axialCoordinateSchema)) }),
  z.object({ ...documentBase, layout: z.literal('cube'), tiles: z.array(tileSpecSchema(cubeCoordinateSchema)) }),
  z.object({ ...documentBase, layout: z.literal('offset'), tiles: z.array(tileSpecSchema(offsetCoordinateSchema)) }),
  z.object({ ...documentBase, layout: z.literal('doubled'), tiles: z.array(tileSpecSchema(doubledCoordinateSchema)) }),
  z.object({ ...documentBase, layout: z.literal('square'), tiles: z.array(tileSpecSchema(squareCoordinateSchema)) })
]);

export function parseMapDocument(raw: unknown): MapDocument {
  return mapDocumentSchema.parse(raw);
}

function buildTileMap<C>(
  id: string,
  system: CoordinateSystem<C>,
  tiles: TileSpec<C>[],
  defaultCost: number
): TileMap<C, MapTile> {
  const map = new TileMap<C, MapTile>(system);
  for (const spec of tiles) {
    if (map.contains(spec.at)) {
      throw new MapDocumentError(`Duplicate tile at ${system.key(spec.at)} in map ${id}`);
    }
    map.insert(spec.at, { pathfindCost: spec.cost ?? defaultCost, terrain: spec.terrain });
  }
  return map;
}

/**
 * Validates a raw map document and builds its tile map. Documents without an id
 * are given a random one.
 */
export function loadTileMap(raw: unknown): LoadedMap {
  const document = parseMapDocument(raw);
  const id = document.id ?? `map-${nanoid(8)}`;
  const defaultCost = document.defaultCost ?? 1;

  switch (document.layout) {
    case 'axial':
      return { id, layout: 'axial', map: buildTileMap(id, axialSystem, document.tiles, defaultCost) };
    case 'cube':
      return { id, layout: 'cube', map: buildTileMap(id, cubeSystem, document.tiles, defaultCost) };
    case 'offset':
      return { id, layout: 'offset', map: buildTileMap(id, offsetSystem, document.tiles, defaultCost) };
    case 'doubled':
      return { id, layout: 'doubled', map: buildTileMap(id, doubledSystem, document.tiles, defaultCost) };
    case 'square':
      return { id, layout: 'square', map: buildTileMap(id, squareSystem, document.tiles, defaultCost) };
  }
}

export type AnyPathResult =
  | PathResult<AxialCoordinate>
  | PathResult<CubeCoordinate>
  | PathResult<OffsetCoordinate>
  | PathResult<DoubledCoordinate>
  | PathResult<SquareCoordinate>;

/**
 * Plans a path on a loaded map, validating the endpoints against the map's layout.
 */
export function planPathOnMap(
  loaded: LoadedMap,
  start: unknown,
  end: unknown,
  options: PathfindingOptions = {}
): AnyPathResult {
  switch (loaded.layout) {
    case 'axial':
      return planPath(loaded.map, axialCoordinateSchema.parse(start), axialCoordinateSchema.parse(end), options);
    case 'cube':
      return planPath(loaded.map, cubeCoordinateSchema.parse(start), cubeCoordinateSchema.parse(end), options);
    case 'offset':
      return planPath(loaded.map, offsetCoordinateSchema.parse(start), offsetCoordinateSchema.parse(end), options);
    case 'doubled':
      return planPath(loaded.map, doubledCoordinateSchema.parse(start), doubledCoordinateSchema.parse(end), options);
    case 'square':
      return planPath(loaded.map, squareCoordinateSchema.parse(start), squareCoordinateSchema.parse(end), options);
  }
}

const makeHexMap = (
  id: string,
  name: string,
  radius: number,
  decorate: (at: AxialCoordinate) => Omit<TileSpec<AxialCoordinate>, 'at'>
): MapDocument => ({
  id,
  name,
  layout: 'axial',
  tiles: hexArea({ q: 0, r: 0 }, radius).map((at) => ({ at, ...decorate(at) }))
});

const roadCoordinates: AxialCoordinate[] = [
  { q: -2, r: 2 },
  { q: -2, r: 1 },
  { q: -1, r: 0 },
  { q: 0, r: 0 },
  { q: 0, r: 1 },
  { q: 1, r: 1 },
  { q: 2, r: 0 },
  { q: 2, r: -1 },
  { q: 2, r: -2 }
];

const isRoad = (at: AxialCoordinate) => roadCoordinates.some((road) => road.q === at.q && road.r === at.r);

export const starterMaps: MapDocument[] = [
  makeHexMap('open-field', 'Open Field', 2, () => ({ terrain: 'plain' })),
  makeHexMap('road-through-ground', 'Road Through Rough Ground', 3, (at) =>
    isRoad(at) ? { terrain: 'road', cost: 1 } : { terrain: 'ground', cost: 5 }
  ),
  {
    id: 'islands',
    name: 'Islands',
    layout: 'axial',
    tiles: [
      { at: { q: 0, r: 0 }, terrain: 'plain' },
      { at: { q: 4, r: -2 }, terrain: 'plain' }
    ]
  }
];

export const validatedStarterMaps = starterMaps.map((document) => parseMapDocument(document));
