import { fastify } from 'fastify';
import { z, ZodError } from 'zod';

import { loadTileMap, MapDocumentError, planPathOnMap, validatedStarterMaps } from '@tilegrid/data';
import type { LoadedMap } from '@tilegrid/data';

import { loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';

const pathRequestSchema = z
  .object({
    mapId: z.string().optional(),
    map: z.unknown().optional(),
    start: z.unknown(),
    end: z.unknown(),
    maxCost: z.number().nonnegative().optional()
  })
  .refine((body) => (body.mapId === undefined) !== (body.map === undefined), {
    message: 'provide exactly one of mapId or map'
  });

export function createServer(config: ServiceConfig = loadConfig()) {
  const app = fastify({
    logger: { level: config.logLevel }
  });

  const starterMaps = new Map<string, LoadedMap>();
  for (const document of validatedStarterMaps) {
    const loaded = loadTileMap(document);
    starterMaps.set(loaded.id, loaded);
  }

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid_request', issues: error.issues });
    }
    if (error instanceof MapDocumentError) {
      return reply.code(400).send({ error: 'invalid_map', message: error.message });
    }
    request.log.error(error);
    return reply.code(500).send({ error: 'internal_error' });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/maps', async () => ({ maps: Array.from(starterMaps.keys()) }));

  app.post('/path', async (request, reply) => {
    const body = pathRequestSchema.parse(request.body);

    let loaded: LoadedMap;
    if (body.mapId !== undefined) {
      const starter = starterMaps.get(body.mapId);
      if (!starter) {
        return reply.code(404).send({ error: 'map_not_found', mapId: body.mapId });
      }
      loaded = starter;
    } else {
      loaded = loadTileMap(body.map);
    }

    const result = planPathOnMap(loaded, body.start, body.end, { maxCost: body.maxCost });
    request.log.info({ mapId: loaded.id, success: result.success, cost: result.cost }, 'path planned');
    // JSON has no Infinity; an unreachable goal reports a null cost
    return { ...result, cost: result.success ? result.cost : null };
  });

  return app;
}

export async function startServer(config: ServiceConfig = loadConfig()) {
  const app = createServer(config);
  try {
    await app.listen({ port: config.port, host: config.host });
    return app;
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
