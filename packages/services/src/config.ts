import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  TILEGRID_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['TILEGRID_LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.parse(env);
  return { port: parsed.PORT, host: parsed.HOST, logLevel: parsed.TILEGRID_LOG_LEVEL };
}
