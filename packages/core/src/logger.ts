import { pino } from 'pino';

export const logger = pino({
  name: 'tilegrid',
  level: process.env.TILEGRID_LOG_LEVEL ?? 'silent'
});
