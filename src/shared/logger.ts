import pino from 'pino';
import { LogLevelSchema } from './config.js';

// A bad CMDKIT_LOG_LEVEL must not break importing the library; loadConfig() reports it instead.
const level = LogLevelSchema.catch('warn').parse(process.env['CMDKIT_LOG_LEVEL']);

export const logger = pino(
  { name: 'cmdkit', level },
  pino.destination({ dest: 2, sync: true }),
);
