import { createRequire } from 'module';

import pino, { type TransportSingleOptions } from 'pino';

import { env } from '../../config/env.js';

let transport: TransportSingleOptions | undefined;

if (env.NODE_ENV === 'development') {
  try {
    const require = createRequire(import.meta.url);
    require.resolve('pino-pretty');
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
      },
    };
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('pino-pretty is not installed; falling back to JSON logs.', error);
  }
}

export const logger = pino({
  name: 'vampgotchi',
  level: env.LOG_LEVEL,
  transport,
});

/** Debug mode from the preferences file overrides the environment level. */
export const applyDebugMode = (debugMode: boolean) => {
  if (env.LOG_LEVEL === 'silent') return;
  logger.level = debugMode ? 'debug' : env.LOG_LEVEL;
};

export type Logger = typeof logger;
