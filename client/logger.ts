import pino, { Logger } from 'pino';

import { ClientConfig } from './config';

export type { Logger };

export function buildLogger(config: Pick<ClientConfig, 'logLevel' | 'loggerName'>): Logger {
  return pino({ name: config.loggerName, level: config.logLevel });
}
