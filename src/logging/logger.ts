/**
 * Process logger.  Every module takes a `Logger` through its constructor
 * or dependency bag; nothing logs through a global.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { FulfillmentConfig } from '../config';

export type { Logger } from 'pino';

export function createLogger(config: Pick<FulfillmentConfig, 'logLevel'>): Logger {
  return pino({ name: 'smart-home-fulfillment', level: config.logLevel });
}
