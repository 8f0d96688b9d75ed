import { pino } from 'pino';

import { APP_ENV } from './config.js';

export const logger = pino({
  name: 'live-schedule',
  level: APP_ENV.LOG_LEVEL
});
