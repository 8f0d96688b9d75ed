import { cleanEnv, num, str } from 'envalid';

export const APP_ENV = cleanEnv(process.env, {
  DATABASE_PATH: str({ default: './data/live-schedule.db', desc: 'SQLite database file (":memory:" for an ephemeral database)' }),
  LOG_LEVEL: str({
    default: 'info',
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    desc: 'Minimum pino log level'
  }),
  // Upper bound on streamers read when ranking by follower count
  STREAMER_LIST_LIMIT: num({ default: 10000, desc: 'Maximum streamers enumerated for follower ranking (default: 10000)' })
});
