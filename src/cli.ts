#!/usr/bin/env node
/**
 * Minimal CLI for the live schedule core
 */

import 'dotenv/config';
import { parseISO, isValid } from 'date-fns';

import { createScheduleCore, createSqliteStores } from './index.js';
import { closeDb, getDb } from './db/index.js';
import { isPlatform, PLATFORMS, type Platform } from './domain/types.js';
import { logger } from './logger.js';
import { formatUserError } from './utils/error-formatter.js';
import { WEEK_DIRECTIONS } from './calendar/week.js';

const usage = `Live Schedule - predicts when streamers go live

Usage:
  live-schedule add-streamer <name> <platform=handle>...  Add a streamer (e.g. twitch=some_handle)
  live-schedule add-user <googleId> <email>          Register a user
  live-schedule follow <userId> <streamerId>         Follow a streamer
  live-schedule unfollow <userId> <streamerId>       Unfollow a streamer
  live-schedule heatmap <streamerId>                 Regenerate and print a streamer's heatmap
  live-schedule stats <streamerId>                   Activity statistics for the last year
  live-schedule record <streamerId> [iso] [platform] Record a live sample (default: now)
  live-schedule predict <streamerId> <day>           Most likely hour on a day (0 = Sunday)
  live-schedule view [userId] [week] [direction]     Custom or most-followed programme for a week
  live-schedule rank [limit]                         Streamers ranked by follower count
  live-schedule --help                               Show this help

Platforms: ${PLATFORMS.join(', ')}
Directions: ${WEEK_DIRECTIONS.join(', ')}`;

const args = process.argv.slice(2);
const command = args[0];

const print = (value: unknown): void => {
  console.log(
    JSON.stringify(value, (_key, inner: unknown) => (inner instanceof Map ? Object.fromEntries(inner) : inner), 2)
  );
};

function parseDate(value: string | undefined, label: string): Date {
  if (value === undefined) {
    return new Date();
  }
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new Error(`${label} must be an ISO-8601 date, got "${value}"`);
  }
  return parsed;
}

function parsePlatform(value: string | undefined): Platform | null {
  if (value === undefined) {
    return null;
  }
  if (!isPlatform(value)) {
    throw new Error(`platform must be one of ${PLATFORMS.join(', ')}, got "${value}"`);
  }
  return value;
}

function parseHandles(values: string[]): Partial<Record<Platform, string>> {
  const handles: Partial<Record<Platform, string>> = {};
  for (const value of values) {
    const [platform, handle] = value.split('=', 2);
    const parsed = parsePlatform(platform);
    if (parsed === null || !handle) {
      throw new Error(`handles are written platform=handle, got "${value}"`);
    }
    handles[parsed] = handle;
  }
  return handles;
}

function requireArg(value: string | undefined, name: string): string {
  if (value === undefined) {
    throw new Error(`${name} is required. Run live-schedule --help for usage.`);
  }
  return value;
}

async function main(): Promise<void> {
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    console.log(usage);
    return;
  }

  const core = createScheduleCore(createSqliteStores(getDb()));

  switch (command) {
    case 'add-streamer': {
      print(
        await core.streamers.addStreamer({
          name: requireArg(args[1], 'name'),
          handles: parseHandles(args.slice(2))
        })
      );
      return;
    }

    case 'add-user': {
      print(await core.users.createUser(requireArg(args[1], 'googleId'), requireArg(args[2], 'email')));
      return;
    }

    case 'follow': {
      await core.users.followStreamer(requireArg(args[1], 'userId'), requireArg(args[2], 'streamerId'));
      console.log('Followed');
      return;
    }

    case 'unfollow': {
      await core.users.unfollowStreamer(requireArg(args[1], 'userId'), requireArg(args[2], 'streamerId'));
      console.log('Unfollowed');
      return;
    }

    case 'heatmap': {
      print(await core.heatmaps.generateHeatmap(requireArg(args[1], 'streamerId')));
      return;
    }

    case 'stats': {
      print(await core.heatmaps.getActivityStats(requireArg(args[1], 'streamerId')));
      return;
    }

    case 'record': {
      const record = await core.heatmaps.recordActivity(
        requireArg(args[1], 'streamerId'),
        parseDate(args[2], 'timestamp'),
        parsePlatform(args[3])
      );
      print(record);
      return;
    }

    case 'predict': {
      const day = Number(requireArg(args[2], 'day'));
      print(await core.predictor.getPredictedLiveTime(requireArg(args[1], 'streamerId'), day));
      return;
    }

    case 'view': {
      const userId = args[1] ?? '';
      const week = core.calendar.navigateWeek(parseDate(args[2], 'week'), args[3] ?? '');
      const view = await core.calendar.getProgrammeCalendarView(userId, week);
      print({
        week: view.week,
        prevWeek: view.prevWeek,
        nextWeek: view.nextWeek,
        isCustom: view.isCustom,
        isGuestSession: view.isGuestSession,
        streamers: view.programme.streamers.map(s => ({ id: s.id, name: s.name })),
        entries: view.programme.entries
      });
      return;
    }

    case 'rank': {
      const limit = args[1] === undefined ? 0 : Number(args[1]);
      const ranked = await core.ranker.getStreamersRankedByFollowers(limit);
      print(ranked.map(r => ({ id: r.streamer.id, name: r.streamer.name, followers: r.followerCount })));
      return;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "live-schedule --help" for usage information');
      process.exitCode = 1;
  }
}

main()
  .catch((error: unknown) => {
    logger.debug({ err: error, command }, 'command failed');
    console.error(formatUserError(error, `running ${command ?? 'command'}`));
    process.exitCode = 1;
  })
  .finally(() => {
    closeDb();
  });
