#!/usr/bin/env tsx
/**
 * Archived Calls Script
 *
 * Fetches the 30-minute archive window for a talkgroup and prints each call
 * with its audio URL.
 *
 * Usage:
 *   npm run archive -- --system 7804 --talkgroup 2451
 *   npm run archive -- --system 7804 --talkgroup 2451 --time 2024-12-03T12:30:00Z
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { config } from '../config/index.js';
import { isBroadcastifyError } from '../errors/index.js';
import { withClient } from '../services/broadcastify/client.js';
import { describeCall, getMediaUrl } from '../services/calls/call.js';

const { values: args } = parseArgs({
  options: {
    system: { type: 'string', short: 's' },
    talkgroup: { type: 'string', short: 't' },
    time: { type: 'string' },
    'cache-dir': { type: 'string' },
    'no-cache': { type: 'boolean', default: false },
    help: { type: 'boolean', short: 'h' },
  },
});

if (args.help) {
  console.log(`
Archived Calls Script

Usage:
  npm run archive -- --system 7804 --talkgroup 2451     Calls from the current window
  npm run archive -- ... --time 1733229000              Window containing an epoch time (seconds)
  npm run archive -- ... --time 2024-12-03T12:30:00Z    Window containing an ISO date
  npm run archive -- ... --cache-dir .bc_cache          Cache directory (default: ${config.cache.dir})
  npm run archive -- ... --no-cache                     Do not read or write the cache file

Environment Variables:
  BCFY_USERNAME         Broadcastify username
  BCFY_PASSWORD         Broadcastify password
  BCFY_CREDENTIAL_KEY   Token from an earlier login (skips the login request)
  `);
  process.exit(0);
}

function parseId(value: string | undefined, name: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id)) {
    console.error(`--${name} must be an integer id`);
    process.exit(1);
  }
  return id;
}

function parseTime(value: string | undefined): number {
  if (!value) return Math.floor(Date.now() / 1000);
  if (/^\d+$/.test(value)) return parseInt(value, 10);

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    console.error(`Invalid --time: ${value}`);
    process.exit(1);
  }
  return Math.floor(ms / 1000);
}

async function main() {
  const systemId = parseId(args.system, 'system');
  const talkgroupId = parseId(args.talkgroup, 'talkgroup');
  const time = parseTime(args.time);

  await withClient({ cacheDir: args['cache-dir'], saveCache: !args['no-cache'] }, async (client) => {
    await client.login();

    const { calls, start, end } = await client.getArchivedCalls(systemId, talkgroupId, time);
    console.log(
      `\n${calls.length} calls for ${systemId}-${talkgroupId} between ${new Date(start * 1000).toISOString()} and ${new Date(end * 1000).toISOString()}\n`
    );

    for (const call of calls) {
      console.log(describeCall(call));
      console.log(`  ${getMediaUrl(call) ?? '(no audio url)'}`);
    }
  });
}

main().catch((error) => {
  console.error('Fatal error:', isBroadcastifyError(error) ? `${error.code}: ${error.message}` : error);
  process.exit(1);
});
