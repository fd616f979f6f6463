#!/usr/bin/env tsx
/**
 * Live Calls Script
 *
 * Follows a talkgroup's live calls, printing each one as it arrives and
 * optionally recording it in the SQLite call store.
 *
 * Usage:
 *   npm run live -- --system 7804 --talkgroup 2451
 *   npm run live -- --system 7804 --talkgroup 2451 --db
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { config } from '../config/index.js';
import { isBroadcastifyError } from '../errors/index.js';
import { CallStore } from '../db/index.js';
import { withClient } from '../services/broadcastify/client.js';
import { describeCall, getMediaUrl } from '../services/calls/call.js';
import { createStopSignal } from '../utils/stop-signal.js';

const { values: args } = parseArgs({
  options: {
    system: { type: 'string', short: 's' },
    talkgroup: { type: 'string', short: 't' },
    db: { type: 'boolean', default: false },
    'db-path': { type: 'string' },
    help: { type: 'boolean', short: 'h' },
  },
});

if (args.help) {
  console.log(`
Live Calls Script

Usage:
  npm run live -- --system 7804 --talkgroup 2451    Print live calls until interrupted
  npm run live -- ... --db                          Also store calls (default: ${config.database.path})
  npm run live -- ... --db-path ./calls.db          Store calls in another database file

Polls are spaced by BCFY_RATE_LIVE_MS (default: 5000). Stop with Ctrl+C; press it twice to exit at once.

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

async function main() {
  const systemId = parseId(args.system, 'system');
  const talkgroupId = parseId(args.talkgroup, 'talkgroup');
  const store = args.db || args['db-path'] ? new CallStore(args['db-path']) : null;

  const stop = createStopSignal();
  process.on('SIGINT', stop.handle);
  process.on('SIGTERM', stop.handle);

  try {
    await withClient({}, async (client) => {
      await client.login();

      const session = client.createLiveSession(systemId, talkgroupId);
      session.on('update', (calls) => {
        for (const call of calls) {
          console.log(describeCall(call));
          console.log(`  ${getMediaUrl(call) ?? '(no audio url)'}`);
        }
        if (store && calls.length > 0) {
          const added = store.saveCalls(calls, { systemId, talkgroupId });
          console.log(`[CallStore] Stored ${added} new calls`);
        }
      });

      await session.initSession();
      console.log(`Following ${systemId}-${talkgroupId} from position ${session.position}`);

      while (!stop.stopping) {
        await session.poll();
      }

      console.log(`Received ${session.calls.length} calls`);
    });
  } finally {
    store?.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', isBroadcastifyError(error) ? `${error.code}: ${error.message}` : error);
  process.exit(1);
});
