import Database, { Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config/index.js';
import type { Call } from '../types/index.js';

interface CallRow {
  id: string;
  system_id: number;
  talkgroup_id: number;
  start_time: number;
  duration: number | null;
  filename: string | null;
  talkgroup_name: string | null;
  talkgroup_group: string | null;
  unit_radio_id: number | null;
  hash: string | null;
  created_at: number;
}

export interface StoredCall extends Call {
  readonly id: string;
  readonly systemId: number;
  readonly talkgroupId: number;
  readonly startTime: number;
  /** Epoch seconds the row was written */
  readonly createdAt: number;
}

export interface CallQuery {
  systemId?: number;
  talkgroupId?: number;
  /** Only calls starting strictly after this time */
  since?: number;
  limit?: number;
  offset?: number;
}

/** Ids to fall back on for records that omit them */
export interface CallDefaults {
  systemId?: number;
  talkgroupId?: number;
}

export function callId(systemId: number, talkgroupId: number, startTime: number, filename = ''): string {
  return `${systemId}-${talkgroupId}-${startTime}-${filename}`;
}

/**
 * Received calls in SQLite. Rows are keyed by system, talkgroup, start time
 * and filename, so saving the same call twice leaves one row.
 */
export class CallStore {
  readonly db: DatabaseType;

  constructor(path: string = config.database.path) {
    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS calls (
        id TEXT PRIMARY KEY,
        system_id INTEGER NOT NULL,
        talkgroup_id INTEGER NOT NULL,
        start_time INTEGER NOT NULL,
        duration REAL,
        filename TEXT,
        talkgroup_name TEXT,
        talkgroup_group TEXT,
        unit_radio_id INTEGER,
        hash TEXT,
        created_at INTEGER NOT NULL DEFAULT (unixepoch())
      );

      CREATE INDEX IF NOT EXISTS idx_calls_start_time ON calls(start_time DESC);
      CREATE INDEX IF NOT EXISTS idx_calls_talkgroup ON calls(system_id, talkgroup_id);
    `);
  }

  /**
   * Insert calls not stored yet; returns how many rows were added. Calls
   * without a system, talkgroup or start time are skipped.
   */
  saveCalls(calls: readonly Call[], defaults: CallDefaults = {}): number {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO calls (
        id, system_id, talkgroup_id, start_time, duration, filename,
        talkgroup_name, talkgroup_group, unit_radio_id, hash
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    let skipped = 0;
    const insertMany = this.db.transaction((batch: readonly Call[]) => {
      let inserted = 0;
      for (const call of batch) {
        const systemId = call.systemId ?? defaults.systemId;
        const talkgroupId = call.talkgroupId ?? defaults.talkgroupId;
        if (systemId === undefined || talkgroupId === undefined || call.startTime === undefined) {
          skipped++;
          continue;
        }
        const result = stmt.run(
          callId(systemId, talkgroupId, call.startTime, call.filename),
          systemId,
          talkgroupId,
          call.startTime,
          call.duration ?? null,
          call.filename ?? null,
          call.talkgroupName ?? null,
          call.talkgroupGroup ?? null,
          call.unitRadioId ?? null,
          call.hash ?? null
        );
        inserted += result.changes;
      }
      return inserted;
    });

    const inserted = insertMany(calls);
    if (skipped > 0) {
      console.warn(`[CallStore] Skipped ${skipped} calls without system, talkgroup or start time`);
    }
    return inserted;
  }

  /** Newest first */
  getCalls(query: CallQuery = {}): StoredCall[] {
    const { limit = 50, offset = 0, systemId, talkgroupId, since } = query;

    let sql = `SELECT * FROM calls WHERE 1=1`;
    const params: number[] = [];

    if (systemId !== undefined) {
      sql += ` AND system_id = ?`;
      params.push(systemId);
    }
    if (talkgroupId !== undefined) {
      sql += ` AND talkgroup_id = ?`;
      params.push(talkgroupId);
    }
    if (since !== undefined) {
      sql += ` AND start_time > ?`;
      params.push(since);
    }

    sql += ` ORDER BY start_time DESC, id LIMIT ? OFFSET ?`;
    params.push(limit, offset);

    return this.db.prepare<number[], CallRow>(sql).all(...params).map(rowToCall);
  }

  countCalls(query: Pick<CallQuery, 'systemId' | 'talkgroupId'> = {}): number {
    let sql = `SELECT COUNT(*) as count FROM calls WHERE 1=1`;
    const params: number[] = [];

    if (query.systemId !== undefined) {
      sql += ` AND system_id = ?`;
      params.push(query.systemId);
    }
    if (query.talkgroupId !== undefined) {
      sql += ` AND talkgroup_id = ?`;
      params.push(query.talkgroupId);
    }

    const row = this.db.prepare<number[], { count: number }>(sql).get(...params);
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function rowToCall(row: CallRow): StoredCall {
  return {
    id: row.id,
    systemId: row.system_id,
    talkgroupId: row.talkgroup_id,
    startTime: row.start_time,
    createdAt: row.created_at,
    ...(row.duration !== null && { duration: row.duration }),
    ...(row.filename !== null && { filename: row.filename }),
    ...(row.talkgroup_name !== null && { talkgroupName: row.talkgroup_name }),
    ...(row.talkgroup_group !== null && { talkgroupGroup: row.talkgroup_group }),
    ...(row.unit_radio_id !== null && { unitRadioId: row.unit_radio_id }),
    ...(row.hash !== null && { hash: row.hash }),
  };
}
