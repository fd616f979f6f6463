import { config } from '../../config/index.js';
import type { Call, RawCallRecord } from '../../types/index.js';
import { isRecord } from '../broadcastify/http.js';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type NumericField = 'talkgroupId' | 'systemId' | 'duration' | 'startTime' | 'unitRadioId';
type TextField = 'filename' | 'talkgroupName' | 'talkgroupGroup' | 'hash';

type FieldSpec =
  | { field: NumericField; kind: 'number'; min?: number }
  | { field: TextField; kind: 'string' };

/** Upstream record key -> Call attribute */
export const CALL_FIELD_MAP: Readonly<Record<string, FieldSpec>> = {
  call_tg: { field: 'talkgroupId', kind: 'number' },
  call_duration: { field: 'duration', kind: 'number', min: 0 },
  ts: { field: 'startTime', kind: 'number' },
  filename: { field: 'filename', kind: 'string' },
  display: { field: 'talkgroupName', kind: 'string' },
  grouping: { field: 'talkgroupGroup', kind: 'string' },
  systemId: { field: 'systemId', kind: 'number' },
  call_src: { field: 'unitRadioId', kind: 'number' },
  hash: { field: 'hash', kind: 'string' },
};

export class CallParseError extends Error {
  constructor(
    message: string,
    readonly key?: string
  ) {
    super(message);
    this.name = 'CallParseError';
  }
}

function toNumber(key: string, value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new CallParseError(`Field "${key}" is not numeric: ${JSON.stringify(value)}`, key);
}

function toText(key: string, value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new CallParseError(`Field "${key}" is not text: ${JSON.stringify(value)}`, key);
}

/**
 * Build a Call from one upstream record. Unknown keys are ignored and
 * missing (or null) keys leave the attribute unset; a known key holding a
 * value of the wrong type throws CallParseError.
 */
export function parseCall(record: unknown): Call {
  if (!isRecord(record)) {
    throw new CallParseError(`Call record is not an object: ${JSON.stringify(record)}`);
  }

  const call: Mutable<Call> = {};
  for (const [key, spec] of Object.entries(CALL_FIELD_MAP)) {
    const value = record[key];
    if (value === undefined || value === null) continue;

    if (spec.kind === 'number') {
      const parsed = toNumber(key, value);
      if (spec.min !== undefined && parsed < spec.min) {
        throw new CallParseError(`Field "${key}" must be >= ${spec.min}, got ${parsed}`, key);
      }
      call[spec.field] = parsed;
    } else {
      call[spec.field] = toText(key, value);
    }
  }
  return call;
}

/**
 * Parse a batch of records, skipping (and logging) any that fail.
 */
export function parseCalls(records: readonly unknown[], source = 'calls'): Call[] {
  const calls: Call[] = [];
  records.forEach((record, index) => {
    try {
      calls.push(parseCall(record));
    } catch (error) {
      if (!(error instanceof CallParseError)) throw error;
      console.warn(`[Calls] Skipping ${source} record ${index}: ${error.message}`);
    }
  });
  return calls;
}

/** Convert a Call back to its upstream shape */
export function toRawCallRecord(call: Call): RawCallRecord {
  const record: RawCallRecord = {};
  for (const [key, spec] of Object.entries(CALL_FIELD_MAP)) {
    const value = call[spec.field];
    if (value !== undefined) {
      record[key] = value;
    }
  }
  return record;
}

/**
 * CDN URL of the call's audio, or null when the record lacks the hash,
 * system id or filename needed to build it.
 */
export function getMediaUrl(call: Call, cdnUrl: string = config.broadcastify.cdnUrl): string | null {
  if (call.hash === undefined || call.systemId === undefined || call.filename === undefined) {
    return null;
  }
  return `${cdnUrl.replace(/\/+$/, '')}/${call.hash}/${call.systemId}/${call.filename}.mp3`;
}

export function describeCall(call: Call): string {
  const parts = [
    `tg=${call.talkgroupId ?? '?'}`,
    `dur=${call.duration ?? '?'}s`,
    `start=${call.startTime ?? '?'}`,
    `fn=${call.filename ?? '?'}`,
    `tg_name=${call.talkgroupName ?? '?'}`,
    `tg_group=${call.talkgroupGroup ?? '?'}`,
    `sys=${call.systemId ?? '?'}`,
    `unit=${call.unitRadioId ?? '?'}`,
  ];
  return `Call(${parts.join(', ')})`;
}
