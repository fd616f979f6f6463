import { vi } from 'vitest';
import type { Clock } from '../utils/clock.js';
import type { FetchLike, HttpResponse } from '../services/broadcastify/http.js';

/**
 * Manually driven clock. sleep() records the requested delay and, unless
 * frozen, moves time forward by that amount.
 */
export class FakeClock implements Clock {
  sleeps: number[] = [];

  constructor(
    public time = 0,
    private frozen = false
  ) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (!this.frozen) {
      this.time += ms;
    }
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: new Headers({ 'content-type': 'application/json' }),
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

export function htmlResponse(html: string, status = 200, headers: Record<string, string> = {}): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: new Headers({ 'content-type': 'text/html', ...headers }),
    json: async () => JSON.parse(html),
    text: async () => html,
  };
}

export function createMockFetch() {
  return vi.fn<FetchLike>();
}
