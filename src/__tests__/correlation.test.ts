import { describe, it, expect } from 'vitest';
import { CorrelationTracker } from '../tracer/correlation.js';
import type { CallRequest, CallResponse } from '../tracer/types.js';

function request(name: string): CallRequest {
  return { method: 'call_tool', args: [], kwargs: { name }, timestamp: '2026-01-05T10:00:00.000Z' };
}

function response(text: string): CallResponse {
  return { success: true, result: text, error: null, timestamp: '2026-01-05T10:00:01.000Z' };
}

describe('CorrelationTracker', () => {
  it('pairs responses with their own requests regardless of completion order', () => {
    let now = 1000;
    const tracker = new CorrelationTracker({ clock: () => now });

    const slow = tracker.open(request('slow'));
    now = 1010;
    const fast = tracker.open(request('fast'));
    now = 1050;

    const fastRecord = tracker.complete(fast, response('fast done'));
    now = 1200;
    const slowRecord = tracker.complete(slow, response('slow done'));

    expect(fastRecord).toMatchObject({ request: { kwargs: { name: 'fast' } }, durationMs: 40, status: 'completed' });
    expect(fastRecord?.response?.result).toBe('fast done');
    expect(slowRecord).toMatchObject({ request: { kwargs: { name: 'slow' } }, durationMs: 200, status: 'completed' });
    expect(tracker.size).toBe(0);
  });

  it('issues a distinct id for every call', () => {
    const tracker = new CorrelationTracker();
    const ids = new Set(Array.from({ length: 100 }, () => tracker.open(request('same'))));
    expect(ids.size).toBe(100);
  });

  it('drops a response whose entry is gone', () => {
    const tracker = new CorrelationTracker();
    const id = tracker.open(request('once'));

    expect(tracker.complete(id, response('first'))).toBeDefined();
    expect(tracker.complete(id, response('second'))).toBeUndefined();
    expect(tracker.complete('unknown', response('x'))).toBeUndefined();
  });

  it('records a cancelled call with no response', () => {
    let now = 0;
    const tracker = new CorrelationTracker({ clock: () => now });
    const id = tracker.open(request('wait'));
    now = 25;

    expect(tracker.cancel(id)).toEqual({ request: request('wait'), response: null, durationMs: 25, status: 'cancelled' });
    expect(tracker.has(id)).toBe(false);
  });

  it('closes a call whose result was not captured as unrecorded', () => {
    let now = 0;
    const tracker = new CorrelationTracker({ clock: () => now });
    const id = tracker.open(request('cyclic'));
    now = 7;

    expect(tracker.discard(id)).toEqual({ request: request('cyclic'), response: null, durationMs: 7, status: 'unrecorded' });
    expect(tracker.discard(id)).toBeUndefined();
  });

  it('abandons only entries older than the grace period', () => {
    let now = 0;
    const tracker = new CorrelationTracker({ graceMs: 100, clock: () => now });
    const old = tracker.open(request('old'));
    now = 60;
    const recent = tracker.open(request('recent'));
    now = 101;

    const stale = tracker.sweep();

    expect(stale).toHaveLength(1);
    expect(stale[0]).toMatchObject({ request: { kwargs: { name: 'old' } }, response: null, durationMs: 101, status: 'abandoned' });
    expect(tracker.has(old)).toBe(false);
    expect(tracker.has(recent)).toBe(true);
  });

  it('drains every open entry', () => {
    const tracker = new CorrelationTracker();
    tracker.open(request('a'));
    tracker.open(request('b'));

    const drained = tracker.drain();
    expect(drained.map((record) => record.status)).toEqual(['abandoned', 'abandoned']);
    expect(tracker.size).toBe(0);
  });
});
