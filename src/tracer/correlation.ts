import { v4 as uuidv4 } from 'uuid';
import type { CallRecord, CallRequest, CallResponse, RecordStatus } from './types.js';

export const DEFAULT_GRACE_MS = 30_000;

export interface CorrelationTrackerOptions {
  /** How long an entry may stay open before `sweep` abandons it */
  graceMs?: number;
  clock?: () => number;
}

interface PendingCall {
  request: CallRequest;
  startTime: number;
}

/**
 * Pairs each outgoing call with its response through a per-call correlation
 * id. Entries are keyed by id only, so concurrent calls to the same method
 * never share a slot.
 */
export class CorrelationTracker {
  private pendingCalls = new Map<string, PendingCall>();
  private graceMs: number;
  private clock: () => number;

  constructor(options: CorrelationTrackerOptions = {}) {
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.pendingCalls.size;
  }

  has(correlationId: string): boolean {
    return this.pendingCalls.has(correlationId);
  }

  open(request: CallRequest): string {
    const correlationId = uuidv4();
    this.pendingCalls.set(correlationId, { request, startTime: this.clock() });
    return correlationId;
  }

  /**
   * Pop the entry and pair it with its response. Returns undefined when the
   * entry is gone (already swept or drained), so a late response is dropped
   * rather than attached to the wrong record.
   */
  complete(correlationId: string, response: CallResponse): CallRecord | undefined {
    const pending = this.take(correlationId);
    if (!pending) return undefined;

    return {
      request: pending.request,
      response,
      durationMs: this.clock() - pending.startTime,
      status: 'completed',
    };
  }

  cancel(correlationId: string): CallRecord | undefined {
    return this.closeWithoutResponse(correlationId, 'cancelled');
  }

  /** The call finished, but its result could not be captured */
  discard(correlationId: string): CallRecord | undefined {
    return this.closeWithoutResponse(correlationId, 'unrecorded');
  }

  /** Abandon entries that have been open longer than the grace period */
  sweep(): CallRecord[] {
    const now = this.clock();
    const stale: CallRecord[] = [];

    for (const [correlationId, pending] of this.pendingCalls) {
      if (now - pending.startTime > this.graceMs) {
        this.pendingCalls.delete(correlationId);
        stale.push(this.abandoned(pending, now));
      }
    }

    return stale;
  }

  /** Abandon every entry still open */
  drain(): CallRecord[] {
    const now = this.clock();
    const remaining = [...this.pendingCalls.values()].map((pending) => this.abandoned(pending, now));
    this.pendingCalls.clear();
    return remaining;
  }

  private closeWithoutResponse(correlationId: string, status: RecordStatus): CallRecord | undefined {
    const pending = this.take(correlationId);
    if (!pending) return undefined;

    return {
      request: pending.request,
      response: null,
      durationMs: this.clock() - pending.startTime,
      status,
    };
  }

  private take(correlationId: string): PendingCall | undefined {
    const pending = this.pendingCalls.get(correlationId);
    if (pending) {
      this.pendingCalls.delete(correlationId);
    }
    return pending;
  }

  private abandoned(pending: PendingCall, now: number): CallRecord {
    return {
      request: pending.request,
      response: null,
      durationMs: now - pending.startTime,
      status: 'abandoned',
    };
  }
}
