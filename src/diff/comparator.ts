import { canonicalize, formatReplayKey, replayKey, type ReplayKey } from '../replay/canonical.js';
import type { CallRecord, CallResponse, JsonValue, Session } from '../tracer/types.js';

export const LATENCY_THRESHOLD_PERCENT = 20;

export interface SessionComparison {
  baselineCalls: number;
  currentCalls: number;
  added: CallDiff[];
  removed: CallDiff[];
  changed: CallChange[];
  latencyChanges: LatencyChange[];
}

export interface CallDiff {
  key: ReplayKey;
  index: number;
}

export interface CallChange {
  key: ReplayKey;
  index: number;
  baseline: CallResponse | null;
  current: CallResponse | null;
  outcomeChanged: boolean;
  resultChanged: boolean;
}

export interface LatencyChange {
  key: ReplayKey;
  index: number;
  baselineLatency: number;
  currentLatency: number;
  changePercent: number;
}

interface KeyedCall {
  key: ReplayKey;
  call: CallRecord;
}

function responseBody(response: CallResponse | null): JsonValue {
  if (!response) return null;
  return response.success ? response.result : response.error;
}

/**
 * Compare two recordings call by call. Calls are paired by ReplayKey, and
 * repeated calls with the same key are paired in completion order.
 */
export function compareSessions(baseline: Session, current: Session): SessionComparison {
  const result: SessionComparison = {
    baselineCalls: baseline.calls.length,
    currentCalls: current.calls.length,
    added: [],
    removed: [],
    changed: [],
    latencyChanges: [],
  };

  const baselineByKey = groupByKey(baseline.calls);
  const currentByKey = groupByKey(current.calls);

  for (const [id, currentCalls] of currentByKey) {
    const baselineCalls = baselineByKey.get(id) ?? [];
    currentCalls.slice(baselineCalls.length).forEach((entry, offset) => {
      result.added.push({ key: entry.key, index: baselineCalls.length + offset });
    });
  }

  for (const [id, baselineCalls] of baselineByKey) {
    const currentCalls = currentByKey.get(id) ?? [];
    baselineCalls.slice(currentCalls.length).forEach((entry, offset) => {
      result.removed.push({ key: entry.key, index: currentCalls.length + offset });
    });

    const paired = Math.min(baselineCalls.length, currentCalls.length);
    for (let i = 0; i < paired; i++) {
      const { key, call: before } = baselineCalls[i];
      const after = currentCalls[i].call;

      const outcomeChanged = (before.response?.success ?? null) !== (after.response?.success ?? null);
      const resultChanged = canonicalize(responseBody(before.response)) !== canonicalize(responseBody(after.response));

      if (outcomeChanged || resultChanged) {
        result.changed.push({
          key,
          index: i,
          baseline: before.response,
          current: after.response,
          outcomeChanged,
          resultChanged,
        });
      }

      if (before.durationMs && after.durationMs !== null) {
        const changePercent = ((after.durationMs - before.durationMs) / before.durationMs) * 100;
        if (Math.abs(changePercent) > LATENCY_THRESHOLD_PERCENT) {
          result.latencyChanges.push({
            key,
            index: i,
            baselineLatency: before.durationMs,
            currentLatency: after.durationMs,
            changePercent,
          });
        }
      }
    }
  }

  return result;
}

function groupByKey(calls: readonly CallRecord[]): Map<string, KeyedCall[]> {
  const map = new Map<string, KeyedCall[]>();
  for (const call of calls) {
    const key = replayKey(call.request.method, call.request);
    const id = formatReplayKey(key);
    const existing = map.get(id) ?? [];
    existing.push({ key, call });
    map.set(id, existing);
  }
  return map;
}
