import type { CallResponse } from '../tracer/types.js';
import type { SessionComparison } from './comparator.js';

export interface ReportSource {
  path: string;
  sessionId: string;
}

export function generateDiffReport(
  comparison: SessionComparison,
  baseline: ReportSource,
  current: ReportSource
): string {
  const lines: string[] = [];

  lines.push('# Session Diff Report');
  lines.push('');
  lines.push(`Generated: ${new Date().toISOString()}`);
  lines.push('');
  lines.push(`- **Baseline:** ${baseline.path} (session ${baseline.sessionId})`);
  lines.push(`- **Current:** ${current.path} (session ${current.sessionId})`);
  lines.push('');

  // Summary
  lines.push('## Summary');
  lines.push('');
  lines.push(`| Metric | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Baseline calls | ${comparison.baselineCalls} |`);
  lines.push(`| Current calls | ${comparison.currentCalls} |`);
  lines.push(`| Added calls | ${comparison.added.length} |`);
  lines.push(`| Removed calls | ${comparison.removed.length} |`);
  lines.push(`| Changed calls | ${comparison.changed.length} |`);
  lines.push(`| Latency regressions | ${comparison.latencyChanges.filter((l) => l.changePercent > 0).length} |`);
  lines.push('');

  const hasChanges =
    comparison.added.length > 0 ||
    comparison.removed.length > 0 ||
    comparison.changed.length > 0;

  if (!hasChanges) {
    lines.push('**Status:** Replay-compatible. Every baseline call has the same recorded answer.');
    lines.push('');
    return lines.join('\n');
  }

  lines.push('**Status:** Changes detected - a mock built from the baseline will not answer the current session identically.');
  lines.push('');

  if (comparison.added.length > 0) {
    lines.push('## Added Calls');
    lines.push('');
    lines.push('Calls in current with no baseline recording (replay misses):');
    lines.push('');
    lines.push('| Method | Arguments |');
    lines.push('|--------|-----------|');
    for (const call of comparison.added) {
      lines.push(`| ${call.key.method} | \`${truncate(call.key.signature)}\` |`);
    }
    lines.push('');
  }

  if (comparison.removed.length > 0) {
    lines.push('## Removed Calls');
    lines.push('');
    lines.push('Calls recorded in baseline but not made in current:');
    lines.push('');
    lines.push('| Method | Arguments |');
    lines.push('|--------|-----------|');
    for (const call of comparison.removed) {
      lines.push(`| ${call.key.method} | \`${truncate(call.key.signature)}\` |`);
    }
    lines.push('');
  }

  if (comparison.changed.length > 0) {
    lines.push('## Changed Calls');
    lines.push('');

    for (const change of comparison.changed) {
      lines.push(`### ${change.key.method} \`${truncate(change.key.signature)}\` (call #${change.index + 1})`);
      lines.push('');
      if (change.outcomeChanged) {
        lines.push(`**Outcome changed:** ${outcome(change.baseline)} → ${outcome(change.current)}`);
        lines.push('');
      }
      lines.push('Baseline:');
      lines.push('```json');
      lines.push(JSON.stringify(change.baseline, null, 2));
      lines.push('```');
      lines.push('');
      lines.push('Current:');
      lines.push('```json');
      lines.push(JSON.stringify(change.current, null, 2));
      lines.push('```');
      lines.push('');
    }
  }

  if (comparison.latencyChanges.length > 0) {
    lines.push('## Latency Changes');
    lines.push('');
    lines.push('| Method | Baseline (ms) | Current (ms) | Change |');
    lines.push('|--------|---------------|--------------|--------|');
    for (const change of comparison.latencyChanges) {
      const direction = change.changePercent > 0 ? 'slower' : 'faster';
      lines.push(
        `| ${change.key.method} | ${change.baselineLatency} | ${change.currentLatency} | ${Math.abs(change.changePercent).toFixed(1)}% ${direction} |`
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}

function outcome(response: CallResponse | null): string {
  if (!response) return 'no response';
  return response.success ? 'success' : 'failure';
}

function truncate(text: string, maxLen = 60): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen - 3) + '...';
}
