import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { summarizeSession, type SessionSummary } from '../server/routes/sessions.js';
import { TraceReader } from '../tracer/store.js';
import { logger } from '../utils/logger.js';

interface SessionsOptions {
  trace?: string;
}

export function sessionsCommand(options: SessionsOptions): void {
  const config = loadConfig();
  const reader = new TraceReader(options.trace ?? config.traceFile);

  let summaries: SessionSummary[];
  try {
    summaries = reader.readAll().map(summarizeSession);
  } catch (err) {
    logger.error('Failed to load trace', { path: reader.path, error: errorMessage(err) });
    process.exit(1);
  }

  if (summaries.length === 0) {
    console.log(`No sessions in ${reader.path}`);
    return;
  }

  console.log(`Sessions in ${reader.path}:\n`);
  for (const summary of summaries) {
    const label = typeof summary.serverInfo.name === 'string' ? summary.serverInfo.name : 'unknown server';
    console.log(`  ${summary.sessionId}  ${summary.startedAt}  ${label}`);
    console.log(`    calls: ${summary.totalCalls}  errors: ${summary.totalErrors}  unanswered: ${summary.unanswered}`);
  }

  const { skipped } = reader.lastReadStats;
  if (skipped > 0) {
    console.log(`\n  ${skipped} unreadable line(s) skipped`);
  }
}
