import { writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { compareSessions } from '../diff/comparator.js';
import { generateDiffReport } from '../diff/reporter.js';
import { errorMessage } from '../errors.js';
import { TraceReader } from '../tracer/store.js';
import type { Session } from '../tracer/types.js';

interface DiffOptions {
  baseline: string;
  current: string;
  output: string;
}

/**
 * Load the most recent session of a trace file
 */
function loadLatest(path: string, role: string): Session {
  let session: Session | undefined;
  try {
    session = new TraceReader(path).readLatest();
  } catch (err) {
    logger.error(`Failed to load ${role} trace`, { path, error: errorMessage(err) });
    process.exit(1);
  }

  if (!session) {
    logger.error(`No sessions in ${role} trace`, { path });
    process.exit(1);
  }
  return session;
}

export async function diffCommand(options: DiffOptions): Promise<void> {
  const { baseline, current, output } = options;

  logger.info('Loading traces', { baseline, current });
  const baselineSession = loadLatest(baseline, 'baseline');
  const currentSession = loadLatest(current, 'current');

  // Compare sessions
  logger.info('Comparing sessions');
  const comparison = compareSessions(baselineSession, currentSession);

  // Generate report
  const report = generateDiffReport(
    comparison,
    { path: baseline, sessionId: baselineSession.sessionId },
    { path: current, sessionId: currentSession.sessionId }
  );

  // Save report
  mkdirSync(dirname(output), { recursive: true });
  writeFileSync(output, report);
  logger.info(`Diff report saved to ${output}`);

  // Print summary
  console.error(`\nDiff Summary:`);
  console.error(`  Baseline calls: ${comparison.baselineCalls}`);
  console.error(`  Current calls: ${comparison.currentCalls}`);
  console.error(`  Added: ${comparison.added.length}`);
  console.error(`  Removed: ${comparison.removed.length}`);
  console.error(`  Changed: ${comparison.changed.length}`);
}
