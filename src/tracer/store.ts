import { closeSync, fstatSync, fsyncSync, mkdirSync, openSync, readFileSync, readSync, writeFileSync, writeSync } from 'fs';
import { dirname } from 'path';
import { PersistenceError, SessionStateError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { parseSessionLine, serializeSession } from './serialize.js';
import type { Session } from './types.js';

function assertSealed(session: Session): void {
  if (session.endedAt === null) {
    throw new SessionStateError(`Session ${session.sessionId} is still open and cannot be persisted`);
  }
}

/** True when the file is non-empty and its last byte is not a newline */
function endsMidLine(fd: number): boolean {
  const { size } = fstatSync(fd);
  if (size === 0) return false;

  const last = Buffer.alloc(1);
  readSync(fd, last, 0, 1, size - 1);
  return last[0] !== 0x0a;
}

/**
 * Appends sealed sessions to a JSONL trace file, one session per line.
 * Each append is synced before returning, so a crash can only damage the
 * line being written. A torn line left by an earlier crash is terminated
 * before the next record. One writer per file.
 */
export class TraceWriter {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  append(session: Session): void {
    assertSealed(session);
    const line = serializeSession(session) + '\n';

    let fd: number | undefined;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      fd = openSync(this.path, 'a+');
      writeSync(fd, endsMidLine(fd) ? '\n' + line : line);
      fsyncSync(fd);
    } catch (err) {
      throw new PersistenceError(this.path, 'Failed to append session', err);
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }

  /** Replace the file contents with the given sessions */
  writeAll(sessions: readonly Session[]): void {
    sessions.forEach(assertSealed);
    const content = sessions.map((session) => serializeSession(session) + '\n').join('');

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, content);
    } catch (err) {
      throw new PersistenceError(this.path, 'Failed to write trace file', err);
    }
  }
}

export interface ReadStats {
  parsed: number;
  skipped: number;
}

export class TraceReader {
  readonly path: string;
  private stats: ReadStats = { parsed: 0, skipped: 0 };

  constructor(path: string) {
    this.path = path;
  }

  get lastReadStats(): ReadStats {
    return { ...this.stats };
  }

  /**
   * Parse every session in the file. Each call re-reads the file. Lines that
   * fail to parse are skipped with a warning; a torn final line is expected
   * after a crash and is treated as absent.
   */
  readAll(): Session[] {
    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new PersistenceError(this.path, 'Failed to read trace file', err);
    }

    const lines = content.split('\n');
    const sessions: Session[] = [];
    this.stats = { parsed: 0, skipped: 0 };

    lines.forEach((line, index) => {
      if (line.trim() === '') return;

      try {
        sessions.push(parseSessionLine(line));
        this.stats.parsed++;
      } catch (err) {
        this.stats.skipped++;
        const isLast = lines.slice(index + 1).every((rest) => rest.trim() === '');
        logger.warn(isLast ? 'Skipping truncated final trace line' : 'Skipping malformed trace line', {
          path: this.path,
          line: index + 1,
          error: errorMessage(err),
        });
      }
    });

    return sessions;
  }

  readLatest(): Session | undefined {
    const sessions = this.readAll();
    return sessions[sessions.length - 1];
  }

  readById(sessionId: string): Session | undefined {
    return this.readAll().find((session) => session.sessionId === sessionId);
  }
}
