import { v4 as uuidv4 } from 'uuid';
import { NoActiveSessionError, SessionAlreadyOpenError, SessionStateError } from '../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { logger } from '../utils/logger.js';
import { CorrelationTracker, type CorrelationTrackerOptions } from './correlation.js';
import type { CallRecord, JsonObject, Session, SessionHandle } from './types.js';

export interface SessionRecorderOptions extends CorrelationTrackerOptions {
  idGenerator?: () => string;
}

interface OpenSession {
  handle: SessionHandle;
  serverInfo: JsonObject;
  metadata: JsonObject;
  calls: CallRecord[];
}

/**
 * Owns at most one open recording session and collects its CallRecords in
 * the order calls complete.
 */
export class SessionRecorder {
  readonly tracker: CorrelationTracker;
  private current: OpenSession | null = null;
  private idGenerator: () => string;

  constructor(options: SessionRecorderOptions = {}) {
    this.tracker = new CorrelationTracker(options);
    this.idGenerator = options.idGenerator ?? uuidv4;
  }

  get isRecording(): boolean {
    return this.current !== null;
  }

  get currentSessionId(): string | undefined {
    return this.current?.handle.sessionId;
  }

  get callCount(): number {
    return this.current?.calls.length ?? 0;
  }

  start(serverInfo: JsonObject = {}, metadata: JsonObject = {}): SessionHandle {
    if (this.current) {
      throw new SessionAlreadyOpenError(this.current.handle.sessionId);
    }

    const handle: SessionHandle = Object.freeze({
      sessionId: this.idGenerator(),
      startedAt: new Date().toISOString(),
    });
    this.current = { handle, serverInfo: { ...serverInfo }, metadata: { ...metadata }, calls: [] };
    logger.debug('Recording session started', { sessionId: handle.sessionId });
    return handle;
  }

  append(record: CallRecord): void {
    if (!this.current) {
      throw new NoActiveSessionError('append a call record');
    }
    this.current.calls.push(record);
  }

  finish(handle: SessionHandle): Session {
    const open = this.current;
    if (!open) {
      throw new NoActiveSessionError('finish recording');
    }
    if (open.handle.sessionId !== handle.sessionId) {
      throw new SessionStateError(
        `Handle for session ${handle.sessionId} does not match open session ${open.handle.sessionId}`
      );
    }

    const abandoned = this.tracker.drain();
    if (abandoned.length > 0) {
      logger.warn('Sealing session with calls still in flight', {
        sessionId: open.handle.sessionId,
        abandoned: abandoned.length,
      });
      open.calls.push(...abandoned);
    }

    this.current = null;

    const session: Session = {
      sessionId: open.handle.sessionId,
      serverInfo: open.serverInfo,
      calls: open.calls,
      startedAt: open.handle.startedAt,
      endedAt: new Date().toISOString(),
      metadata: open.metadata,
    };
    return deepFreeze(session);
  }
}
