import { NoActiveSessionError } from '../errors.js';
import { SessionRecorder, type SessionRecorderOptions } from '../tracer/recorder.js';
import type { TraceWriter } from '../tracer/store.js';
import type { JsonObject, Session, SessionHandle } from '../tracer/types.js';
import { logger } from '../utils/logger.js';
import { InterceptionProxy } from './proxy.js';
import type { McpSession } from './session.js';

export interface CaptureControllerOptions extends SessionRecorderOptions {
  writer?: TraceWriter;
}

/**
 * Turns capture on and off around a live session: attaches the proxy,
 * opens and seals recording sessions, and hands sealed sessions to the
 * trace writer.
 */
export class CaptureController {
  readonly recorder: SessionRecorder;
  private writer?: TraceWriter;
  private proxy?: InterceptionProxy;
  private handle?: SessionHandle;

  constructor(options: CaptureControllerOptions = {}) {
    const { writer, ...recorderOptions } = options;
    this.recorder = new SessionRecorder(recorderOptions);
    this.writer = writer;
  }

  attach(session: McpSession): InterceptionProxy {
    this.proxy?.detach();
    this.proxy = new InterceptionProxy(session, this.recorder);
    return this.proxy;
  }

  detach(): void {
    this.proxy?.detach();
    this.proxy = undefined;
  }

  startCapture(serverInfo: JsonObject = {}, metadata: JsonObject = {}): SessionHandle {
    this.handle = this.recorder.start(serverInfo, metadata);
    logger.info('Capture started', { sessionId: this.handle.sessionId });
    return this.handle;
  }

  /** Seal the open session and append it to the trace file, if one is configured */
  finishCapture(): Session {
    if (!this.handle) {
      throw new NoActiveSessionError('finish capture');
    }

    const session = this.recorder.finish(this.handle);
    this.handle = undefined;

    const failed = session.calls.filter((call) => call.response && !call.response.success).length;
    const unanswered = session.calls.filter((call) => !call.response).length;

    if (this.writer) {
      this.writer.append(session);
      logger.info('Session saved', { path: this.writer.path, sessionId: session.sessionId });
    }

    logger.info(`Recorded ${session.calls.length} calls`, { failed, unanswered });
    return session;
  }
}
