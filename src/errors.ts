import type { ReplayKey } from './replay/canonical.js';

export type ErrorCode =
  | 'INSTRUMENTATION_FAILURE'
  | 'SESSION_STATE'
  | 'NO_ACTIVE_SESSION'
  | 'SESSION_ALREADY_OPEN'
  | 'RESPONDER_STATE'
  | 'PERSISTENCE'
  | 'TRACE_FORMAT'
  | 'REPLAY_MISS'
  | 'UPSTREAM'
  | 'REPLAYED_FAILURE';

export class McpTapeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A hook or logger threw while observing a call. Always caught and logged by
 * the proxy; never reaches the caller of the wrapped operation.
 */
export class InstrumentationFailure extends McpTapeError {
  readonly hook: string;

  constructor(hook: string, cause: unknown) {
    super('INSTRUMENTATION_FAILURE', `${hook} failed: ${errorMessage(cause)}`, { cause });
    this.hook = hook;
  }
}

export class SessionStateError extends McpTapeError {
  constructor(message: string, code: ErrorCode = 'SESSION_STATE') {
    super(code, message);
  }
}

export class NoActiveSessionError extends SessionStateError {
  constructor(operation: string) {
    super(`Cannot ${operation}: no recording session is open`, 'NO_ACTIVE_SESSION');
  }
}

export class SessionAlreadyOpenError extends SessionStateError {
  readonly openSessionId: string;

  constructor(openSessionId: string) {
    super(
      `Recording session ${openSessionId} is still open; finish it before starting another`,
      'SESSION_ALREADY_OPEN'
    );
    this.openSessionId = openSessionId;
  }
}

export class ResponderStateError extends SessionStateError {
  constructor(message: string) {
    super(message, 'RESPONDER_STATE');
  }
}

export class PersistenceError extends McpTapeError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('PERSISTENCE', `${message}: ${path}${cause ? ` (${errorMessage(cause)})` : ''}`, { cause });
    this.path = path;
  }
}

export class TraceFormatError extends McpTapeError {
  constructor(message: string, cause?: unknown) {
    super('TRACE_FORMAT', message, { cause });
  }
}

export class ReplayMissError extends McpTapeError {
  readonly key: ReplayKey;

  constructor(key: ReplayKey) {
    super('REPLAY_MISS', `No recorded response for ${key.method} ${key.signature}`);
    this.key = key;
  }
}

/**
 * Failure of the real wrapped call. The proxy re-throws the original error
 * object; this class exists for failures that are reconstructed from a trace.
 */
export class UpstreamError extends McpTapeError {
  constructor(message: string, code: ErrorCode = 'UPSTREAM') {
    super(code, message);
  }
}

export class ReplayedFailureError extends UpstreamError {
  readonly method: string;
  readonly upstreamCode?: number;

  constructor(method: string, message: string, upstreamCode?: number) {
    super(message, 'REPLAYED_FAILURE');
    this.method = method;
    this.upstreamCode = upstreamCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
