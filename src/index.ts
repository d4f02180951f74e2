export type {
  CallArguments,
  CallRecord,
  CallRequest,
  CallResponse,
  JsonObject,
  JsonValue,
  OperationName,
  OperationParams,
  OperationResults,
  RecordStatus,
  Session,
  SessionHandle,
} from './tracer/types.js';
export { OPERATIONS, RECORD_STATUSES, isOperationName } from './tracer/types.js';
export { CorrelationTracker, DEFAULT_GRACE_MS } from './tracer/correlation.js';
export { SessionRecorder } from './tracer/recorder.js';
export type { SessionRecorderOptions } from './tracer/recorder.js';
export { TraceReader, TraceWriter } from './tracer/store.js';
export { decodeResult, encodeResult, parseSessionLine, serializeSession } from './tracer/serialize.js';

export type { CallOptions, McpSession } from './capture/session.js';
export { SdkSession } from './capture/session.js';
export { InterceptionProxy } from './capture/proxy.js';
export type { RequestHook, ResponseHook } from './capture/proxy.js';
export { CaptureController } from './capture/controller.js';
export { EventLog } from './capture/events.js';
export type { CallEvent } from './capture/events.js';
export { loadCallPlan, planSampleCalls, sampleArguments } from './capture/plan.js';
export type { PlannedCall } from './capture/plan.js';

export { bindArguments, canonicalize, formatReplayKey, replayKey } from './replay/canonical.js';
export type { ReplayKey } from './replay/canonical.js';
export { ReplayIndex, buildReplayIndex } from './replay/index-builder.js';
export type { ReplayCatalog, ReplayEntry, ReplayIndexStats } from './replay/index-builder.js';
export { MockResponder } from './replay/responder.js';
export type { ResponderState } from './replay/responder.js';
export { createReplayServer, serveReplay, serveStdio } from './replay/server.js';

export { compareSessions } from './diff/comparator.js';
export type { SessionComparison, CallDiff, CallChange, LatencyChange } from './diff/comparator.js';
export { generateDiffReport } from './diff/reporter.js';

export { createApp, startServer } from './server/index.js';
export { loadConfig, parsePort } from './config.js';
export type { TapeConfig } from './config.js';
export * from './errors.js';
