import { InstrumentationFailure, errorMessage } from '../errors.js';
import type { SessionRecorder } from '../tracer/recorder.js';
import { encodeResult, toJsonObject } from '../tracer/serialize.js';
import type {
  CallArguments,
  CallRecord,
  CallResponse,
  OperationName,
  OperationParams,
  OperationResults,
  TaggedResult,
} from '../tracer/types.js';
import { logger } from '../utils/logger.js';
import type { CallOptions, McpSession } from './session.js';

export type RequestHook = (method: OperationName, args: CallArguments) => void | Promise<void>;
export type ResponseHook = (method: OperationName, response: CallResponse) => void | Promise<void>;

function upstreamCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Wraps a live session and records every call made through it while the
 * recorder has a session open. Results and errors of the wrapped session
 * reach the caller untouched; failures of the bookkeeping itself are logged
 * and dropped.
 */
export class InterceptionProxy implements McpSession {
  private target: McpSession;
  private recorder: SessionRecorder;
  private requestHooks: RequestHook[] = [];
  private responseHooks: ResponseHook[] = [];
  private attached = true;

  constructor(target: McpSession, recorder: SessionRecorder) {
    this.target = target;
    this.recorder = recorder;
  }

  get isInstrumenting(): boolean {
    return this.attached && this.recorder.isRecording;
  }

  attach(): void {
    this.attached = true;
  }

  detach(): void {
    this.attached = false;
  }

  /** Runs before each recorded call, in registration order. Hooks get their own copy of the arguments. */
  addRequestHook(hook: RequestHook): void {
    this.requestHooks.push(hook);
  }

  /** Runs after each recorded call settles, success or failure */
  addResponseHook(hook: ResponseHook): void {
    this.responseHooks.push(hook);
  }

  initialize(options?: CallOptions): Promise<OperationResults['initialize']> {
    return this.intercept('initialize', undefined, options, () => this.target.initialize(options));
  }

  listTools(options?: CallOptions): Promise<OperationResults['list_tools']> {
    return this.intercept('list_tools', undefined, options, () => this.target.listTools(options));
  }

  callTool(params: OperationParams['call_tool'], options?: CallOptions): Promise<OperationResults['call_tool']> {
    return this.intercept('call_tool', params, options, () => this.target.callTool(params, options));
  }

  listResources(options?: CallOptions): Promise<OperationResults['list_resources']> {
    return this.intercept('list_resources', undefined, options, () => this.target.listResources(options));
  }

  readResource(params: OperationParams['read_resource'], options?: CallOptions): Promise<OperationResults['read_resource']> {
    return this.intercept('read_resource', params, options, () => this.target.readResource(params, options));
  }

  listPrompts(options?: CallOptions): Promise<OperationResults['list_prompts']> {
    return this.intercept('list_prompts', undefined, options, () => this.target.listPrompts(options));
  }

  getPrompt(params: OperationParams['get_prompt'], options?: CallOptions): Promise<OperationResults['get_prompt']> {
    return this.intercept('get_prompt', params, options, () => this.target.getPrompt(params, options));
  }

  private async intercept<M extends OperationName>(
    method: M,
    params: OperationParams[M],
    options: CallOptions | undefined,
    invoke: () => Promise<OperationResults[M]>
  ): Promise<OperationResults[M]> {
    if (!this.isInstrumenting) {
      return invoke();
    }

    const correlationId = this.guard('request capture', () => this.openCall(method, params));

    let result: OperationResults[M];
    try {
      result = await invoke();
    } catch (err) {
      if (correlationId !== undefined) {
        if (isCancellation(err, options?.signal)) {
          logger.debug('Call cancelled', { method, correlationId });
          this.guard('cancellation capture', () => this.settle(correlationId, this.recorder.tracker.cancel(correlationId)));
        } else {
          const code = upstreamCode(err);
          this.closeCall(method, correlationId, {
            success: false,
            result: null,
            error: errorMessage(err),
            ...(code !== undefined ? { errorCode: code } : {}),
            timestamp: new Date().toISOString(),
          });
        }
      }
      throw err;
    }

    if (correlationId !== undefined) {
      let encoded: TaggedResult | undefined;
      try {
        encoded = encodeResult(method, result);
      } catch (err) {
        this.report(new InstrumentationFailure('response capture', err));
        this.discardCall(method, correlationId, errorMessage(err));
      }

      if (encoded) {
        this.closeCall(method, correlationId, {
          success: true,
          result: encoded,
          error: null,
          timestamp: new Date().toISOString(),
        });
      }
    }

    return result;
  }

  private openCall<M extends OperationName>(method: M, params: OperationParams[M]): string {
    const args: CallArguments = { args: [], kwargs: toJsonObject(params) };
    this.notify('request hook', this.requestHooks, (hook) => hook(method, structuredClone(args)));

    const tracker = this.recorder.tracker;
    const correlationId = tracker.open({ method, ...args, timestamp: new Date().toISOString() });
    logger.debug('Call started', { method, correlationId, kwargs: args.kwargs });

    const stale = tracker.sweep();
    if (stale.length > 0) {
      logger.warn('Abandoning calls open past the grace period', { count: stale.length });
      stale.forEach((record) => this.recorder.append(record));
    }

    return correlationId;
  }

  private closeCall(method: OperationName, correlationId: string, response: CallResponse): void {
    logger.debug('Call finished', {
      method,
      correlationId,
      success: response.success,
      ...(response.error !== null ? { error: response.error } : {}),
    });
    this.guard('response capture', () => this.settle(correlationId, this.recorder.tracker.complete(correlationId, response)));
    this.notify('response hook', this.responseHooks, (hook) => hook(method, structuredClone(response)));
  }

  /** Keep the call in the session without a response when its result cannot be stored */
  private discardCall(method: OperationName, correlationId: string, reason: string): void {
    logger.debug('Call finished without a recordable result', { method, correlationId, reason });
    this.guard('response capture', () => this.settle(correlationId, this.recorder.tracker.discard(correlationId)));

    const response: CallResponse = {
      success: true,
      result: null,
      error: `Result not recorded: ${reason}`,
      timestamp: new Date().toISOString(),
    };
    this.notify('response hook', this.responseHooks, (hook) => hook(method, response));
  }

  private settle(correlationId: string, record: CallRecord | undefined): void {
    if (!record) {
      logger.warn('Dropping response for a call no longer tracked', { correlationId });
      return;
    }
    this.recorder.append(record);
  }

  private notify<H>(label: string, hooks: H[], run: (hook: H) => void | Promise<void>): void {
    for (const hook of hooks) {
      try {
        const pending = run(hook);
        if (pending instanceof Promise) {
          void pending.catch((err: unknown) => this.report(new InstrumentationFailure(label, err)));
        }
      } catch (err) {
        this.report(new InstrumentationFailure(label, err));
      }
    }
  }

  private guard<T>(label: string, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (err) {
      this.report(new InstrumentationFailure(label, err));
      return undefined;
    }
  }

  private report(failure: InstrumentationFailure): void {
    logger.warn('Instrumentation failure', { hook: failure.hook, error: errorMessage(failure.cause) });
  }
}
