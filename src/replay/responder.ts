import type { McpSession } from '../capture/session.js';
import { ReplayMissError, ReplayedFailureError, ResponderStateError } from '../errors.js';
import { toJsonObject, decodeResult } from '../tracer/serialize.js';
import type { OperationName, OperationParams, OperationResults, Session } from '../tracer/types.js';
import { logger } from '../utils/logger.js';
import { formatReplayKey, replayKey } from './canonical.js';
import { ReplayIndex, buildReplayIndex } from './index-builder.js';

export type ResponderState = 'unstarted' | 'loaded' | 'serving' | 'stopped';

type CatalogOperation = 'initialize' | 'list_tools' | 'list_resources' | 'list_prompts';

/**
 * Answers the session contract from a ReplayIndex alone. Recorded successes
 * come back as recorded, recorded failures are thrown again, and anything
 * never recorded fails with ReplayMissError. Handshake and list operations
 * fall back to the catalog synthesized from the recorded calls.
 */
export class MockResponder implements McpSession {
  private index?: ReplayIndex;
  private currentState: ResponderState = 'unstarted';
  private served = 0;
  private misses = 0;

  get state(): ResponderState {
    return this.currentState;
  }

  get servedCount(): number {
    return this.served;
  }

  get missCount(): number {
    return this.misses;
  }

  get replayIndex(): ReplayIndex {
    if (!this.index) {
      throw new ResponderStateError('No replay index loaded');
    }
    return this.index;
  }

  load(source: ReplayIndex | readonly Session[]): this {
    if (this.currentState !== 'unstarted') {
      throw new ResponderStateError(`Cannot load a responder that is ${this.currentState}`);
    }
    this.index = source instanceof ReplayIndex ? source : buildReplayIndex(source);
    this.currentState = 'loaded';
    logger.info('Replay index loaded', { entries: this.index.size, methods: this.index.methods() });
    return this;
  }

  start(): this {
    if (this.currentState !== 'loaded') {
      throw new ResponderStateError(`Cannot start a responder that is ${this.currentState}`);
    }
    this.currentState = 'serving';
    return this;
  }

  stop(): void {
    if (this.currentState === 'stopped') return;
    this.currentState = 'stopped';
    logger.info('Responder stopped', { served: this.served, misses: this.misses });
  }

  async initialize(): Promise<OperationResults['initialize']> {
    return this.answerOrSynthesize('initialize', undefined, (index) => index.handshake);
  }

  async listTools(): Promise<OperationResults['list_tools']> {
    return this.answerOrSynthesize('list_tools', undefined, (index) => ({ tools: index.catalog.tools }));
  }

  async callTool(params: OperationParams['call_tool']): Promise<OperationResults['call_tool']> {
    return this.answer('call_tool', params);
  }

  async listResources(): Promise<OperationResults['list_resources']> {
    return this.answerOrSynthesize('list_resources', undefined, (index) => ({ resources: index.catalog.resources }));
  }

  async readResource(params: OperationParams['read_resource']): Promise<OperationResults['read_resource']> {
    return this.answer('read_resource', params);
  }

  async listPrompts(): Promise<OperationResults['list_prompts']> {
    return this.answerOrSynthesize('list_prompts', undefined, (index) => ({ prompts: index.catalog.prompts }));
  }

  async getPrompt(params: OperationParams['get_prompt']): Promise<OperationResults['get_prompt']> {
    return this.answer('get_prompt', params);
  }

  private serving(): ReplayIndex {
    if (this.currentState !== 'serving' || !this.index) {
      throw new ResponderStateError(`Responder is ${this.currentState}, not serving`);
    }
    return this.index;
  }

  private lookup<M extends OperationName>(method: M, params: OperationParams[M]): OperationResults[M] | ReplayMissError {
    const index = this.serving();
    const key = replayKey(method, { args: [], kwargs: toJsonObject(params) });
    const entry = index.lookup(key);

    if (!entry) {
      return new ReplayMissError(key);
    }

    this.served++;
    const { response } = entry;
    if (!response.success) {
      throw new ReplayedFailureError(method, response.error ?? 'Recorded call failed', response.errorCode);
    }
    return decodeResult(method, response.result);
  }

  private answer<M extends OperationName>(method: M, params: OperationParams[M]): OperationResults[M] {
    const result = this.lookup(method, params);
    if (result instanceof ReplayMissError) {
      this.misses++;
      logger.warn('Replay miss', { key: formatReplayKey(result.key) });
      throw result;
    }
    return result;
  }

  private answerOrSynthesize<M extends CatalogOperation>(
    method: M,
    params: OperationParams[M],
    synthesize: (index: ReplayIndex) => OperationResults[M]
  ): OperationResults[M] {
    const result = this.lookup(method, params);
    if (result instanceof ReplayMissError) {
      this.served++;
      // the catalog is frozen and shared between calls
      return structuredClone(synthesize(this.serving()));
    }
    return result;
  }
}
