import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { CallArguments, CallResponse, JsonObject, JsonValue, OperationName } from '../tracer/types.js';
import type { InterceptionProxy } from './proxy.js';

export type CallEvent =
  | { t: 'request'; method: OperationName; args: JsonValue[]; kwargs: JsonObject; timestamp: string }
  | {
      t: 'response';
      method: OperationName;
      success: boolean;
      result: JsonValue | null;
      error: string | null;
      timestamp: string;
    };

/**
 * Streams one NDJSON line per request and per response while a capture
 * runs, so a capture in progress can be followed with `tail -f`. The trace
 * file only receives a session once it is sealed.
 */
export class EventLog {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  /** Register this log's hooks on a proxy */
  attachTo(proxy: InterceptionProxy): void {
    proxy.addRequestHook((method, args) => this.request(method, args));
    proxy.addResponseHook((method, response) => this.response(method, response));
  }

  request(method: OperationName, args: CallArguments): void {
    this.write({ t: 'request', method, args: args.args, kwargs: args.kwargs, timestamp: new Date().toISOString() });
  }

  response(method: OperationName, response: CallResponse): void {
    this.write({
      t: 'response',
      method,
      success: response.success,
      result: response.result,
      error: response.error,
      timestamp: response.timestamp,
    });
  }

  private write(event: CallEvent): void {
    appendFileSync(this.path, JSON.stringify(event) + '\n');
  }
}
