import { z } from 'zod';
import {
  CallToolResultSchema,
  GetPromptResultSchema,
  InitializeResultSchema,
  ListPromptsResultSchema,
  ListResourcesResultSchema,
  ListToolsResultSchema,
  ReadResourceResultSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { TraceFormatError, errorMessage } from '../errors.js';
import {
  PAYLOAD_VERSION,
  RECORD_STATUSES,
  RESULT_TYPES,
  type CallRecord,
  type JsonObject,
  type JsonValue,
  type OperationName,
  type OperationResults,
  type Session,
  type TaggedResult,
} from './types.js';

/**
 * Convert a live value into plain JSON. Returns undefined for values JSON has
 * no representation for (undefined, functions, symbols), which callers drop.
 */
export function toJsonValue(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value !== 'object') return undefined;

  if (seen.has(value)) {
    throw new TraceFormatError('Cannot serialize a value with circular references');
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item) => toJsonValue(item, seen) ?? null);
    }

    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const json = toJsonValue(item, seen);
      if (json !== undefined) {
        out[key] = json;
      }
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

export function toJsonObject(value: unknown): JsonObject {
  const json = toJsonValue(value);
  if (json === undefined || json === null) return {};
  if (typeof json !== 'object' || Array.isArray(json)) {
    throw new TraceFormatError(`Expected an object, got ${Array.isArray(json) ? 'array' : typeof json}`);
  }
  return json;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeResult(method: OperationName, value: unknown): TaggedResult {
  const fields = toJsonObject(value);
  return { ...fields, _type: RESULT_TYPES[method], _v: PAYLOAD_VERSION };
}

const decoders: { [M in OperationName]: (data: unknown) => OperationResults[M] } = {
  initialize: (data) => InitializeResultSchema.parse(data),
  list_tools: (data) => ListToolsResultSchema.parse(data),
  call_tool: (data) => CallToolResultSchema.parse(data),
  list_resources: (data) => ListResourcesResultSchema.parse(data),
  read_resource: (data) => ReadResourceResultSchema.parse(data),
  list_prompts: (data) => ListPromptsResultSchema.parse(data),
  get_prompt: (data) => GetPromptResultSchema.parse(data),
};

/**
 * Turn a recorded payload back into the typed result of its operation.
 * Payloads without `_v` come from older traces and are read as version 1.
 */
export function decodeResult<M extends OperationName>(method: M, payload: JsonValue | null): OperationResults[M] {
  if (payload === null || !isJsonObject(payload)) {
    throw new TraceFormatError(`Recorded ${method} result is not an object`);
  }
  const { _type: type, _v: version, ...data } = payload;

  if (type !== undefined && type !== RESULT_TYPES[method]) {
    throw new TraceFormatError(`Recorded ${method} result is tagged ${String(type)}, expected ${RESULT_TYPES[method]}`);
  }
  if (version !== undefined && version !== PAYLOAD_VERSION) {
    throw new TraceFormatError(`Unsupported ${method} payload version ${String(version)}`);
  }

  try {
    return decoders[method](data);
  } catch (err) {
    throw new TraceFormatError(`Recorded ${method} result does not match its schema: ${errorMessage(err)}`, err);
  }
}

// Wire format: one session per line, snake_case keys

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

const WireRequestSchema = z.object({
  method: z.string(),
  args: z.array(JsonValueSchema).default([]),
  kwargs: JsonObjectSchema.default({}),
  timestamp: z.string(),
});

const WireResponseSchema = z.object({
  success: z.boolean(),
  result: JsonValueSchema.optional(),
  error: z.string().nullable().optional(),
  error_code: z.number().optional(),
  timestamp: z.string(),
});

const WireCallSchema = z.object({
  request: WireRequestSchema,
  response: WireResponseSchema.nullable().optional(),
  duration_ms: z.number().nullable().optional(),
  status: z.enum(RECORD_STATUSES).optional(),
});

export const WireSessionSchema = z.object({
  session_id: z.string(),
  server_info: JsonObjectSchema.default({}),
  calls: z.array(WireCallSchema).default([]),
  started_at: z.string(),
  ended_at: z.string().nullable().optional(),
  metadata: JsonObjectSchema.default({}),
});

export type WireSession = z.input<typeof WireSessionSchema>;
type WireCall = z.output<typeof WireCallSchema>;

export function sessionToWire(session: Session): WireSession {
  return {
    session_id: session.sessionId,
    server_info: session.serverInfo,
    calls: session.calls.map((call) => ({
      request: {
        method: call.request.method,
        args: call.request.args,
        kwargs: call.request.kwargs,
        timestamp: call.request.timestamp,
      },
      response: call.response
        ? {
            success: call.response.success,
            result: call.response.result,
            error: call.response.error,
            ...(call.response.errorCode !== undefined ? { error_code: call.response.errorCode } : {}),
            timestamp: call.response.timestamp,
          }
        : null,
      duration_ms: call.durationMs,
      status: call.status,
    })),
    started_at: session.startedAt,
    ended_at: session.endedAt,
    metadata: session.metadata,
  };
}

function callFromWire(call: WireCall): CallRecord {
  const response = call.response
    ? {
        success: call.response.success,
        result: call.response.result ?? null,
        error: call.response.error ?? null,
        ...(call.response.error_code !== undefined ? { errorCode: call.response.error_code } : {}),
        timestamp: call.response.timestamp,
      }
    : null;

  return {
    request: { ...call.request },
    response,
    durationMs: call.duration_ms ?? null,
    status: call.status ?? (response ? 'completed' : 'abandoned'),
  };
}

export function sessionFromWire(input: unknown): Session {
  const parsed = WireSessionSchema.safeParse(input);
  if (!parsed.success) {
    throw new TraceFormatError(`Invalid session record: ${parsed.error.message}`, parsed.error);
  }
  const wire = parsed.data;

  return {
    sessionId: wire.session_id,
    serverInfo: wire.server_info,
    calls: wire.calls.map(callFromWire),
    startedAt: wire.started_at,
    endedAt: wire.ended_at ?? null,
    metadata: wire.metadata,
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(sessionToWire(session));
}

export function parseSessionLine(line: string): Session {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new TraceFormatError(`Malformed JSON: ${errorMessage(err)}`, err);
  }
  return sessionFromWire(raw);
}
