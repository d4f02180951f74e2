import {
  isOperationName,
  type CallArguments,
  type JsonObject,
  type JsonValue,
  type OperationName,
} from '../tracer/types.js';

export interface ReplayKey {
  method: string;
  signature: string;
}

// Declared parameter names, in positional order
const PARAMETER_NAMES: Record<OperationName, readonly string[]> = {
  initialize: [],
  list_tools: [],
  call_tool: ['name', 'arguments'],
  list_resources: [],
  read_resource: ['uri'],
  list_prompts: [],
  get_prompt: ['name', 'arguments'],
};

const OPTIONAL_OBJECTS: Partial<Record<OperationName, readonly string[]>> = {
  call_tool: ['arguments'],
  get_prompt: ['arguments'],
};

/**
 * Map positional and named values onto the operation's parameter names, so
 * `call_tool("add", {a: 1})` and `call_tool(name="add", arguments={a: 1})`
 * bind to the same object. Named values win over positional ones; surplus
 * positional values are kept under `$args`.
 */
export function bindArguments(method: string, callArgs: CallArguments): JsonObject {
  const names = isOperationName(method) ? PARAMETER_NAMES[method] : [];
  const bound: JsonObject = {};

  callArgs.args.forEach((value, index) => {
    if (index < names.length) {
      bound[names[index]] = value;
    }
  });
  if (callArgs.args.length > names.length) {
    bound.$args = callArgs.args.slice(names.length);
  }

  for (const [key, value] of Object.entries(callArgs.kwargs)) {
    bound[key] = value;
  }

  if (isOperationName(method)) {
    for (const key of OPTIONAL_OBJECTS[method] ?? []) {
      if (bound[key] === undefined || bound[key] === null) {
        bound[key] = {};
      }
    }
  }

  return bound;
}

function normalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = normalize(value[key]);
    }
    return sorted;
  }
  if (typeof value === 'number' && Object.is(value, -0)) {
    return 0;
  }
  return value;
}

/**
 * Canonical text of a JSON value: object keys sorted at every depth, array
 * order kept. Equal structures give equal strings in any process.
 */
export function canonicalize(value: JsonValue): string {
  return JSON.stringify(normalize(value));
}

export function replayKey(method: string, callArgs: CallArguments): ReplayKey {
  return { method, signature: canonicalize(bindArguments(method, callArgs)) };
}

export function formatReplayKey(key: ReplayKey): string {
  return `${key.method} ${key.signature}`;
}
