import type {
  CallToolResult,
  GetPromptResult,
  InitializeResult,
  ListPromptsResult,
  ListResourcesResult,
  ListToolsResult,
  ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

// Operations of the session contract, named as they appear in trace files
export const OPERATIONS = [
  'initialize',
  'list_tools',
  'call_tool',
  'list_resources',
  'read_resource',
  'list_prompts',
  'get_prompt',
] as const;

export type OperationName = (typeof OPERATIONS)[number];

export function isOperationName(value: string): value is OperationName {
  return OPERATIONS.some((operation) => operation === value);
}

export const RESULT_TYPES = {
  initialize: 'InitializeResult',
  list_tools: 'ListToolsResult',
  call_tool: 'CallToolResult',
  list_resources: 'ListResourcesResult',
  read_resource: 'ReadResourceResult',
  list_prompts: 'ListPromptsResult',
  get_prompt: 'GetPromptResult',
} as const satisfies Record<OperationName, string>;

export type ResultTypeName = (typeof RESULT_TYPES)[OperationName];

export const PAYLOAD_VERSION = 1;

/**
 * Serialized result of a successful call: the result fields plus a `_type`
 * naming the result kind and a `_v` payload format version.
 */
export interface TaggedResult {
  _type: ResultTypeName;
  _v: number;
  [field: string]: JsonValue;
}

export interface OperationParams {
  initialize: undefined;
  list_tools: undefined;
  call_tool: { name: string; arguments?: Record<string, unknown> };
  list_resources: undefined;
  read_resource: { uri: string };
  list_prompts: undefined;
  get_prompt: { name: string; arguments?: Record<string, string> };
}

export interface OperationResults {
  initialize: InitializeResult;
  list_tools: ListToolsResult;
  call_tool: CallToolResult;
  list_resources: ListResourcesResult;
  read_resource: ReadResourceResult;
  list_prompts: ListPromptsResult;
  get_prompt: GetPromptResult;
}

export interface CallArguments {
  args: JsonValue[];
  kwargs: JsonObject;
}

export interface CallRequest extends CallArguments {
  method: string;
  timestamp: string;
}

export interface CallResponse {
  success: boolean;
  result: JsonValue | null;
  error: string | null;
  errorCode?: number;
  timestamp: string;
}

// completed: a response arrived; cancelled: the caller aborted;
// abandoned: still open when the grace period ran out or the session was sealed;
// unrecorded: a response arrived but its result could not be serialized
export const RECORD_STATUSES = ['completed', 'cancelled', 'abandoned', 'unrecorded'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export interface CallRecord {
  request: CallRequest;
  response: CallResponse | null;
  durationMs: number | null;
  status: RecordStatus;
}

export interface Session {
  sessionId: string;
  serverInfo: JsonObject;
  calls: CallRecord[];
  startedAt: string;
  endedAt: string | null;
  metadata: JsonObject;
}

export interface SessionHandle {
  readonly sessionId: string;
  readonly startedAt: string;
}
