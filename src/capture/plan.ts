import { readFileSync } from 'fs';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { TraceFormatError, errorMessage } from '../errors.js';
import type { OperationParams } from '../tracer/types.js';
import type { McpSession } from './session.js';

const PlannedCallSchema = z.discriminatedUnion('method', [
  z.object({
    method: z.literal('call_tool'),
    name: z.string().min(1),
    arguments: z.record(z.string(), z.unknown()).optional(),
  }),
  z.object({
    method: z.literal('read_resource'),
    uri: z.string().min(1),
  }),
  z.object({
    method: z.literal('get_prompt'),
    name: z.string().min(1),
    arguments: z.record(z.string(), z.string()).optional(),
  }),
]);

export const CallPlanSchema = z.array(PlannedCallSchema);

export type PlannedCall = z.infer<typeof PlannedCallSchema>;

/**
 * Read a JSON array of calls to make during a recording, e.g.
 * `[{"method": "call_tool", "name": "add", "arguments": {"a": 2, "b": 3}}]`.
 */
export function loadCallPlan(path: string): PlannedCall[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new TraceFormatError(`Cannot read call plan ${path}: ${errorMessage(err)}`, err);
  }

  const parsed = CallPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TraceFormatError(`Invalid call plan ${path}: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

function schemaType(schema: unknown): unknown {
  if (typeof schema !== 'object' || schema === null || !('type' in schema)) return undefined;
  const { type } = schema;
  return Array.isArray(type) ? type[0] : type;
}

/** A placeholder value matching a JSON Schema property's declared type */
export function sampleValue(schema: unknown): unknown {
  switch (schemaType(schema)) {
    case 'string':
      return 'test';
    case 'number':
    case 'integer':
      return 1;
    case 'boolean':
      return true;
    case 'array':
      return [];
    case 'object':
      return {};
    case 'null':
      return null;
    default:
      return 'test';
  }
}

/** Arguments for a tool with only its required properties filled in */
export function sampleArguments(tool: Tool): Record<string, unknown> {
  const properties = tool.inputSchema.properties ?? {};
  const args: Record<string, unknown> = {};

  for (const name of tool.inputSchema.required ?? []) {
    args[name] = sampleValue(properties[name]);
  }

  return args;
}

/** One call per advertised tool, used when no call plan is given */
export function planSampleCalls(tools: readonly Tool[]): PlannedCall[] {
  return tools.map((tool): PlannedCall => ({ method: 'call_tool', name: tool.name, arguments: sampleArguments(tool) }));
}

export function runPlannedCall(session: McpSession, call: PlannedCall): Promise<unknown> {
  switch (call.method) {
    case 'call_tool': {
      const params: OperationParams['call_tool'] = { name: call.name, arguments: call.arguments };
      return session.callTool(params);
    }
    case 'read_resource':
      return session.readResource({ uri: call.uri });
    case 'get_prompt':
      return session.getPrompt({ name: call.name, arguments: call.arguments });
  }
}

export function describeCall(call: PlannedCall): string {
  return call.method === 'read_resource' ? `${call.method} ${call.uri}` : `${call.method} ${call.name}`;
}
