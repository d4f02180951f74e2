import { LATEST_PROTOCOL_VERSION, type Prompt, type Resource, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '../errors.js';
import { decodeResult, isJsonObject } from '../tracer/serialize.js';
import {
  isOperationName,
  type CallResponse,
  type JsonValue,
  type OperationResults,
  type Session,
} from '../tracer/types.js';
import { deepFreeze } from '../utils/freeze.js';
import { logger } from '../utils/logger.js';
import { bindArguments, formatReplayKey, replayKey, type ReplayKey } from './canonical.js';

export interface ReplayEntry {
  key: ReplayKey;
  response: CallResponse;
  sessionId: string;
}

export interface ReplayCatalog {
  tools: Tool[];
  resources: Resource[];
  prompts: Prompt[];
}

export interface ReplayIndexStats {
  sessions: number;
  records: number;
  indexed: number;
  overwritten: number;
  skipped: number;
}

/**
 * Read-only lookup from ReplayKey to the recorded response, plus the
 * catalog and handshake a mock needs when those were never recorded.
 * Everything it holds is deep-frozen.
 */
export class ReplayIndex {
  readonly catalog: ReplayCatalog;
  readonly handshake: OperationResults['initialize'];
  readonly stats: ReplayIndexStats;
  private entries: ReadonlyMap<string, ReplayEntry>;

  constructor(
    entries: Map<string, ReplayEntry>,
    catalog: ReplayCatalog,
    handshake: OperationResults['initialize'],
    stats: ReplayIndexStats
  ) {
    entries.forEach((entry) => deepFreeze(entry));
    this.entries = entries;
    this.catalog = deepFreeze(catalog);
    this.handshake = deepFreeze(handshake);
    this.stats = Object.freeze(stats);
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(key: ReplayKey): ReplayEntry | undefined {
    return this.entries.get(formatReplayKey(key));
  }

  keys(): ReplayKey[] {
    return [...this.entries.values()].map((entry) => entry.key);
  }

  methods(): string[] {
    return [...new Set(this.keys().map((key) => key.method))].sort();
  }
}

interface ArgumentObservation {
  calls: number;
  keys: Map<string, { count: number; types: Set<string> }>;
}

function jsonType(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function observe(observations: Map<string, ArgumentObservation>, name: string, args: JsonValue | undefined): void {
  const observation = observations.get(name) ?? { calls: 0, keys: new Map() };
  observation.calls++;

  if (args !== undefined && isJsonObject(args)) {
    for (const [key, value] of Object.entries(args)) {
      const seen = observation.keys.get(key) ?? { count: 0, types: new Set<string>() };
      seen.count++;
      seen.types.add(jsonType(value));
      observation.keys.set(key, seen);
    }
  }

  observations.set(name, observation);
}

function inferInputSchema(observation: ArgumentObservation): Tool['inputSchema'] {
  const properties: Record<string, { type?: string }> = {};
  const required: string[] = [];

  for (const [key, seen] of [...observation.keys].sort(([a], [b]) => a.localeCompare(b))) {
    // a key seen with more than one type gets no type constraint
    properties[key] = seen.types.size === 1 ? { type: [...seen.types][0] } : {};
    if (seen.count === observation.calls) {
      required.push(key);
    }
  }

  return { type: 'object', properties, ...(required.length > 0 ? { required } : {}) };
}

function recordedResult<M extends 'initialize' | 'list_tools' | 'list_resources' | 'list_prompts'>(
  method: M,
  response: CallResponse
): OperationResults[M] | undefined {
  try {
    return decodeResult(method, response.result);
  } catch (err) {
    logger.warn('Ignoring undecodable recorded result', { method, error: errorMessage(err) });
    return undefined;
  }
}

function mergeByName<T>(synthesized: T[], recorded: T[] | undefined, nameOf: (item: T) => string): T[] {
  const merged = new Map<string, T>();
  for (const item of synthesized) merged.set(nameOf(item), item);
  for (const item of recorded ?? []) merged.set(nameOf(item), item);
  return [...merged.values()].sort((a, b) => nameOf(a).localeCompare(nameOf(b)));
}

/**
 * Build the lookup from sealed sessions. Sessions are taken in the order
 * given and records in completion order; when two records share a key the
 * later one wins.
 */
export function buildReplayIndex(sessions: readonly Session[]): ReplayIndex {
  const entries = new Map<string, ReplayEntry>();
  const stats: ReplayIndexStats = { sessions: sessions.length, records: 0, indexed: 0, overwritten: 0, skipped: 0 };

  const toolCalls = new Map<string, ArgumentObservation>();
  const promptCalls = new Map<string, ArgumentObservation>();
  const resourceUris = new Set<string>();

  let recordedTools: Tool[] | undefined;
  let recordedResources: Resource[] | undefined;
  let recordedPrompts: Prompt[] | undefined;
  let recordedHandshake: OperationResults['initialize'] | undefined;

  for (const session of sessions) {
    for (const call of session.calls) {
      stats.records++;
      const { request, response } = call;

      if (!response || !isOperationName(request.method)) {
        stats.skipped++;
        continue;
      }

      const key = replayKey(request.method, request);
      const id = formatReplayKey(key);
      if (entries.has(id)) {
        stats.overwritten++;
        logger.debug('Later record replaces earlier one', { key: id, sessionId: session.sessionId });
      }
      entries.set(id, { key, response: structuredClone(response), sessionId: session.sessionId });

      const bound = bindArguments(request.method, request);
      const name = typeof bound.name === 'string' ? bound.name : undefined;

      switch (request.method) {
        case 'call_tool':
          if (name) observe(toolCalls, name, bound.arguments);
          break;
        case 'get_prompt':
          if (name) observe(promptCalls, name, bound.arguments);
          break;
        case 'read_resource':
          if (typeof bound.uri === 'string') resourceUris.add(bound.uri);
          break;
      }

      if (!response.success) continue;

      switch (request.method) {
        case 'initialize':
          recordedHandshake = recordedResult('initialize', response) ?? recordedHandshake;
          break;
        case 'list_tools':
          recordedTools = recordedResult('list_tools', response)?.tools ?? recordedTools;
          break;
        case 'list_resources':
          recordedResources = recordedResult('list_resources', response)?.resources ?? recordedResources;
          break;
        case 'list_prompts':
          recordedPrompts = recordedResult('list_prompts', response)?.prompts ?? recordedPrompts;
          break;
      }
    }
  }

  stats.indexed = entries.size;

  const catalog: ReplayCatalog = {
    tools: mergeByName(
      [...toolCalls].map(([name, observation]): Tool => ({ name, inputSchema: inferInputSchema(observation) })),
      recordedTools,
      (tool) => tool.name
    ),
    resources: mergeByName(
      [...resourceUris].map((uri): Resource => ({ uri, name: uri })),
      recordedResources,
      (resource) => resource.uri
    ),
    prompts: mergeByName(
      [...promptCalls].map(([name, observation]): Prompt => ({
        name,
        arguments: [...observation.keys].map(([argName, seen]) => ({
          name: argName,
          required: seen.count === observation.calls,
        })),
      })),
      recordedPrompts,
      (prompt) => prompt.name
    ),
  };

  const handshake = recordedHandshake ?? synthesizeHandshake(sessions, catalog);

  logger.debug('Replay index built', { ...stats });
  return new ReplayIndex(entries, catalog, handshake, stats);
}

function synthesizeHandshake(sessions: readonly Session[], catalog: ReplayCatalog): OperationResults['initialize'] {
  const latest = sessions[sessions.length - 1];
  const info = latest?.serverInfo ?? {};

  return {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {
      ...(catalog.tools.length > 0 ? { tools: {} } : {}),
      ...(catalog.resources.length > 0 ? { resources: {} } : {}),
      ...(catalog.prompts.length > 0 ? { prompts: {} } : {}),
    },
    serverInfo: {
      name: typeof info.name === 'string' ? info.name : 'mcp-tape-replay',
      version: typeof info.version === 'string' ? info.version : '0.0.0',
    },
  };
}
