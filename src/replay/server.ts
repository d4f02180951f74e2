import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ReplayMissError, ReplayedFailureError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { MockResponder } from './responder.js';

const MCP_ERROR_PREFIX = /^MCP error -?\d+: /;

async function replayed<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof ReplayMissError) {
      throw new McpError(ErrorCode.InvalidParams, err.message, { ...err.key });
    }
    if (err instanceof ReplayedFailureError) {
      // recorded SDK errors already carry the prefix McpError adds
      throw new McpError(err.upstreamCode ?? ErrorCode.InternalError, err.message.replace(MCP_ERROR_PREFIX, ''));
    }
    throw err;
  }
}

/**
 * Expose a serving MockResponder as an MCP server. The handshake the server
 * advertises is the recorded (or synthesized) initialize result.
 */
export async function createReplayServer(responder: MockResponder): Promise<Server> {
  const handshake = await responder.initialize();

  const server = new Server(handshake.serverInfo, {
    capabilities: { tools: {}, resources: {}, prompts: {} },
    ...(handshake.instructions !== undefined ? { instructions: handshake.instructions } : {}),
  });

  server.setRequestHandler(ListToolsRequestSchema, () => replayed(() => responder.listTools()));

  server.setRequestHandler(CallToolRequestSchema, (request) =>
    replayed(() => responder.callTool({ name: request.params.name, arguments: request.params.arguments }))
  );

  server.setRequestHandler(ListResourcesRequestSchema, () => replayed(() => responder.listResources()));

  server.setRequestHandler(ReadResourceRequestSchema, (request) =>
    replayed(() => responder.readResource({ uri: request.params.uri }))
  );

  server.setRequestHandler(ListPromptsRequestSchema, () => replayed(() => responder.listPrompts()));

  server.setRequestHandler(GetPromptRequestSchema, (request) =>
    replayed(() => responder.getPrompt({ name: request.params.name, arguments: request.params.arguments }))
  );

  return server;
}

export async function serveReplay(responder: MockResponder, transport: Transport): Promise<Server> {
  const server = await createReplayServer(responder);
  await server.connect(transport);
  return server;
}

export async function serveStdio(responder: MockResponder): Promise<Server> {
  const server = await serveReplay(responder, new StdioServerTransport());
  logger.info('Replay server running on stdio', { entries: responder.replayIndex.size });
  return server;
}
