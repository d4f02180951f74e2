import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import type { OperationParams, OperationResults } from '../tracer/types.js';

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * The call surface of a live MCP session. The interception proxy and the
 * mock responder both implement it, so either can stand in for the other.
 */
export interface McpSession {
  initialize(options?: CallOptions): Promise<OperationResults['initialize']>;
  listTools(options?: CallOptions): Promise<OperationResults['list_tools']>;
  callTool(params: OperationParams['call_tool'], options?: CallOptions): Promise<OperationResults['call_tool']>;
  listResources(options?: CallOptions): Promise<OperationResults['list_resources']>;
  readResource(params: OperationParams['read_resource'], options?: CallOptions): Promise<OperationResults['read_resource']>;
  listPrompts(options?: CallOptions): Promise<OperationResults['list_prompts']>;
  getPrompt(params: OperationParams['get_prompt'], options?: CallOptions): Promise<OperationResults['get_prompt']>;
}

/**
 * Adapts an SDK client to the session contract. `initialize` performs the
 * connection handshake, so a failing server start is observed like any
 * other failing call.
 */
export class SdkSession implements McpSession {
  private client: Client;
  private transport: Transport;

  constructor(client: Client, transport: Transport) {
    this.client = client;
    this.transport = transport;
  }

  async initialize(options?: CallOptions): Promise<OperationResults['initialize']> {
    await this.client.connect(this.transport, options);

    const instructions = this.client.getInstructions();
    return {
      // the client does not expose the negotiated version
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: this.client.getServerCapabilities() ?? {},
      serverInfo: this.client.getServerVersion() ?? { name: 'unknown', version: '0.0.0' },
      ...(instructions !== undefined ? { instructions } : {}),
    };
  }

  listTools(options?: CallOptions): Promise<OperationResults['list_tools']> {
    return this.client.listTools(undefined, options);
  }

  async callTool(params: OperationParams['call_tool'], options?: CallOptions): Promise<OperationResults['call_tool']> {
    const result = await this.client.callTool(params, CallToolResultSchema, options);
    return CallToolResultSchema.parse(result);
  }

  listResources(options?: CallOptions): Promise<OperationResults['list_resources']> {
    return this.client.listResources(undefined, options);
  }

  readResource(params: OperationParams['read_resource'], options?: CallOptions): Promise<OperationResults['read_resource']> {
    return this.client.readResource(params, options);
  }

  listPrompts(options?: CallOptions): Promise<OperationResults['list_prompts']> {
    return this.client.listPrompts(undefined, options);
  }

  getPrompt(params: OperationParams['get_prompt'], options?: CallOptions): Promise<OperationResults['get_prompt']> {
    return this.client.getPrompt(params, options);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
