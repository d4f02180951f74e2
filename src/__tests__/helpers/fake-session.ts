import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallOptions, McpSession } from '../../capture/session.js';
import type { OperationParams, OperationResults } from '../../tracer/types.js';

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * In-process stand-in for a calculator MCP server:
 * - `add` sums `a` and `b`
 * - `divide` fails with InvalidParams when `b` is 0
 * - `wait` resolves after `ms` milliseconds, or rejects when aborted
 * - `cyclic` answers with a result that refers to itself
 */
export class FakeSession implements McpSession {
  readonly received: string[] = [];

  async initialize(): Promise<OperationResults['initialize']> {
    this.received.push('initialize');
    return {
      protocolVersion: '2025-06-18',
      capabilities: { tools: {}, resources: {}, prompts: {} },
      serverInfo: { name: 'calc', version: '1.2.0' },
    };
  }

  async listTools(): Promise<OperationResults['list_tools']> {
    this.received.push('list_tools');
    return {
      tools: [
        {
          name: 'add',
          description: 'Add two numbers',
          inputSchema: {
            type: 'object',
            properties: { a: { type: 'number' }, b: { type: 'number' } },
            required: ['a', 'b'],
          },
        },
      ],
    };
  }

  async callTool(params: OperationParams['call_tool'], options?: CallOptions): Promise<OperationResults['call_tool']> {
    this.received.push(`call_tool ${params.name}`);
    const args = params.arguments ?? {};

    switch (params.name) {
      case 'add':
        return { content: [{ type: 'text', text: String(Number(args.a) + Number(args.b)) }] };
      case 'divide':
        if (Number(args.b) === 0) {
          throw new McpError(ErrorCode.InvalidParams, 'Division by zero');
        }
        return { content: [{ type: 'text', text: String(Number(args.a) / Number(args.b)) }] };
      case 'wait':
        return this.wait(Number(args.ms), options?.signal);
      case 'cyclic': {
        const result: OperationResults['call_tool'] = { content: [{ type: 'text', text: 'loop' }] };
        return Object.assign(result, { self: result });
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${params.name}`);
    }
  }

  async listResources(): Promise<OperationResults['list_resources']> {
    this.received.push('list_resources');
    return { resources: [{ uri: 'file:///notes.txt', name: 'notes' }] };
  }

  async readResource(params: OperationParams['read_resource']): Promise<OperationResults['read_resource']> {
    this.received.push(`read_resource ${params.uri}`);
    return { contents: [{ uri: params.uri, text: 'remember the milk' }] };
  }

  async listPrompts(): Promise<OperationResults['list_prompts']> {
    this.received.push('list_prompts');
    return { prompts: [{ name: 'greet', arguments: [{ name: 'who', required: true }] }] };
  }

  async getPrompt(params: OperationParams['get_prompt']): Promise<OperationResults['get_prompt']> {
    this.received.push(`get_prompt ${params.name}`);
    const who = params.arguments?.who ?? 'nobody';
    return { messages: [{ role: 'user', content: { type: 'text', text: `Say hello to ${who}` } }] };
  }

  private wait(ms: number, signal?: AbortSignal): Promise<OperationResults['call_tool']> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }
      const timer = setTimeout(() => resolve({ content: [{ type: 'text', text: `waited ${ms}` }] }), ms);
      signal?.addEventListener('abort', () => {
        clearTimeout(timer);
        reject(abortError());
      });
    });
  }
}
