import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { InterceptionProxy } from '../capture/proxy.js';
import { SessionRecorder } from '../tracer/recorder.js';
import { setLogLevel } from '../utils/logger.js';
import { FakeSession } from './helpers/fake-session.js';

describe('InterceptionProxy', () => {
  let live: FakeSession;
  let recorder: SessionRecorder;
  let proxy: InterceptionProxy;

  beforeEach(() => {
    setLogLevel('error');
    live = new FakeSession();
    recorder = new SessionRecorder();
    proxy = new InterceptionProxy(live, recorder);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('passes calls through untouched when no session is open', async () => {
    const result = await proxy.callTool({ name: 'add', arguments: { a: 2, b: 3 } });

    expect(result.content).toEqual([{ type: 'text', text: '5' }]);
    expect(proxy.isInstrumenting).toBe(false);
    expect(recorder.tracker.size).toBe(0);
  });

  it('records a successful call with its arguments and tagged result', async () => {
    const handle = recorder.start();
    const result = await proxy.callTool({ name: 'add', arguments: { a: 2, b: 3 } });
    const session = recorder.finish(handle);

    expect(result.content).toEqual([{ type: 'text', text: '5' }]);
    expect(session.calls).toHaveLength(1);

    const [record] = session.calls;
    expect(record.request).toMatchObject({ method: 'call_tool', args: [], kwargs: { name: 'add', arguments: { a: 2, b: 3 } } });
    expect(record.response).toMatchObject({
      success: true,
      error: null,
      result: { content: [{ type: 'text', text: '5' }], _type: 'CallToolResult', _v: 1 },
    });
    expect(record.status).toBe('completed');
    expect(record.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('records list operations with empty arguments', async () => {
    const handle = recorder.start();
    await proxy.initialize();
    await proxy.listTools();
    const session = recorder.finish(handle);

    expect(session.calls.map((call) => call.request.method)).toEqual(['initialize', 'list_tools']);
    expect(session.calls[1].request.kwargs).toEqual({});
  });

  it('re-throws the original error object and records the failure', async () => {
    const handle = recorder.start();

    let caught: unknown;
    try {
      await proxy.callTool({ name: 'divide', arguments: { a: 1, b: 0 } });
    } catch (err) {
      caught = err;
    }
    const session = recorder.finish(handle);

    expect(caught).toBeInstanceOf(McpError);
    expect(session.calls[0].response).toMatchObject({
      success: false,
      result: null,
      error: 'MCP error -32602: Division by zero',
      errorCode: -32602,
    });
  });

  it('keeps calling through when a request hook throws', async () => {
    proxy.addRequestHook(() => {
      throw new Error('hook exploded');
    });
    const handle = recorder.start();

    const result = await proxy.callTool({ name: 'add', arguments: { a: 1, b: 1 } });
    const session = recorder.finish(handle);

    expect(result.content).toEqual([{ type: 'text', text: '2' }]);
    expect(session.calls).toHaveLength(1);
  });

  it('keeps calling through when a response hook rejects', async () => {
    proxy.addResponseHook(async () => {
      throw new Error('async hook exploded');
    });
    const handle = recorder.start();

    await expect(proxy.callTool({ name: 'add', arguments: { a: 4, b: 4 } })).resolves.toMatchObject({
      content: [{ type: 'text', text: '8' }],
    });
    expect(recorder.finish(handle).calls).toHaveLength(1);
  });

  it('notifies hooks with the call and its response', async () => {
    const seen: string[] = [];
    proxy.addRequestHook((method, args) => {
      seen.push(`request ${method} ${JSON.stringify(args.kwargs)}`);
    });
    proxy.addResponseHook((method, response) => {
      seen.push(`response ${method} ${response.success}`);
    });
    const handle = recorder.start();

    await proxy.readResource({ uri: 'file:///notes.txt' });
    recorder.finish(handle);

    expect(seen).toEqual(['request read_resource {"uri":"file:///notes.txt"}', 'response read_resource true']);
  });

  it('returns the result even when recording it fails', async () => {
    const handle = recorder.start();
    const append = vi.spyOn(recorder, 'append').mockImplementation(() => {
      throw new Error('disk full');
    });

    const result = await proxy.callTool({ name: 'add', arguments: { a: 2, b: 2 } });

    expect(result.content).toEqual([{ type: 'text', text: '4' }]);
    append.mockRestore();
    expect(recorder.finish(handle).calls).toHaveLength(0);
  });

  it('keeps a call whose result cannot be serialized, without a response', async () => {
    const outcomes: string[] = [];
    proxy.addResponseHook((method, response) => {
      outcomes.push(`${method} ${response.error}`);
    });
    const handle = recorder.start();

    const result = await proxy.callTool({ name: 'cyclic' });
    const session = recorder.finish(handle);

    expect(result.content).toEqual([{ type: 'text', text: 'loop' }]);
    expect(session.calls).toHaveLength(1);
    expect(session.calls[0]).toMatchObject({ status: 'unrecorded', response: null, request: { kwargs: { name: 'cyclic' } } });
    expect(outcomes).toEqual(['call_tool Result not recorded: Cannot serialize a value with circular references']);
  });

  it('gives hooks copies so they cannot rewrite the recording', async () => {
    proxy.addRequestHook((_method, args) => {
      args.kwargs.name = 'tampered';
    });
    proxy.addResponseHook((_method, response) => {
      response.success = false;
      response.result = null;
    });
    const handle = recorder.start();

    await proxy.callTool({ name: 'add', arguments: { a: 2, b: 3 } });
    const [record] = recorder.finish(handle).calls;

    expect(record.request.kwargs.name).toBe('add');
    expect(record.response).toMatchObject({ success: true, result: { content: [{ type: 'text', text: '5' }] } });
  });

  it('abandons calls left open past the grace period when the next call starts', async () => {
    let now = 0;
    recorder = new SessionRecorder({ graceMs: 100, clock: () => now });
    proxy = new InterceptionProxy(live, recorder);
    const handle = recorder.start();
    const controller = new AbortController();

    const stuck = proxy.callTool({ name: 'wait', arguments: { ms: 10_000 } }, { signal: controller.signal });
    now = 500;
    await proxy.listTools();

    controller.abort();
    await expect(stuck).rejects.toThrow('The operation was aborted');
    const session = recorder.finish(handle);

    expect(session.calls.map((call) => [call.request.method, call.status, call.durationMs])).toEqual([
      ['call_tool', 'abandoned', 500],
      ['list_tools', 'completed', 0],
    ]);
  });

  it('pairs 50 concurrent calls with their own responses', async () => {
    const handle = recorder.start();

    const results = await Promise.all(
      Array.from({ length: 50 }, (_, i) => proxy.callTool({ name: 'add', arguments: { a: i, b: 1000 } }))
    );
    const session = recorder.finish(handle);

    results.forEach((result, i) => {
      expect(result.content).toEqual([{ type: 'text', text: String(i + 1000) }]);
    });
    expect(session.calls).toHaveLength(50);
    for (const call of session.calls) {
      const args = call.request.kwargs.arguments;
      const a = typeof args === 'object' && args !== null && !Array.isArray(args) ? Number(args.a) : Number.NaN;
      expect(call.response?.result).toMatchObject({ content: [{ type: 'text', text: String(a + 1000) }] });
    }
  });

  it('records calls in completion order', async () => {
    const handle = recorder.start();

    await Promise.all([
      proxy.callTool({ name: 'wait', arguments: { ms: 30 } }),
      proxy.callTool({ name: 'wait', arguments: { ms: 1 } }),
    ]);
    const session = recorder.finish(handle);

    expect(session.calls.map((call) => call.request.kwargs.arguments)).toEqual([{ ms: 1 }, { ms: 30 }]);
  });

  it('records an aborted call as cancelled and re-throws', async () => {
    const handle = recorder.start();
    const controller = new AbortController();

    const pending = proxy.callTool({ name: 'wait', arguments: { ms: 1000 } }, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow('The operation was aborted');
    const session = recorder.finish(handle);

    expect(session.calls).toHaveLength(1);
    expect(session.calls[0].status).toBe('cancelled');
    expect(session.calls[0].response).toBeNull();
  });

  it('stops recording after detach', async () => {
    const handle = recorder.start();
    proxy.detach();

    await proxy.listTools();
    expect(recorder.finish(handle).calls).toHaveLength(0);
    expect(live.received).toEqual(['list_tools']);
  });
});
