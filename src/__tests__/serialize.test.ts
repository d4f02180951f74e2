import { describe, it, expect } from 'vitest';
import { TraceFormatError } from '../errors.js';
import {
  decodeResult,
  encodeResult,
  parseSessionLine,
  serializeSession,
  sessionFromWire,
  toJsonObject,
  toJsonValue,
} from '../tracer/serialize.js';
import { failedCall, okCall, sealedSession, textResult } from './helpers/sessions.js';

describe('toJsonValue', () => {
  it('drops undefined fields and keeps nulls', () => {
    expect(toJsonValue({ a: 1, b: undefined, c: null })).toEqual({ a: 1, c: null });
  });

  it('maps non-finite numbers to null and bigints to strings', () => {
    expect(toJsonValue([Number.NaN, Infinity, 10n])).toEqual([null, null, '10']);
  });

  it('writes dates as ISO strings', () => {
    expect(toJsonValue(new Date('2026-03-01T00:00:00.000Z'))).toBe('2026-03-01T00:00:00.000Z');
  });

  it('rejects circular structures', () => {
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    expect(() => toJsonValue(loop)).toThrow(TraceFormatError);
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { x: 1 };
    expect(toJsonValue({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });
});

describe('toJsonObject', () => {
  it('treats undefined params as an empty object', () => {
    expect(toJsonObject(undefined)).toEqual({});
  });

  it('rejects arrays', () => {
    expect(() => toJsonObject([1, 2])).toThrow('Expected an object, got array');
  });
});

describe('encodeResult / decodeResult', () => {
  it('tags the payload with its result type and version', () => {
    expect(encodeResult('call_tool', textResult('5'))).toEqual({
      content: [{ type: 'text', text: '5' }],
      _type: 'CallToolResult',
      _v: 1,
    });
  });

  it('decodes a tagged payload back to the typed result', () => {
    const decoded = decodeResult('call_tool', encodeResult('call_tool', textResult('5')));
    expect(decoded.content).toEqual([{ type: 'text', text: '5' }]);
  });

  it('reads untagged payloads as version 1', () => {
    const decoded = decodeResult('read_resource', { contents: [{ uri: 'file:///a', text: 'hi' }] });
    expect(decoded.contents).toEqual([{ uri: 'file:///a', text: 'hi' }]);
  });

  it('rejects a payload tagged for another operation', () => {
    expect(() => decodeResult('list_tools', encodeResult('call_tool', textResult('5')))).toThrow(
      'Recorded list_tools result is tagged CallToolResult, expected ListToolsResult'
    );
  });

  it('rejects unknown payload versions', () => {
    expect(() => decodeResult('call_tool', { content: [], _type: 'CallToolResult', _v: 2 })).toThrow(
      'Unsupported call_tool payload version 2'
    );
  });

  it('rejects payloads that do not match the result schema', () => {
    expect(() => decodeResult('list_tools', { tools: 'nope' })).toThrow(TraceFormatError);
  });

  it('rejects null payloads', () => {
    expect(() => decodeResult('call_tool', null)).toThrow('Recorded call_tool result is not an object');
  });
});

describe('session lines', () => {
  it('round-trips a session through its trace line', () => {
    const session = sealedSession(
      's-1',
      [
        okCall('call_tool', { name: 'add', arguments: { a: 2, b: 3 } }, textResult('5')),
        failedCall('call_tool', { name: 'divide', arguments: { a: 1, b: 0 } }, 'Division by zero', -32602),
      ],
      { name: 'calc', version: '1.2.0' }
    );

    expect(parseSessionLine(serializeSession(session))).toEqual(session);
  });

  it('writes snake_case keys', () => {
    const line = serializeSession(sealedSession('s-2', [okCall('list_tools', {}, { tools: [] })]));
    const raw: unknown = JSON.parse(line);

    expect(raw).toMatchObject({
      session_id: 's-2',
      server_info: {},
      started_at: '2026-01-05T10:00:00.000Z',
      ended_at: '2026-01-05T10:01:00.000Z',
      calls: [{ duration_ms: 10, status: 'completed' }],
    });
  });

  it('fills in defaults for traces without status or error codes', () => {
    const session = sessionFromWire({
      session_id: 'old',
      started_at: '2026-01-01T00:00:00.000Z',
      calls: [
        {
          request: { method: 'list_tools', timestamp: '2026-01-01T00:00:00.000Z' },
          response: { success: true, result: { tools: [] }, error: null, timestamp: '2026-01-01T00:00:00.100Z' },
          duration_ms: 100,
        },
        {
          request: { method: 'call_tool', kwargs: { name: 'slow' }, timestamp: '2026-01-01T00:00:01.000Z' },
          response: null,
        },
      ],
    });

    expect(session.serverInfo).toEqual({});
    expect(session.endedAt).toBeNull();
    expect(session.calls[0].request.args).toEqual([]);
    expect(session.calls[0].status).toBe('completed');
    expect(session.calls[1].status).toBe('abandoned');
    expect(session.calls[1].durationMs).toBeNull();
  });

  it('rejects malformed JSON', () => {
    expect(() => parseSessionLine('{"session_id": "s-1", "calls": [')).toThrow(TraceFormatError);
  });

  it('rejects records missing required fields', () => {
    expect(() => parseSessionLine('{"calls": []}')).toThrow(/^Invalid session record/);
  });
});
