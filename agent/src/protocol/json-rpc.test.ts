import { describe, test, expect } from 'vitest';
import { encodeMessage, parseMessage } from './json-rpc.js';

describe('parseMessage', () => {
  test('classifies results and errors', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":3,"result":{"ok":true}}')).toEqual({
      kind: 'result',
      id: 3,
      result: { ok: true },
    });
    expect(parseMessage('{"jsonrpc":"2.0","id":"a","error":{"code":-32600,"message":"Invalid Request"}}')).toEqual({
      kind: 'error',
      id: 'a',
      error: { code: -32600, message: 'Invalid Request' },
    });
  });

  test('a null result is still a result', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":1,"result":null}')).toEqual({ kind: 'result', id: 1, result: null });
  });

  test('classifies requests and notifications from the server', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":9,"method":"roots/list"}')).toEqual({
      kind: 'request',
      id: 9,
      method: 'roots/list',
      params: undefined,
    });
    expect(parseMessage('{"jsonrpc":"2.0","method":"notifications/progress","params":{"progress":1}}')).toEqual({
      kind: 'notification',
      method: 'notifications/progress',
      params: { progress: 1 },
    });
  });

  test('rejects lines that are not JSON objects', () => {
    expect(parseMessage('Starting server...')).toMatchObject({ kind: 'invalid' });
    expect(parseMessage('[1,2]')).toEqual({ kind: 'invalid', reason: 'not a JSON object' });
  });

  test('keeps the id of a malformed response so the call can be failed', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":5,"error":{"code":"x"}}')).toEqual({
      kind: 'invalid',
      id: 5,
      reason: 'malformed error object',
    });
    expect(parseMessage('{"jsonrpc":"2.0","id":6}')).toEqual({
      kind: 'invalid',
      id: 6,
      reason: 'response has neither result nor error',
    });
    expect(parseMessage('{"jsonrpc":"1.0","id":7,"result":1}')).toMatchObject({ kind: 'invalid', id: 7 });
  });

  test('a response without id is invalid', () => {
    expect(parseMessage('{"jsonrpc":"2.0","result":1}')).toEqual({ kind: 'invalid', reason: 'response without id' });
  });
});

describe('encodeMessage', () => {
  test('writes one line per message', () => {
    expect(encodeMessage({ jsonrpc: '2.0', id: 1, method: 'ping' })).toBe('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
  });
});
