/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import {
  classify,
  describeMessage,
  errorResponse,
  messageId,
  messageMethod,
  notification,
  request,
  response,
  toWire,
} from '../src/message.js';

describe('classify', () => {
  it('treats method without id as a notification', () => {
    expect(
      classify({
        jsonrpc: '2.0',
        method: 'textDocument/didOpen',
        params: { uri: 'file:///a.ts' },
      }),
    ).toEqual({
      kind: 'notification',
      message: {
        kind: 'notification',
        method: 'textDocument/didOpen',
        params: { uri: 'file:///a.ts' },
      },
    });
  });

  it('treats method with id as a request', () => {
    expect(
      classify({ jsonrpc: '2.0', id: 7, method: 'textDocument/hover' }),
    ).toEqual({
      kind: 'request',
      message: { kind: 'request', id: 7, method: 'textDocument/hover' },
    });
  });

  it('accepts string request ids', () => {
    const result = classify({ jsonrpc: '2.0', id: 'abc', method: 'shutdown' });
    expect(result.kind).toBe('request');
    expect(result.kind === 'request' && result.message.id).toBe('abc');
  });

  it('keeps explicit null params but omits absent ones', () => {
    const withNull = classify({ jsonrpc: '2.0', method: 'exit', params: null });
    const without = classify({ jsonrpc: '2.0', method: 'exit' });
    expect(withNull).toEqual({
      kind: 'notification',
      message: { kind: 'notification', method: 'exit', params: null },
    });
    expect(without.kind === 'notification' && 'params' in without.message).toBe(
      false,
    );
  });

  it('treats id with result as a response', () => {
    expect(classify({ jsonrpc: '2.0', id: 3, result: { contents: [] } })).toEqual({
      kind: 'response',
      message: { kind: 'response', id: 3, result: { contents: [] } },
    });
  });

  it('counts a null result as present', () => {
    expect(classify({ jsonrpc: '2.0', id: 3, result: null })).toEqual({
      kind: 'response',
      message: { kind: 'response', id: 3, result: null },
    });
  });

  it('treats id with error as a response, including a null id', () => {
    expect(
      classify({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' },
      }),
    ).toEqual({
      kind: 'response',
      message: {
        kind: 'response',
        id: null,
        error: { code: -32700, message: 'Parse error' },
      },
    });
  });

  it.each([
    ['a non-object', 42, 'message must be a JSON object'],
    ['an array', [1, 2], 'message must be a JSON object'],
    ['null', null, 'message must be a JSON object'],
    [
      'neither id nor method',
      { jsonrpc: '2.0' },
      'message has neither id nor method',
    ],
    [
      'a non-string method',
      { jsonrpc: '2.0', id: 1, method: 5 },
      'method must be a string',
    ],
    [
      'both method and result',
      { jsonrpc: '2.0', id: 1, method: 'x', result: 1 },
      "'x' carries both a method and a result or error",
    ],
    [
      'an object request id',
      { jsonrpc: '2.0', id: { n: 1 }, method: 'x' },
      "request 'x' has an id that is neither a string nor a number",
    ],
    [
      'both result and error',
      { jsonrpc: '2.0', id: 1, result: 1, error: { code: 1, message: 'm' } },
      'response must carry exactly one of result or error',
    ],
    [
      'neither result nor error',
      { jsonrpc: '2.0', id: 1 },
      'response must carry exactly one of result or error',
    ],
    [
      'a non-integer error code',
      { jsonrpc: '2.0', id: 1, error: { code: 1.5, message: 'm' } },
      'response error must have an integer code and a string message',
    ],
    [
      'a boolean response id',
      { jsonrpc: '2.0', id: true, result: 1 },
      'response id must be a string, a number or null',
    ],
  ])('rejects %s', (_label, raw, reason) => {
    expect(classify(raw)).toEqual({ kind: 'malformed', reason });
  });

  it('is total over arbitrary JSON values', () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        const result = classify(value);
        expect(['request', 'response', 'notification', 'malformed']).toContain(
          result.kind,
        );
      }),
    );
  });

  it('classifies every object with a string method and no id as a notification', () => {
    fc.assert(
      fc.property(fc.string(), fc.jsonValue(), (method, params) => {
        const result = classify({ jsonrpc: '2.0', method, params });
        expect(result.kind).toBe('notification');
      }),
    );
  });

  it('classifies every object with a string method and a valid id as a request', () => {
    const ids = fc.oneof(fc.string(), fc.integer(), fc.double({ noNaN: true, noDefaultInfinity: true }));
    fc.assert(
      fc.property(fc.string(), ids, (method, id) => {
        const result = classify({ jsonrpc: '2.0', id, method });
        expect(result).toEqual({
          kind: 'request',
          message: { kind: 'request', id, method },
        });
      }),
    );
  });
});

describe('toWire', () => {
  it('renders a request without undefined params', () => {
    expect(toWire(request(1, 'shutdown'))).toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'shutdown',
    });
  });

  it('renders a notification with params', () => {
    expect(toWire(notification('$/progress', { token: 't' }))).toEqual({
      jsonrpc: '2.0',
      method: '$/progress',
      params: { token: 't' },
    });
  });

  it('renders a result response, defaulting a missing result to null', () => {
    expect(toWire({ kind: 'response', id: 2 })).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: null,
    });
    expect(toWire(response(2, [1]))).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: [1],
    });
  });

  it('renders an error response', () => {
    expect(toWire(errorResponse('a', -32603, 'boom', { hint: 1 }))).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      error: { code: -32603, message: 'boom', data: { hint: 1 } },
    });
  });

  it('produces objects that classify back to the same message', () => {
    const original = request('r-1', 'textDocument/definition', { line: 4 });
    expect(classify(toWire(original))).toEqual({
      kind: 'request',
      message: original,
    });
  });
});

describe('accessors', () => {
  it('reads id and method across kinds', () => {
    expect(messageId(request(5, 'a'))).toBe(5);
    expect(messageId(response(null, 1))).toBeNull();
    expect(messageId(notification('n'))).toBeUndefined();
    expect(messageMethod(request(5, 'a'))).toBe('a');
    expect(messageMethod(notification('n'))).toBe('n');
    expect(messageMethod(response(5, 1))).toBeUndefined();
  });

  it('describes messages for logs', () => {
    expect(describeMessage(request(3, 'textDocument/hover'))).toBe(
      'request textDocument/hover#3',
    );
    expect(describeMessage(notification('exit'))).toBe('notification exit');
    expect(describeMessage(response(3, null))).toBe('response#3');
    expect(describeMessage(errorResponse(4, -1, 'x'))).toBe(
      'error response#4',
    );
  });
});
