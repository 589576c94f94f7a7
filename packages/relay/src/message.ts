/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  NotificationMessage,
  ProxyMessage,
  RequestId,
  RequestMessage,
  ResponseErrorPayload,
  ResponseMessage,
  WireMessage,
} from './types.js';

export const JSONRPC_VERSION = '2.0';

/** JSON-RPC reserved error codes used by the proxy. */
export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type Classification =
  | { kind: 'request'; message: RequestMessage }
  | { kind: 'response'; message: ResponseMessage }
  | { kind: 'notification'; message: NotificationMessage }
  | { kind: 'malformed'; reason: string };

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isRequestId = (value: unknown): value is RequestId =>
  typeof value === 'string' ||
  (typeof value === 'number' && Number.isFinite(value));

const isErrorPayload = (value: unknown): value is ResponseErrorPayload =>
  isObject(value) &&
  typeof value.code === 'number' &&
  Number.isInteger(value.code) &&
  typeof value.message === 'string';

/**
 * Sorts a decoded JSON value into one of the three protocol shapes.
 *
 * - `method` without `id` is a notification;
 * - `method` with `id` is a request;
 * - `id` without `method` and exactly one of `result`/`error` is a response;
 * - anything else is malformed.
 */
export function classify(raw: unknown): Classification {
  if (!isObject(raw)) {
    return { kind: 'malformed', reason: 'message must be a JSON object' };
  }

  const hasId = 'id' in raw;
  const hasMethod = 'method' in raw;
  const hasResult = 'result' in raw;
  const hasError = 'error' in raw;

  if (hasMethod) {
    const method = raw.method;
    if (typeof method !== 'string') {
      return { kind: 'malformed', reason: 'method must be a string' };
    }
    if (hasResult || hasError) {
      return {
        kind: 'malformed',
        reason: `'${method}' carries both a method and a result or error`,
      };
    }

    if (!hasId) {
      return {
        kind: 'notification',
        message: withParams({ kind: 'notification', method }, raw),
      };
    }

    const id = raw.id;
    if (!isRequestId(id)) {
      return {
        kind: 'malformed',
        reason: `request '${method}' has an id that is neither a string nor a number`,
      };
    }
    return {
      kind: 'request',
      message: withParams({ kind: 'request', id, method }, raw),
    };
  }

  if (!hasId) {
    return { kind: 'malformed', reason: 'message has neither id nor method' };
  }

  const id = raw.id;
  if (id !== null && !isRequestId(id)) {
    return {
      kind: 'malformed',
      reason: 'response id must be a string, a number or null',
    };
  }

  if (hasResult === hasError) {
    return {
      kind: 'malformed',
      reason: 'response must carry exactly one of result or error',
    };
  }

  if (hasError) {
    const error = raw.error;
    if (!isErrorPayload(error)) {
      return {
        kind: 'malformed',
        reason: 'response error must have an integer code and a string message',
      };
    }
    return { kind: 'response', message: { kind: 'response', id, error } };
  }

  return {
    kind: 'response',
    message: { kind: 'response', id, result: raw.result },
  };
}

function withParams<T extends RequestMessage | NotificationMessage>(
  message: T,
  raw: Record<string, unknown>,
): T {
  return 'params' in raw ? { ...message, params: raw.params } : message;
}

/**
 * Renders a model message as a JSON-RPC 2.0 object. Optional members that are
 * `undefined` are left out.
 */
export function toWire(message: ProxyMessage): WireMessage {
  switch (message.kind) {
    case 'request':
      return {
        jsonrpc: JSONRPC_VERSION,
        id: message.id,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    case 'notification':
      return {
        jsonrpc: JSONRPC_VERSION,
        method: message.method,
        ...(message.params !== undefined ? { params: message.params } : {}),
      };
    case 'response':
      if (message.error !== undefined) {
        return {
          jsonrpc: JSONRPC_VERSION,
          id: message.id,
          error: message.error,
        };
      }
      return {
        jsonrpc: JSONRPC_VERSION,
        id: message.id,
        result: message.result ?? null,
      };
    default: {
      const unreachable: never = message;
      throw new Error(`Unknown message kind: ${String(unreachable)}`);
    }
  }
}

export function messageId(message: ProxyMessage): RequestId | null | undefined {
  return message.kind === 'notification' ? undefined : message.id;
}

export function messageMethod(message: ProxyMessage): string | undefined {
  return message.kind === 'response' ? undefined : message.method;
}

export function notification(
  method: string,
  params?: unknown,
): NotificationMessage {
  return params === undefined
    ? { kind: 'notification', method }
    : { kind: 'notification', method, params };
}

export function request(
  id: RequestId,
  method: string,
  params?: unknown,
): RequestMessage {
  return params === undefined
    ? { kind: 'request', id, method }
    : { kind: 'request', id, method, params };
}

export function response(id: RequestId | null, result: unknown): ResponseMessage {
  return { kind: 'response', id, result };
}

export function errorResponse(
  id: RequestId | null,
  code: number,
  message: string,
  data?: unknown,
): ResponseMessage {
  return {
    kind: 'response',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

/** Short human-readable label for logs, e.g. `request textDocument/hover#3`. */
export function describeMessage(message: ProxyMessage): string {
  switch (message.kind) {
    case 'request':
      return `request ${message.method}#${String(message.id)}`;
    case 'notification':
      return `notification ${message.method}`;
    case 'response':
      return `${message.error ? 'error response' : 'response'}#${String(message.id)}`;
    default: {
      const unreachable: never = message;
      return String(unreachable);
    }
  }
}
