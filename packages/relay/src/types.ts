/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type RequestId = string | number;

export interface ResponseErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

export interface RequestMessage {
  kind: 'request';
  id: RequestId;
  method: string;
  params?: unknown;
}

/**
 * Exactly one of `result` / `error` is set. `id` is `null` only for errors the
 * peer could not attribute to a request.
 */
export interface ResponseMessage {
  kind: 'response';
  id: RequestId | null;
  result?: unknown;
  error?: ResponseErrorPayload;
}

export interface NotificationMessage {
  kind: 'notification';
  method: string;
  params?: unknown;
}

export type ProxyMessage = RequestMessage | ResponseMessage | NotificationMessage;

/** Which way a message travels through the proxy. */
export type Direction = 'client-to-server' | 'server-to-client';

/** JSON-RPC 2.0 object as it appears on the wire. */
export interface WireMessage {
  jsonrpc: string;
  [key: string]: unknown;
}
