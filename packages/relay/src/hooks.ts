/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage } from '@lsp-relay/core';

import { RelayError } from './errors.js';
import type {
  NotificationMessage,
  RequestMessage,
  ResponseMessage,
} from './types.js';

/** Plain-object form of a hook's result. */
export interface HookOutputLike<M extends RequestMessage | ResponseMessage> {
  message: M;
  notifications: readonly NotificationMessage[];
}

/**
 * A rewritten request or response plus the notifications to deliver to the
 * client alongside it, in order.
 */
export class HookOutput<M extends RequestMessage | ResponseMessage>
  implements HookOutputLike<M>
{
  readonly message: M;
  readonly notifications: NotificationMessage[];

  constructor(message: M, notifications: NotificationMessage[] = []) {
    this.message = message;
    this.notifications = notifications;
  }

  static of<M extends RequestMessage | ResponseMessage>(
    message: M,
  ): HookOutput<M> {
    return new HookOutput(message);
  }

  withNotification(notification: NotificationMessage): HookOutput<M> {
    return new HookOutput(this.message, [...this.notifications, notification]);
  }

  withNotifications(
    notifications: readonly NotificationMessage[],
  ): HookOutput<M> {
    return new HookOutput(this.message, [
      ...this.notifications,
      ...notifications,
    ]);
  }

  addNotification(notification: NotificationMessage): void {
    this.notifications.push(notification);
  }
}

export type HookPhase = 'request' | 'response';

/**
 * `failed`: the hook reported or threw an error.
 * `contract`: the hook returned a message of another kind, or for responses,
 * another id.
 */
export type HookErrorKind = 'failed' | 'contract';

export class HookError extends RelayError {
  readonly kind: HookErrorKind;

  constructor(kind: HookErrorKind, message: string, options?: ErrorOptions) {
    super('HOOK_FAILURE', message, options);
    this.name = 'HookError';
    this.kind = kind;
  }

  static failed(reason: string, cause?: unknown): HookError {
    return new HookError(
      'failed',
      reason,
      cause === undefined ? undefined : { cause },
    );
  }
}

export type HookResult<M extends RequestMessage | ResponseMessage> =
  | HookOutputLike<M>
  | HookError;

type MaybePromise<T> = T | Promise<T>;

/**
 * Interceptor bound to one method name. Both capabilities are optional; a
 * missing one forwards the message unchanged.
 *
 * A single instance serves every matching message for the whole session, so
 * any state it keeps must tolerate interleaved requests.
 */
export interface Hook {
  onRequest?(message: RequestMessage): MaybePromise<HookResult<RequestMessage>>;
  onResponse?(
    message: ResponseMessage,
  ): MaybePromise<HookResult<ResponseMessage>>;
}

export type HookInvocation<M extends RequestMessage | ResponseMessage> =
  | { ok: true; output: HookOutput<M> }
  | { ok: false; error: HookError };

type OutputShape = HookOutputLike<RequestMessage | ResponseMessage>;

function isNotificationMessage(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    Reflect.get(value, 'kind') === 'notification' &&
    typeof Reflect.get(value, 'method') === 'string'
  );
}

function isHookOutput(value: unknown): value is OutputShape {
  if (value instanceof HookOutput) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const message: unknown = Reflect.get(value, 'message');
  const notifications: unknown = Reflect.get(value, 'notifications');
  return (
    typeof message === 'object' &&
    message !== null &&
    'kind' in message &&
    Array.isArray(notifications)
  );
}

async function settle<M extends RequestMessage | ResponseMessage>(
  phase: HookPhase,
  method: string,
  run: () => MaybePromise<HookResult<M>>,
): Promise<OutputShape | HookError> {
  let result: unknown;
  try {
    result = await run();
  } catch (error) {
    if (error instanceof HookError) {
      return error;
    }
    return HookError.failed(getErrorMessage(error), error);
  }

  if (result instanceof HookError) {
    return result;
  }
  if (!isHookOutput(result)) {
    return new HookError(
      'contract',
      `${phase} hook for '${method}' did not return a HookOutput`,
    );
  }
  const invalid = result.notifications.findIndex(
    (item: unknown) => !isNotificationMessage(item),
  );
  if (invalid >= 0) {
    return new HookError(
      'contract',
      `${phase} hook for '${method}' returned notification ${invalid} without a string method`,
    );
  }
  return result;
}

/**
 * Runs a request hook and checks that it handed back a request. Never throws.
 */
export async function invokeRequestHook(
  hook: Hook,
  message: RequestMessage,
): Promise<HookInvocation<RequestMessage>> {
  const onRequest = hook.onRequest;
  if (!onRequest) {
    return { ok: true, output: HookOutput.of(message) };
  }

  const result = await settle('request', message.method, () =>
    onRequest.call(hook, message),
  );
  if (result instanceof HookError) {
    return { ok: false, error: result };
  }

  const output = result.message;
  if (output.kind !== 'request') {
    return {
      ok: false,
      error: new HookError(
        'contract',
        `request hook for '${message.method}' returned a ${output.kind}`,
      ),
    };
  }
  return {
    ok: true,
    output: new HookOutput(output, [...result.notifications]),
  };
}

/**
 * Runs a response hook and checks that it handed back a response with the
 * same id. Never throws.
 */
export async function invokeResponseHook(
  hook: Hook,
  method: string,
  message: ResponseMessage,
): Promise<HookInvocation<ResponseMessage>> {
  const onResponse = hook.onResponse;
  if (!onResponse) {
    return { ok: true, output: HookOutput.of(message) };
  }

  const result = await settle('response', method, () =>
    onResponse.call(hook, message),
  );
  if (result instanceof HookError) {
    return { ok: false, error: result };
  }

  const output = result.message;
  if (output.kind !== 'response') {
    return {
      ok: false,
      error: new HookError(
        'contract',
        `response hook for '${method}' returned a ${output.kind}`,
      ),
    };
  }
  if (output.id !== message.id) {
    return {
      ok: false,
      error: new HookError(
        'contract',
        `response hook for '${method}' changed the id from ${JSON.stringify(message.id)} to ${JSON.stringify(output.id)}`,
      ),
    };
  }
  return {
    ok: true,
    output: new HookOutput(output, [...result.notifications]),
  };
}
