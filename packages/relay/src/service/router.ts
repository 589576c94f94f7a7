/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '@lsp-relay/core';
import type { Message } from 'vscode-jsonrpc/node.js';

import type { MessageQueue } from '../channels/message-queue.js';
import type { MessageSink } from '../channels/message-sink.js';
import { MalformedMessageError } from '../errors.js';
import {
  invokeRequestHook,
  invokeResponseHook,
  type HookError,
} from '../hooks.js';
import {
  classify,
  describeMessage,
  errorResponse,
  ErrorCodes,
  toWire,
} from '../message.js';
import type {
  Direction,
  NotificationMessage,
  RequestId,
  RequestMessage,
  ResponseMessage,
  WireMessage,
} from '../types.js';
import type { HookRegistry } from './hook-registry.js';
import type { PendingRequestTable } from './pending-requests.js';

const logger = DebugLogger.getLogger('lsp-relay:router');

const PROTOCOL_MEMBERS = new Set([
  'jsonrpc',
  'id',
  'method',
  'params',
  'result',
  'error',
]);

/**
 * Encodes a hook's output. Members of the decoded frame outside the protocol
 * are carried over; everything the protocol defines comes from `message`.
 */
function encodeHooked(
  raw: Message,
  message: RequestMessage | ResponseMessage,
): WireMessage {
  const extras = Object.fromEntries(
    Object.entries(raw).filter(([key]) => !PROTOCOL_MEMBERS.has(key)),
  );
  return { ...extras, ...toWire(message) };
}

export interface RouterStats {
  clientMessages: number;
  serverMessages: number;
  hookFailures: number;
  unmatchedResponses: number;
  duplicateIds: number;
}

export interface RouterEndpoints {
  /** Frames bound for the language server. */
  server: MessageSink;
  /** Frames bound for the editor. */
  client: MessageSink;
}

/** Why a forwarding loop returned without throwing. */
export type PumpResult = 'ended' | 'aborted';

/**
 * Moves messages between the editor and the language server, running hooks
 * on the way.
 *
 * Each direction is processed strictly in arrival order: the next message is
 * not read until the previous one, hook included, has been written. A slow
 * hook therefore throttles its own direction and nothing else.
 */
export class MessageRouter {
  private readonly counters: RouterStats = {
    clientMessages: 0,
    serverMessages: 0,
    hookFailures: 0,
    unmatchedResponses: 0,
    duplicateIds: 0,
  };

  constructor(
    private readonly registry: HookRegistry,
    private readonly pending: PendingRequestTable,
    private readonly endpoints: RouterEndpoints,
  ) {}

  get stats(): RouterStats {
    return { ...this.counters };
  }

  /** Editor to server loop. Rejects with `MalformedMessageError`. */
  pumpClientToServer(
    source: MessageQueue,
    signal: AbortSignal,
  ): Promise<PumpResult> {
    return this.pump('client-to-server', source, signal, (raw) =>
      this.handleClientMessage(raw),
    );
  }

  /** Server to editor loop. Rejects with `MalformedMessageError`. */
  pumpServerToClient(
    source: MessageQueue,
    signal: AbortSignal,
  ): Promise<PumpResult> {
    return this.pump('server-to-client', source, signal, (raw) =>
      this.handleServerMessage(raw),
    );
  }

  private async pump(
    direction: Direction,
    source: MessageQueue,
    signal: AbortSignal,
    handle: (raw: Message) => Promise<void>,
  ): Promise<PumpResult> {
    while (!signal.aborted) {
      const raw = await source.next(signal);
      if (raw === undefined) {
        const result: PumpResult = signal.aborted ? 'aborted' : 'ended';
        logger.debug(() => `${direction} loop ${result}`);
        return result;
      }
      await handle(raw);
    }
    logger.debug(() => `${direction} loop aborted`);
    return 'aborted';
  }

  /** Routes one editor message. Accepts decoded frames or wire objects. */
  async handleClientMessage(raw: Message | WireMessage): Promise<void> {
    this.counters.clientMessages += 1;
    const classified = classify(raw);

    switch (classified.kind) {
      case 'malformed':
        throw new MalformedMessageError('client-to-server', classified.reason);
      case 'notification':
      case 'response':
        logger.debug(() => `→ ${describeMessage(classified.message)}`);
        await this.endpoints.server.send(raw);
        return;
      case 'request':
        await this.forwardRequest(raw, classified.message);
        return;
      default: {
        const unreachable: never = classified;
        throw new Error(`Unhandled classification ${String(unreachable)}`);
      }
    }
  }

  /** Routes one server message. */
  async handleServerMessage(raw: Message | WireMessage): Promise<void> {
    this.counters.serverMessages += 1;
    const classified = classify(raw);

    switch (classified.kind) {
      case 'malformed':
        throw new MalformedMessageError('server-to-client', classified.reason);
      case 'notification':
      case 'request':
        logger.debug(() => `← ${describeMessage(classified.message)}`);
        await this.endpoints.client.send(raw);
        return;
      case 'response':
        await this.forwardResponse(raw, classified.message);
        return;
      default: {
        const unreachable: never = classified;
        throw new Error(`Unhandled classification ${String(unreachable)}`);
      }
    }
  }

  private async forwardRequest(
    raw: Message,
    message: RequestMessage,
  ): Promise<void> {
    const hook = this.registry.lookup(message.method);
    if (!hook) {
      logger.debug(() => `→ ${describeMessage(message)}`);
      await this.sendToServer(raw, message.id, message.method);
      return;
    }

    const invocation = await invokeRequestHook(hook, message);
    if (!invocation.ok) {
      await this.rejectRequest(message, invocation.error);
      return;
    }

    const { output } = invocation;
    // Side effects announced by the hook reach the editor before the request
    // they belong to is in flight.
    await this.deliverNotifications(output.notifications);

    const forwarded = output.message;
    logger.debug(() => `→ ${describeMessage(forwarded)} (hooked)`);
    await this.sendToServer(
      encodeHooked(raw, forwarded),
      forwarded.id,
      forwarded.method,
    );
  }

  /**
   * Records the request before writing it so the response can never race
   * ahead of its pending entry.
   */
  private async sendToServer(
    frame: Message,
    id: RequestId,
    method: string,
  ): Promise<void> {
    const duplicate = this.pending.record(id, method);
    if (duplicate) {
      this.counters.duplicateIds += 1;
      logger.warn(duplicate.message);
    }

    const sent = await this.endpoints.server.send(frame);
    if (!sent && this.pending.get(id)?.method === method) {
      this.pending.resolve(id);
    }
  }

  private async rejectRequest(
    message: RequestMessage,
    error: HookError,
  ): Promise<void> {
    this.counters.hookFailures += 1;
    logger.error(
      () =>
        `Request hook for '${message.method}' (id ${JSON.stringify(message.id)}) failed: ${error.message}`,
    );
    await this.endpoints.client.send(
      toWire(
        errorResponse(
          message.id,
          ErrorCodes.InternalError,
          `Request hook for '${message.method}' failed: ${error.message}`,
          { hookError: error.kind },
        ),
      ),
    );
  }

  private async forwardResponse(
    raw: Message,
    message: ResponseMessage,
  ): Promise<void> {
    const method =
      message.id === null ? undefined : this.pending.resolve(message.id);

    if (method === undefined) {
      this.counters.unmatchedResponses += 1;
      logger.warn(
        () =>
          `Response id ${JSON.stringify(message.id)} matches no in-flight request; forwarding unchanged`,
      );
      await this.endpoints.client.send(raw);
      return;
    }

    const hook = this.registry.lookup(method);
    if (!hook) {
      logger.debug(() => `← ${describeMessage(message)} for ${method}`);
      await this.endpoints.client.send(raw);
      return;
    }

    const invocation = await invokeResponseHook(hook, method, message);
    if (!invocation.ok) {
      this.counters.hookFailures += 1;
      logger.error(
        () =>
          `Response hook for '${method}' (id ${JSON.stringify(message.id)}) failed, forwarding original: ${invocation.error.message}`,
      );
      await this.endpoints.client.send(raw);
      return;
    }

    const { output } = invocation;
    logger.debug(() => `← ${describeMessage(output.message)} (hooked)`);
    await this.endpoints.client.send(encodeHooked(raw, output.message));
    // The editor is waiting on the response, so it goes first.
    await this.deliverNotifications(output.notifications);
  }

  private async deliverNotifications(
    notifications: readonly NotificationMessage[],
  ): Promise<void> {
    for (const notification of notifications) {
      logger.debug(() => `⇠ injected ${describeMessage(notification)}`);
      await this.endpoints.client.send(toWire(notification));
    }
  }
}
