/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, getErrorMessage, isNodeError } from '@lsp-relay/core';
import type {
  Disposable,
  Message,
  MessageReader,
} from 'vscode-jsonrpc/node.js';

import { MalformedMessageError } from '../errors.js';
import type { Direction } from '../types.js';

const logger = DebugLogger.getLogger('lsp-relay:channel');

type Waiter = {
  resolve: (message: Message | undefined) => void;
  reject: (error: Error) => void;
};

/**
 * Turns the push-style `MessageReader` into a pull-style queue so a forwarding
 * loop can take one decoded message at a time, strictly in arrival order.
 *
 * Decode failures surface as `MalformedMessageError` once every message that
 * arrived before them has been taken. Transport errors (`EPIPE`, `ECONNRESET`
 * and friends) count as end of input.
 *
 * The reader decodes frames one per `setImmediate` turn, so messages can still
 * be delivered after its close event. End of input is only reported once a
 * full turn passes with nothing new arriving.
 */
export class MessageQueue {
  private readonly buffer: Message[] = [];
  private readonly disposables: Disposable[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private closing = false;
  private activitySinceCheck = false;
  private failure: MalformedMessageError | null = null;

  constructor(
    reader: MessageReader,
    private readonly direction: Direction,
  ) {
    this.disposables.push(
      reader.onError((error) => this.onReaderError(error)),
      reader.onClose(() => this.onReaderClose()),
      reader.listen((message) => this.push(message)),
    );
  }

  /**
   * Resolves with the next message, or `undefined` once the source has ended
   * or `signal` has fired.
   */
  next(signal?: AbortSignal): Promise<Message | undefined> {
    if (signal?.aborted) {
      return Promise.resolve(undefined);
    }

    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(
        new Error(`Concurrent read on the ${this.direction} queue`),
      );
    }

    return new Promise<Message | undefined>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        resolve(undefined);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (message) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(message);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }

  get pending(): number {
    return this.buffer.length;
  }

  get isEnded(): boolean {
    return this.ended || this.failure !== null;
  }

  dispose(): void {
    for (const disposable of this.disposables.splice(0)) {
      disposable.dispose();
    }
    this.finishEnd();
  }

  private push(message: Message): void {
    if (this.ended || this.failure) {
      return;
    }
    this.activitySinceCheck = true;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(message);
      return;
    }
    this.buffer.push(message);
  }

  private onReaderError(error: Error): void {
    if (this.ended || this.failure) {
      return;
    }
    this.activitySinceCheck = true;
    if (isNodeError(error) || isNodeError(error.cause)) {
      logger.debug(
        () =>
          `${this.direction} transport error treated as end of input: ${error.message}`,
      );
      this.onReaderClose();
      return;
    }

    this.failure = new MalformedMessageError(
      this.direction,
      getErrorMessage(error),
      { cause: error },
    );
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.reject(this.failure);
    }
  }

  private onReaderClose(): void {
    if (this.ended || this.closing) {
      return;
    }
    this.closing = true;
    this.activitySinceCheck = true;
    this.scheduleDrainCheck();
  }

  private scheduleDrainCheck(): void {
    setImmediate(() => {
      if (this.ended) {
        return;
      }
      if (this.activitySinceCheck) {
        this.activitySinceCheck = false;
        this.scheduleDrainCheck();
        return;
      }
      this.finishEnd();
    });
  }

  private finishEnd(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve(undefined);
    }
  }

  private takeWaiter(): Waiter | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}
