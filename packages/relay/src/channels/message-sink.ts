/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, getErrorMessage } from '@lsp-relay/core';
import type {
  Disposable,
  Message,
  MessageWriter,
} from 'vscode-jsonrpc/node.js';

const logger = DebugLogger.getLogger('lsp-relay:channel');

/**
 * Destination side of one stream. Writing to a closed destination is a no-op
 * that reports `false`; it never throws into the forwarding loop.
 *
 * The underlying writer serialises frames, and callers await each `send`, so
 * frames reach the stream in call order.
 */
export class MessageSink {
  private closed = false;
  private written = 0;
  private dropped = 0;
  private readonly disposables: Disposable[] = [];

  constructor(
    private readonly writer: MessageWriter,
    readonly name: string,
  ) {
    this.disposables.push(
      writer.onClose(() => {
        this.closed = true;
      }),
      writer.onError(([error]) => {
        logger.debug(() => `${this.name} writer error: ${error.message}`);
      }),
    );
  }

  async send(message: Message): Promise<boolean> {
    if (this.closed) {
      this.dropped += 1;
      logger.debug(() => `Dropping frame for closed ${this.name} stream`);
      return false;
    }

    try {
      await this.writer.write(message);
      this.written += 1;
      return true;
    } catch (error) {
      this.closed = true;
      this.dropped += 1;
      logger.warn(
        () => `Write to ${this.name} failed: ${getErrorMessage(error)}`,
      );
      return false;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get writtenCount(): number {
    return this.written;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /** Ends the underlying stream after queued frames have been flushed. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      this.writer.end();
    } catch (error) {
      logger.debug(
        () => `Ending ${this.name} writer failed: ${getErrorMessage(error)}`,
      );
    }
  }

  dispose(): void {
    for (const disposable of this.disposables.splice(0)) {
      disposable.dispose();
    }
  }
}
