/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';
import { fileURLToPath } from 'node:url';
import {
  StreamMessageReader,
  StreamMessageWriter,
  type Message,
} from 'vscode-jsonrpc/node.js';

export const ECHO_SERVER = fileURLToPath(
  new URL('./fixtures/echo-server.mjs', import.meta.url),
);

/** Collects every message decoded from a stream. */
export class MessageRecorder {
  readonly messages: Message[] = [];
  private closed = false;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly reader: StreamMessageReader) {
    reader.listen((message) => {
      this.messages.push(message);
      this.notify();
    });
    reader.onClose(() => {
      this.closed = true;
      this.notify();
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Resolves once `count` messages have arrived. */
  async waitFor(count: number, timeoutMs = 5000): Promise<Message[]> {
    await this.until(() => this.messages.length >= count, timeoutMs);
    return this.messages.slice(0, count);
  }

  async waitForClose(timeoutMs = 5000): Promise<void> {
    await this.until(() => this.closed, timeoutMs);
  }

  private until(predicate: () => boolean, timeoutMs: number): Promise<void> {
    if (predicate()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new Error(
            `Timed out after ${timeoutMs}ms with ${this.messages.length} message(s)`,
          ),
        );
      }, timeoutMs);
      const check = (): void => {
        if (predicate()) {
          clearTimeout(timer);
          resolve();
        } else {
          this.waiters.push(check);
        }
      };
      this.waiters.push(check);
    });
  }

  private notify(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter();
    }
  }
}

/** One side of the relay as the test sees it. */
export interface Peer {
  /** Sends toward the relay. */
  writer: StreamMessageWriter;
  /** What the relay delivered to this peer. */
  received: MessageRecorder;
  /** Bytes toward the relay; end it to simulate a disconnect. */
  output: PassThrough;
}

/** The four streams handed to `Proxy.forward`. */
export interface RelayStreams {
  serverReader: PassThrough;
  serverWriter: PassThrough;
  clientReader: PassThrough;
  clientWriter: PassThrough;
}

export interface Harness {
  editor: Peer;
  server: Peer;
  streams: RelayStreams;
}

function createPeer(toRelay: PassThrough, fromRelay: PassThrough): Peer {
  return {
    writer: new StreamMessageWriter(toRelay),
    received: new MessageRecorder(new StreamMessageReader(fromRelay)),
    output: toRelay,
  };
}

export interface EditorStreams {
  editor: Peer;
  clientReader: PassThrough;
  clientWriter: PassThrough;
}

/** An in-process editor for sessions whose server is a real process. */
export function createEditor(): EditorStreams {
  const clientReader = new PassThrough();
  const clientWriter = new PassThrough();
  return {
    editor: createPeer(clientReader, clientWriter),
    clientReader,
    clientWriter,
  };
}

/**
 * In-process editor and server wired to a relay through byte streams.
 * When `autoEndServer` is set, the fake server closes its output as soon as
 * the relay closes the server's input.
 */
export function createHarness(autoEndServer = true): Harness {
  const clientReader = new PassThrough();
  const clientWriter = new PassThrough();
  const serverReader = new PassThrough();
  const serverWriter = new PassThrough();

  const editor = createPeer(clientReader, clientWriter);
  const server = createPeer(serverReader, serverWriter);
  if (autoEndServer) {
    serverWriter.on('end', () => serverReader.end());
  }

  return {
    editor,
    server,
    streams: { serverReader, serverWriter, clientReader, clientWriter },
  };
}

/** Writes a frame whose body is not valid JSON. */
export function writeRawFrame(stream: PassThrough, body: string): void {
  const bytes = Buffer.from(body, 'utf8');
  stream.write(`Content-Length: ${bytes.length}\r\n\r\n`);
  stream.write(bytes);
}
