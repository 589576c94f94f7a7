/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable, Writable } from 'node:stream';

import { DebugLogger, getErrorMessage } from '@lsp-relay/core';
import {
  StreamMessageReader,
  StreamMessageWriter,
  type Disposable,
  type MessageReader,
  type MessageWriter,
} from 'vscode-jsonrpc/node.js';

import { MessageQueue } from './channels/message-queue.js';
import { MessageSink } from './channels/message-sink.js';
import {
  parseOptions,
  type RelayOptions,
  type RelayOptionsInput,
} from './config.js';
import type { Hook } from './hooks.js';
import {
  createHookRegistry,
  type HookRegistry,
} from './service/hook-registry.js';
import { PendingRequestTable } from './service/pending-requests.js';
import { MessageRouter, type PumpResult } from './service/router.js';
import {
  spawnServer,
  type ProcessExit,
  type ServerProcess,
} from './service/supervisor.js';

const logger = DebugLogger.getLogger('lsp-relay:proxy');

/** A decoded message source, or a byte stream to decode. */
export type ReaderSource = MessageReader | Readable;
/** A message destination, or a byte stream to encode onto. */
export type WriterTarget = MessageWriter | Writable;

export type ProxyEndReason =
  | 'client-closed'
  | 'server-closed'
  | 'process-exit'
  | 'stopped';

export interface ProxyStats {
  clientMessages: number;
  serverMessages: number;
  hookFailures: number;
  evictions: number;
  unmatchedResponses: number;
}

export interface ProxyOutcome {
  reason: ProxyEndReason;
  /** Set when the session owned a server process. */
  exit?: ProcessExit;
  stats: ProxyStats;
}

interface SessionEndpoints {
  clientReader: MessageReader;
  clientWriter: MessageWriter;
  serverReader: MessageReader;
  serverWriter: MessageWriter;
  server?: ServerProcess;
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

type Ending =
  | { kind: 'client' | 'server'; settled: Settled<PumpResult> }
  | { kind: 'exit'; exit: ProcessExit };

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}

/** Resolves with `undefined` if `promise` has not settled within `ms`. */
async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
): Promise<T | undefined> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function toReader(source: ReaderSource, owned: Disposable[]): MessageReader {
  if ('listen' in source) {
    return source;
  }
  const reader = new StreamMessageReader(source);
  owned.push(reader);
  return reader;
}

function toWriter(target: WriterTarget, owned: Disposable[]): MessageWriter {
  if ('onClose' in target) {
    return target;
  }
  const writer = new StreamMessageWriter(target);
  owned.push(writer);
  return writer;
}

/**
 * One hookable relay between an editor and a language server. Hooks are fixed
 * at construction; a proxy runs at most one session at a time.
 */
export class Proxy {
  private controller: AbortController | null = null;

  constructor(
    private readonly registry: HookRegistry,
    readonly options: RelayOptions,
  ) {}

  /** Methods with a registered hook. */
  get hookedMethods(): string[] {
    return this.registry.methods();
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Starts `command` and relays between it and the editor until either side
   * closes, the process exits or `stop()` is called. Rejects with
   * `ProcessSpawnError` before any forwarding if the server cannot start,
   * and with the first fatal error of either direction otherwise.
   */
  async spawn(
    command: string,
    args: readonly string[],
    clientReader: ReaderSource,
    clientWriter: WriterTarget,
  ): Promise<ProxyOutcome> {
    const controller = this.begin();
    const owned: Disposable[] = [];
    try {
      const server = await spawnServer(command, args, {
        cwd: this.options.cwd,
        env: this.options.env,
        stderr: this.options.serverStderr,
      });
      return await this.run(controller, {
        clientReader: toReader(clientReader, owned),
        clientWriter: toWriter(clientWriter, owned),
        serverReader: toReader(server.stdout, owned),
        serverWriter: toWriter(server.stdin, owned),
        server,
      });
    } finally {
      this.end(controller, owned);
    }
  }

  /**
   * Relays over already-open streams, e.g. to a server running in process.
   * The server side's writer is ended when the session finishes; the client
   * side's streams are left to the caller.
   */
  async forward(
    serverReader: ReaderSource,
    serverWriter: WriterTarget,
    clientReader: ReaderSource,
    clientWriter: WriterTarget,
  ): Promise<ProxyOutcome> {
    const controller = this.begin();
    const owned: Disposable[] = [];
    try {
      return await this.run(controller, {
        clientReader: toReader(clientReader, owned),
        clientWriter: toWriter(clientWriter, owned),
        serverReader: toReader(serverReader, owned),
        serverWriter: toWriter(serverWriter, owned),
      });
    } finally {
      this.end(controller, owned);
    }
  }

  /** Asks the running session to finish. Safe to call at any time. */
  stop(): void {
    if (this.controller && !this.controller.signal.aborted) {
      logger.log('Stop requested');
      this.controller.abort();
    }
  }

  private begin(): AbortController {
    if (this.controller) {
      throw new Error('Proxy session already running');
    }
    this.registry.freeze();
    this.controller = new AbortController();
    return this.controller;
  }

  private end(controller: AbortController, owned: Disposable[]): void {
    for (const disposable of owned.splice(0)) {
      disposable.dispose();
    }
    if (this.controller === controller) {
      this.controller = null;
    }
  }

  private async run(
    controller: AbortController,
    endpoints: SessionEndpoints,
  ): Promise<ProxyOutcome> {
    const { signal } = controller;
    const graceMs = this.options.shutdownGraceMs;
    const { server } = endpoints;

    const pending = new PendingRequestTable({
      requestTimeoutMs: this.options.requestTimeoutMs,
    });
    const clientQueue = new MessageQueue(
      endpoints.clientReader,
      'client-to-server',
    );
    const serverQueue = new MessageQueue(
      endpoints.serverReader,
      'server-to-client',
    );
    const serverSink = new MessageSink(endpoints.serverWriter, 'server');
    const clientSink = new MessageSink(endpoints.clientWriter, 'client');
    const router = new MessageRouter(this.registry, pending, {
      server: serverSink,
      client: clientSink,
    });

    logger.log(
      () =>
        `Session started${server ? ` for '${server.command}' (pid ${String(server.pid)})` : ''} with hooks [${this.registry.methods().join(', ')}]`,
    );

    const results: Partial<Record<'client' | 'server', Settled<PumpResult>>> =
      {};
    const clientLoop = settle(router.pumpClientToServer(clientQueue, signal)).then(
      (settled) => (results.client = settled),
    );
    const serverLoop = settle(
      router.pumpServerToClient(serverQueue, signal),
    ).then((settled) => (results.server = settled));

    const endings: Array<Promise<Ending>> = [
      clientLoop.then((settled): Ending => ({ kind: 'client', settled })),
      serverLoop.then((settled): Ending => ({ kind: 'server', settled })),
    ];
    if (server) {
      endings.push(
        server.exited.then((exit): Ending => ({ kind: 'exit', exit })),
      );
    }

    let reason: ProxyEndReason;
    let exit: ProcessExit | undefined;
    try {
      const first = await Promise.race(endings);

      if (signal.aborted) {
        reason = 'stopped';
      } else if (first.kind === 'exit') {
        reason = 'process-exit';
        exit = first.exit;
        // Whatever the server wrote before exiting still reaches the editor.
        await withTimeout(serverLoop, graceMs);
      } else if (!first.settled.ok) {
        reason = first.kind === 'client' ? 'client-closed' : 'server-closed';
      } else if (first.kind === 'client') {
        reason = 'client-closed';
        serverSink.close();
        await withTimeout(Promise.all([serverLoop, server?.exited]), graceMs);
      } else {
        reason = 'server-closed';
        if (server) {
          exit = await withTimeout(server.exited, graceMs);
          if (exit) {
            reason = 'process-exit';
          }
        }
      }
    } finally {
      controller.abort();
      await withTimeout(Promise.all([clientLoop, serverLoop]), graceMs);

      pending.clear();
      clientQueue.dispose();
      serverQueue.dispose();
      serverSink.close();
      serverSink.dispose();
      clientSink.dispose();

      if (server) {
        exit = server.isRunning()
          ? await server.stop(graceMs)
          : await server.exited;
      }
    }

    const failure = [results.client, results.server].find(
      (settled): settled is { ok: false; error: unknown } =>
        settled !== undefined && !settled.ok,
    );
    if (failure) {
      logger.error(
        () => `Session failed: ${getErrorMessage(failure.error)}`,
      );
      throw failure.error;
    }

    const routerStats = router.stats;
    const outcome: ProxyOutcome = {
      reason,
      ...(exit ? { exit } : {}),
      stats: {
        clientMessages: routerStats.clientMessages,
        serverMessages: routerStats.serverMessages,
        hookFailures: routerStats.hookFailures,
        evictions: pending.evictions,
        unmatchedResponses: routerStats.unmatchedResponses,
      },
    };
    logger.log(
      () =>
        `Session ended: ${outcome.reason}${exit ? ` (code ${String(exit.code)}, signal ${String(exit.signal)})` : ''}`,
    );
    return outcome;
  }
}

/** Collects hooks and options, then builds a `Proxy`. */
export class ProxyBuilder {
  private readonly hooks = new Map<string, Hook>();
  private options: RelayOptionsInput = {};

  withHook(method: string, hook: Hook): this {
    this.hooks.set(method, hook);
    return this;
  }

  withOptions(options: RelayOptionsInput): this {
    this.options = { ...this.options, ...options };
    return this;
  }

  /** Throws `ConfigError` when the collected options are invalid. */
  build(): Proxy {
    return new Proxy(createHookRegistry(this.hooks), parseOptions(this.options));
  }
}

export type SpawnOptions = RelayOptionsInput & {
  hooks?: Iterable<readonly [string, Hook]>;
};

/** Builds a one-off proxy and runs a single session with it. */
export function spawn(
  command: string,
  args: readonly string[],
  clientReader: ReaderSource,
  clientWriter: WriterTarget,
  options: SpawnOptions = {},
): Promise<ProxyOutcome> {
  const { hooks = [], ...relayOptions } = options;
  const builder = new ProxyBuilder().withOptions(relayOptions);
  for (const [method, hook] of hooks) {
    builder.withHook(method, hook);
  }
  return builder.build().spawn(command, args, clientReader, clientWriter);
}
