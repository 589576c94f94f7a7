/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import { DebugLogger } from '@lsp-relay/core';

import { ProcessSpawnError } from '../errors.js';

const logger = DebugLogger.getLogger('lsp-relay:supervisor');

export type StderrMode = 'inherit' | 'pipe' | 'ignore';

export interface SpawnServerOptions {
  cwd?: string;
  /** Merged over the relay's own environment. */
  env?: Record<string, string>;
  stderr?: StderrMode;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ServerProcess {
  readonly command: string;
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  /** Only set when spawned with `stderr: 'pipe'`. */
  readonly stderr: Readable | null;
  readonly exited: Promise<ProcessExit>;
  isRunning(): boolean;
  /**
   * Ends stdin, sends `SIGTERM` and escalates to `SIGKILL` once `graceMs`
   * has passed. Resolves with the exit either way.
   */
  stop(graceMs: number): Promise<ProcessExit>;
}

type ServerChild = ChildProcessByStdio<Writable, Readable, Readable | null>;

class ManagedServerProcess implements ServerProcess {
  readonly exited: Promise<ProcessExit>;
  private exit: ProcessExit | null = null;
  private stopping: Promise<ProcessExit> | null = null;

  constructor(
    readonly command: string,
    private readonly child: ServerChild,
  ) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exit = { code, signal };
        logger.debug(
          () =>
            `'${command}' (pid ${String(child.pid)}) exited with code ${String(code)}, signal ${String(signal)}`,
        );
        resolve(this.exit);
      });
    });

    child.on('error', (error) => {
      logger.warn(() => `'${command}' process error: ${error.message}`);
    });
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      logger.debug(
        () =>
          `'${command}' stdin error${error.code ? ` (${error.code})` : ''}: ${error.message}`,
      );
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  get stderr(): Readable | null {
    return this.child.stderr;
  }

  isRunning(): boolean {
    return this.exit === null;
  }

  stop(graceMs: number): Promise<ProcessExit> {
    if (this.exit) {
      return Promise.resolve(this.exit);
    }
    this.stopping ??= this.terminate(graceMs);
    return this.stopping;
  }

  private async terminate(graceMs: number): Promise<ProcessExit> {
    if (!this.child.stdin.writableEnded) {
      this.child.stdin.end();
    }

    logger.debug(() => `Sending SIGTERM to '${this.command}'`);
    this.child.kill('SIGTERM');

    const timer = setTimeout(() => {
      if (this.isRunning()) {
        logger.warn(
          () =>
            `'${this.command}' still running ${graceMs}ms after SIGTERM; sending SIGKILL`,
        );
        this.child.kill('SIGKILL');
      }
    }, graceMs);
    timer.unref();

    try {
      return await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }
}

function spawnChild(
  command: string,
  args: readonly string[],
  options: SpawnServerOptions,
): ServerChild {
  const env = options.env ? { ...process.env, ...options.env } : process.env;
  const stderr = options.stderr ?? 'inherit';
  if (stderr === 'pipe') {
    return spawn(command, [...args], {
      cwd: options.cwd,
      env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
  }
  return spawn(command, [...args], {
    cwd: options.cwd,
    env,
    stdio: ['pipe', 'pipe', stderr],
  });
}

/**
 * Starts the language server with piped stdin and stdout. Resolves once the
 * operating system reports the process as started; rejects with
 * `ProcessSpawnError` when it cannot be started at all.
 */
export function spawnServer(
  command: string,
  args: readonly string[],
  options: SpawnServerOptions = {},
): Promise<ServerProcess> {
  return new Promise<ServerProcess>((resolve, reject) => {
    let child: ServerChild;
    try {
      child = spawnChild(command, args, options);
    } catch (error) {
      reject(new ProcessSpawnError(command, error));
      return;
    }

    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      logger.error(() => `Could not start '${command}': ${error.message}`);
      reject(new ProcessSpawnError(command, error));
    };
    const onSpawn = (): void => {
      child.off('error', onError);
      logger.debug(
        () =>
          `Started '${command}' ${args.join(' ')} (pid ${String(child.pid)})`,
      );
      resolve(new ManagedServerProcess(command, child));
    };

    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}
