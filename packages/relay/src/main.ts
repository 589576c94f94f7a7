#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { realpathSync } from 'node:fs';
import { constants } from 'node:os';
import { stderr } from 'node:process';
import { pathToFileURL } from 'node:url';

import { DebugLogger, getErrorMessage } from '@lsp-relay/core';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import {
  defaultRelayOptions,
  loadOptionsFromEnv,
  parseOptions,
  type RelayOptions,
} from './config.js';
import { ConfigError } from './errors.js';
import { ProxyBuilder, type ProxyOutcome } from './proxy.js';

const logger = DebugLogger.getLogger('lsp-relay:cli');

export const USAGE =
  'Usage: lsp-relay [--request-timeout <ms>] [--grace <ms>] [--cwd <dir>] [--stderr inherit|pipe|ignore] -- <command> [args...]';

/** Exit status for usage and configuration errors. */
export const USAGE_EXIT_CODE = 2;

export interface CliInvocation {
  command: string;
  args: string[];
  options: RelayOptions;
}

/**
 * Parses the relay's own flags and the server command line. Flags override
 * `base`. Everything after `--`, or from the first positional argument on,
 * belongs to the server. Throws `ConfigError`.
 */
export function parseCliArgs(
  argv: readonly string[],
  base: RelayOptions = defaultRelayOptions,
): CliInvocation {
  const parsed = yargs([...argv])
    .scriptName('lsp-relay')
    .usage(USAGE)
    .parserConfiguration({
      'populate--': true,
      'halt-at-non-option': true,
      'parse-positional-numbers': false,
    })
    .option('request-timeout', {
      type: 'number',
      description:
        'Forget a request after this many ms without a response (0 = never)',
    })
    .option('grace', {
      type: 'number',
      description: 'Time between SIGTERM and SIGKILL when stopping the server',
    })
    .option('cwd', {
      type: 'string',
      description: 'Working directory for the server',
    })
    .option('stderr', {
      type: 'string',
      description: "What to do with the server's stderr",
    })
    .strictOptions()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw new ConfigError(message || getErrorMessage(error), {
        cause: error,
      });
    })
    .parseSync();

  const dashed = parsed['--'];
  const [command, ...args] = [
    ...parsed._,
    ...(Array.isArray(dashed) ? dashed : []),
  ].map((item: unknown) => String(item));
  if (command === undefined || command.length === 0) {
    throw new ConfigError('Missing server command');
  }

  const options = parseOptions({
    ...base,
    ...(parsed.requestTimeout !== undefined
      ? { requestTimeoutMs: parsed.requestTimeout }
      : {}),
    ...(parsed.grace !== undefined ? { shutdownGraceMs: parsed.grace } : {}),
    ...(parsed.cwd !== undefined ? { cwd: parsed.cwd } : {}),
    ...(parsed.stderr !== undefined ? { serverStderr: parsed.stderr } : {}),
  });

  return { command, args, options };
}

/**
 * Maps a finished session onto the relay's own exit status: the server's
 * exit code, or `128 + n` when it died from signal `n`.
 */
export function exitCodeFor(outcome: ProxyOutcome): number {
  const exit = outcome.exit;
  if (!exit) {
    return 0;
  }
  if (exit.code !== null) {
    return exit.code;
  }
  const signalNumber = Object.entries(constants.signals).find(
    ([name]) => name === exit.signal,
  )?.[1];
  return signalNumber === undefined ? 1 : 128 + signalNumber;
}

export async function main(
  argv: readonly string[] = hideBin(process.argv),
): Promise<number> {
  let invocation: CliInvocation;
  try {
    invocation = parseCliArgs(argv, loadOptionsFromEnv());
  } catch (error) {
    if (error instanceof ConfigError) {
      stderr.write(`${error.message}\n${USAGE}\n`);
      return USAGE_EXIT_CODE;
    }
    throw error;
  }

  const proxy = new ProxyBuilder().withOptions(invocation.options).build();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.log(`Received ${signal}`);
    proxy.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const outcome = await proxy.spawn(
      invocation.command,
      invocation.args,
      process.stdin,
      process.stdout,
    );
    logger.log(
      () =>
        `Relayed ${outcome.stats.clientMessages} client and ${outcome.stats.serverMessages} server messages`,
    );
    return exitCodeFor(outcome);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === pathToFileURL(realpathSync(argvEntry)).href;
  } catch {
    return false;
  }
};

if (isMainModule()) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      stderr.write(`lsp-relay: ${getErrorMessage(error)}\n`);
      process.exit(1);
    },
  );
}
