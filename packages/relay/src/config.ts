/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { ConfigError } from './errors.js';

export const OPTIONS_ENV_VAR = 'LSP_RELAY_OPTIONS';

export const RelayOptionsSchema = z
  .object({
    requestTimeoutMs: z
      .number()
      .int()
      .nonnegative()
      .default(300_000)
      .describe(
        'Evict a pending request after this many ms without a response; 0 never evicts',
      ),
    shutdownGraceMs: z
      .number()
      .int()
      .nonnegative()
      .default(5_000)
      .describe('Time between SIGTERM and SIGKILL when stopping the server'),
    serverStderr: z
      .enum(['inherit', 'pipe', 'ignore'])
      .default('inherit')
      .describe("What to do with the server's stderr"),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export type RelayOptions = z.output<typeof RelayOptionsSchema>;
export type RelayOptionsInput = z.input<typeof RelayOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/** Validates `input` and fills in defaults. Throws `ConfigError`. */
export function parseOptions(input: unknown = {}): RelayOptions {
  const result = RelayOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid relay options: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

export const defaultRelayOptions: RelayOptions = parseOptions();

/**
 * Reads options as JSON from `LSP_RELAY_OPTIONS`. An unset or empty variable
 * yields the defaults.
 */
export function loadOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): RelayOptions {
  const raw = env[OPTIONS_ENV_VAR];
  if (raw === undefined || raw.trim().length === 0) {
    return parseOptions();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${OPTIONS_ENV_VAR} must be valid JSON`, {
      cause: error,
    });
  }
  return parseOptions(parsed);
}
