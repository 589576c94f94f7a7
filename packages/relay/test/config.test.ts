/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import {
  defaultRelayOptions,
  loadOptionsFromEnv,
  OPTIONS_ENV_VAR,
  parseOptions,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseOptions', () => {
  it('fills in defaults', () => {
    expect(parseOptions()).toEqual({
      requestTimeoutMs: 300_000,
      shutdownGraceMs: 5_000,
      serverStderr: 'inherit',
    });
    expect(defaultRelayOptions).toEqual(parseOptions({}));
  });

  it('keeps every given option', () => {
    expect(
      parseOptions({
        requestTimeoutMs: 0,
        shutdownGraceMs: 100,
        serverStderr: 'pipe',
        cwd: '/srv/project',
        env: { RUST_LOG: 'info' },
      }),
    ).toEqual({
      requestTimeoutMs: 0,
      shutdownGraceMs: 100,
      serverStderr: 'pipe',
      cwd: '/srv/project',
      env: { RUST_LOG: 'info' },
    });
  });

  it('names the offending field', () => {
    expect(() => parseOptions({ requestTimeoutMs: -1 })).toThrow(
      'Invalid relay options: requestTimeoutMs: Number must be greater than or equal to 0',
    );
  });

  it('rejects fractional durations', () => {
    expect(() => parseOptions({ shutdownGraceMs: 1.5 })).toThrow(
      'Invalid relay options: shutdownGraceMs: Expected integer, received float',
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseOptions({ retries: 3 })).toThrow(
      "Invalid relay options: Unrecognized key(s) in object: 'retries'",
    );
  });

  it('throws ConfigError with the zod error as cause', () => {
    const failure = (() => {
      try {
        parseOptions({ serverStderr: 'file' });
        return undefined;
      } catch (error) {
        return error;
      }
    })();

    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure instanceof ConfigError && failure.code).toBe(
      'CONFIG_INVALID',
    );
    expect(failure instanceof ConfigError && failure.cause).toBeDefined();
  });
});

describe('loadOptionsFromEnv', () => {
  it('returns the defaults when the variable is unset or blank', () => {
    expect(loadOptionsFromEnv({})).toEqual(defaultRelayOptions);
    expect(loadOptionsFromEnv({ [OPTIONS_ENV_VAR]: '   ' })).toEqual(
      defaultRelayOptions,
    );
  });

  it('reads JSON options', () => {
    expect(
      loadOptionsFromEnv({
        LSP_RELAY_OPTIONS: '{"requestTimeoutMs":0,"serverStderr":"ignore"}',
      }),
    ).toEqual({
      requestTimeoutMs: 0,
      shutdownGraceMs: 5_000,
      serverStderr: 'ignore',
    });
  });

  it('rejects text that is not JSON', () => {
    expect(() => loadOptionsFromEnv({ LSP_RELAY_OPTIONS: 'fast please' })).toThrow(
      'LSP_RELAY_OPTIONS must be valid JSON',
    );
  });

  it('validates the decoded value', () => {
    expect(() =>
      loadOptionsFromEnv({ LSP_RELAY_OPTIONS: '{"shutdownGraceMs":"soon"}' }),
    ).toThrow(
      'Invalid relay options: shutdownGraceMs: Expected number, received string',
    );
  });
});
