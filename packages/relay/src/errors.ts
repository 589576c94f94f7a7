/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Direction, RequestId } from './types.js';

export type RelayErrorCode =
  | 'MALFORMED_MESSAGE'
  | 'DUPLICATE_IN_FLIGHT_ID'
  | 'HOOK_FAILURE'
  | 'STREAM_CLOSED'
  | 'PROCESS_SPAWN_FAILURE'
  | 'REGISTRY_FROZEN'
  | 'CONFIG_INVALID';

/**
 * Base class for every error the relay raises. `code` is stable and safe to
 * switch on; `message` is for humans.
 */
export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
  }
}

/**
 * A frame that could not be decoded, or a decoded value that is not a request,
 * response or notification. Fatal for the direction it was read on.
 */
export class MalformedMessageError extends RelayError {
  readonly direction: Direction;

  constructor(direction: Direction, reason: string, options?: ErrorOptions) {
    super('MALFORMED_MESSAGE', `Malformed message (${direction}): ${reason}`, options);
    this.name = 'MalformedMessageError';
    this.direction = direction;
  }
}

/**
 * A request id was recorded while an earlier request with the same id was
 * still waiting for its response. Returned rather than thrown; the newer
 * mapping wins.
 */
export class DuplicateInFlightIdError extends RelayError {
  readonly id: RequestId;
  readonly previousMethod: string;
  readonly method: string;

  constructor(id: RequestId, previousMethod: string, method: string) {
    super(
      'DUPLICATE_IN_FLIGHT_ID',
      `Request id ${JSON.stringify(id)} is already in flight for '${previousMethod}'; now tracking '${method}'`,
    );
    this.name = 'DuplicateInFlightIdError';
    this.id = id;
    this.previousMethod = previousMethod;
    this.method = method;
  }
}

export class StreamClosedError extends RelayError {
  constructor(message = 'Stream closed', options?: ErrorOptions) {
    super('STREAM_CLOSED', message, options);
    this.name = 'StreamClosedError';
  }
}

export class ProcessSpawnError extends RelayError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super(
      'PROCESS_SPAWN_FAILURE',
      `Failed to start '${command}': ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'ProcessSpawnError';
    this.command = command;
  }
}

export class RegistryFrozenError extends RelayError {
  constructor(method: string) {
    super(
      'REGISTRY_FROZEN',
      `Cannot register a hook for '${method}' after the proxy session has started`,
    );
    this.name = 'RegistryFrozenError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
  }
}
