/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '@lsp-relay/core';

import { RegistryFrozenError } from '../errors.js';
import type { Hook } from '../hooks.js';

const logger = DebugLogger.getLogger('lsp-relay:hooks');

/**
 * Method name to hook mapping. Filled before a session starts and read-only
 * once frozen.
 */
export class HookRegistry {
  private readonly hooks = new Map<string, Hook>();
  private frozen = false;

  /** Last registration for a method wins. */
  register(method: string, hook: Hook): this {
    if (this.frozen) {
      throw new RegistryFrozenError(method);
    }
    if (this.hooks.has(method)) {
      logger.debug(() => `Replacing hook for '${method}'`);
    }
    this.hooks.set(method, hook);
    return this;
  }

  lookup(method: string): Hook | undefined {
    return this.hooks.get(method);
  }

  has(method: string): boolean {
    return this.hooks.has(method);
  }

  methods(): string[] {
    return [...this.hooks.keys()].sort((a, b) => a.localeCompare(b));
  }

  get size(): number {
    return this.hooks.size;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}

export function createHookRegistry(
  entries: Iterable<readonly [string, Hook]> = [],
): HookRegistry {
  const registry = new HookRegistry();
  for (const [method, hook] of entries) {
    registry.register(method, hook);
  }
  return registry;
}
