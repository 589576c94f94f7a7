/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugSettings, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'log', 'warn', 'error'];

const NAMESPACE_ROOT = 'lsp-relay';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Merges debug settings from defaults, the environment and ephemeral
 * (runtime) overrides, in that priority order.
 *
 * Recognised environment variables:
 * - `DEBUG`: standard `debug` namespaces; only `lsp-relay*` or `*` entries
 *   enable relay logging.
 * - `LSP_RELAY_DEBUG`: comma-separated namespaces, always enables.
 * - `LSP_RELAY_DEBUG_LEVEL`: minimum level (`debug`, `log`, `warn`, `error`).
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private envConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the singleton so the next getInstance() re-reads the environment.
   */
  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor(env: NodeJS.ProcessEnv = process.env) {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      redactPatterns: ['token', 'password', 'apiKey', 'authorization'],
    };
    this.loadEnvironmentConfig(env);
    this.mergedConfig = this.merge();
  }

  private loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    const debugEnv = env['DEBUG'];
    if (debugEnv) {
      const namespaces = parseNamespaceList(debugEnv).filter(
        (ns) => ns.startsWith(NAMESPACE_ROOT) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    const relayDebug = env['LSP_RELAY_DEBUG'];
    if (relayDebug) {
      this.envConfig = {
        enabled: true,
        namespaces: parseNamespaceList(relayDebug),
      };
    }

    const level = env['LSP_RELAY_DEBUG_LEVEL'];
    if (level && isLogLevel(level)) {
      this.envConfig = { ...this.envConfig, level };
    }
  }

  private merge(): DebugSettings {
    return {
      ...this.defaultConfig,
      ...(this.envConfig ?? {}),
      ...(this.ephemeralConfig ?? {}),
    };
  }

  private mergeConfigurations(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }
}

function parseNamespaceList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
