/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './message.js';
export * from './errors.js';
export * from './hooks.js';
export * from './config.js';
export * from './service/hook-registry.js';
export * from './service/pending-requests.js';
export * from './service/router.js';
export * from './service/supervisor.js';
export * from './channels/message-queue.js';
export * from './channels/message-sink.js';
export * from './proxy.js';
