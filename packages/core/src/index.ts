/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './debug/index.js';
export { getErrorMessage, isNodeError } from './utils/errors.js';
