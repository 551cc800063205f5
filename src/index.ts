/**
 * @fileoverview pursuit-runtime public API.
 *
 * @module pursuit-runtime
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './metrics/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './scenarios/index.js';
