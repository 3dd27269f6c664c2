/**
 * @fileoverview Public type exports.
 *
 * @module sql-audit-agent/types
 * @version 0.1.0
 */

export * from './core.types.js';
export * from './agent.types.js';
export * from './tools.types.js';
