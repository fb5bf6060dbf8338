/**
 * @pdu-cycle/core - Core types and contracts for pdu-cycle
 *
 * This package provides pure definitions with no side effects.
 * All implementations should depend on these core types.
 *
 * Dependency direction: core → runtime → transport → cli
 */

// Constants
export * from './constants.js';
// Error system
export * from './errors/index.js';
// Logger
export * from './logger.js';
// Configuration schemas
export * from './schemas.js';
// Domain types and capabilities
export * from './types/index.js';
