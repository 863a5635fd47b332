/**
 * @fileoverview Infrastructure Layer Exports
 *
 * @module @wireloom/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Types - Type resolution against generic hierarchies
// ============================================================================
export * from './types';

// ============================================================================
// DI - Service locator and registration
// ============================================================================
export * from './di';

// ============================================================================
// Provides - Provider members as services
// ============================================================================
export * from './provides';

// ============================================================================
// Messaging - Topics and subscribers
// ============================================================================
export * from './messaging';

// ============================================================================
// Logging
// ============================================================================
export { createLogger, rootLogger, type Logger } from './logging/logger';
