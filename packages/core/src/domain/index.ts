/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains the container's contracts and pure metadata
 * readers. NO infrastructure dependencies are allowed here (Hexagonal
 * Architecture).
 *
 * @module @wireloom/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Types - Runtime type references and generic metadata
// ============================================================================
export * from './types';

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';

// ============================================================================
// Provides - Provider member declarations
// ============================================================================
export * from './provides';

// ============================================================================
// Messaging - Topics and message receivers
// ============================================================================
export * from './messaging';
