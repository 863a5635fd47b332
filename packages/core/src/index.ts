/**
 * @fileoverview @wireloom/core - Main Entry Point
 *
 * A dependency injection container with Hexagonal Architecture, provider
 * members and typed publish/subscribe topics.
 *
 * @packageDocumentation
 * @module @wireloom/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { ServiceCollection, Services, Scope, provides } from '@wireloom/core';
 *
 * class ConnectionPool {
 *   constructor(readonly name: string) {}
 * }
 *
 * class Pools {
 *   static provides = {
 *     primary: provides.method({ static: true, type: ConnectionPool, scope: Scope.Singleton }),
 *   };
 *
 *   static primary(): ConnectionPool {
 *     return new ConnectionPool('primary');
 *   }
 * }
 *
 * const services = new Services(new ServiceCollection().addClass(Pools));
 * const pool = services.getService(ConnectionPool);
 * services.shutdown();
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts and metadata - NO infrastructure dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// The Services facade and module enablers
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Locator, provides and messaging implementations
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
