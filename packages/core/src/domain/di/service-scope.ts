/**
 * @fileoverview Scope - Service Lifecycle Policy
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the scopes that control when service instances are
 * created and destroyed, and how a class declares its scope marker.
 *
 * @version 1.0.0
 */

import { type ClassType } from '../types/type-ref';
import { readOwnStatic } from '../types/generic-metadata';

/**
 * Scope - Defines when service instances are created and destroyed.
 *
 * @remarks
 * | Scope | Created | Shared | Destroyed |
 * |-------|---------|--------|-----------|
 * | Singleton | First lookup | Globally | Locator shutdown |
 * | PerLookup | Every lookup | Never | When the creating handle is closed |
 *
 * A per-lookup instance obtained without a handle is never destroyed by the
 * container; the caller owns it.
 *
 * @example
 * ```typescript
 * class Clock {
 *   static scope = Scope.Singleton;
 * }
 *
 * class RequestTimer {
 *   static scope = Scope.PerLookup;
 * }
 * ```
 */
export enum Scope {
  /**
   * One instance per locator, cached on the descriptor.
   */
  Singleton = 'singleton',

  /**
   * A fresh instance for every lookup.
   */
  PerLookup = 'per-lookup',
}

/**
 * Check if instances of a scope are cached on their descriptor.
 */
export function isCacheable(scope: Scope): boolean {
  return scope === Scope.Singleton;
}

/**
 * Type guard for scope values.
 */
export function isScope(value: unknown): value is Scope {
  return value === Scope.Singleton || value === Scope.PerLookup;
}

/**
 * Human-readable scope name for error messages.
 */
export function getScopeName(scope: Scope): string {
  switch (scope) {
    case Scope.Singleton:
      return 'Singleton';
    case Scope.PerLookup:
      return 'PerLookup';
  }
}

/**
 * The scope marker declared directly on `cls` by `static scope`.
 */
export function getScopeMarker(cls: ClassType): Scope | undefined {
  const declared = readOwnStatic(cls, 'scope');
  return isScope(declared) ? declared : undefined;
}
