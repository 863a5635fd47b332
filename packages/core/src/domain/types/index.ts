/**
 * @fileoverview Domain Types Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Runtime type references. Generic arguments are erased at run time, so
 * classes declare them with static metadata and lookups spell them out:
 *
 * ```typescript
 * import { generic, typeVariable } from '@wireloom/core/domain/types';
 *
 * class Box<T> {
 *   static typeParameters = ['T'] as const;
 * }
 *
 * class StringBox extends Box<string> {
 *   static supertypes = [generic(Box, String)];
 * }
 *
 * locator.getService(generic(Box, String));
 * ```
 */

export * from './type-ref';
export * from './generic-metadata';
