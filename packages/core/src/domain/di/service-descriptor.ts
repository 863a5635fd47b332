/**
 * @fileoverview ActiveDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A descriptor is the unit of registration: it says which contracts a
 * service answers to, how instances are created and destroyed, and how long
 * they live.
 *
 * @version 1.0.0
 */

import { type ClassType, type TypeRef, typeName } from '../types/type-ref';

import { type Qualifier } from './qualifier';
import { type Scope } from './service-scope';
import type { IServiceHandle } from './di.interface';

/**
 * ActiveDescriptor - A registered, creatable service.
 *
 * @template T - The service type
 *
 * @remarks
 * **Immutability:**
 *
 * Everything except the ranking and the cache slot is fixed once the
 * descriptor is built. The cache holds the singleton instance for
 * cacheable scopes.
 *
 * **Creation:**
 *
 * `create(root)` is called at most once per lookup; for singletons, at most
 * once until `releaseCache()`. `root` is the handle the lookup started from,
 * which also owns any per-lookup dependencies created along the way.
 */
export interface ActiveDescriptor<T = unknown> {
  /**
   * The raw class of created instances, when there is one.
   */
  readonly implementationClass: ClassType | undefined;

  /**
   * The full (possibly generic) type of created instances.
   */
  readonly implementationType: TypeRef;

  /**
   * The types this service can be looked up by.
   */
  readonly contractTypes: readonly TypeRef[];

  readonly scope: Scope;

  readonly qualifiers: readonly Qualifier[];

  /**
   * The `Named` qualifier value, if any.
   */
  readonly name: string | undefined;

  getRanking(): number;

  /**
   * Change the ranking, returning the previous value.
   */
  setRanking(ranking: number): number;

  create(root: IServiceHandle<T>): T;

  /**
   * Destroy an instance. Must accept `null` without error.
   */
  dispose(instance: T | null): void;

  isCacheSet(): boolean;
  getCache(): T;
  setCache(instance: T): void;
  releaseCache(): void;
}

/**
 * Predicate over descriptors, used for registry queries.
 */
export type DescriptorFilter = (descriptor: ActiveDescriptor) => boolean;

/**
 * Accepts every descriptor.
 */
export const ALL_DESCRIPTORS: DescriptorFilter = () => true;

/**
 * Short description of a descriptor for logs and errors.
 */
export function describeDescriptor(descriptor: ActiveDescriptor): string {
  const contracts = descriptor.contractTypes.map(typeName).join(', ');
  return `${typeName(descriptor.implementationType)} [${contracts}]`;
}
