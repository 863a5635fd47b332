/**
 * @fileoverview AbstractActiveDescriptor - Shared Descriptor State
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Ranking and cache bookkeeping common to every descriptor.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type IServiceHandle,
  type Qualifier,
  type Scope,
  type TypeRef,
  getName,
} from '../../domain';

/**
 * Base class for descriptors.
 *
 * @remarks
 * The ranking is computed on first access through {@link initialRanking}
 * and cached; the cache slot holds the singleton instance.
 */
export abstract class AbstractActiveDescriptor<T> implements ActiveDescriptor<T> {
  abstract readonly implementationClass: ClassType | undefined;
  abstract readonly implementationType: TypeRef;
  abstract readonly contractTypes: readonly TypeRef[];
  abstract readonly scope: Scope;
  abstract readonly qualifiers: readonly Qualifier[];

  private ranking = 0;
  private rankingFound = false;
  private cache: { readonly value: T } | undefined;

  get name(): string | undefined {
    return getName(this.qualifiers);
  }

  /**
   * The ranking declared for this service, if any.
   */
  protected initialRanking(): number | undefined {
    return undefined;
  }

  getRanking(): number {
    if (!this.rankingFound) {
      this.ranking = this.initialRanking() ?? 0;
      this.rankingFound = true;
    }
    return this.ranking;
  }

  setRanking(ranking: number): number {
    const previous = this.getRanking();
    this.ranking = ranking;
    return previous;
  }

  isCacheSet(): boolean {
    return this.cache !== undefined;
  }

  getCache(): T {
    if (this.cache === undefined) {
      throw new Error('Descriptor cache is not set');
    }
    return this.cache.value;
  }

  setCache(instance: T): void {
    this.cache = { value: instance };
  }

  releaseCache(): void {
    this.cache = undefined;
  }

  abstract create(root: IServiceHandle<T>): T;

  abstract dispose(instance: T | null): void;
}
