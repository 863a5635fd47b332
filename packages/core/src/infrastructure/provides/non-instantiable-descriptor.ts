/**
 * @fileoverview NonInstantiableClassDescriptor - Placeholder Registration
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Stands in for a class that was registered only to expose its static
 * provider members. It advertises no contracts, so no lookup ever selects
 * it.
 *
 * @version 1.0.0
 */

import { type ClassType, type Qualifier, type TypeRef, NonInstantiableServiceError, Scope } from '../../domain';
import { AbstractActiveDescriptor } from '../di/abstract-descriptor';

export class NonInstantiableClassDescriptor extends AbstractActiveDescriptor<never> {
  readonly implementationType: TypeRef;
  readonly contractTypes: readonly TypeRef[] = [];
  readonly scope = Scope.PerLookup;
  readonly qualifiers: readonly Qualifier[] = [];

  constructor(readonly implementationClass: ClassType) {
    super();
    this.implementationType = implementationClass;
  }

  /**
   * @throws NonInstantiableServiceError always
   */
  create(): never {
    throw new NonInstantiableServiceError(
      this.implementationClass.name,
      'it was registered only for its static provider members',
    );
  }

  dispose(): void {
    // never created, so only ever called with null
  }
}
