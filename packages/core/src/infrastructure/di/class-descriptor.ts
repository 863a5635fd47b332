/**
 * @fileoverview Built-in Descriptors - Classes, Constants and Factories
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * | Descriptor | Created by | Destroyed by |
 * |------------|------------|--------------|
 * | ClassDescriptor | `new cls(...inject)` then `postConstruct()` | `preDestroy()` |
 * | ConstantDescriptor | returns the registered instance | nothing; the caller owns it |
 * | FactoryDescriptor | `factory(locator)` then `postConstruct()` | `preDestroy()` |
 *
 * @version 1.0.0
 */

import {
  type ClassType,
  type Constructor,
  type IServiceHandle,
  type IServiceLocator,
  type Qualifier,
  type ServiceFactory,
  type TypeRef,
  NonInstantiableServiceError,
  Scope,
  addDistinctType,
  getContractsMarker,
  getInjectDependencies,
  getQualifierMarkers,
  getRankMarker,
  getScopeMarker,
  isConstructible,
  isContract,
  rawClassOf,
} from '../../domain';
import { getAllSupertypes } from '../types/type-resolver';

import { AbstractActiveDescriptor } from './abstract-descriptor';
import { serviceFromParameter } from './parameter-resolver';

/**
 * Options overriding the markers a class declares.
 */
export interface ClassDescriptorOptions {
  readonly scope?: Scope;
  readonly contracts?: readonly TypeRef[];
  readonly qualifiers?: readonly Qualifier[];
  readonly rank?: number;
}

/**
 * Contracts advertised by a class: its `static contracts` list, or the
 * class itself plus every supertype marked `contract`.
 */
export function getClassContracts(cls: ClassType): TypeRef[] {
  const declared = getContractsMarker(cls);
  if (declared) {
    return [...declared];
  }

  const contracts: TypeRef[] = [cls];
  for (const supertype of getAllSupertypes(cls)) {
    const raw = rawClassOf(supertype);
    if (raw && raw !== cls && isContract(raw)) {
      addDistinctType(contracts, supertype);
    }
  }
  return contracts;
}

/**
 * @throws NonInstantiableServiceError if `cls` cannot be constructed from
 * its `inject` list
 */
export function assertConstructible<T>(cls: ClassType<T>): asserts cls is Constructor<T> {
  if (isConstructible(cls)) {
    return;
  }
  throw new NonInstantiableServiceError(
    cls.name,
    isContract(cls)
      ? 'it is marked as a contract'
      : `its constructor takes ${cls.length} parameter(s) but inject declares ${getInjectDependencies(cls).length}`,
  );
}

// ============================================================================
// ClassDescriptor
// ============================================================================

/**
 * Creates instances through the constructor, resolving `static inject`.
 *
 * @example
 * ```typescript
 * const descriptor = new ClassDescriptor(Reports, locator, { scope: Scope.Singleton });
 * ```
 */
export class ClassDescriptor<T> extends AbstractActiveDescriptor<T> {
  readonly implementationClass: Constructor<T>;
  readonly implementationType: TypeRef;
  readonly contractTypes: readonly TypeRef[];
  readonly scope: Scope;
  readonly qualifiers: readonly Qualifier[];

  constructor(
    cls: ClassType<T>,
    private readonly locator: IServiceLocator,
    private readonly options: ClassDescriptorOptions = {},
  ) {
    super();
    assertConstructible(cls);

    this.implementationClass = cls;
    this.implementationType = cls;
    this.contractTypes = options.contracts ?? getClassContracts(cls);
    this.scope = options.scope ?? getScopeMarker(cls) ?? Scope.PerLookup;
    this.qualifiers = options.qualifiers ?? getQualifierMarkers(cls);
  }

  protected override initialRanking(): number | undefined {
    return this.options.rank ?? getRankMarker(this.implementationClass);
  }

  create(root: IServiceHandle<T>): T {
    const cls = this.implementationClass;
    const parent = `${cls.name} constructor`;

    const args = getInjectDependencies(cls).map((spec, position) =>
      serviceFromParameter(
        spec,
        { context: this.implementationType, parent, position, injecteeDescriptor: this },
        this.locator,
        root,
      ),
    );

    const instance = new cls(...args);
    this.locator.postConstruct(instance);
    return instance;
  }

  dispose(instance: T | null): void {
    if (instance !== null) {
      this.locator.preDestroy(instance);
    }
  }
}

// ============================================================================
// ConstantDescriptor
// ============================================================================

/**
 * Always answers with one pre-built instance.
 */
export class ConstantDescriptor<T> extends AbstractActiveDescriptor<T> {
  readonly implementationClass: ClassType | undefined;
  readonly implementationType: TypeRef;
  readonly contractTypes: readonly TypeRef[];
  readonly scope = Scope.Singleton;
  readonly qualifiers: readonly Qualifier[];

  constructor(
    private readonly instance: T,
    contracts: readonly TypeRef[],
    qualifiers: readonly Qualifier[] = [],
    private readonly rank?: number,
  ) {
    super();
    const primary = contracts[0];
    this.implementationClass = primary === undefined ? undefined : rawClassOf(primary);
    this.implementationType = primary ?? Object;
    this.contractTypes = contracts;
    this.qualifiers = qualifiers;
  }

  protected override initialRanking(): number | undefined {
    return this.rank;
  }

  create(): T {
    return this.instance;
  }

  dispose(): void {
    // owned by whoever registered it
  }
}

// ============================================================================
// FactoryDescriptor
// ============================================================================

/**
 * Creates instances by calling a factory function with the locator.
 */
export class FactoryDescriptor<T> extends AbstractActiveDescriptor<T> {
  readonly implementationClass: ClassType | undefined;
  readonly implementationType: TypeRef;
  readonly contractTypes: readonly TypeRef[];
  readonly qualifiers: readonly Qualifier[] = [];

  constructor(
    contract: TypeRef,
    private readonly factory: ServiceFactory<T>,
    readonly scope: Scope,
    private readonly locator: IServiceLocator,
  ) {
    super();
    this.implementationClass = rawClassOf(contract);
    this.implementationType = contract;
    this.contractTypes = [contract];
  }

  create(): T {
    const instance = this.factory(this.locator);
    if (instance !== null && instance !== undefined) {
      this.locator.postConstruct(instance);
    }
    return instance;
  }

  dispose(instance: T | null): void {
    if (instance !== null) {
      this.locator.preDestroy(instance);
    }
  }
}
