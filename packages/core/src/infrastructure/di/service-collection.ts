/**
 * @fileoverview ServiceCollection - Service Registration Implementation
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements IServiceCollection with a fluent API for
 * registering services before a locator exists. Registrations are recorded
 * and replayed into a locator as a single configuration.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type Constructor,
  type IBuildOptions,
  type IDynamicConfiguration,
  type IServiceCollection,
  type IServiceLocator,
  type Qualifier,
  type ServiceFactory,
  type ServiceType,
  type TypeRef,
  ContainerSealedError,
  DYNAMIC_CONFIGURATION_SERVICE,
  Scope,
  isClassType,
  typesEqual,
} from '../../domain';

import { ClassDescriptor, ConstantDescriptor, FactoryDescriptor, getClassContracts } from './class-descriptor';
import { ServiceLocator } from './service-locator';

/**
 * A recorded registration.
 * @internal
 */
interface Registration {
  readonly contracts: readonly TypeRef[];
  apply(locator: IServiceLocator, configuration: IDynamicConfiguration): void;
}

/**
 * ServiceCollection - Fluent API for service registration.
 *
 * @remarks
 * **Usage Pattern:**
 *
 * ```typescript
 * const locator = new ServiceCollection()
 *   .addSingleton(Settings)
 *   .addSingleton(Clock, SystemClock)
 *   .addPerLookup(ReportJob)
 *   .addClass(DatabaseModule)
 *   .build();
 * ```
 *
 * `addClass` registers through the locator's best configuration service,
 * so classes that only exist to carry provider members are accepted once
 * the provides module is enabled. The other methods build their
 * descriptors directly.
 *
 * **Sealing:**
 *
 * `build()` and `applyTo()` seal the collection. Later registrations throw
 * `ContainerSealedError`.
 */
export class ServiceCollection implements IServiceCollection {
  private readonly registrations: Registration[] = [];

  private sealed = false;

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * @throws ContainerSealedError if sealed
   */
  private ensureNotSealed(operation: string): void {
    if (this.sealed) {
      throw new ContainerSealedError(operation);
    }
  }

  private register(operation: string, registration: Registration): this {
    this.ensureNotSealed(operation);
    this.registrations.push(registration);
    return this;
  }

  private addWithScope<T>(
    operation: string,
    scope: Scope,
    first: ServiceType<T>,
    implementation: Constructor<T> | undefined,
  ): this {
    const [contract, cls] = this.normalizeArgs(first, implementation);
    const contracts = contract === undefined ? undefined : [contract];

    return this.register(operation, {
      contracts: contracts ?? getClassContracts(cls),
      apply: (locator, configuration) => {
        configuration.addActiveDescriptor(new ClassDescriptor(cls, locator, { scope, contracts }));
      },
    });
  }

  // ============================================================================
  // Class Registration
  // ============================================================================

  /**
   * Register a singleton service.
   *
   * @remarks
   * Two overloads:
   * 1. Self-registration: `addSingleton(Settings)`
   * 2. Contract-to-impl: `addSingleton(Clock, SystemClock)`
   */
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(contract: ServiceType<T>, implementation: Constructor<T>): this;
  addSingleton<T>(first: ServiceType<T>, implementation?: Constructor<T>): this {
    return this.addWithScope('add singleton', Scope.Singleton, first, implementation);
  }

  /**
   * Register a per-lookup service.
   */
  addPerLookup<T>(implementation: Constructor<T>): this;
  addPerLookup<T>(contract: ServiceType<T>, implementation: Constructor<T>): this;
  addPerLookup<T>(first: ServiceType<T>, implementation?: Constructor<T>): this {
    return this.addWithScope('add per-lookup service', Scope.PerLookup, first, implementation);
  }

  addClass(cls: ClassType): this {
    return this.register('add class', {
      contracts: getClassContracts(cls),
      apply: (_locator, configuration) => {
        configuration.addActiveClass(cls);
      },
    });
  }

  // ============================================================================
  // Instances and Factories
  // ============================================================================

  /**
   * Register a pre-created instance. The container never destroys it.
   */
  addInstance<T>(contract: ServiceType<T>, instance: T, ...qualifiers: Qualifier[]): this {
    return this.register('add instance', {
      contracts: [contract],
      apply: (_locator, configuration) => {
        configuration.addActiveDescriptor(new ConstantDescriptor(instance, [contract], qualifiers));
      },
    });
  }

  addFactory<T>(contract: ServiceType<T>, factory: ServiceFactory<T>, scope: Scope = Scope.PerLookup): this {
    return this.register('add factory', {
      contracts: [contract],
      apply: (locator, configuration) => {
        configuration.addActiveDescriptor(new FactoryDescriptor(contract, factory, scope, locator));
      },
    });
  }

  addDescriptor(descriptor: ActiveDescriptor): this {
    return this.register('add descriptor', {
      contracts: descriptor.contractTypes,
      apply: (_locator, configuration) => {
        configuration.addActiveDescriptor(descriptor);
      },
    });
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Check if a registration advertises `type`.
   */
  has(type: TypeRef): boolean {
    return this.registrations.some((registration) =>
      registration.contracts.some((contract) => typesEqual(contract, type)),
    );
  }

  /**
   * Replay every registration into `locator` as one configuration.
   */
  applyTo(locator: IServiceLocator): IServiceLocator {
    this.sealed = true;

    const configuration = locator.getService(DYNAMIC_CONFIGURATION_SERVICE).createDynamicConfiguration();
    for (const registration of this.registrations) {
      registration.apply(locator, configuration);
    }
    configuration.commit();

    return locator;
  }

  /**
   * Build a new locator holding every registration.
   */
  build(options?: IBuildOptions): IServiceLocator {
    return this.applyTo(new ServiceLocator(options));
  }

  /**
   * Normalize registration arguments.
   *
   * Handles two overload patterns:
   * 1. `add*(Implementation)` - self-registration
   * 2. `add*(Contract, Implementation)` - contract-to-impl
   */
  private normalizeArgs<T>(
    first: ServiceType<T>,
    implementation: Constructor<T> | undefined,
  ): [TypeRef | undefined, ClassType<T>] {
    if (implementation !== undefined) {
      return [first, implementation];
    }
    if (isClassType(first)) {
      return [undefined, first];
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or [contract, implementation], ` +
        `got token '${first.description}'`,
    );
  }
}

/**
 * Create a new ServiceCollection.
 */
export function createServiceCollection(): ServiceCollection {
  return new ServiceCollection();
}
