/**
 * @fileoverview DynamicConfiguration - Transactional Registration
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Descriptors added to a configuration stay invisible until `commit()`,
 * which hands them to the locator in one step. A configuration cannot be
 * reused after it is committed.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type IDynamicConfiguration,
  type IDynamicConfigurationService,
  type IServiceLocator,
  ConfigurationCommittedError,
  DYNAMIC_CONFIGURATION_SERVICE,
  typesEqual,
} from '../../domain';

import { ClassDescriptor } from './class-descriptor';
import type { ServiceLocator } from './service-locator';

export class DynamicConfiguration implements IDynamicConfiguration {
  private readonly pending: ActiveDescriptor[] = [];
  private committed = false;

  constructor(private readonly locator: ServiceLocator) {}

  addActiveDescriptor<T>(descriptor: ActiveDescriptor<T>): ActiveDescriptor<T> {
    this.ensureNotCommitted();
    this.pending.push(descriptor);
    return descriptor;
  }

  /**
   * @throws NonInstantiableServiceError if the class cannot be constructed
   */
  addActiveClass(cls: ClassType): ActiveDescriptor {
    this.ensureNotCommitted();
    return this.addActiveDescriptor(new ClassDescriptor(cls, this.locator));
  }

  commit(): void {
    this.ensureNotCommitted();
    this.committed = true;
    this.locator.commit(this.pending);
  }

  private ensureNotCommitted(): void {
    if (this.committed) {
      throw new ConfigurationCommittedError();
    }
  }
}

/**
 * The default configuration service, registered by every locator at
 * rank 0.
 */
export class DynamicConfigurationService implements IDynamicConfigurationService {
  constructor(private readonly locator: ServiceLocator) {}

  createDynamicConfiguration(): IDynamicConfiguration {
    return new DynamicConfiguration(this.locator);
  }
}

/**
 * Check if `descriptor` is the registration of `cls` itself.
 */
function isClassRegistration(descriptor: ActiveDescriptor, cls: ClassType): boolean {
  return descriptor.implementationClass === cls && typesEqual(descriptor.implementationType, cls);
}

/**
 * Register classes in one configuration, through the best-ranked
 * configuration service.
 *
 * @param idempotent - Skip classes that are already registered
 * @returns The descriptors added
 *
 * @example
 * ```typescript
 * addClasses(locator, true, ProvidesEnabler, TopicDistributionService);
 * ```
 */
export function addClasses(
  locator: IServiceLocator,
  idempotent: boolean,
  ...classes: ClassType[]
): ActiveDescriptor[] {
  const configuration = locator.getService(DYNAMIC_CONFIGURATION_SERVICE).createDynamicConfiguration();
  const added: ActiveDescriptor[] = [];
  const seen = new Set<ClassType>();

  for (const cls of classes) {
    if (idempotent) {
      if (seen.has(cls) || locator.getDescriptors((descriptor) => isClassRegistration(descriptor, cls)).length > 0) {
        continue;
      }
      seen.add(cls);
    }
    added.push(configuration.addActiveClass(cls));
  }

  if (added.length > 0) {
    configuration.commit();
  }
  return added;
}
