/**
 * @fileoverview ProvidesEnabler - Registers Provider Members as Services
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The enabler is a configuration listener and, at rank 1, the container's
 * preferred configuration service.
 *
 * ## On Every Configuration Change
 *
 * ```
 * for each registered descriptor (reified)
 *   class not yet seen in the AnalysisTable?
 *     scan static members            (unless already recorded)
 *     scan instance members          (owner = that descriptor)
 * record, add to one configuration, commit if anything was added
 * ```
 *
 * The commit notifies listeners again, so classes provided by the new
 * descriptors are scanned in the next round.
 *
 * ## Registering a Class Through the Enabler
 *
 * `createDynamicConfiguration()` wraps the default configuration. A class
 * added to it is scanned for static provider members right away; a class
 * that cannot be instantiated is then represented by one of those members
 * or by a {@link NonInstantiableClassDescriptor}. The members are recorded
 * on `commit()`.
 *
 * Parameters of provider members are not checked against what is
 * registered: a member whose dependency is still missing is registered
 * anyway and throws {@link UnsatisfiedDependencyError} when it is invoked.
 *
 * @example
 * ```typescript
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
 * services.getService(ConnectionPool); // from Pools.primary()
 * ```
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type IDynamicConfiguration,
  type IDynamicConfigurationListener,
  type IDynamicConfigurationService,
  type IServiceHandle,
  type IServiceLocator,
  type TypeRef,
  DYNAMIC_CONFIGURATION_LISTENER,
  DYNAMIC_CONFIGURATION_SERVICE,
  SERVICE_LOCATOR_TOKEN,
  Scope,
  ServiceNotFoundError,
  isConstructible,
  typesEqual,
} from '../../domain';
import { createLogger } from '../logging/logger';
import { isSubclass } from '../types/type-resolver';

import { AnalysisTable } from './analysis-table';
import { NonInstantiableClassDescriptor } from './non-instantiable-descriptor';
import {
  type ProviderMemberKind,
  INSTANCE_MEMBER_KINDS,
  STATIC_MEMBER_KINDS,
  isStaticMember,
} from './provider-member';
import { ProviderScanner, collectProviderMembers } from './provider-scanner';
import { type ProvidesDescriptor } from './provides-descriptor';

/**
 * Descriptors scanned for one member kind of one class.
 */
export interface ScannedGroup {
  readonly cls: ClassType;
  readonly kind: ProviderMemberKind;
  readonly descriptors: readonly ProvidesDescriptor[];
}

/**
 * Check for a class with nothing but static provider members: no
 * prototype methods and no instance provider declarations.
 */
function isUtilityClass(cls: ClassType): boolean {
  const prototype: unknown = cls.prototype;
  const onlyConstructor =
    typeof prototype === 'object' &&
    prototype !== null &&
    Object.getOwnPropertyNames(prototype).every((name) => name === 'constructor');

  return onlyConstructor && collectProviderMembers(cls).every(isStaticMember);
}

export class ProvidesEnabler implements IDynamicConfigurationService, IDynamicConfigurationListener {
  static scope = Scope.Singleton;
  static rank = 1;
  static contracts: readonly TypeRef[] = [
    ProvidesEnabler,
    DYNAMIC_CONFIGURATION_SERVICE,
    DYNAMIC_CONFIGURATION_LISTENER,
  ];
  static inject = [SERVICE_LOCATOR_TOKEN, AnalysisTable];

  private readonly log = createLogger('provides-enabler');
  private readonly scanner: ProviderScanner;

  constructor(
    private readonly locator: IServiceLocator,
    private readonly table: AnalysisTable,
  ) {
    this.scanner = new ProviderScanner(locator);
  }

  createDynamicConfiguration(): IDynamicConfiguration {
    return new ProvidesDynamicConfiguration(this.defaultConfigurationService().createDynamicConfiguration(), this);
  }

  configurationChanged(): void {
    try {
      this.registerNewClasses();
    } catch (error) {
      this.log.error({ err: error }, 'Failed to register provider members');
      throw error;
    }
  }

  /**
   * Candidate descriptors for the static members of `cls` whose kind is
   * not recorded yet.
   * @internal Used by ProvidesDynamicConfiguration
   */
  scanStaticProviders(cls: ClassType): ScannedGroup[] {
    return STATIC_MEMBER_KINDS.filter((kind) => !this.table.hasDescriptors(cls, kind)).map((kind) => ({
      cls,
      kind,
      descriptors: this.scanner.scan(cls, kind),
    }));
  }

  /**
   * @internal Used by ProvidesDynamicConfiguration
   */
  recordedStaticProviders(cls: ClassType): ActiveDescriptor[] {
    return STATIC_MEMBER_KINDS.flatMap((kind) => this.table.getDescriptors(cls, kind));
  }

  private registerNewClasses(): void {
    const groups: ScannedGroup[] = [];

    for (const registered of this.locator.getDescriptors()) {
      const descriptor = this.locator.reifyDescriptor(registered);
      const cls = descriptor.implementationClass;
      if (cls === undefined || !this.table.beginAnalysis('provides', cls)) {
        continue;
      }

      try {
        for (const kind of STATIC_MEMBER_KINDS) {
          if (!this.table.hasDescriptors(cls, kind)) {
            groups.push({ cls, kind, descriptors: this.scanner.scan(cls, kind) });
          }
        }
        if (!(descriptor instanceof NonInstantiableClassDescriptor)) {
          for (const kind of INSTANCE_MEMBER_KINDS) {
            if (!this.table.hasDescriptors(cls, kind)) {
              groups.push({ cls, kind, descriptors: this.scanner.scan(cls, kind, descriptor) });
            }
          }
        }
      } finally {
        this.table.finishAnalysis('provides', cls);
      }
    }

    if (groups.length === 0) {
      return;
    }

    const configuration = this.defaultConfigurationService().createDynamicConfiguration();
    const added = this.recordGroups(groups, configuration);
    if (added > 0) {
      this.log.debug({ added }, 'Registering provider members');
      configuration.commit();
    }
  }

  /**
   * Record scanned descriptors and add them to `configuration`.
   *
   * @returns The number of descriptors added
   * @internal Used by ProvidesDynamicConfiguration
   */
  recordGroups(groups: readonly ScannedGroup[], configuration: IDynamicConfiguration): number {
    let added = 0;
    for (const { cls, kind, descriptors } of groups) {
      this.table.recordDescriptors(cls, kind, descriptors);
      for (const descriptor of descriptors) {
        configuration.addActiveDescriptor(descriptor);
        added++;
      }
    }
    return added;
  }

  /**
   * The best-ranked configuration service other than an enabler.
   */
  private defaultConfigurationService(): IDynamicConfigurationService {
    let best: IServiceHandle<IDynamicConfigurationService> | undefined;

    for (const handle of this.locator.getAllServiceHandles(DYNAMIC_CONFIGURATION_SERVICE)) {
      const cls = handle.activeDescriptor.implementationClass;
      if (cls !== undefined && isSubclass(cls, ProvidesEnabler)) {
        continue;
      }
      if (best === undefined || handle.activeDescriptor.getRanking() > best.activeDescriptor.getRanking()) {
        best = handle;
      }
    }

    if (best === undefined) {
      throw new ServiceNotFoundError(DYNAMIC_CONFIGURATION_SERVICE);
    }
    return best.getService();
  }
}

/**
 * A configuration that registers static provider members of every class
 * added to it.
 */
class ProvidesDynamicConfiguration implements IDynamicConfiguration {
  private readonly groups: ScannedGroup[] = [];

  constructor(
    private readonly delegate: IDynamicConfiguration,
    private readonly enabler: ProvidesEnabler,
  ) {}

  addActiveDescriptor<T>(descriptor: ActiveDescriptor<T>): ActiveDescriptor<T> {
    return this.delegate.addActiveDescriptor(descriptor);
  }

  /**
   * Register `cls`.
   *
   * @returns The class's own descriptor when it can be instantiated; else
   * a static provider of `cls` itself, or a placeholder
   */
  addActiveClass(cls: ClassType): ActiveDescriptor {
    if (!this.groups.some((group) => group.cls === cls)) {
      this.groups.push(...this.enabler.scanStaticProviders(cls));
    }

    const statics = [
      ...this.enabler.recordedStaticProviders(cls),
      ...this.groups.filter((group) => group.cls === cls).flatMap((group) => group.descriptors),
    ];

    if (statics.length === 0 || (isConstructible(cls) && !isUtilityClass(cls))) {
      return this.delegate.addActiveClass(cls);
    }

    const selfProvider = statics.find((descriptor) =>
      descriptor.contractTypes.some((contract) => typesEqual(contract, cls)),
    );
    if (selfProvider !== undefined) {
      return selfProvider;
    }

    return this.addActiveDescriptor(new NonInstantiableClassDescriptor(cls));
  }

  commit(): void {
    this.enabler.recordGroups(this.groups, this.delegate);
    this.delegate.commit();
  }
}
