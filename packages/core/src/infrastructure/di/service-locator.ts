/**
 * @fileoverview ServiceLocator - Descriptor Registry and Resolution Engine
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements the host container: an ordered descriptor
 * registry, lookup by injectee, instance creation per scope, and
 * configuration-change notification.
 *
 * ## Resolution Algorithm
 *
 * ```
 * getService(type, ...qualifiers)
 *   1. Find the best descriptor for the injectee
 *      (highest ranking, then lowest service id)
 *   2. Based on scope:
 *      - Singleton: return the descriptor's cache, creating it if empty
 *      - PerLookup: create a new instance under a fresh handle; when a
 *        root handle is given, the new handle becomes its sub-handle
 *   3. When creating:
 *      a. Check the resolution stack for a cycle
 *      b. descriptor.create(root) resolves its own parameters
 *      c. Failures other than DIErrors are wrapped in ServiceCreationError
 * ```
 *
 * ## Configuration Changes
 *
 * `commit()` appends descriptors in one step, then notifies listeners. A
 * commit made by a listener while notification is running does not
 * recurse; it schedules another notification round instead.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type DescriptorFilter,
  type IBuildOptions,
  type IDynamicConfigurationListener,
  type IDynamicConfigurationService,
  type IServiceHandle,
  type IServiceLocator,
  type Injectee,
  type Qualifier,
  type ServiceType,
  type TypeRef,
  ALL_DESCRIPTORS,
  CircularDependencyError,
  DIError,
  DYNAMIC_CONFIGURATION_LISTENER,
  DYNAMIC_CONFIGURATION_SERVICE,
  LocatorShutdownError,
  SERVICE_LOCATOR_TOKEN,
  ServiceCreationError,
  ServiceNotFoundError,
  hasPostConstruct,
  hasPreDestroy,
  injecteeFromType,
  isCacheable,
  typeName,
} from '../../domain';
import { createLogger } from '../logging/logger';

import { ConstantDescriptor } from './class-descriptor';
import { matchesInjectee } from './contract-matcher';
import { DynamicConfigurationService } from './dynamic-configuration';
import { ServiceHandle } from './service-handle';

/**
 * ServiceLocator - IServiceLocator implementation.
 *
 * @remarks
 * **Lifecycle Management:**
 *
 * - Singleton: cached on its descriptor, destroyed by `shutdown()` in
 *   reverse creation order
 * - PerLookup: never cached, destroyed only by closing the handle that
 *   created it
 *
 * **Circular Dependency Detection:**
 *
 * Descriptors being created are kept on a resolution stack. Meeting one
 * that is already on the stack is a cycle.
 *
 * @example
 * ```typescript
 * const locator = new ServiceCollection()
 *   .addSingleton(Clock)
 *   .addPerLookup(ReportJob)
 *   .build();
 *
 * const job = locator.getService(ReportJob);
 * locator.shutdown();
 * ```
 */
export class ServiceLocator implements IServiceLocator {
  readonly name: string;

  /**
   * Descriptors in registration (service id) order.
   */
  private readonly descriptors: ActiveDescriptor[] = [];

  private readonly serviceIds = new Map<ActiveDescriptor, number>();

  private nextServiceId = 0;

  /**
   * Singleton descriptors whose cache is set, in creation order.
   */
  private readonly createdSingletons: ActiveDescriptor[] = [];

  private readonly resolutionStack: ActiveDescriptor[] = [];

  private readonly listeners: IDynamicConfigurationListener[] = [];

  private readonly selfDescriptors = new WeakMap<ActiveDescriptor, ActiveDescriptor<ActiveDescriptor>>();

  private readonly options: Required<IBuildOptions>;

  private readonly log = createLogger('service-locator');

  private notifying = false;

  private notificationPending = false;

  private shutDown = false;

  constructor(options?: IBuildOptions) {
    this.options = {
      name: options?.name ?? 'default',
      detectCircularDependencies: options?.detectCircularDependencies ?? true,
    };
    this.name = this.options.name;

    this.register([
      new ConstantDescriptor<IServiceLocator>(this, [SERVICE_LOCATOR_TOKEN]),
      new ConstantDescriptor<IDynamicConfigurationService>(
        new DynamicConfigurationService(this),
        [DYNAMIC_CONFIGURATION_SERVICE],
        [],
        0,
      ),
    ]);
  }

  // ============================================================================
  // Registry
  // ============================================================================

  getDescriptors(filter: DescriptorFilter = ALL_DESCRIPTORS): ActiveDescriptor[] {
    return this.descriptors.filter(filter);
  }

  getBestDescriptor(filter: DescriptorFilter): ActiveDescriptor | undefined {
    let best: ActiveDescriptor | undefined;
    for (const descriptor of this.descriptors) {
      if (filter(descriptor) && (best === undefined || descriptor.getRanking() > best.getRanking())) {
        best = descriptor;
      }
    }
    return best;
  }

  /**
   * The id assigned to a descriptor when it was committed.
   */
  getServiceId(descriptor: ActiveDescriptor): number | undefined {
    return this.serviceIds.get(descriptor);
  }

  reifyDescriptor<T>(descriptor: ActiveDescriptor<T>): ActiveDescriptor<T> {
    return descriptor;
  }

  getInjecteeDescriptor(injectee: Injectee): ActiveDescriptor | undefined {
    if (injectee.self) {
      return injectee.injecteeDescriptor === undefined
        ? undefined
        : this.selfDescriptor(injectee.injecteeDescriptor);
    }
    return this.getBestDescriptor((descriptor) => matchesInjectee(descriptor, injectee));
  }

  /**
   * Append descriptors and notify listeners.
   * @internal Used by DynamicConfiguration.commit()
   */
  commit(descriptors: readonly ActiveDescriptor[]): void {
    this.ensureNotShutdown();
    const added = this.register(descriptors);
    this.log.debug({ locator: this.name, added }, 'Configuration committed');
    this.notifyConfigurationChanged();
  }

  private register(descriptors: readonly ActiveDescriptor[]): number {
    let added = 0;
    for (const descriptor of descriptors) {
      if (!this.serviceIds.has(descriptor)) {
        this.serviceIds.set(descriptor, this.nextServiceId++);
        this.descriptors.push(descriptor);
        added++;
      }
    }
    return added;
  }

  private selfDescriptor(descriptor: ActiveDescriptor): ActiveDescriptor<ActiveDescriptor> {
    let self = this.selfDescriptors.get(descriptor);
    if (self === undefined) {
      self = new ConstantDescriptor<ActiveDescriptor>(descriptor, []);
      this.selfDescriptors.set(descriptor, self);
    }
    return self;
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  getServiceHandle<T>(descriptor: ActiveDescriptor<T>, injectee?: Injectee): ServiceHandle<T> {
    return new ServiceHandle(this, descriptor, injectee);
  }

  getAllServiceHandles<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): IServiceHandle<T>[];
  getAllServiceHandles(type: TypeRef, ...qualifiers: Qualifier[]): IServiceHandle[];
  getAllServiceHandles(type: TypeRef, ...qualifiers: Qualifier[]): IServiceHandle[] {
    const injectee = injecteeFromType(type, qualifiers);
    return this.getDescriptors((descriptor) => matchesInjectee(descriptor, injectee)).map((descriptor) =>
      this.getServiceHandle(descriptor, injectee),
    );
  }

  getService<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T;
  getService(type: TypeRef, ...qualifiers: Qualifier[]): unknown;
  getService(type: TypeRef, ...qualifiers: Qualifier[]): unknown {
    this.ensureNotShutdown();

    const injectee = injecteeFromType(type, qualifiers);
    const descriptor = this.getInjecteeDescriptor(injectee);
    if (descriptor === undefined) {
      throw new ServiceNotFoundError(type, qualifiers, this.currentPath());
    }
    return this.getServiceFromDescriptor(descriptor, undefined, injectee);
  }

  tryGetService<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T | undefined;
  tryGetService(type: TypeRef, ...qualifiers: Qualifier[]): unknown;
  tryGetService(type: TypeRef, ...qualifiers: Qualifier[]): unknown {
    this.ensureNotShutdown();

    const injectee = injecteeFromType(type, qualifiers);
    const descriptor = this.getInjecteeDescriptor(injectee);
    return descriptor === undefined ? undefined : this.getServiceFromDescriptor(descriptor, undefined, injectee);
  }

  getAllServices<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T[];
  getAllServices(type: TypeRef, ...qualifiers: Qualifier[]): unknown[];
  getAllServices(type: TypeRef, ...qualifiers: Qualifier[]): unknown[] {
    this.ensureNotShutdown();

    const injectee = injecteeFromType(type, qualifiers);
    return this.getDescriptors((descriptor) => matchesInjectee(descriptor, injectee)).map((descriptor) =>
      this.getServiceFromDescriptor(descriptor, undefined, injectee),
    );
  }

  getServiceFromDescriptor<T>(descriptor: ActiveDescriptor<T>, root?: IServiceHandle, injectee?: Injectee): T {
    this.ensureNotShutdown();

    const handle = this.getServiceHandle(descriptor, injectee);
    if (!isCacheable(descriptor.scope) && root instanceof ServiceHandle) {
      root.addSubHandle(handle);
    }
    return handle.getService();
  }

  /**
   * Produce the service of a handle.
   * @internal Used by ServiceHandle.getService()
   */
  serviceFromHandle<T>(handle: ServiceHandle<T>): T {
    this.ensureNotShutdown();

    const descriptor = handle.activeDescriptor;
    if (!isCacheable(descriptor.scope)) {
      return this.createInstance(descriptor, handle);
    }

    if (descriptor.isCacheSet()) {
      return descriptor.getCache();
    }
    const instance = this.createInstance(descriptor, handle);
    descriptor.setCache(instance);
    this.createdSingletons.push(descriptor);
    return instance;
  }

  // ============================================================================
  // Creation
  // ============================================================================

  private createInstance<T>(descriptor: ActiveDescriptor<T>, root: IServiceHandle<T>): T {
    const name = typeName(descriptor.implementationType);

    if (this.options.detectCircularDependencies && this.resolutionStack.includes(descriptor)) {
      throw new CircularDependencyError(name, this.currentPath());
    }

    this.resolutionStack.push(descriptor);
    try {
      return descriptor.create(root);
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }
      throw new ServiceCreationError(name, error, this.currentPath().slice(0, -1));
    } finally {
      this.resolutionStack.pop();
    }
  }

  private currentPath(): string[] {
    return this.resolutionStack.map((descriptor) => typeName(descriptor.implementationType));
  }

  // ============================================================================
  // Lifecycle Hooks
  // ============================================================================

  postConstruct(instance: unknown): void {
    if (hasPostConstruct(instance)) {
      instance.postConstruct();
    }
  }

  preDestroy(instance: unknown): void {
    if (hasPreDestroy(instance)) {
      instance.preDestroy();
    }
  }

  // ============================================================================
  // Configuration Listeners
  // ============================================================================

  addConfigurationListener(listener: IDynamicConfigurationListener): void {
    this.listeners.push(listener);
  }

  private notifyConfigurationChanged(): void {
    if (this.notifying) {
      this.notificationPending = true;
      return;
    }

    this.notifying = true;
    try {
      do {
        this.notificationPending = false;
        const listeners = [...this.listeners, ...this.getAllServices(DYNAMIC_CONFIGURATION_LISTENER)];
        for (const listener of listeners) {
          listener.configurationChanged();
        }
      } while (this.notificationPending);
    } finally {
      this.notifying = false;
      this.notificationPending = false;
    }
  }

  // ============================================================================
  // Shutdown
  // ============================================================================

  /**
   * Destroy every singleton, most recently created first, and reject
   * further use. Errors from dispose methods are logged; the remaining
   * singletons are still destroyed.
   */
  shutdown(): void {
    if (this.shutDown) {
      return;
    }
    this.shutDown = true;

    for (const descriptor of [...this.createdSingletons].reverse()) {
      if (!descriptor.isCacheSet()) {
        continue;
      }
      const instance = descriptor.getCache();
      descriptor.releaseCache();
      try {
        descriptor.dispose(instance);
      } catch (error) {
        this.log.error(
          { err: error, service: typeName(descriptor.implementationType) },
          'Error disposing singleton',
        );
      }
    }
    this.createdSingletons.length = 0;
  }

  isShutdown(): boolean {
    return this.shutDown;
  }

  private ensureNotShutdown(): void {
    if (this.shutDown) {
      throw new LocatorShutdownError(this.name);
    }
  }
}
