/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the contracts of the host container: registration,
 * lookup, handles, dynamic configuration and lifecycle hooks. The
 * Infrastructure layer implements them.
 *
 * ## Dynamic Configuration
 *
 * Services can be added after the locator is built. Additions are batched in
 * a configuration and become visible together on `commit()`, after which
 * every registered configuration listener is notified:
 *
 * ```typescript
 * const configuration = locator
 *   .getService(DYNAMIC_CONFIGURATION_SERVICE)
 *   .createDynamicConfiguration();
 *
 * configuration.addActiveClass(ReportJob);
 * configuration.addActiveClass(Reports);
 * configuration.commit();
 * ```
 *
 * @version 1.0.0
 */

import { type ClassType, type Constructor, type Token, type TypeRef, createToken } from '../types/type-ref';

import { type Injectee } from './injectee';
import { type Qualifier } from './qualifier';
import { type ActiveDescriptor, type DescriptorFilter } from './service-descriptor';
import { type Scope } from './service-scope';

/**
 * A lookup key with a known service type: a class or a token.
 */
export type ServiceType<T = unknown> = ClassType<T> | Token<T>;

// ============================================================================
// Lifecycle Hooks
// ============================================================================

/**
 * Services with a `postConstruct()` method have it called after creation.
 */
export interface IPostConstruct {
  postConstruct(): void;
}

/**
 * Services with a `preDestroy()` method have it called when destroyed.
 */
export interface IPreDestroy {
  preDestroy(): void;
}

export function hasPostConstruct(obj: unknown): obj is IPostConstruct {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'postConstruct' in obj &&
    typeof obj.postConstruct === 'function'
  );
}

export function hasPreDestroy(obj: unknown): obj is IPreDestroy {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'preDestroy' in obj &&
    typeof obj.preDestroy === 'function'
  );
}

// ============================================================================
// IServiceHandle - Release Scope for a Lookup
// ============================================================================

/**
 * A handle to one service, created lazily on `getService()`.
 *
 * @remarks
 * Closing a handle destroys the per-lookup instance it created together
 * with every per-lookup dependency created under it. Singletons are left
 * alone; they are destroyed when the locator shuts down.
 *
 * @example
 * ```typescript
 * const handle = locator.getServiceHandle(descriptor);
 * try {
 *   handle.getService().run();
 * } finally {
 *   handle.close();
 * }
 * ```
 */
export interface IServiceHandle<T = unknown> {
  readonly activeDescriptor: ActiveDescriptor<T>;

  /**
   * The injection point this handle was created for, if any.
   */
  readonly injectee: Injectee | undefined;

  getService(): T;

  /**
   * Whether `getService()` has produced an instance that is not yet destroyed.
   */
  isActive(): boolean;

  close(): void;
}

// ============================================================================
// IServiceLocator - Registry and Resolution
// ============================================================================

export interface IServiceLocator {
  readonly name: string;

  /**
   * All descriptors matching `filter`, in registration order.
   */
  getDescriptors(filter?: DescriptorFilter): ActiveDescriptor[];

  /**
   * The best descriptor matching `filter`: highest ranking, then oldest.
   */
  getBestDescriptor(filter: DescriptorFilter): ActiveDescriptor | undefined;

  /**
   * Complete any lazily computed state of a descriptor.
   */
  reifyDescriptor<T>(descriptor: ActiveDescriptor<T>): ActiveDescriptor<T>;

  /**
   * The best descriptor satisfying an injection point.
   */
  getInjecteeDescriptor(injectee: Injectee): ActiveDescriptor | undefined;

  getServiceHandle<T>(descriptor: ActiveDescriptor<T>, injectee?: Injectee): IServiceHandle<T>;

  /**
   * Handles for every service matching a type, in registration order. No
   * service is created until its handle is asked for it.
   */
  getAllServiceHandles<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): IServiceHandle<T>[];
  getAllServiceHandles(type: TypeRef, ...qualifiers: Qualifier[]): IServiceHandle[];

  /**
   * Register a listener notified after every committed configuration, in
   * addition to the services registered under
   * `DYNAMIC_CONFIGURATION_LISTENER`.
   */
  addConfigurationListener(listener: IDynamicConfigurationListener): void;

  /**
   * Resolve the best service for a type.
   *
   * @throws ServiceNotFoundError if nothing matches
   */
  getService<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T;
  getService(type: TypeRef, ...qualifiers: Qualifier[]): unknown;

  tryGetService<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T | undefined;
  tryGetService(type: TypeRef, ...qualifiers: Qualifier[]): unknown;

  /**
   * Create or fetch an instance of a specific descriptor. Per-lookup
   * instances are owned by `root` when given.
   */
  getServiceFromDescriptor<T>(
    descriptor: ActiveDescriptor<T>,
    root?: IServiceHandle,
    injectee?: Injectee,
  ): T;

  /**
   * Every service matching a type, in registration order.
   */
  getAllServices<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T[];
  getAllServices(type: TypeRef, ...qualifiers: Qualifier[]): unknown[];

  /**
   * Run the post-construction hook on any instance that has one.
   */
  postConstruct(instance: unknown): void;

  /**
   * Run the pre-destruction hook on any instance that has one.
   */
  preDestroy(instance: unknown): void;

  /**
   * Destroy all singletons and reject further use.
   */
  shutdown(): void;

  isShutdown(): boolean;
}

// ============================================================================
// Dynamic Configuration
// ============================================================================

/**
 * A batch of registrations committed atomically.
 */
export interface IDynamicConfiguration {
  addActiveDescriptor<T>(descriptor: ActiveDescriptor<T>): ActiveDescriptor<T>;

  /**
   * Register a class through the container's constructor strategy.
   */
  addActiveClass(cls: ClassType): ActiveDescriptor;

  /**
   * Make every added descriptor visible at once. Single-use.
   */
  commit(): void;
}

/**
 * Creates configurations. The locator resolves the best-ranked one, so a
 * higher-ranked service replaces the default.
 */
export interface IDynamicConfigurationService {
  createDynamicConfiguration(): IDynamicConfiguration;
}

/**
 * Notified after every committed configuration.
 */
export interface IDynamicConfigurationListener {
  configurationChanged(): void;
}

// ============================================================================
// IServiceCollection - Bootstrap Registration
// ============================================================================

/**
 * Factory function for creating service instances.
 */
export type ServiceFactory<T> = (locator: IServiceLocator) => T;

export interface IServiceCollection {
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(contract: ServiceType<T>, implementation: Constructor<T>): this;

  addPerLookup<T>(implementation: Constructor<T>): this;
  addPerLookup<T>(contract: ServiceType<T>, implementation: Constructor<T>): this;

  /**
   * Register a class with the scope it declares, through the active
   * configuration service.
   */
  addClass(cls: ClassType): this;

  addInstance<T>(contract: ServiceType<T>, instance: T, ...qualifiers: Qualifier[]): this;

  addFactory<T>(contract: ServiceType<T>, factory: ServiceFactory<T>, scope?: Scope): this;

  addDescriptor(descriptor: ActiveDescriptor): this;

  has(type: TypeRef): boolean;

  /**
   * Replay every registration into an existing locator as one
   * configuration.
   */
  applyTo(locator: IServiceLocator): IServiceLocator;

  build(options?: IBuildOptions): IServiceLocator;
}

// ============================================================================
// Build Options
// ============================================================================

export interface IBuildOptions {
  /**
   * Name used in logs and errors.
   * @default 'default'
   */
  name?: string;

  /**
   * Detect circular constructor dependencies.
   * @default true
   */
  detectCircularDependencies?: boolean;
}

// ============================================================================
// Pre-defined Core Tokens
// ============================================================================

export const SERVICE_LOCATOR_TOKEN: Token<IServiceLocator> = createToken('IServiceLocator');

export const DYNAMIC_CONFIGURATION_SERVICE: Token<IDynamicConfigurationService> = createToken(
  'IDynamicConfigurationService',
);

export const DYNAMIC_CONFIGURATION_LISTENER: Token<IDynamicConfigurationListener> = createToken(
  'IDynamicConfigurationListener',
);
