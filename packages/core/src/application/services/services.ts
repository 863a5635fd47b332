/**
 * @fileoverview Services - Container Facade
 *
 * @packageDocumentation
 * @module @wireloom/core/application/services
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Builds a locator with the provides and topics modules enabled, then
 * applies a service collection to it.
 *
 * @example
 * ```typescript
 * const services = new Services(
 *   new ServiceCollection().addSingleton(Settings).addClass(Pools),
 *   { name: 'app' },
 * );
 *
 * const pool = services.getService(ConnectionPool);
 * services.shutdown();
 * ```
 *
 * @version 1.0.0
 */

import {
  type IBuildOptions,
  type IServiceCollection,
  type IServiceHandle,
  type IServiceLocator,
  type ParamSpec,
  type Qualifier,
  type ServiceType,
  type TypeRef,
  ServiceNotFoundError,
  injecteeFromType,
} from '../../domain';
import {
  type ParameterSite,
  serviceHandleFromParameter,
  supportsParameter,
} from '../../infrastructure/di/parameter-resolver';
import { ServiceCollection } from '../../infrastructure/di/service-collection';
import { ServiceLocator } from '../../infrastructure/di/service-locator';

import { enableProvides, enableTopics } from './modules';

export interface IServicesOptions extends IBuildOptions {
  /**
   * Register provider members as services.
   * @default true
   */
  enableProvides?: boolean;

  /**
   * Enable topics and message receivers.
   * @default true
   */
  enableTopics?: boolean;
}

export class Services {
  private readonly serviceLocator: ServiceLocator;

  constructor(collection: IServiceCollection = new ServiceCollection(), options?: IServicesOptions) {
    this.serviceLocator = new ServiceLocator(options);

    if (options?.enableProvides ?? true) {
      enableProvides(this.serviceLocator);
    }
    if (options?.enableTopics ?? true) {
      enableTopics(this.serviceLocator);
    }
    collection.applyTo(this.serviceLocator);
  }

  get locator(): IServiceLocator {
    return this.serviceLocator;
  }

  /**
   * The best service for a type.
   *
   * @throws ServiceNotFoundError if nothing matches, or the matching
   * provider produced `null` or `undefined`
   */
  getService<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): T;
  getService(type: TypeRef, ...qualifiers: Qualifier[]): unknown;
  getService(type: TypeRef, ...qualifiers: Qualifier[]): unknown {
    const service: unknown = this.getServiceHandle(type, ...qualifiers).getService();
    if (service === null || service === undefined) {
      throw new ServiceNotFoundError(type, qualifiers);
    }
    return service;
  }

  /**
   * A handle to the best service for a type. Closing the handle destroys
   * the per-lookup instances it created.
   *
   * @throws ServiceNotFoundError if nothing matches
   */
  getServiceHandle<T>(type: ServiceType<T>, ...qualifiers: Qualifier[]): IServiceHandle<T>;
  getServiceHandle(type: TypeRef, ...qualifiers: Qualifier[]): IServiceHandle;
  getServiceHandle(type: TypeRef, ...qualifiers: Qualifier[]): IServiceHandle {
    const injectee = injecteeFromType(type, qualifiers);
    const descriptor = this.serviceLocator.getInjecteeDescriptor(injectee);
    if (descriptor === undefined) {
      throw new ServiceNotFoundError(type, qualifiers);
    }
    return this.serviceLocator.getServiceHandle(descriptor, injectee);
  }

  /**
   * Check if a parameter declared in `context` could be injected.
   */
  supportsParameter(spec: ParamSpec, context: TypeRef = Object): boolean {
    return supportsParameter(spec, this.siteOf(context), this.serviceLocator);
  }

  /**
   * The value a parameter declared in `context` would be injected with;
   * `null` for an optional parameter with no match.
   *
   * @throws UnsatisfiedDependencyError if a required parameter has no match
   */
  resolveParameter(spec: ParamSpec, context: TypeRef = Object): unknown {
    const handle = serviceHandleFromParameter(spec, this.siteOf(context), this.serviceLocator);
    return handle === null ? null : handle.getService();
  }

  shutdown(): void {
    this.serviceLocator.shutdown();
  }

  private siteOf(context: TypeRef): ParameterSite {
    return { context, parent: 'Services', position: 0 };
  }
}
