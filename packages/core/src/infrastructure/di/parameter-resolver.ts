/**
 * @fileoverview Parameter Resolver - Values for Declared Parameters
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Turns a declared parameter of a constructor, provider member or subscriber
 * method into an injectee, and answers it from a locator. Parameter types
 * are resolved against the type that declares them, so a `T` declared by a
 * generic ancestor becomes the argument the subclass supplies.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type IServiceHandle,
  type IServiceLocator,
  type Injectee,
  type ParamSpec,
  type TypeRef,
  UnsatisfiedDependencyError,
  isTypeVariable,
  toParameterSpec,
} from '../../domain';
import { resolve } from '../types/type-resolver';

/**
 * Where a parameter is declared.
 */
export interface ParameterSite {
  /** Type the parameter's declared type is resolved against. */
  readonly context: TypeRef;

  /** The member owning the parameter, for diagnostics. */
  readonly parent: string;

  readonly position: number;

  /** Descriptor of the service whose member declares the parameter. */
  readonly injecteeDescriptor?: ActiveDescriptor;
}

export function injecteeFromParameter(spec: ParamSpec, site: ParameterSite): Injectee {
  const parameter = toParameterSpec(spec);
  return {
    requiredType: resolve(site.context, parameter.type),
    requiredQualifiers: parameter.qualifiers ?? [],
    optional: parameter.optional === true,
    self: parameter.self === true,
    unqualified: parameter.unqualified,
    position: site.position,
    parent: site.parent,
    injecteeDescriptor: site.injecteeDescriptor,
  };
}

/**
 * Check if `locator` can supply a value for a parameter.
 *
 * @remarks
 * Optional parameters are always supported. A parameter whose type is a
 * bare type variable never is, since there is nothing to look up.
 */
export function supportsParameter(spec: ParamSpec, site: ParameterSite, locator: IServiceLocator): boolean {
  const injectee = injecteeFromParameter(spec, site);
  if (isTypeVariable(injectee.requiredType)) {
    return false;
  }
  if (injectee.optional || injectee.self) {
    return true;
  }
  return locator.getInjecteeDescriptor(injectee) !== undefined;
}

/**
 * A handle for a parameter's value, or `null` for an optional parameter
 * with no matching service.
 *
 * @throws UnsatisfiedDependencyError if a required parameter has no match
 */
export function serviceHandleFromParameter(
  spec: ParamSpec,
  site: ParameterSite,
  locator: IServiceLocator,
): IServiceHandle | null {
  const injectee = injecteeFromParameter(spec, site);
  const descriptor = locator.getInjecteeDescriptor(injectee);

  if (descriptor === undefined) {
    if (!injectee.optional) {
      throw new UnsatisfiedDependencyError(injectee);
    }
    return null;
  }

  return locator.getServiceHandle(descriptor, injectee);
}

/**
 * The value of a parameter, or `null` for an optional parameter with no
 * matching service. Per-lookup values are owned by `root` when given.
 *
 * @throws UnsatisfiedDependencyError if a required parameter has no match
 */
export function serviceFromParameter(
  spec: ParamSpec,
  site: ParameterSite,
  locator: IServiceLocator,
  root?: IServiceHandle,
): unknown {
  const injectee = injecteeFromParameter(spec, site);
  const descriptor = locator.getInjecteeDescriptor(injectee);

  if (descriptor === undefined) {
    if (!injectee.optional) {
      throw new UnsatisfiedDependencyError(injectee);
    }
    return null;
  }

  return locator.getServiceFromDescriptor(descriptor, root, injectee);
}
