/**
 * @fileoverview ProvidesDescriptor - Descriptor for a Provider Member
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Creation
 *
 * ```
 * create(root)
 *   1. Resolve each parameter through a handle; keep per-lookup handles
 *   2. Static member: no owner
 *      Instance member: owner from a handle to the owner's descriptor,
 *      kept for release when the owner is per-lookup
 *   3. Read the member; failures become MultiError
 *   4. postConstruct(value) unless the value is null
 *   5. Close the kept handles, whatever happened
 * ```
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type IServiceHandle,
  type IServiceLocator,
  type ParamSpec,
  type Qualifier,
  type TypeRef,
  MultiError,
  Scope,
  rawClassOf,
  toError,
} from '../../domain';
import { AbstractActiveDescriptor } from '../di/abstract-descriptor';
import { type ParameterSite, serviceHandleFromParameter } from '../di/parameter-resolver';
import { closeAll } from '../di/service-handle';

import { type ProviderMember, describeProviderMember, isStaticMember, readMember } from './provider-member';

/**
 * Destroys a non-null provided instance.
 */
export type DisposeFunction = (instance: unknown) => void;

/**
 * A parameter of a provider member, with the site it is resolved at.
 */
export interface ProviderParameter {
  readonly spec: ParamSpec;
  readonly site: ParameterSite;
}

export interface ProvidesDescriptorInit {
  readonly member: ProviderMember;

  /** The member's value type, resolved against `context`. */
  readonly providedType: TypeRef;

  readonly contracts: readonly TypeRef[];
  readonly scope: Scope;

  /** Type the member's declared types are resolved against. */
  readonly context: TypeRef;

  readonly params: readonly ParamSpec[];

  /** Descriptor of the owning service. Required for instance members. */
  readonly serviceDescriptor: ActiveDescriptor | undefined;

  readonly dispose: DisposeFunction;
}

export class ProvidesDescriptor extends AbstractActiveDescriptor<unknown> {
  readonly member: ProviderMember;
  readonly implementationClass: ClassType | undefined;
  readonly implementationType: TypeRef;
  readonly contractTypes: readonly TypeRef[];
  readonly scope: Scope;
  readonly qualifiers: readonly Qualifier[];
  readonly parameters: readonly ProviderParameter[];
  readonly serviceDescriptor: ActiveDescriptor | undefined;

  private readonly disposeFunction: DisposeFunction;

  constructor(
    private readonly locator: IServiceLocator,
    init: ProvidesDescriptorInit,
  ) {
    super();

    if (isStaticMember(init.member) !== (init.serviceDescriptor === undefined)) {
      throw new TypeError(
        `${describeProviderMember(init.member)}: a service descriptor is required for instance members ` +
          `and forbidden for static ones`,
      );
    }

    const parent = describeProviderMember(init.member);

    this.member = init.member;
    this.implementationClass = rawClassOf(init.providedType);
    this.implementationType = init.providedType;
    this.contractTypes = init.contracts;
    this.scope = init.scope;
    this.qualifiers = init.member.declaration.qualifiers ?? [];
    this.serviceDescriptor = init.serviceDescriptor;
    this.disposeFunction = init.dispose;
    this.parameters = init.params.map((spec, position) => ({
      spec,
      site: { context: init.context, parent, position, injecteeDescriptor: this },
    }));
  }

  protected override initialRanking(): number | undefined {
    return this.member.declaration.rank;
  }

  create(): unknown {
    const perLookupHandles: IServiceHandle[] = [];

    try {
      const args = this.parameters.map(({ spec, site }) => {
        const handle = serviceHandleFromParameter(spec, site, this.locator);
        if (handle === null) {
          return null;
        }
        if (handle.activeDescriptor.scope === Scope.PerLookup) {
          perLookupHandles.push(handle);
        }
        return handle.getService();
      });

      let owner: unknown;
      if (this.serviceDescriptor !== undefined) {
        const handle = this.locator.getServiceHandle(this.serviceDescriptor);
        if (this.serviceDescriptor.scope === Scope.PerLookup) {
          perLookupHandles.push(handle);
        }
        owner = handle.getService();
      }

      let provided: unknown;
      try {
        provided = readMember(this.member, owner, args);
      } catch (error) {
        throw new MultiError(
          [error],
          `Provider ${describeProviderMember(this.member)} failed: ${toError(error).message}`,
        );
      }

      if (provided !== null && provided !== undefined) {
        this.locator.postConstruct(provided);
      }
      return provided;
    } finally {
      closeAll(perLookupHandles);
    }
  }

  dispose(instance: unknown): void {
    if (instance === null || instance === undefined) {
      return;
    }
    this.disposeFunction(instance);
  }

  toString(): string {
    return `ProvidesDescriptor(${describeProviderMember(this.member)})`;
  }
}
