/**
 * @fileoverview ProviderScanner - Provider Member Discovery
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Discovery
 *
 * ```
 * members of cls
 *   static:   declared by cls itself
 *   instance: declared by cls, its prototype-chain ancestors, then its
 *             declared supertypes; the most derived declaration of a
 *             name wins
 *
 * for each member
 *   provided type  ← resolve(context, declared type)
 *   contracts      ← explicit list, or provided type + contract supertypes
 *   scope          ← nullable → PerLookup
 *                    member scope
 *                    scope marker of a contract's class
 *                    owner's scope (instance members)
 *                    PerLookup
 *   dispose        ← preDestroy / provided instance method / provider method
 * ```
 *
 * The context is the owner descriptor's implementation type for instance
 * members and the scanned class for static ones, so a `T` bound by a
 * generic owner resolves while a member's own `T` never does.
 *
 * Members that cannot be resolved are skipped with a warning. Whether a
 * parameter's service is registered is not checked here: it may be
 * registered later, and a missing one fails when the member is invoked.
 * A missing dispose method is a configuration error and throws.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type IServiceLocator,
  type ProvidesDeclaration,
  type TypeRef,
  DisposalHandledBy,
  MultiError,
  ProvidesConfigurationError,
  Scope,
  addDistinctType,
  getOwnProvidesDeclarations,
  getParentClass,
  getScopeMarker,
  getSignatures,
  isContract,
  rawClassOf,
  toError,
  toParameterSpec,
  typeName,
} from '../../domain';
import { createLogger } from '../logging/logger';
import { evaluateParamList, evaluateType, evaluateTypeList, memberTypeVariables } from '../types/lazy-types';
import { containsUnresolvedVariable, getAllSupertypes, isSupertype, resolve } from '../types/type-resolver';

import {
  type ProviderMember,
  type ProviderMemberKind,
  createProviderMember,
  describeProviderMember,
  invokeMethod,
  isStaticMember,
  memberParams,
  readProperty,
} from './provider-member';
import { type DisposeFunction, ProvidesDescriptor } from './provides-descriptor';

/**
 * Classes whose provider declarations apply to `cls`: the prototype chain
 * first, then declared supertypes.
 */
function providerHierarchy(cls: ClassType): ClassType[] {
  const classes: ClassType[] = [];
  for (let current: ClassType | undefined = cls; current; current = getParentClass(current)) {
    classes.push(current);
  }
  for (const supertype of getAllSupertypes(cls)) {
    const raw = rawClassOf(supertype);
    if (raw !== undefined && !classes.includes(raw)) {
      classes.push(raw);
    }
  }
  return classes;
}

/**
 * Provider members of `cls`, deduplicated by (static, name).
 */
export function collectProviderMembers(cls: ClassType): ProviderMember[] {
  const members: ProviderMember[] = [];
  const seen = new Set<string>();

  for (const declaringClass of providerHierarchy(cls)) {
    for (const [key, declaration] of getOwnProvidesDeclarations(declaringClass)) {
      const isStatic = declaration.static === true;
      if (isStatic && declaringClass !== cls) {
        continue;
      }

      const slot = `${isStatic ? 'static' : 'instance'}:${key}`;
      if (!seen.has(slot)) {
        seen.add(slot);
        members.push(createProviderMember(declaringClass, key, declaration));
      }
    }
  }
  return members;
}

/**
 * Number of declared parameters of `target[name]`, if it is a function.
 */
function methodArity(target: unknown, name: string): number | undefined {
  if (target === null || target === undefined) {
    return undefined;
  }
  const method = readProperty(target, name);
  return typeof method === 'function' ? method.length : undefined;
}

function wrapDisposeFailure(description: string, error: unknown): MultiError {
  return new MultiError([error], `Dispose method for ${description} failed: ${toError(error).message}`);
}

function getProvidedScope(
  declaration: ProvidesDeclaration,
  contracts: readonly TypeRef[],
  serviceDescriptor: ActiveDescriptor | undefined,
): Scope {
  if (declaration.nullable === true) {
    return Scope.PerLookup;
  }
  if (declaration.scope !== undefined) {
    return declaration.scope;
  }
  for (const contract of contracts) {
    const raw = rawClassOf(contract);
    const marker = raw === undefined ? undefined : getScopeMarker(raw);
    if (marker !== undefined) {
      return marker;
    }
  }
  return serviceDescriptor?.scope ?? Scope.PerLookup;
}

export class ProviderScanner {
  private readonly log = createLogger('provider-scanner');

  constructor(private readonly locator: IServiceLocator) {}

  /**
   * Candidate descriptors for the members of one kind.
   *
   * @param serviceDescriptor - The owner's descriptor; required for
   * instance kinds
   * @throws ProvidesConfigurationError if a declared dispose method is
   * missing
   */
  scan(cls: ClassType, kind: ProviderMemberKind, serviceDescriptor?: ActiveDescriptor): ProvidesDescriptor[] {
    const descriptors: ProvidesDescriptor[] = [];
    for (const member of collectProviderMembers(cls)) {
      if (member.kind !== kind) {
        continue;
      }
      const descriptor = this.createDescriptor(member, cls, serviceDescriptor);
      if (descriptor !== undefined) {
        descriptors.push(descriptor);
      }
    }
    return descriptors;
  }

  // ============================================================================
  // Descriptor Construction
  // ============================================================================

  private createDescriptor(
    member: ProviderMember,
    cls: ClassType,
    serviceDescriptor: ActiveDescriptor | undefined,
  ): ProvidesDescriptor | undefined {
    const isStatic = isStaticMember(member);
    if (!isStatic && serviceDescriptor === undefined) {
      throw new TypeError(`A service descriptor is required for ${describeProviderMember(member)}`);
    }

    const name = describeProviderMember(member);
    const owner = isStatic ? undefined : serviceDescriptor;
    const context: TypeRef = owner === undefined ? cls : owner.implementationType;

    const providedType = resolve(context, evaluateType(member.declaration.type, member.typeVariables));
    if (containsUnresolvedVariable(providedType)) {
      this.log.warn(
        { member: name, type: typeName(providedType) },
        'Skipping provider member whose type has an unresolved type variable',
      );
      return undefined;
    }

    const params = memberParams(member);
    for (const [position, spec] of params.entries()) {
      const type = resolve(context, toParameterSpec(spec).type);
      if (containsUnresolvedVariable(type)) {
        this.log.warn(
          { member: name, position, type: typeName(type) },
          'Skipping provider member whose parameter type has an unresolved type variable',
        );
        return undefined;
      }
    }

    const contracts = this.getContracts(member, context, providedType);
    if (contracts === undefined) {
      return undefined;
    }

    return new ProvidesDescriptor(this.locator, {
      member,
      providedType,
      contracts,
      scope: getProvidedScope(member.declaration, contracts, owner),
      context,
      params,
      serviceDescriptor: owner,
      dispose: this.getDisposeFunction(member, cls, context, providedType, owner),
    });
  }

  private getContracts(member: ProviderMember, context: TypeRef, providedType: TypeRef): TypeRef[] | undefined {
    const declared = member.declaration.contracts;
    if (declared !== undefined) {
      const contracts = evaluateTypeList(declared, member.typeVariables).map((type) => resolve(context, type));
      const unresolved = contracts.find((type) => containsUnresolvedVariable(type));
      if (unresolved !== undefined) {
        this.log.warn(
          { member: describeProviderMember(member), type: typeName(unresolved) },
          'Skipping provider member whose contract has an unresolved type variable',
        );
        return undefined;
      }
      return contracts;
    }

    const contracts: TypeRef[] = [providedType];
    for (const supertype of getAllSupertypes(providedType)) {
      const raw = rawClassOf(supertype);
      if (raw !== undefined && isContract(raw)) {
        addDistinctType(contracts, supertype);
      }
    }
    return contracts;
  }

  // ============================================================================
  // Dispose Policy
  // ============================================================================

  private getDisposeFunction(
    member: ProviderMember,
    cls: ClassType,
    context: TypeRef,
    providedType: TypeRef,
    owner: ActiveDescriptor | undefined,
  ): DisposeFunction {
    const { disposeMethod, disposalHandledBy = DisposalHandledBy.ProvidedInstance } = member.declaration;

    if (disposeMethod === undefined || disposeMethod === '') {
      return (instance) => this.locator.preDestroy(instance);
    }

    switch (disposalHandledBy) {
      case DisposalHandledBy.ProvidedInstance:
        return this.providedInstanceDisposer(member, providedType, disposeMethod);
      case DisposalHandledBy.Provider:
        return this.providerDisposer(member, cls, context, providedType, disposeMethod, owner);
    }
  }

  /**
   * `instance[methodName]()`, where the provided class declares that
   * method with no parameters.
   */
  private providedInstanceDisposer(
    member: ProviderMember,
    providedType: TypeRef,
    methodName: string,
  ): DisposeFunction {
    const description = describeProviderMember(member);
    const raw = rawClassOf(providedType);

    if (raw === undefined || !this.declaresMethod(raw, methodName, false, 0)) {
      throw new ProvidesConfigurationError(
        `Dispose method '${methodName}()' for ${description} not found on ${typeName(providedType)}`,
      );
    }

    return (instance) => {
      try {
        invokeMethod(instance, methodName, []);
      } catch (error) {
        throw wrapDisposeFailure(description, error);
      }
    };
  }

  /**
   * `provider[methodName](instance)`, where the provider method's single
   * parameter accepts the provided type and its static-ness matches the
   * member's.
   */
  private providerDisposer(
    member: ProviderMember,
    cls: ClassType,
    context: TypeRef,
    providedType: TypeRef,
    methodName: string,
    owner: ActiveDescriptor | undefined,
  ): DisposeFunction {
    const description = describeProviderMember(member);
    const isStatic = isStaticMember(member);

    if (!this.acceptsProvidedType(cls, methodName, isStatic, context, providedType)) {
      throw new ProvidesConfigurationError(
        `Dispose method '${methodName}(${typeName(providedType)})' for ${description} not found on ` +
          `${isStatic ? 'static members of ' : ''}${typeName(cls)}`,
      );
    }

    if (owner === undefined) {
      return (instance) => {
        try {
          invokeMethod(cls, methodName, [instance]);
        } catch (error) {
          throw wrapDisposeFailure(description, error);
        }
      };
    }

    return (instance) => {
      const handle = this.locator.getServiceHandle(owner);
      try {
        invokeMethod(handle.getService(), methodName, [instance]);
      } catch (error) {
        throw wrapDisposeFailure(description, error);
      } finally {
        if (owner.scope === Scope.PerLookup) {
          handle.close();
        }
      }
    };
  }

  /**
   * Check for a method with the given arity. A declared signature decides
   * the arity when there is one; otherwise the function's `length` does.
   */
  private declaresMethod(cls: ClassType, methodName: string, isStatic: boolean, arity: number): boolean {
    const target: unknown = isStatic ? cls : cls.prototype;
    const length = methodArity(target, methodName);
    if (length === undefined) {
      return false;
    }

    const signature = getSignatures(cls).find((method) => method.key === methodName && method.isStatic === isStatic);
    if (signature === undefined) {
      return length === arity;
    }
    const variables = memberTypeVariables(signature.owner, methodName, isStatic, signature.typeParameters);
    return evaluateParamList(signature.params, variables).length === arity;
  }

  private acceptsProvidedType(
    cls: ClassType,
    methodName: string,
    isStatic: boolean,
    context: TypeRef,
    providedType: TypeRef,
  ): boolean {
    if (!this.declaresMethod(cls, methodName, isStatic, 1)) {
      return false;
    }

    const signature = getSignatures(cls).find((method) => method.key === methodName && method.isStatic === isStatic);
    if (signature === undefined) {
      // An undeclared parameter accepts anything.
      return true;
    }

    const variables = memberTypeVariables(signature.owner, methodName, isStatic, signature.typeParameters);
    const [parameter] = evaluateParamList(signature.params, variables);
    return parameter !== undefined && isSupertype(resolve(context, toParameterSpec(parameter).type), providedType);
  }
}
