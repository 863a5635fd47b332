/**
 * @fileoverview Contract Matcher - Which Descriptors Answer an Injectee
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Matching Rules
 *
 * ```
 * contract C satisfies required type R when
 *   - C equals R
 *   - R is raw and C has the same raw class
 *   - R and C are parameterized over the same raw class and each
 *     argument of R contains the matching argument of C
 *   - C is raw, R is parameterized, and the implementation's supertype
 *     for that raw class is compatible with R (or is raw or unresolved)
 * ```
 *
 * Tokens only ever match themselves.
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type Injectee,
  type ParameterizedType,
  type Qualifier,
  type QualifierType,
  type TypeRef,
  containsAllQualifiers,
  isParameterized,
  isToken,
  isTypeVariable,
  rawClassOf,
  typesEqual,
} from '../../domain';
import { containsArgument, containsUnresolvedVariable, getSupertype } from '../types/type-resolver';

function argumentsCompatible(required: ParameterizedType, actual: ParameterizedType): boolean {
  return required.args.every((argument, i) => {
    const candidate = actual.args[i];
    return candidate !== undefined && (isTypeVariable(argument) || containsArgument(argument, candidate));
  });
}

/**
 * Check if `contract`, advertised by `descriptor`, satisfies `required`.
 */
export function contractSatisfies(descriptor: ActiveDescriptor, contract: TypeRef, required: TypeRef): boolean {
  if (typesEqual(contract, required)) {
    return true;
  }
  if (isToken(contract) || isToken(required)) {
    return false;
  }

  const requiredRaw = rawClassOf(required);
  if (requiredRaw === undefined || rawClassOf(contract) !== requiredRaw) {
    return false;
  }
  if (!isParameterized(required)) {
    return true;
  }
  if (isParameterized(contract)) {
    return argumentsCompatible(required, contract);
  }

  const implemented = getSupertype(descriptor.implementationType, requiredRaw);
  if (implemented === undefined || !isParameterized(implemented) || containsUnresolvedVariable(implemented)) {
    return true;
  }
  return argumentsCompatible(required, implemented);
}

/**
 * Apply an `unqualified` filter to a set of qualifiers.
 *
 * @remarks
 * No filter, or no qualifiers, always passes. An empty filter rejects
 * anything qualified; otherwise none of the listed qualifier types may
 * appear.
 */
export function passesUnqualifiedFilter(
  qualifiers: readonly Qualifier[],
  unqualified: readonly QualifierType<unknown>[] | undefined,
): boolean {
  if (unqualified === undefined || qualifiers.length === 0) {
    return true;
  }
  if (unqualified.length === 0) {
    return false;
  }
  return !qualifiers.some((qualifier) => unqualified.includes(qualifier.type));
}

/**
 * Check if a descriptor can answer an injectee.
 */
export function matchesInjectee(descriptor: ActiveDescriptor, injectee: Injectee): boolean {
  return (
    descriptor.contractTypes.some((contract) =>
      contractSatisfies(descriptor, contract, injectee.requiredType),
    ) &&
    containsAllQualifiers(descriptor.qualifiers, injectee.requiredQualifiers) &&
    passesUnqualifiedFilter(descriptor.qualifiers, injectee.unqualified)
  );
}
