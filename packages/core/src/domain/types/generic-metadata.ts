/**
 * @fileoverview Generic Metadata - Static Type Parameter Declarations
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Classes describe their generic shape with static properties, in the same
 * zero-reflection style as `static inject`:
 *
 * ```typescript
 * class Box<T> {
 *   static typeParameters = ['T'] as const;
 * }
 *
 * class StringBox extends Box<string> {
 *   static supertypes = [generic(Box, String)];
 * }
 *
 * class Crate<U> extends Box<U> {
 *   static typeParameters = ['U'] as const;
 *   static supertypes = () => [generic(Box, typeVariable(Crate, 'U'))];
 * }
 * ```
 *
 * `supertypes` lists direct supertypes. It may also name abstract classes
 * that are not on the prototype chain, which play the role of implemented
 * interfaces. A prototype parent that no entry covers is added as a raw
 * supertype.
 *
 * @version 1.0.0
 */

import {
  type ClassType,
  type TypeRef,
  type TypeVariable,
  isClassType,
  isTypeRef,
  rawClassOf,
  typeVariable,
} from './type-ref';

/**
 * Read a static property declared directly on `cls`, ignoring inherited ones.
 */
export function readOwnStatic(cls: ClassType, key: string): unknown {
  return Object.getOwnPropertyDescriptor(cls, key)?.value;
}

/**
 * Arrow-function thunks have no `prototype`; classes always do.
 */
export function isThunk(value: unknown): value is () => unknown {
  return typeof value === 'function' && !Object.prototype.hasOwnProperty.call(value, 'prototype');
}

/**
 * Evaluate a value that may be given lazily as an arrow-function thunk.
 */
export function evaluateLazy(value: unknown): unknown {
  return isThunk(value) ? value() : value;
}

/**
 * Type variables declared by `cls` through `static typeParameters`.
 */
export function getTypeParameters(cls: ClassType): readonly TypeVariable[] {
  const declared = readOwnStatic(cls, 'typeParameters');
  if (!Array.isArray(declared)) {
    return [];
  }

  return declared
    .filter((name): name is string => typeof name === 'string')
    .map((name) => typeVariable(cls, name));
}

/**
 * The prototype-chain parent of `cls`, if it is a user class.
 */
export function getParentClass(cls: ClassType): ClassType | undefined {
  const parent: unknown = Object.getPrototypeOf(cls);
  if (!isClassType(parent) || parent === Function.prototype) {
    return undefined;
  }
  return parent;
}

/**
 * Direct supertypes of `cls`: declared `supertypes` entries, then the raw
 * prototype parent when no entry covers it.
 */
export function getDirectSupertypes(cls: ClassType): readonly TypeRef[] {
  const declared = evaluateLazy(readOwnStatic(cls, 'supertypes'));
  const supertypes: TypeRef[] = Array.isArray(declared)
    ? declared.filter((entry): entry is TypeRef => isTypeRef(entry))
    : [];

  const parent = getParentClass(cls);
  if (parent && !supertypes.some((supertype) => rawClassOf(supertype) === parent)) {
    supertypes.push(parent);
  }

  return supertypes;
}
