/**
 * @fileoverview Lazy Types - Evaluating Member Type Declarations
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Provider and subscriber declarations may give their types as thunks that
 * receive the member's own type variables. These helpers evaluate either
 * form.
 *
 * @version 1.0.0
 */

import {
  type ClassType,
  type ParamListSpec,
  type ParamSpec,
  type TypeListSpec,
  type TypeRef,
  type TypeSpec,
  type TypeVariable,
  isThunk,
  memberDeclaration,
  typeVariable,
} from '../../domain';

type TypeThunk = (...typeParameters: TypeVariable[]) => TypeRef;

function isTypeThunk(spec: TypeSpec): spec is TypeThunk {
  return isThunk(spec);
}

/**
 * The interned type variables a member declares.
 */
export function memberTypeVariables(
  owner: ClassType,
  key: string,
  isStatic: boolean,
  names: readonly string[] = [],
): TypeVariable[] {
  const declaration = memberDeclaration(owner, key, isStatic);
  return names.map((name) => typeVariable(declaration, name));
}

export function evaluateType(spec: TypeSpec, variables: readonly TypeVariable[]): TypeRef {
  return isTypeThunk(spec) ? spec(...variables) : spec;
}

export function evaluateTypeList(spec: TypeListSpec, variables: readonly TypeVariable[]): readonly TypeRef[] {
  return typeof spec === 'function' ? spec(...variables) : spec;
}

export function evaluateParamList(spec: ParamListSpec, variables: readonly TypeVariable[]): readonly ParamSpec[] {
  return typeof spec === 'function' ? spec(...variables) : spec;
}
