/**
 * @fileoverview Type Resolver - Generic Type Variable Resolution
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(context, dependent)
 *   1. Walk upward from context, breadth first:
 *      - a parameterized type binds its raw class's type parameters to
 *        its arguments (first binding wins)
 *      - its declared supertypes are pushed with those arguments
 *        substituted in
 *      - owner types of nested generics are pushed too
 *      - already-visited types are skipped
 *   2. Substitute every bound variable in `dependent`
 * ```
 *
 * Variables are keyed by their interned identity, so a class's `T` and a
 * method's own `T` never share a binding.
 *
 * None of these functions throw; a variable without a binding simply stays
 * in the result.
 *
 * @version 1.0.0
 */

import {
  type ClassType,
  type TypeRef,
  type TypeVariable,
  arrayOf,
  generic,
  isClassType,
  isParameterized,
  isToken,
  ownedGeneric,
  rawClassOf,
  typesEqual,
  wildcard,
} from '../../domain/types/type-ref';
import { getDirectSupertypes, getTypeParameters } from '../../domain/types/generic-metadata';

/**
 * Bindings from type variables to the types they stand for.
 */
export type TypeBindings = ReadonlyMap<TypeVariable, TypeRef>;

interface HierarchyWalk {
  readonly bindings: Map<TypeVariable, TypeRef>;
  /** Every type in the hierarchy, context first. */
  readonly types: TypeRef[];
}

/**
 * Walk the supertype hierarchy of `context`.
 * @internal
 */
function walkHierarchy(context: TypeRef): HierarchyWalk {
  const bindings = new Map<TypeVariable, TypeRef>();
  const types: TypeRef[] = [];
  const worklist: TypeRef[] = [context];

  for (let current = worklist.shift(); current !== undefined; current = worklist.shift()) {
    const type = current;
    if (types.some((visited) => typesEqual(visited, type))) {
      continue;
    }
    types.push(type);

    if (isClassType(type)) {
      worklist.push(...getDirectSupertypes(type));
    } else if (type.kind === 'parameterized') {
      const local = new Map<TypeVariable, TypeRef>();
      getTypeParameters(type.raw).forEach((variable, i) => {
        const argument = type.args[i];
        if (argument === undefined) {
          return;
        }
        local.set(variable, argument);
        if (!bindings.has(variable)) {
          bindings.set(variable, argument);
        }
      });

      if (type.owner) {
        worklist.push(type.owner);
      }
      for (const supertype of getDirectSupertypes(type.raw)) {
        worklist.push(substitute(supertype, local));
      }
    }
  }

  return { bindings, types };
}

/**
 * Replace bound variables in `type`.
 *
 * @remarks
 * A binding may itself mention bound variables, so substitution follows
 * chains. A variable met again while its own binding is being substituted
 * is left in place.
 */
export function substitute(
  type: TypeRef,
  bindings: TypeBindings,
  resolving: Set<TypeVariable> = new Set(),
): TypeRef {
  if (isClassType(type)) {
    return type;
  }

  switch (type.kind) {
    case 'token':
      return type;
    case 'variable': {
      const bound = bindings.get(type);
      if (bound === undefined || resolving.has(type)) {
        return type;
      }
      resolving.add(type);
      const result = substitute(bound, bindings, resolving);
      resolving.delete(type);
      return result;
    }
    case 'parameterized': {
      const args = type.args.map((arg) => substitute(arg, bindings, resolving));
      return type.owner
        ? ownedGeneric(substitute(type.owner, bindings, resolving), type.raw, ...args)
        : generic(type.raw, ...args);
    }
    case 'array':
      return arrayOf(substitute(type.component, bindings, resolving));
    case 'wildcard':
      return wildcard({
        extends: type.upper.map((bound) => substitute(bound, bindings, resolving)),
        super: type.lower.map((bound) => substitute(bound, bindings, resolving)),
      });
  }
}

/**
 * Type variable bindings visible from `context`.
 */
export function getBindings(context: TypeRef): TypeBindings {
  return walkHierarchy(context).bindings;
}

/**
 * Resolve `dependent`, declared somewhere in the hierarchy of `context`.
 *
 * @example
 * ```typescript
 * // class Holder<T> { static typeParameters = ['T'] }
 * // class StringHolder { static supertypes = [generic(Holder, String)] }
 * resolve(StringHolder, typeVariable(Holder, 'T')); // String
 * ```
 */
export function resolve(context: TypeRef, dependent: TypeRef): TypeRef {
  return substitute(dependent, walkHierarchy(context).bindings);
}

/**
 * Check if a type mentions a type variable anywhere.
 */
export function containsUnresolvedVariable(type: TypeRef, visited: Set<TypeRef> = new Set()): boolean {
  if (isClassType(type) || visited.has(type)) {
    return false;
  }
  visited.add(type);

  switch (type.kind) {
    case 'variable':
      return true;
    case 'token':
      return false;
    case 'parameterized':
      return (
        type.args.some((arg) => containsUnresolvedVariable(arg, visited)) ||
        (type.owner !== undefined && containsUnresolvedVariable(type.owner, visited))
      );
    case 'array':
      return containsUnresolvedVariable(type.component, visited);
    case 'wildcard':
      return (
        type.upper.some((bound) => containsUnresolvedVariable(bound, visited)) ||
        type.lower.some((bound) => containsUnresolvedVariable(bound, visited))
      );
  }
}

/**
 * Every type in the hierarchy of `type`, itself first, with variables
 * bound from `type` substituted.
 */
export function getAllSupertypes(type: TypeRef): TypeRef[] {
  const walk = walkHierarchy(type);
  return walk.types.map((supertype) => substitute(supertype, walk.bindings));
}

/**
 * The supertype of `type` whose raw class is `raw`, e.g.
 * `getSupertype(StringHolder, Holder)` is `Holder<String>`.
 */
export function getSupertype(type: TypeRef, raw: ClassType): TypeRef | undefined {
  const walk = walkHierarchy(type);
  const found = walk.types.find((supertype) => rawClassOf(supertype) === raw);
  return found === undefined ? undefined : substitute(found, walk.bindings);
}

/**
 * Check if `sub` is `sup` or inherits from it, through the prototype chain
 * or declared `supertypes`.
 */
export function isSubclass(sub: ClassType, sup: ClassType): boolean {
  if (sub === sup || sup === Object) {
    return true;
  }

  const seen = new Set<ClassType>();
  const worklist: ClassType[] = [sub];
  for (let current = worklist.shift(); current !== undefined; current = worklist.shift()) {
    if (current === sup) {
      return true;
    }
    if (seen.has(current)) {
      continue;
    }
    seen.add(current);

    for (const supertype of getDirectSupertypes(current)) {
      const supertypeRaw = rawClassOf(supertype);
      if (supertypeRaw) {
        worklist.push(supertypeRaw);
      }
    }
  }
  return false;
}

/**
 * Check if a value of type `sub` is assignable to `sup`.
 *
 * @remarks
 * Generic arguments are invariant unless `sup` uses a wildcard. A raw
 * generic class is not a subtype of any parameterization.
 */
export function isSupertype(sup: TypeRef, sub: TypeRef): boolean {
  if (typesEqual(sup, sub)) {
    return true;
  }

  if (isClassType(sup)) {
    if (isToken(sub)) {
      return false;
    }
    if (isClassType(sub)) {
      return isSubclass(sub, sup);
    }

    switch (sub.kind) {
      case 'parameterized':
        return isSubclass(sub.raw, sup);
      case 'array':
        return sup === Object || sup === Array;
      case 'wildcard':
        return sub.upper.some((bound) => isSupertype(sup, bound));
      case 'variable':
        return sup === Object;
    }
  }

  switch (sup.kind) {
    case 'token':
    case 'variable':
      return false;
    case 'array':
      return !isClassType(sub) && sub.kind === 'array' && isSupertype(sup.component, sub.component);
    case 'wildcard':
      return containsArgument(sup, sub);
    case 'parameterized': {
      const subRaw = rawClassOf(sub);
      if (subRaw === undefined || !isSubclass(subRaw, sup.raw)) {
        return false;
      }
      const resolved = getSupertype(sub, sup.raw);
      if (resolved === undefined || !isParameterized(resolved)) {
        return false;
      }
      return sup.args.every((arg, i) => {
        const actual = resolved.args[i];
        return actual !== undefined && containsArgument(arg, actual);
      });
    }
  }
}

/**
 * Check if type argument `container` admits `argument`.
 */
export function containsArgument(container: TypeRef, argument: TypeRef): boolean {
  if (typesEqual(container, argument)) {
    return true;
  }
  if (isClassType(container) || container.kind !== 'wildcard') {
    return false;
  }
  return (
    container.upper.every((bound) => isSupertype(bound, argument)) &&
    container.lower.every((bound) => isSupertype(argument, bound))
  );
}

/**
 * The runtime class of a value. Primitives map to their wrapper classes.
 */
export function runtimeTypeOf(value: unknown): ClassType {
  switch (typeof value) {
    case 'string':
      return String;
    case 'number':
      return Number;
    case 'boolean':
      return Boolean;
    case 'function':
      return Function;
    case 'object': {
      if (value === null) {
        return Object;
      }
      const prototype: unknown = Object.getPrototypeOf(value);
      if (typeof prototype === 'object' && prototype !== null && 'constructor' in prototype) {
        const constructor = prototype.constructor;
        if (isClassType(constructor)) {
          return constructor;
        }
      }
      return Object;
    }
    default:
      return Object;
  }
}
