/**
 * @fileoverview Type References - Runtime Generic Type Model
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * TypeScript erases generics, so generic service types are described with
 * plain values instead:
 *
 * ```typescript
 * class Box<T> {
 *   static typeParameters = ['T'] as const;
 * }
 *
 * const stringBox = generic(Box, String);      // Box<String>
 * const boxes = arrayOf(generic(Box, Number)); // Box<Number>[]
 * const T = typeVariable(Box, 'T');            // the T declared by Box
 * ```
 *
 * Type variables are interned per (declaration, name). Two variables named
 * `T` declared by different classes or members are distinct objects.
 *
 * @version 1.0.0
 */

// ============================================================================
// Class Types
// ============================================================================

/**
 * A concrete class constructor.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * An abstract class constructor, used for contracts that stand in for
 * interfaces.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * Any class, abstract or not.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ClassType<T = any> = Constructor<T> | AbstractConstructor<T>;

/**
 * Type guard for class types.
 */
export function isClassType(value: unknown): value is ClassType {
  return typeof value === 'function';
}

// ============================================================================
// Structured Types
// ============================================================================

/**
 * A named contract with no structure. Tokens match by identity only.
 */
export interface Token<T = unknown> {
  readonly kind: 'token';
  readonly description: string;
  /** Phantom slot carrying the service type. Never set. */
  readonly __type?: T;
}

/**
 * A generic class applied to type arguments, e.g. `Box<String>`.
 */
export interface ParameterizedType {
  readonly kind: 'parameterized';
  readonly raw: ClassType;
  readonly args: readonly TypeRef[];
  /** Enclosing type whose variables the arguments may reference. */
  readonly owner?: TypeRef;
}

/**
 * A type variable, identified by its declaration and name.
 */
export interface TypeVariable {
  readonly kind: 'variable';
  readonly name: string;
  readonly declaration: GenericDeclaration;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly component: TypeRef;
}

/**
 * A wildcard such as `? extends Number` or `? super Integer`.
 */
export interface WildcardType {
  readonly kind: 'wildcard';
  readonly upper: readonly TypeRef[];
  readonly lower: readonly TypeRef[];
}

/**
 * A method or field that declares its own type parameters.
 */
export interface MemberDeclaration {
  readonly kind: 'member';
  readonly owner: ClassType;
  readonly key: string;
  readonly isStatic: boolean;
}

/**
 * Something that can declare type parameters.
 */
export type GenericDeclaration = ClassType | MemberDeclaration;

/**
 * Any runtime type reference.
 */
export type TypeRef =
  | ClassType
  | Token
  | ParameterizedType
  | TypeVariable
  | ArrayType
  | WildcardType;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a token contract.
 *
 * @example
 * ```typescript
 * const IClock = createToken<Clock>('IClock');
 * ```
 */
export function createToken<T>(description: string): Token<T> {
  const token: Token<T> = { kind: 'token', description };
  return Object.freeze(token);
}

/**
 * Apply a generic class to type arguments.
 */
export function generic(raw: ClassType, ...args: TypeRef[]): ParameterizedType {
  const type: ParameterizedType = { kind: 'parameterized', raw, args: Object.freeze(args) };
  return Object.freeze(type);
}

/**
 * Apply a generic class nested in an owner type.
 */
export function ownedGeneric(
  owner: TypeRef,
  raw: ClassType,
  ...args: TypeRef[]
): ParameterizedType {
  const type: ParameterizedType = { kind: 'parameterized', raw, args: Object.freeze(args), owner };
  return Object.freeze(type);
}

export function arrayOf(component: TypeRef): ArrayType {
  const type: ArrayType = { kind: 'array', component };
  return Object.freeze(type);
}

/**
 * Create a wildcard. With no bounds it is `?`, bounded above by `Object`.
 */
export function wildcard(bounds?: {
  extends?: readonly TypeRef[];
  super?: readonly TypeRef[];
}): WildcardType {
  const upper = bounds?.extends && bounds.extends.length > 0 ? bounds.extends : [Object];
  const type: WildcardType = {
    kind: 'wildcard',
    upper: Object.freeze([...upper]),
    lower: Object.freeze([...(bounds?.super ?? [])]),
  };
  return Object.freeze(type);
}

const memberDeclarations = new WeakMap<ClassType, Map<string, MemberDeclaration>>();

/**
 * The interned declaration of a class member.
 */
export function memberDeclaration(
  owner: ClassType,
  key: string,
  isStatic: boolean,
): MemberDeclaration {
  let byKey = memberDeclarations.get(owner);
  if (!byKey) {
    byKey = new Map();
    memberDeclarations.set(owner, byKey);
  }

  const slot = `${isStatic ? 'static' : 'instance'}:${key}`;
  let declaration = byKey.get(slot);
  if (!declaration) {
    const created: MemberDeclaration = { kind: 'member', owner, key, isStatic };
    declaration = Object.freeze(created);
    byKey.set(slot, declaration);
  }
  return declaration;
}

const typeVariables = new WeakMap<GenericDeclaration, Map<string, TypeVariable>>();

/**
 * The interned type variable `name` declared by `declaration`.
 */
export function typeVariable(declaration: GenericDeclaration, name: string): TypeVariable {
  let byName = typeVariables.get(declaration);
  if (!byName) {
    byName = new Map();
    typeVariables.set(declaration, byName);
  }

  let variable = byName.get(name);
  if (!variable) {
    const created: TypeVariable = { kind: 'variable', name, declaration };
    variable = Object.freeze(created);
    byName.set(name, variable);
  }
  return variable;
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Type guard for type references.
 */
export function isTypeRef(value: unknown): value is TypeRef {
  if (isClassType(value)) {
    return true;
  }

  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }

  switch (value.kind) {
    case 'token':
    case 'parameterized':
    case 'variable':
    case 'array':
    case 'wildcard':
      return true;
    default:
      return false;
  }
}

export function isToken(type: TypeRef): type is Token {
  return !isClassType(type) && type.kind === 'token';
}

export function isParameterized(type: TypeRef): type is ParameterizedType {
  return !isClassType(type) && type.kind === 'parameterized';
}

export function isTypeVariable(type: TypeRef): type is TypeVariable {
  return !isClassType(type) && type.kind === 'variable';
}

/**
 * The raw class of a type, or `undefined` for tokens.
 *
 * @remarks
 * Variables and wildcards erase to their first upper bound, or `Object`.
 */
export function rawClassOf(type: TypeRef): ClassType | undefined {
  if (isClassType(type)) {
    return type;
  }

  switch (type.kind) {
    case 'token':
      return undefined;
    case 'parameterized':
      return type.raw;
    case 'array':
      return Array;
    case 'wildcard': {
      const [bound] = type.upper;
      return bound === undefined ? Object : rawClassOf(bound);
    }
    case 'variable':
      return Object;
  }
}

/**
 * Human-readable name of a type.
 */
export function typeName(type: TypeRef): string {
  if (isClassType(type)) {
    return type.name || 'AnonymousClass';
  }

  switch (type.kind) {
    case 'token':
      return type.description;
    case 'parameterized': {
      const prefix = type.owner ? `${typeName(type.owner)}.` : '';
      return `${prefix}${typeName(type.raw)}<${type.args.map(typeName).join(', ')}>`;
    }
    case 'variable':
      return type.name;
    case 'array':
      return `${typeName(type.component)}[]`;
    case 'wildcard': {
      if (type.lower.length > 0) {
        return `? super ${type.lower.map(typeName).join(' & ')}`;
      }
      const bounds = type.upper.filter((bound) => bound !== Object);
      return bounds.length === 0 ? '?' : `? extends ${bounds.map(typeName).join(' & ')}`;
    }
  }
}

/**
 * Structural equality of two type references.
 */
export function typesEqual(a: TypeRef, b: TypeRef): boolean {
  if (a === b) {
    return true;
  }

  if (isClassType(a) || isClassType(b)) {
    return false;
  }

  switch (a.kind) {
    case 'parameterized':
      return (
        b.kind === 'parameterized' &&
        a.raw === b.raw &&
        listsEqual(a.args, b.args) &&
        (a.owner === undefined
          ? b.owner === undefined
          : b.owner !== undefined && typesEqual(a.owner, b.owner))
      );
    case 'array':
      return b.kind === 'array' && typesEqual(a.component, b.component);
    case 'wildcard':
      return b.kind === 'wildcard' && listsEqual(a.upper, b.upper) && listsEqual(a.lower, b.lower);
    case 'token':
    case 'variable':
      // Interned or identity-only.
      return false;
  }
}

function listsEqual(a: readonly TypeRef[], b: readonly TypeRef[]): boolean {
  return a.length === b.length && a.every((type, i) => {
    const other = b[i];
    return other !== undefined && typesEqual(type, other);
  });
}

/**
 * Add `type` to `types` unless an equal type is already present.
 */
export function addDistinctType(types: TypeRef[], type: TypeRef): void {
  if (!types.some((existing) => typesEqual(existing, type))) {
    types.push(type);
  }
}
