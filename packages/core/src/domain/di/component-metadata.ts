/**
 * @fileoverview Component Metadata - Static Markers on Service Classes
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ## Zero-Reflection Pattern
 *
 * Classes describe themselves with static properties instead of decorators:
 *
 * ```typescript
 * class ReportJob {
 *   static inject = [Reports, param(Clock, { optional: true })] as const;
 *   static scope = Scope.Singleton;
 *   static qualifiers = [named('nightly')];
 *   static rank = 10;
 *
 *   constructor(reports: Reports, clock: Clock | null) {}
 * }
 *
 * // Abstract classes stand in for interfaces
 * abstract class Clock {
 *   static contract = true;
 *   abstract now(): number;
 * }
 * ```
 *
 * Markers are read from the class itself, never inherited from a parent
 * class. `inject` is the exception: a subclass without its own constructor
 * uses its parent's.
 *
 * @version 1.0.0
 */

import { type ClassType, type Constructor, type TypeRef, type TypeVariable, isTypeRef, rawClassOf } from '../types/type-ref';
import { evaluateLazy, getParentClass, readOwnStatic } from '../types/generic-metadata';

import { type ParamSpec, isParamSpec } from './injectee';

/**
 * Constructor dependencies declared by `static inject`.
 *
 * @remarks
 * Order must match constructor parameter order. When `cls` declares no
 * `inject` of its own, its nearest ancestor's is used.
 */
export function getInjectDependencies(cls: ClassType): readonly ParamSpec[] {
  for (let current: ClassType | undefined = cls; current; current = getParentClass(current)) {
    const declared = evaluateLazy(readOwnStatic(current, 'inject'));
    if (Array.isArray(declared)) {
      return declared.filter(isParamSpec);
    }
  }
  return [];
}

/**
 * Check if a class carries the `static contract = true` marker.
 */
export function isContract(cls: ClassType): boolean {
  return readOwnStatic(cls, 'contract') === true;
}

/**
 * The explicit contract list declared by `static contracts`, if any.
 */
export function getContractsMarker(cls: ClassType): readonly TypeRef[] | undefined {
  const declared = evaluateLazy(readOwnStatic(cls, 'contracts'));
  return Array.isArray(declared) ? declared.filter((entry): entry is TypeRef => isTypeRef(entry)) : undefined;
}

/**
 * The ranking declared by `static rank`, if any.
 */
export function getRankMarker(cls: ClassType): number | undefined {
  const declared = readOwnStatic(cls, 'rank');
  return typeof declared === 'number' ? declared : undefined;
}

/**
 * Check if the container can construct `cls` from its `inject` list.
 *
 * @remarks
 * Contract classes stand in for interfaces and are never constructed. A
 * class whose constructor takes more parameters than `inject` declares
 * cannot be constructed either.
 */
export function isConstructible<T>(cls: ClassType<T>): cls is Constructor<T> {
  return !isContract(cls) && cls.length <= getInjectDependencies(cls).length;
}

/**
 * Raw classes of a list of types, skipping tokens.
 */
export function rawClassesOf(types: readonly TypeRef[]): ClassType[] {
  const classes: ClassType[] = [];
  for (const type of types) {
    const raw = rawClassOf(type);
    if (raw && !classes.includes(raw)) {
      classes.push(raw);
    }
  }
  return classes;
}

// ============================================================================
// Method Signatures
// ============================================================================

/**
 * Parameter list of a method, or a thunk computing it from the method's own
 * type variables.
 */
export type SignatureParams =
  | readonly ParamSpec[]
  | ((...typeParameters: TypeVariable[]) => readonly ParamSpec[]);

/**
 * A declared method signature.
 *
 * @example
 * ```typescript
 * class Inbox {
 *   static signatures = {
 *     onMessage: [subscribeTo(Message), Clock],
 *     release: { static: true, params: [Connection] },
 *   };
 * }
 * ```
 */
export interface MethodSignature {
  readonly static?: boolean;
  readonly params: SignatureParams;
  readonly typeParameters?: readonly string[];
}

/**
 * A signature entry resolved from `static signatures`.
 */
export interface DeclaredMethod {
  readonly owner: ClassType;
  readonly key: string;
  readonly isStatic: boolean;
  readonly params: SignatureParams;
  readonly typeParameters: readonly string[];
  /** Positions of entries that are not parameter declarations. */
  readonly malformed: readonly number[];
}

function isMethodSignature(value: unknown): value is MethodSignature {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'params' in value &&
    (Array.isArray(value.params) || typeof value.params === 'function')
  );
}

function malformedPositions(entries: readonly unknown[]): number[] {
  return [...entries.keys()].filter((position) => !isParamSpec(entries[position]));
}

/**
 * Method signatures declared directly on `cls`. A signature with a
 * malformed entry keeps no parameters and lists the entry's position in
 * `malformed`.
 */
export function getOwnSignatures(cls: ClassType): DeclaredMethod[] {
  const declared = readOwnStatic(cls, 'signatures');
  if (typeof declared !== 'object' || declared === null) {
    return [];
  }

  const methods: DeclaredMethod[] = [];
  for (const [key, value] of Object.entries(declared)) {
    if (Array.isArray(value)) {
      const entries: unknown[] = value;
      methods.push({
        owner: cls,
        key,
        isStatic: false,
        params: entries.every(isParamSpec) ? entries : [],
        typeParameters: [],
        malformed: malformedPositions(entries),
      });
    } else if (isMethodSignature(value)) {
      methods.push({
        owner: cls,
        key,
        isStatic: value.static === true,
        params: value.params,
        typeParameters: value.typeParameters ?? [],
        malformed: typeof value.params === 'function' ? [] : malformedPositions(value.params),
      });
    }
  }
  return methods;
}

/**
 * Method signatures of `cls` and its ancestors, most derived first. A
 * method redeclared by a subclass shadows its ancestors' declarations.
 */
export function getSignatures(cls: ClassType): DeclaredMethod[] {
  const methods: DeclaredMethod[] = [];
  const seen = new Set<string>();

  for (let current: ClassType | undefined = cls; current; current = getParentClass(current)) {
    for (const method of getOwnSignatures(current)) {
      const slot = `${method.isStatic ? 'static' : 'instance'}:${method.key}`;
      if (!seen.has(slot)) {
        seen.add(slot);
        methods.push(method);
      }
    }
  }
  return methods;
}
