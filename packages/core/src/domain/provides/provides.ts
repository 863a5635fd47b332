/**
 * @fileoverview Provides - Provider Member Declarations
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A provider member is a method or field whose value becomes a service of
 * its own. Members are declared in `static provides`:
 *
 * ```typescript
 * class DatabaseModule {
 *   static inject = [Settings] as const;
 *   static scope = Scope.Singleton;
 *
 *   static provides = {
 *     pool: provides.method({
 *       type: Pool,
 *       params: [Metrics],
 *       disposeMethod: 'end',
 *     }),
 *     defaultTimeout: provides.field({ type: Number, static: true, qualifiers: [named('timeout')] }),
 *   };
 *
 *   static defaultTimeout = 30;
 *
 *   constructor(private readonly settings: Settings) {}
 *
 *   pool(metrics: Metrics): Pool {
 *     return new Pool(this.settings.url, metrics);
 *   }
 * }
 * ```
 *
 * Types that mention type variables may be written as thunks. A thunk
 * receives the member's own type variables, in `typeParameters` order:
 *
 * ```typescript
 * static provides = {
 *   wrap: provides.method({
 *     static: true,
 *     typeParameters: ['T'],
 *     type: (T) => generic(Box, T),
 *     params: (T) => [generic(Source, T)],
 *   }),
 * };
 * ```
 *
 * @version 1.0.0
 */

import { type ClassType, type TypeRef, type TypeVariable, isTypeRef, typeName } from '../types/type-ref';
import { readOwnStatic } from '../types/generic-metadata';
import { type ParamSpec } from '../di/injectee';
import { type Qualifier } from '../di/qualifier';
import { type Scope } from '../di/service-scope';

/**
 * Who destroys a provided instance when `disposeMethod` is set.
 */
export enum DisposalHandledBy {
  /**
   * Call `instance[disposeMethod]()` on the provided instance.
   */
  ProvidedInstance = 'PROVIDED_INSTANCE',

  /**
   * Call `provider[disposeMethod](instance)` on the declaring class, or on
   * its instance for non-static members.
   */
  Provider = 'PROVIDER',
}

/**
 * A type, or a thunk computing it from the member's type variables.
 */
export type TypeSpec = TypeRef | ((...typeParameters: TypeVariable[]) => TypeRef);

/**
 * A type list, or a thunk computing it from the member's type variables.
 */
export type TypeListSpec = readonly TypeRef[] | ((...typeParameters: TypeVariable[]) => readonly TypeRef[]);

/**
 * A parameter list, or a thunk computing it from the member's type variables.
 */
export type ParamListSpec =
  | readonly ParamSpec[]
  | ((...typeParameters: TypeVariable[]) => readonly ParamSpec[]);

interface ProvidesOptions {
  /** Declared type of the provided value. */
  readonly type: TypeSpec;

  readonly static?: boolean;

  /**
   * Contracts to advertise instead of the value type and its contract
   * supertypes.
   */
  readonly contracts?: TypeListSpec;

  /**
   * Name of the method that destroys provided instances. Empty means the
   * container's `preDestroy` hook.
   */
  readonly disposeMethod?: string;

  /** @default DisposalHandledBy.ProvidedInstance */
  readonly disposalHandledBy?: DisposalHandledBy;

  /** The member may supply `null`. Forces per-lookup scope. */
  readonly nullable?: boolean;

  readonly scope?: Scope;

  readonly qualifiers?: readonly Qualifier[];

  readonly rank?: number;
}

export interface ProvidesMethodOptions extends ProvidesOptions {
  readonly params?: ParamListSpec;

  /** Names of the method's own type parameters. */
  readonly typeParameters?: readonly string[];
}

export type ProvidesFieldOptions = ProvidesOptions;

export interface ProvidesMethodDeclaration extends ProvidesMethodOptions {
  readonly kind: 'method';
}

export interface ProvidesFieldDeclaration extends ProvidesFieldOptions {
  readonly kind: 'field';
}

export type ProvidesDeclaration = ProvidesMethodDeclaration | ProvidesFieldDeclaration;

/**
 * Builders for `static provides` entries.
 */
export const provides = {
  method(options: ProvidesMethodOptions): ProvidesMethodDeclaration {
    return Object.freeze({ ...options, kind: 'method' as const });
  },

  field(options: ProvidesFieldOptions): ProvidesFieldDeclaration {
    return Object.freeze({ ...options, kind: 'field' as const });
  },
};

export function isProvidesDeclaration(value: unknown): value is ProvidesDeclaration {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'method' || value.kind === 'field') &&
    'type' in value &&
    (isTypeRef(value.type) || typeof value.type === 'function')
  );
}

/**
 * Provider declarations made directly on `cls`, keyed by member name.
 */
export function getOwnProvidesDeclarations(cls: ClassType): ReadonlyMap<string, ProvidesDeclaration> {
  const declarations = new Map<string, ProvidesDeclaration>();
  const declared = readOwnStatic(cls, 'provides');

  if (typeof declared === 'object' && declared !== null) {
    for (const [key, value] of Object.entries(declared)) {
      if (isProvidesDeclaration(value)) {
        declarations.set(key, value);
      }
    }
  }

  return declarations;
}

/**
 * Describe a provider member for logs, e.g. `static DatabaseModule.pool()`.
 */
export function describeMember(owner: ClassType, key: string, declaration: ProvidesDeclaration): string {
  const prefix = declaration.static === true ? 'static ' : '';
  const suffix = declaration.kind === 'method' ? '()' : '';
  return `${prefix}${typeName(owner)}.${key}${suffix}`;
}
