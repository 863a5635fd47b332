/**
 * @fileoverview Injectee - Injection Points and Parameter Declarations
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Constructor and method parameters are declared as plain types, or as
 * `param(...)` specs when they carry injection options:
 *
 * ```typescript
 * class Mailer {
 *   static inject = [
 *     Transport,
 *     param(Clock, { optional: true }),
 *     param(Template, { qualifiers: [named('welcome')] }),
 *   ] as const;
 * }
 * ```
 *
 * @version 1.0.0
 */

import { type TypeRef, isTypeRef, typeName } from '../types/type-ref';

import { type Qualifier, type QualifierType, formatQualifiers } from './qualifier';
import type { ActiveDescriptor } from './service-descriptor';

// ============================================================================
// Parameter Declarations
// ============================================================================

/**
 * Injection options for a single parameter.
 */
export interface ParameterOptions {
  /** Qualifiers the injected service must carry. */
  readonly qualifiers?: readonly Qualifier[];

  /** Inject `null` instead of failing when no service matches. */
  readonly optional?: boolean;

  /** Inject the descriptor of the service being created. */
  readonly self?: boolean;

  /**
   * Only accept services without the listed qualifier types. An empty list
   * accepts only services with no qualifiers at all.
   */
  readonly unqualified?: readonly QualifierType<unknown>[];

  /** Marks the message slot of a subscriber method. */
  readonly subscribeTo?: boolean;
}

/**
 * A parameter declaration with options.
 */
export interface ParameterSpec extends ParameterOptions {
  readonly kind: 'parameter';
  readonly type: TypeRef;
}

/**
 * A parameter declaration: a bare type or a `param(...)` spec.
 */
export type ParamSpec = TypeRef | ParameterSpec;

/**
 * Declare a parameter with injection options.
 */
export function param(type: TypeRef, options: ParameterOptions = {}): ParameterSpec {
  return Object.freeze({ ...options, kind: 'parameter' as const, type });
}

/**
 * Declare the message parameter of a subscriber method.
 */
export function subscribeTo(type: TypeRef, options: ParameterOptions = {}): ParameterSpec {
  return param(type, { ...options, subscribeTo: true });
}

export function isParameterSpec(value: unknown): value is ParameterSpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'parameter' &&
    'type' in value &&
    isTypeRef(value.type)
  );
}

export function isParamSpec(value: unknown): value is ParamSpec {
  return isParameterSpec(value) || isTypeRef(value);
}

/**
 * Normalize a parameter declaration to its spec form.
 */
export function toParameterSpec(spec: ParamSpec): ParameterSpec {
  return isParameterSpec(spec) ? spec : param(spec);
}

// ============================================================================
// Injectee
// ============================================================================

/**
 * A request for a service at a specific injection point.
 */
export interface Injectee {
  readonly requiredType: TypeRef;
  readonly requiredQualifiers: readonly Qualifier[];
  readonly optional: boolean;
  readonly self: boolean;
  readonly unqualified?: readonly QualifierType<unknown>[];

  /** Parameter index, or -1 for a direct lookup. */
  readonly position: number;

  /** Description of the member that owns the parameter. */
  readonly parent?: string;

  /** Descriptor of the service being created, when there is one. */
  readonly injecteeDescriptor?: ActiveDescriptor;
}

/**
 * The injectee for a direct lookup of `type`.
 */
export function injecteeFromType(type: TypeRef, qualifiers: readonly Qualifier[] = []): Injectee {
  return {
    requiredType: type,
    requiredQualifiers: qualifiers,
    optional: false,
    self: false,
    position: -1,
  };
}

/**
 * Describe an injectee for error messages, e.g. `@Named(main) Database`.
 */
export function describeInjectee(injectee: Injectee): string {
  const qualifiers = formatQualifiers(injectee.requiredQualifiers);
  const type = typeName(injectee.requiredType);
  const target = qualifiers ? `${qualifiers} ${type}` : type;

  if (injectee.parent === undefined || injectee.position < 0) {
    return target;
  }
  return `${target} (parameter ${injectee.position} of ${injectee.parent})`;
}
