/**
 * @fileoverview Qualifiers - Distinguishing Services of One Contract
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A qualifier narrows a lookup to services that carry it:
 *
 * ```typescript
 * const Primary = new QualifierType('Primary');
 *
 * class PrimaryDatabase {
 *   static qualifiers = [Primary.of(), named('main')];
 * }
 *
 * class Reports {
 *   static inject = [param(Database, { qualifiers: [Primary.of()] })] as const;
 *   constructor(private readonly db: Database) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

import { type ClassType, isTypeRef, typeName } from '../types/type-ref';
import { readOwnStatic } from '../types/generic-metadata';

/**
 * A kind of qualifier, optionally carrying a value.
 *
 * @remarks
 * Two qualifiers are equal when they share a type and their values compare
 * equal under {@link QualifierType.valuesEqual}.
 */
export class QualifierType<V = void> {
  constructor(public readonly name: string) {}

  /**
   * Create a qualifier instance of this type.
   */
  of(value: V): Qualifier<V> {
    return Object.freeze({ type: this, value });
  }

  /**
   * Value equality. Arrays compare element-wise by identity.
   */
  valuesEqual(a: V, b: V): boolean {
    if (Array.isArray(a) && Array.isArray(b)) {
      return a.length === b.length && a.every((item, i) => Object.is(item, b[i]));
    }
    return Object.is(a, b);
  }

  toString(): string {
    return `@${this.name}`;
  }
}

/**
 * A qualifier instance attached to a service or requested by an injectee.
 */
export interface Qualifier<V = unknown> {
  readonly type: QualifierType<V>;
  readonly value: V;
}

/**
 * Type guard for qualifier instances.
 */
export function isQualifier(value: unknown): value is Qualifier {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type instanceof QualifierType
  );
}

/**
 * The built-in name qualifier.
 */
export const Named = new QualifierType<string>('Named');

/**
 * Shorthand for `Named.of(name)`.
 */
export function named(name: string): Qualifier<string> {
  return Named.of(name);
}

export function qualifiersEqual(a: Qualifier, b: Qualifier): boolean {
  return a.type === b.type && a.type.valuesEqual(a.value, b.value);
}

/**
 * Check that every qualifier in `required` appears in `available`.
 */
export function containsAllQualifiers(
  available: readonly Qualifier[],
  required: readonly Qualifier[],
): boolean {
  return required.every((wanted) => available.some((have) => qualifiersEqual(have, wanted)));
}

/**
 * The value of the `Named` qualifier among `qualifiers`, if any.
 */
export function getName(qualifiers: readonly Qualifier[]): string | undefined {
  for (const qualifier of qualifiers) {
    if (qualifier.type === Named && typeof qualifier.value === 'string') {
      return qualifier.value;
    }
  }
  return undefined;
}

/**
 * Render qualifiers for diagnostics.
 */
export function formatQualifiers(qualifiers: readonly Qualifier[]): string {
  return qualifiers
    .map((qualifier) =>
      qualifier.value === undefined
        ? `@${qualifier.type.name}`
        : `@${qualifier.type.name}(${formatValue(qualifier.value)})`,
    )
    .join(' ');
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(formatValue).join(', ');
  }
  return isTypeRef(value) ? typeName(value) : String(value);
}

/**
 * Qualifiers declared directly on `cls` by `static qualifiers`.
 */
export function getQualifierMarkers(cls: ClassType): readonly Qualifier[] {
  const declared = readOwnStatic(cls, 'qualifiers');
  return Array.isArray(declared) ? declared.filter(isQualifier) : [];
}
