/**
 * @fileoverview ProviderMember - The Four Kinds of Provider Member
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * | kind | value read from | needs an owner instance |
 * |------|-----------------|-------------------------|
 * | `static-method` | `DeclaringClass[key](...args)` | no |
 * | `instance-method` | `owner[key](...args)` | yes |
 * | `static-field` | `DeclaringClass[key]` | no |
 * | `instance-field` | `owner[key]` | yes |
 *
 * @version 1.0.0
 */

import {
  type ClassType,
  type ParamSpec,
  type ProvidesDeclaration,
  type ProvidesFieldDeclaration,
  type ProvidesMethodDeclaration,
  type TypeVariable,
  describeMember,
  typeName,
} from '../../domain';
import { evaluateParamList, memberTypeVariables } from '../types/lazy-types';
import { runtimeTypeOf } from '../types/type-resolver';

interface MemberBase {
  /** The class whose `static provides` declares the member. */
  readonly declaringClass: ClassType;
  readonly key: string;
  /** Type variables the member declares for itself. */
  readonly typeVariables: readonly TypeVariable[];
}

export interface StaticMethodMember extends MemberBase {
  readonly kind: 'static-method';
  readonly declaration: ProvidesMethodDeclaration;
}

export interface InstanceMethodMember extends MemberBase {
  readonly kind: 'instance-method';
  readonly declaration: ProvidesMethodDeclaration;
}

export interface StaticFieldMember extends MemberBase {
  readonly kind: 'static-field';
  readonly declaration: ProvidesFieldDeclaration;
}

export interface InstanceFieldMember extends MemberBase {
  readonly kind: 'instance-field';
  readonly declaration: ProvidesFieldDeclaration;
}

export type ProviderMember = StaticMethodMember | InstanceMethodMember | StaticFieldMember | InstanceFieldMember;

export type ProviderMemberKind = ProviderMember['kind'];

export const STATIC_MEMBER_KINDS: readonly ProviderMemberKind[] = ['static-method', 'static-field'];

export const INSTANCE_MEMBER_KINDS: readonly ProviderMemberKind[] = ['instance-method', 'instance-field'];

export function createProviderMember(
  declaringClass: ClassType,
  key: string,
  declaration: ProvidesDeclaration,
): ProviderMember {
  const isStatic = declaration.static === true;

  if (declaration.kind === 'method') {
    const typeVariables = memberTypeVariables(declaringClass, key, isStatic, declaration.typeParameters);
    return isStatic
      ? { kind: 'static-method', declaringClass, key, declaration, typeVariables }
      : { kind: 'instance-method', declaringClass, key, declaration, typeVariables };
  }

  return isStatic
    ? { kind: 'static-field', declaringClass, key, declaration, typeVariables: [] }
    : { kind: 'instance-field', declaringClass, key, declaration, typeVariables: [] };
}

export function isStaticMember(member: ProviderMember): boolean {
  return member.kind === 'static-method' || member.kind === 'static-field';
}

/**
 * Declared parameters, with the member's type variables applied. Fields
 * have none.
 */
export function memberParams(member: ProviderMember): readonly ParamSpec[] {
  switch (member.kind) {
    case 'static-method':
    case 'instance-method':
      return evaluateParamList(member.declaration.params ?? [], member.typeVariables);
    case 'static-field':
    case 'instance-field':
      return [];
  }
}

export function describeProviderMember(member: ProviderMember): string {
  return describeMember(member.declaringClass, member.key, member.declaration);
}

// ============================================================================
// Invocation
// ============================================================================

function describeTarget(target: unknown): string {
  if (target === null || target === undefined) {
    return String(target);
  }
  return typeof target === 'function' ? target.name : `an instance of ${typeName(runtimeTypeOf(target))}`;
}

/**
 * Read a property of an object or function.
 *
 * @throws TypeError if `target` cannot carry properties
 */
export function readProperty(target: unknown, key: string): unknown {
  if (typeof target === 'function' || (typeof target === 'object' && target !== null)) {
    const value: unknown = Reflect.get(target, key);
    return value;
  }
  throw new TypeError(`Cannot read '${key}' of ${describeTarget(target)}`);
}

/**
 * Call `target[key](...args)` with `target` as `this`.
 *
 * @throws TypeError if the property is not a function
 */
export function invokeMethod(target: unknown, key: string, args: readonly unknown[]): unknown {
  const method = readProperty(target, key);
  if (typeof method !== 'function') {
    throw new TypeError(`'${key}' is not a method of ${describeTarget(target)}`);
  }
  const result: unknown = Reflect.apply(method, target, args);
  return result;
}

/**
 * Produce the value of a member. `owner` is ignored for static members.
 */
export function readMember(member: ProviderMember, owner: unknown, args: readonly unknown[]): unknown {
  switch (member.kind) {
    case 'static-method':
      return invokeMethod(member.declaringClass, member.key, args);
    case 'instance-method':
      return invokeMethod(owner, member.key, args);
    case 'static-field':
      return readProperty(member.declaringClass, member.key);
    case 'instance-field':
      return readProperty(owner, member.key);
  }
}
