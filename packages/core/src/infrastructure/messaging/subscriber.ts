/**
 * @fileoverview Subscriber - A Message Receiver Method
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/messaging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Matching
 *
 * ```
 * isSubscribedTo(topic)
 *   1. topic.topicType is assignable to the subscribed parameter type
 *   2. no permitted types, or topicType is assignable to one of them
 *   3. topic.qualifiers contain every qualifier of the parameter
 *   4. the parameter's `unqualified` filter passes topic.qualifiers
 * ```
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type ParamSpec,
  type ParameterSpec,
  type Qualifier,
  type QualifierType,
  type Topic,
  type TypeRef,
  containsAllQualifiers,
} from '../../domain';
import { passesUnqualifiedFilter } from '../di/contract-matcher';
import { type ParameterSite } from '../di/parameter-resolver';
import { isSupertype, resolve } from '../types/type-resolver';

export interface SubscriberInit {
  /** The receiver service's descriptor. */
  readonly descriptor: ActiveDescriptor;
  readonly receiverClass: ClassType;
  readonly methodName: string;
  readonly isStatic: boolean;
  readonly params: readonly ParamSpec[];
  /** Position of the `subscribeTo(...)` parameter. */
  readonly subscriptionIndex: number;
  readonly subscription: ParameterSpec;
  readonly permittedTypes: readonly TypeRef[];
}

export class Subscriber {
  readonly descriptor: ActiveDescriptor;
  readonly receiverClass: ClassType;
  readonly methodName: string;
  readonly isStatic: boolean;
  readonly params: readonly ParamSpec[];
  readonly subscriptionIndex: number;
  readonly permittedTypes: readonly TypeRef[];

  /** The subscribed message type, resolved against the receiver. */
  readonly parameterType: TypeRef;

  readonly qualifiers: readonly Qualifier[];
  readonly unqualified: readonly QualifierType<unknown>[] | undefined;

  constructor(init: SubscriberInit) {
    this.descriptor = init.descriptor;
    this.receiverClass = init.receiverClass;
    this.methodName = init.methodName;
    this.isStatic = init.isStatic;
    this.params = init.params;
    this.subscriptionIndex = init.subscriptionIndex;
    this.permittedTypes = init.permittedTypes;
    this.parameterType = resolve(init.descriptor.implementationType, init.subscription.type);
    this.qualifiers = init.subscription.qualifiers ?? [];
    this.unqualified = init.subscription.unqualified;
  }

  isSubscribedTo(topic: Topic<unknown>): boolean {
    const messageType = topic.topicType;

    if (!isSupertype(this.parameterType, messageType)) {
      return false;
    }
    if (
      this.permittedTypes.length > 0 &&
      !this.permittedTypes.some((permitted) => isSupertype(permitted, messageType))
    ) {
      return false;
    }
    return (
      containsAllQualifiers(topic.qualifiers, this.qualifiers) &&
      passesUnqualifiedFilter(topic.qualifiers, this.unqualified)
    );
  }

  /**
   * Where the parameter at `position` is resolved.
   */
  siteOf(position: number): ParameterSite {
    return {
      context: this.descriptor.implementationType,
      parent: this.toString(),
      position,
      injecteeDescriptor: this.descriptor,
    };
  }

  toString(): string {
    return `${this.receiverClass.name}.${this.isStatic ? 'static ' : ''}${this.methodName}()`;
  }
}
