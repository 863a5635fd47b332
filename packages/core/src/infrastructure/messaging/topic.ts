/**
 * @fileoverview TopicImpl and TopicDescriptor - Injectable Topics
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/messaging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A `Topic` parameter is answered by {@link TopicDescriptor}, which reads
 * the message type from the injection point:
 *
 * | Injection point | topicType |
 * |-----------------|-----------|
 * | `generic(Topic, UserEvent)` | `UserEvent` |
 * | `Topic` | `Object` |
 *
 * Publishing goes through the best-ranked topic distribution service at
 * the time of the call.
 *
 * @version 1.0.0
 */

import {
  type IServiceHandle,
  type IServiceLocator,
  type Qualifier,
  type TypeRef,
  Scope,
  TOPIC_DISTRIBUTION_SERVICE,
  Topic,
  isParameterized,
  typeName,
} from '../../domain';
import { AbstractActiveDescriptor } from '../di/abstract-descriptor';

export class TopicImpl<T> extends Topic<T> {
  readonly qualifiers: readonly Qualifier[];

  constructor(
    private readonly locator: IServiceLocator,
    readonly topicType: TypeRef,
    qualifiers: readonly Qualifier[] = [],
  ) {
    super();
    this.qualifiers = Object.freeze([...qualifiers]);
  }

  publish(message: T): void {
    this.locator.getService(TOPIC_DISTRIBUTION_SERVICE).distributeMessage(this, message);
  }

  ofType<U extends T>(type: TypeRef, ...qualifiers: Qualifier[]): Topic<U> {
    return new TopicImpl<U>(this.locator, type, [...this.qualifiers, ...qualifiers]);
  }

  toString(): string {
    return `Topic<${typeName(this.topicType)}>`;
  }
}

/**
 * The message type named by a `Topic` injection point.
 */
export function topicTypeOf(requiredType: TypeRef | undefined): TypeRef {
  if (requiredType !== undefined && isParameterized(requiredType) && requiredType.raw === Topic) {
    const [messageType] = requiredType.args;
    if (messageType !== undefined) {
      return messageType;
    }
  }
  return Object;
}

export class TopicDescriptor extends AbstractActiveDescriptor<Topic<unknown>> {
  readonly implementationClass = Topic;
  readonly implementationType: TypeRef = Topic;
  readonly contractTypes: readonly TypeRef[] = [Topic];
  readonly scope = Scope.PerLookup;
  readonly qualifiers: readonly Qualifier[] = [];

  constructor(private readonly locator: IServiceLocator) {
    super();
  }

  create(root: IServiceHandle<Topic<unknown>>): Topic<unknown> {
    return new TopicImpl<unknown>(this.locator, topicTypeOf(root.injectee?.requiredType));
  }

  dispose(): void {
    // topics hold no resources
  }

  toString(): string {
    return 'TopicDescriptor';
  }
}
