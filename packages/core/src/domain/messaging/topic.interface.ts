/**
 * @fileoverview Topics - Typed Publish/Subscribe Contracts
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/messaging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A message receiver is a service carrying the `MessageReceiver`
 * qualifier. Its subscriber methods are declared in `static signatures`
 * with exactly one `subscribeTo(...)` parameter; the other parameters are
 * resolved from the container on every delivery:
 *
 * ```typescript
 * class AuditTrail {
 *   static scope = Scope.Singleton;
 *   static qualifiers = [messageReceiver(UserEvent)];
 *   static signatures = {
 *     onUserEvent: [subscribeTo(UserEvent), Clock],
 *   };
 *
 *   onUserEvent(event: UserEvent, clock: Clock): void { ... }
 * }
 *
 * class Accounts {
 *   static inject = [generic(Topic, UserEvent)] as const;
 *   constructor(private readonly events: Topic<UserEvent>) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

import { type TypeRef, createToken } from '../types/type-ref';
import { type Qualifier, QualifierType } from '../di/qualifier';

/**
 * Qualifier marking a service as a message receiver. Its value lists the
 * message types the receiver accepts; empty means any type.
 */
export const MessageReceiver = new QualifierType<readonly TypeRef[]>('MessageReceiver');

/**
 * Shorthand for `MessageReceiver.of(permittedTypes)`.
 */
export function messageReceiver(...permittedTypes: TypeRef[]): Qualifier<readonly TypeRef[]> {
  return MessageReceiver.of(Object.freeze(permittedTypes));
}

/**
 * A typed publishing endpoint.
 *
 * @template T - The message type
 */
export abstract class Topic<T> {
  static typeParameters = ['T'] as const;

  /**
   * Declared message type. Subscribers are matched against it.
   */
  abstract readonly topicType: TypeRef;

  /**
   * Qualifiers attached to every message published here.
   */
  abstract readonly qualifiers: readonly Qualifier[];

  /**
   * Deliver a message to every matching subscriber.
   */
  abstract publish(message: T): void;

  /**
   * A topic of a narrower type or with more qualifiers.
   */
  abstract ofType<U extends T>(type: TypeRef, ...qualifiers: Qualifier[]): Topic<U>;
}

/**
 * Routes published messages to subscribers.
 */
export interface ITopicDistributionService {
  distributeMessage(topic: Topic<unknown>, message: unknown): void;
}

export const TOPIC_DISTRIBUTION_SERVICE = createToken<ITopicDistributionService>(
  'ITopicDistributionService',
);
