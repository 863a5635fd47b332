/**
 * @fileoverview TopicDistributionService - Subscriber Discovery and Delivery
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/messaging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Discovery (on every configuration change)
 *
 * ```
 * for each descriptor qualified with MessageReceiver
 *   class not yet seen?
 *     for each method in `static signatures`
 *       malformed entry                 → warn, reject
 *       no subscribeTo parameter        → skip
 *       more than one                   → warn, reject
 *       another parameter unsupported   → warn, reject
 *       type outside permitted types    → warn, keep
 * ```
 *
 * New subscribers replace the list with an extended copy, so a message
 * being delivered keeps the list it started with.
 *
 * ## Delivery
 *
 * Sequential, in discovery order. For each matching subscriber the other
 * parameters are resolved and the receiver is obtained through a handle;
 * per-lookup handles are closed once the method returns. A failing
 * subscriber is logged and the rest still receive the message.
 *
 * @example
 * ```typescript
 * const services = new Services(collection);
 * const topics = services.getService(TopicDistributionService);
 * topics.topic(UserEvent).publish(new UserEvent('alice'));
 * ```
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type ClassType,
  type DeclaredMethod,
  type IDynamicConfigurationListener,
  type IServiceHandle,
  type IServiceLocator,
  type ITopicDistributionService,
  type Qualifier,
  type Topic,
  type TypeRef,
  DYNAMIC_CONFIGURATION_LISTENER,
  MessageReceiver,
  SERVICE_LOCATOR_TOKEN,
  Scope,
  TOPIC_DISTRIBUTION_SERVICE,
  getSignatures,
  isTypeRef,
  toParameterSpec,
  typeName,
} from '../../domain';
import { serviceHandleFromParameter, supportsParameter } from '../di/parameter-resolver';
import { closeAll } from '../di/service-handle';
import { createLogger } from '../logging/logger';
import { AnalysisTable } from '../provides/analysis-table';
import { invokeMethod } from '../provides/provider-member';
import { evaluateParamList, memberTypeVariables } from '../types/lazy-types';
import { isSupertype } from '../types/type-resolver';

import { Subscriber } from './subscriber';
import { TopicImpl } from './topic';

/**
 * Message types accepted by a receiver, from its `MessageReceiver`
 * qualifiers. Empty means any type.
 */
function getPermittedTypes(qualifiers: readonly Qualifier[]): TypeRef[] {
  const permitted: TypeRef[] = [];
  for (const qualifier of qualifiers) {
    if (qualifier.type === MessageReceiver && Array.isArray(qualifier.value)) {
      permitted.push(...qualifier.value.filter(isTypeRef));
    }
  }
  return permitted;
}

function isMessageReceiver(descriptor: ActiveDescriptor): boolean {
  return descriptor.qualifiers.some((qualifier) => qualifier.type === MessageReceiver);
}

export class TopicDistributionService implements ITopicDistributionService, IDynamicConfigurationListener {
  static scope = Scope.Singleton;
  static contracts: readonly TypeRef[] = [
    TopicDistributionService,
    TOPIC_DISTRIBUTION_SERVICE,
    DYNAMIC_CONFIGURATION_LISTENER,
  ];
  static inject = [SERVICE_LOCATOR_TOKEN, AnalysisTable];

  private readonly log = createLogger('topics');
  private subscribers: readonly Subscriber[] = [];

  constructor(
    private readonly locator: IServiceLocator,
    private readonly table: AnalysisTable,
  ) {}

  /**
   * Subscribers discovered so far.
   */
  getSubscribers(): readonly Subscriber[] {
    return this.subscribers;
  }

  /**
   * A topic for publishing messages of `type`.
   */
  topic<T>(type: TypeRef, ...qualifiers: Qualifier[]): Topic<T> {
    return new TopicImpl<T>(this.locator, type, qualifiers);
  }

  /**
   * Deliver `message` to every subscriber of `topic`.
   *
   * @throws TypeError if `message` is null or undefined
   */
  distributeMessage(topic: Topic<unknown>, message: unknown): void {
    if (message === null || message === undefined) {
      throw new TypeError(`Cannot publish ${String(message)} to ${String(topic)}`);
    }

    const matching = this.subscribers.filter((subscriber) => subscriber.isSubscribedTo(topic));

    if (matching.length === 0) {
      this.log.warn({ topic: typeName(topic.topicType) }, 'No subscribers for message');
      return;
    }

    for (const subscriber of matching) {
      this.deliver(subscriber, message);
    }
  }

  configurationChanged(): void {
    const discovered: Subscriber[] = [];

    for (const registered of this.locator.getDescriptors(isMessageReceiver)) {
      const descriptor = this.locator.reifyDescriptor(registered);
      const cls = descriptor.implementationClass;
      if (cls === undefined || !this.table.beginAnalysis('topics', cls)) {
        continue;
      }

      try {
        discovered.push(...this.findSubscribers(descriptor, cls));
      } finally {
        this.table.finishAnalysis('topics', cls);
      }
    }

    if (discovered.length > 0) {
      this.log.debug({ subscribers: discovered.map(String) }, 'Subscribers discovered');
      this.subscribers = Object.freeze([...this.subscribers, ...discovered]);
    }
  }

  // ============================================================================
  // Discovery
  // ============================================================================

  private findSubscribers(descriptor: ActiveDescriptor, cls: ClassType): Subscriber[] {
    const permittedTypes = getPermittedTypes(descriptor.qualifiers);
    const subscribers: Subscriber[] = [];

    for (const method of getSignatures(cls)) {
      const subscriber = this.createSubscriber(descriptor, cls, method, permittedTypes);
      if (subscriber !== undefined) {
        subscribers.push(subscriber);
      }
    }
    return subscribers;
  }

  private createSubscriber(
    descriptor: ActiveDescriptor,
    cls: ClassType,
    method: DeclaredMethod,
    permittedTypes: readonly TypeRef[],
  ): Subscriber | undefined {
    const name = `${cls.name}.${method.key}()`;
    if (method.malformed.length > 0) {
      this.log.warn(
        { method: name, positions: method.malformed },
        'Subscriber method has malformed parameter declarations',
      );
      return undefined;
    }

    const variables = memberTypeVariables(method.owner, method.key, method.isStatic, method.typeParameters);
    const params = evaluateParamList(method.params, variables);
    const subscriptions = [...params.entries()].filter(([, spec]) => toParameterSpec(spec).subscribeTo === true);

    const [first] = subscriptions;
    if (first === undefined) {
      this.log.debug({ method: name }, 'Method has no subscribeTo parameter');
      return undefined;
    }
    if (subscriptions.length > 1) {
      this.log.warn(
        { method: name, positions: subscriptions.map(([position]) => position) },
        'Subscriber method has more than one subscribeTo parameter',
      );
      return undefined;
    }

    const [subscriptionIndex, subscriptionSpec] = first;
    const subscriber = new Subscriber({
      descriptor,
      receiverClass: cls,
      methodName: method.key,
      isStatic: method.isStatic,
      params,
      subscriptionIndex,
      subscription: toParameterSpec(subscriptionSpec),
      permittedTypes,
    });

    for (const [position, spec] of params.entries()) {
      if (position !== subscriptionIndex && !supportsParameter(spec, subscriber.siteOf(position), this.locator)) {
        this.log.warn(
          { method: name, position, type: typeName(toParameterSpec(spec).type) },
          'Subscriber method has an unsupported parameter',
        );
        return undefined;
      }
    }

    if (
      permittedTypes.length > 0 &&
      !permittedTypes.some((permitted) => isSupertype(permitted, subscriber.parameterType))
    ) {
      this.log.warn(
        {
          method: name,
          type: typeName(subscriber.parameterType),
          permitted: permittedTypes.map(typeName),
        },
        'Subscriber message type is not among the permitted types',
      );
    }

    return subscriber;
  }

  // ============================================================================
  // Delivery
  // ============================================================================

  private deliver(subscriber: Subscriber, message: unknown): void {
    const handles: IServiceHandle[] = [];

    try {
      const args = subscriber.params.map((spec, position) => {
        if (position === subscriber.subscriptionIndex) {
          return message;
        }
        const handle = serviceHandleFromParameter(spec, subscriber.siteOf(position), this.locator);
        if (handle === null) {
          return null;
        }
        if (handle.activeDescriptor.scope === Scope.PerLookup) {
          handles.push(handle);
        }
        return handle.getService();
      });

      let receiver: unknown = subscriber.receiverClass;
      if (!subscriber.isStatic) {
        const handle = this.locator.getServiceHandle(subscriber.descriptor);
        if (subscriber.descriptor.scope === Scope.PerLookup) {
          handles.push(handle);
        }
        receiver = handle.getService();
        if (receiver === null || receiver === undefined) {
          this.log.error({ subscriber: String(subscriber) }, 'Message receiver produced no instance');
          return;
        }
      }

      invokeMethod(receiver, subscriber.methodName, args);
    } catch (error) {
      this.log.error({ err: error, subscriber: String(subscriber) }, 'Subscriber failed');
    } finally {
      this.release(subscriber, handles);
    }
  }

  private release(subscriber: Subscriber, handles: readonly IServiceHandle[]): void {
    try {
      closeAll(handles);
    } catch (error) {
      this.log.error({ err: error, subscriber: String(subscriber) }, 'Failed to release subscriber dependencies');
    }
  }
}
