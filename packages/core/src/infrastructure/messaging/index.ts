/**
 * @fileoverview Messaging Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/messaging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

export { Subscriber, type SubscriberInit } from './subscriber';
export { TopicImpl, TopicDescriptor, topicTypeOf } from './topic';
export { TopicDistributionService } from './topic-distribution-service';
