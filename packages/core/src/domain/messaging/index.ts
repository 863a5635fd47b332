/**
 * @fileoverview Domain Messaging Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/messaging
 * @license Apache-2.0
 */

export * from './topic.interface';
