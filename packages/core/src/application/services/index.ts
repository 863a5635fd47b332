/**
 * @fileoverview Application Services Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/application/services
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 */

export { enableProvides, enableTopics } from './modules';
export { Services, type IServicesOptions } from './services';
