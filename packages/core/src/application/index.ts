/**
 * @fileoverview Application Layer Exports
 *
 * @module @wireloom/core/application
 * @license Apache-2.0
 */

export * from './services';
