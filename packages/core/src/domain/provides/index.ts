/**
 * @fileoverview Domain Provides Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/provides
 * @license Apache-2.0
 */

export * from './provides';
