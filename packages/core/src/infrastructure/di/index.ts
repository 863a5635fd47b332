/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete container implementation. Use these in
 * your application's composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { createServiceCollection } from '@wireloom/core/infrastructure/di';
 *
 * const locator = createServiceCollection()
 *   .addSingleton(Settings)
 *   .addPerLookup(Clock, SystemClock)
 *   .build();
 *
 * for (const handle of locator.getAllServiceHandles(ReportJob)) {
 *   try {
 *     handle.getService().run();
 *   } finally {
 *     handle.close();
 *   }
 * }
 * ```
 */

// ============================================================================
// ServiceLocator - Registry and Resolution
// ============================================================================

export { ServiceLocator } from './service-locator';
export { ServiceHandle, closeAll } from './service-handle';

// ============================================================================
// Descriptors
// ============================================================================

export { AbstractActiveDescriptor } from './abstract-descriptor';
export {
  type ClassDescriptorOptions,
  ClassDescriptor,
  ConstantDescriptor,
  FactoryDescriptor,
  getClassContracts,
  assertConstructible,
} from './class-descriptor';

// ============================================================================
// Matching and Parameters
// ============================================================================

export { contractSatisfies, matchesInjectee, passesUnqualifiedFilter } from './contract-matcher';
export {
  type ParameterSite,
  injecteeFromParameter,
  supportsParameter,
  serviceHandleFromParameter,
  serviceFromParameter,
} from './parameter-resolver';

// ============================================================================
// Dynamic Configuration
// ============================================================================

export { DynamicConfiguration, DynamicConfigurationService, addClasses } from './dynamic-configuration';

// ============================================================================
// ServiceCollection - Service Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';
