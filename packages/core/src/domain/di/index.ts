/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports DI-related interfaces, types, and error classes.
 * These are technology-agnostic contracts that the Infrastructure layer implements.
 *
 * ## Zero-Reflection Pattern
 *
 * wireloom uses static properties instead of decorators:
 *
 * ```typescript
 * import { Scope, createToken, named, param } from '@wireloom/core/domain';
 *
 * interface Mailer { send(to: string): void; }
 * const Mailer = createToken<Mailer>('Mailer');
 *
 * class SignupService {
 *   static scope = Scope.Singleton;
 *   static inject = [Mailer, param(Clock, { qualifiers: [named('utc')] })] as const;
 *   constructor(private mailer: Mailer, private clock: Clock) {}
 * }
 * ```
 */

// ============================================================================
// Scope
// ============================================================================

export { Scope, isCacheable, isScope, getScopeName, getScopeMarker } from './service-scope';

// ============================================================================
// Qualifiers
// ============================================================================

export {
  QualifierType,
  type Qualifier,
  isQualifier,
  Named,
  named,
  qualifiersEqual,
  containsAllQualifiers,
  getName,
  formatQualifiers,
  getQualifierMarkers,
} from './qualifier';

// ============================================================================
// Injection Points
// ============================================================================

export {
  type ParameterOptions,
  type ParameterSpec,
  type ParamSpec,
  type Injectee,
  param,
  subscribeTo,
  isParameterSpec,
  isParamSpec,
  toParameterSpec,
  injecteeFromType,
  describeInjectee,
} from './injectee';

// ============================================================================
// Component Metadata
// ============================================================================

export {
  type SignatureParams,
  type MethodSignature,
  type DeclaredMethod,
  getInjectDependencies,
  isContract,
  getContractsMarker,
  getRankMarker,
  isConstructible,
  rawClassesOf,
  getOwnSignatures,
  getSignatures,
} from './component-metadata';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type ActiveDescriptor,
  type DescriptorFilter,
  ALL_DESCRIPTORS,
  describeDescriptor,
} from './service-descriptor';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type ServiceType,
  type IPostConstruct,
  type IPreDestroy,
  type IServiceHandle,
  type IServiceLocator,
  type IDynamicConfiguration,
  type IDynamicConfigurationService,
  type IDynamicConfigurationListener,
  type ServiceFactory,
  type IServiceCollection,
  type IBuildOptions,
  hasPostConstruct,
  hasPreDestroy,
  SERVICE_LOCATOR_TOKEN,
  DYNAMIC_CONFIGURATION_SERVICE,
  DYNAMIC_CONFIGURATION_LISTENER,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  toError,
  ServiceNotFoundError,
  UnsatisfiedDependencyError,
  CircularDependencyError,
  MultiError,
  ServiceCreationError,
  ProvidesConfigurationError,
  ConfigurationCommittedError,
  LocatorShutdownError,
  NonInstantiableServiceError,
  ServiceHandleClosedError,
  ContainerSealedError,
} from './di.errors';
