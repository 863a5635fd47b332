/**
 * @fileoverview Provides Module Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Discovery and registration of provider members.
 */

export { AnalysisTable, DiscoveryState, type AnalysisNamespace } from './analysis-table';
export { NonInstantiableClassDescriptor } from './non-instantiable-descriptor';
export {
  type ProviderMember,
  type ProviderMemberKind,
  type StaticMethodMember,
  type InstanceMethodMember,
  type StaticFieldMember,
  type InstanceFieldMember,
  STATIC_MEMBER_KINDS,
  INSTANCE_MEMBER_KINDS,
  createProviderMember,
  describeProviderMember,
  isStaticMember,
} from './provider-member';
export { ProviderScanner, collectProviderMembers } from './provider-scanner';
export {
  type DisposeFunction,
  type ProviderParameter,
  type ProvidesDescriptorInit,
  ProvidesDescriptor,
} from './provides-descriptor';
export { ProvidesEnabler, type ScannedGroup } from './provides-enabler';
