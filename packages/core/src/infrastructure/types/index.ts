/**
 * @fileoverview Type Resolution Exports
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/types
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

export {
  type TypeBindings,
  substitute,
  getBindings,
  resolve,
  containsUnresolvedVariable,
  getAllSupertypes,
  getSupertype,
  isSubclass,
  isSupertype,
  containsArgument,
  runtimeTypeOf,
} from './type-resolver';
export { memberTypeVariables, evaluateType, evaluateTypeList, evaluateParamList } from './lazy-types';
