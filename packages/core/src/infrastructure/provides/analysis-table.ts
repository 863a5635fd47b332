/**
 * @fileoverview AnalysisTable - Per-Container Discovery State
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/provides
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Records which classes have been scanned, so every class contributes its
 * provider members and subscribers exactly once no matter how many
 * listeners or notification rounds see it:
 *
 * ```
 * Unseen ──beginAnalysis()──▶ Analyzing ──finishAnalysis()──▶ Recorded
 * ```
 *
 * The provider scan and the subscriber scan keep separate states. The
 * table is a singleton service of its container and is cleared when the
 * container shuts down.
 *
 * @version 1.0.0
 */

import { type ActiveDescriptor, type ClassType, Scope } from '../../domain';

import { type ProviderMemberKind } from './provider-member';

export enum DiscoveryState {
  Unseen = 'unseen',
  Analyzing = 'analyzing',
  Recorded = 'recorded',
}

/**
 * Which scan a discovery state belongs to.
 */
export type AnalysisNamespace = 'provides' | 'topics';

export class AnalysisTable {
  static scope = Scope.Singleton;

  private readonly states: Record<AnalysisNamespace, Map<ClassType, DiscoveryState>> = {
    provides: new Map(),
    topics: new Map(),
  };

  private readonly descriptorsByClass = new Map<ClassType, Map<ProviderMemberKind, readonly ActiveDescriptor[]>>();

  getState(namespace: AnalysisNamespace, cls: ClassType): DiscoveryState {
    return this.states[namespace].get(cls) ?? DiscoveryState.Unseen;
  }

  /**
   * Move an unseen class to `Analyzing`.
   *
   * @returns false if the class was already seen
   */
  beginAnalysis(namespace: AnalysisNamespace, cls: ClassType): boolean {
    const states = this.states[namespace];
    if (states.has(cls)) {
      return false;
    }
    states.set(cls, DiscoveryState.Analyzing);
    return true;
  }

  finishAnalysis(namespace: AnalysisNamespace, cls: ClassType): void {
    this.states[namespace].set(cls, DiscoveryState.Recorded);
  }

  /**
   * Check if members of `kind` were already scanned for `cls`.
   */
  hasDescriptors(cls: ClassType, kind: ProviderMemberKind): boolean {
    return this.descriptorsByClass.get(cls)?.has(kind) ?? false;
  }

  getDescriptors(cls: ClassType, kind: ProviderMemberKind): readonly ActiveDescriptor[] {
    return this.descriptorsByClass.get(cls)?.get(kind) ?? [];
  }

  recordDescriptors(cls: ClassType, kind: ProviderMemberKind, descriptors: readonly ActiveDescriptor[]): void {
    let byKind = this.descriptorsByClass.get(cls);
    if (byKind === undefined) {
      byKind = new Map();
      this.descriptorsByClass.set(cls, byKind);
    }
    byKind.set(kind, Object.freeze([...descriptors]));
  }

  clear(): void {
    this.states.provides.clear();
    this.states.topics.clear();
    this.descriptorsByClass.clear();
  }

  preDestroy(): void {
    this.clear();
  }
}
