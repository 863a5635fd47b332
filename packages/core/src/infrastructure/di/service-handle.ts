/**
 * @fileoverview ServiceHandle - Release Scope for Per-Lookup Instances
 *
 * @packageDocumentation
 * @module @wireloom/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A handle creates its service lazily and owns every per-lookup instance
 * created while building it. Closing the handle destroys them:
 *
 * ```
 * handle(ReportJob)            per-lookup
 *   ├─ sub-handle(Reports)     per-lookup  → destroyed on close
 *   └─ Clock                   singleton   → left to shutdown()
 * ```
 *
 * @version 1.0.0
 */

import {
  type ActiveDescriptor,
  type IServiceHandle,
  type Injectee,
  MultiError,
  Scope,
  ServiceHandleClosedError,
  describeDescriptor,
  toError,
} from '../../domain';

import type { ServiceLocator } from './service-locator';

export class ServiceHandle<T> implements IServiceHandle<T> {
  private instance: { readonly value: T } | undefined;
  private readonly subHandles: ServiceHandle<unknown>[] = [];
  private closed = false;

  constructor(
    private readonly locator: ServiceLocator,
    readonly activeDescriptor: ActiveDescriptor<T>,
    readonly injectee: Injectee | undefined,
  ) {}

  getService(): T {
    if (this.closed) {
      throw new ServiceHandleClosedError(describeDescriptor(this.activeDescriptor));
    }
    if (this.instance === undefined) {
      this.instance = { value: this.locator.serviceFromHandle(this) };
    }
    return this.instance.value;
  }

  isActive(): boolean {
    return !this.closed && this.instance !== undefined;
  }

  /**
   * Track a handle created for a per-lookup dependency of this service.
   * @internal
   */
  addSubHandle(handle: ServiceHandle<unknown>): void {
    this.subHandles.push(handle);
  }

  /**
   * Destroy the per-lookup instance of this handle, then its sub-handles
   * in reverse creation order. Every instance is disposed even when some
   * disposals fail; the failures are thrown together afterwards.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const errors: Error[] = [];
    const instance = this.instance;
    this.instance = undefined;

    if (instance !== undefined && this.activeDescriptor.scope === Scope.PerLookup) {
      try {
        this.activeDescriptor.dispose(instance.value);
      } catch (error) {
        errors.push(toError(error));
      }
    }

    for (const handle of [...this.subHandles].reverse()) {
      try {
        handle.close();
      } catch (error) {
        errors.push(toError(error));
      }
    }
    this.subHandles.length = 0;

    if (errors.length > 0) {
      throw new MultiError(errors);
    }
  }
}

/**
 * Close every handle, in order, even when some fail.
 *
 * @throws MultiError carrying every close failure
 */
export function closeAll(handles: readonly IServiceHandle[]): void {
  const errors: Error[] = [];
  for (const handle of handles) {
    try {
      handle.close();
    } catch (error) {
      errors.push(toError(error));
    }
  }
  if (errors.length > 0) {
    throw new MultiError(errors);
  }
}
