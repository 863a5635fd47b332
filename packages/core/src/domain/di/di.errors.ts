/**
 * @fileoverview Container Errors - Failures of Lookup, Creation and Registration
 *
 * @packageDocumentation
 * @module @wireloom/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * | Error | Raised by |
 * |-------|-----------|
 * | `ServiceNotFoundError` | lookups with no match |
 * | `UnsatisfiedDependencyError` | a required parameter with no match |
 * | `ServiceCreationError` | a constructor, factory or provider that threw |
 * | `ProvidesConfigurationError` | a provider member whose dispose method is missing |
 * | `ConfigurationCommittedError` | a configuration reused after commit |
 * | `LocatorShutdownError` | any lookup after shutdown |
 *
 * @version 1.0.0
 */

import { type TypeRef, typeName } from '../types/type-ref';

import { type Injectee, describeInjectee } from './injectee';
import { type Qualifier, formatQualifiers } from './qualifier';

/**
 * Base class of every container error.
 *
 * @example
 * ```typescript
 * try {
 *   services.getService(ReportJob);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     log.error({ path: error.resolutionPath }, error.message);
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * Services being created when the error was raised, outermost first,
   * e.g. `['ReportJob', 'Reports', 'Database (NOT FOUND)']`.
   */
  public readonly resolutionPath: string[];

  /**
   * `resolutionPath` drawn as an indented tree.
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = resolutionPath
      .map((step, depth) => `${'  '.repeat(depth)}${depth === 0 ? '' : '└─ '}${step}`)
      .join('\n');

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Normalize a thrown value to an `Error`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/**
 * Error thrown when no registered service matches a requested type.
 *
 * @remarks
 * Also thrown by `Services.getService` when the matching provider supplied
 * `null`.
 */
export class ServiceNotFoundError extends DIError {
  public readonly requestedType: TypeRef;

  constructor(type: TypeRef, qualifiers: readonly Qualifier[] = [], resolutionPath: string[] = []) {
    const name = typeName(type);
    const qualified = qualifiers.length > 0 ? `${formatQualifiers(qualifiers)} ${name}` : name;

    super(`There is no service of type ${qualified}`, [...resolutionPath, `${name} (NOT FOUND)`]);
    this.requestedType = type;
  }
}

/**
 * Error thrown when a required parameter has no matching service.
 *
 * **Solutions:**
 * 1. Register a service for the parameter's type
 * 2. Mark the parameter optional: `param(Type, { optional: true })`
 */
export class UnsatisfiedDependencyError extends DIError {
  public readonly injectee: Injectee;

  constructor(injectee: Injectee, resolutionPath: string[] = []) {
    const description = describeInjectee(injectee);
    super(`Unsatisfied dependency: ${description}`, [...resolutionPath, `${description} (UNSATISFIED)`]);
    this.injectee = injectee;
  }
}

/**
 * Error thrown when a circular dependency is detected.
 *
 * @remarks
 * **Example Circular Dependency:**
 * ```
 * ServiceA depends on ServiceB
 * ServiceB depends on ServiceA  ← CIRCULAR!
 * ```
 */
export class CircularDependencyError extends DIError {
  /**
   * The full cycle path.
   */
  public readonly cyclePath: string[];

  constructor(serviceName: string, resolutionPath: string[]) {
    const cyclePath = [...resolutionPath, serviceName];

    super(`Circular dependency detected: ${cyclePath.join(' -> ')}`, [
      ...resolutionPath,
      `${serviceName} (CIRCULAR!)`,
    ]);
    this.cyclePath = cyclePath;
  }
}

/**
 * An error carrying several causes.
 *
 * @remarks
 * Failures thrown by constructors, provider members and dispose methods reach
 * the caller wrapped in a `MultiError`. Nested `MultiError`s are flattened so
 * `errors` always holds the original failures.
 */
export class MultiError extends DIError {
  public readonly errors: readonly Error[];

  constructor(errors: readonly unknown[], message?: string, resolutionPath: string[] = []) {
    const flattened = errors.flatMap((error) =>
      error instanceof MultiError ? error.errors : [toError(error)],
    );

    super(
      message ??
        `${flattened.length} error(s): ${flattened.map((error) => error.message).join('; ')}`,
      resolutionPath,
    );
    this.errors = flattened;
  }
}

/**
 * Error thrown when creating a service instance fails.
 *
 * The original error is preserved in `errors` and as `cause`.
 */
export class ServiceCreationError extends MultiError {
  public readonly serviceName: string;
  public readonly cause: Error;

  constructor(serviceName: string, cause: unknown, resolutionPath: string[] = []) {
    const error = toError(cause);
    super([cause], `Failed to create service '${serviceName}': ${error.message}`, [
      ...resolutionPath,
      `${serviceName} (CREATION FAILED)`,
    ]);
    this.serviceName = serviceName;
    this.cause = this.errors[0] ?? error;
  }
}

/**
 * Error thrown at registration time when a provider member is misconfigured,
 * for example when its declared dispose method does not exist.
 */
export class ProvidesConfigurationError extends DIError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * Error thrown when a configuration is used after `commit()`.
 */
export class ConfigurationCommittedError extends DIError {
  constructor() {
    super('This configuration has already been committed. Create a new one.');
  }
}

/**
 * Error thrown when a locator is used after `shutdown()`.
 */
export class LocatorShutdownError extends DIError {
  constructor(locatorName: string) {
    super(`Service locator '${locatorName}' has been shut down`);
  }
}

/**
 * Error thrown when a class is registered that the container cannot
 * construct, or when a non-instantiable placeholder is asked for an instance.
 */
export class NonInstantiableServiceError extends DIError {
  constructor(className: string, reason: string) {
    super(`Class '${className}' cannot be instantiated: ${reason}`);
  }
}

/**
 * Error thrown when `getService()` is called on a closed handle.
 */
export class ServiceHandleClosedError extends DIError {
  constructor(serviceName: string) {
    super(`The handle for '${serviceName}' has been closed`);
  }
}

/**
 * Error thrown when attempting to modify a sealed container.
 *
 * @remarks
 * After `build()` is called on a ServiceCollection, it becomes sealed
 * and no more services can be registered.
 */
export class ContainerSealedError extends DIError {
  constructor(operation: string) {
    super(
      `Cannot ${operation}: Container has been sealed. ` +
        `Services must be registered before calling build().`,
    );
  }
}
