/**
 * @fileoverview Services Integration Tests
 *
 * Tests the container facade: lookups, handles, parameter checks and
 * shutdown.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  LocatorShutdownError,
  Scope,
  ServiceNotFoundError,
  UnsatisfiedDependencyError,
  generic,
  named,
  param,
  provides,
  typeVariable,
} from '../../../src/domain';
import { Services, enableProvides, enableTopics } from '../../../src/application';
import { ServiceCollection, ServiceLocator } from '../../../src/infrastructure/di';
import { ProvidesEnabler } from '../../../src/infrastructure/provides';
import { TopicDistributionService } from '../../../src/infrastructure/messaging';

// ============================================================================
// Test Fixtures
// ============================================================================

let events: string[];

class Clock {
  static scope = Scope.Singleton;

  preDestroy(): void {
    events.push('clock stopped');
  }
}

class Transport {}

class User {}

class Session {
  preDestroy(): void {
    events.push('session closed');
  }
}

class Repository<T> {
  static typeParameters = ['T'];

  readonly items: T[] = [];
}

class Lookups {
  static provides = {
    currentUser: provides.method({ type: User, static: true, nullable: true }),
  };

  static currentUser(): User | null {
    return null;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('Services', () => {
  let services: Services;

  beforeEach(() => {
    events = [];
    services = new Services(
      new ServiceCollection().addClass(Clock).addClass(Session).addClass(Lookups),
      { name: 'app' },
    );
  });

  // ============================================================================
  // Lookups
  // ============================================================================

  describe('getService', () => {
    it('should return the best service', () => {
      expect(services.getService(Clock)).toBe(services.locator.getService(Clock));
    });

    it('should treat a provider that produced null as missing', () => {
      expect(services.locator.getService(User)).toBeNull();
      expect(() => services.getService(User)).toThrow(ServiceNotFoundError);
      expect(() => services.getService(User)).toThrow('There is no service of type User');
    });

    it('should name the qualifiers of a missing service', () => {
      expect(() => services.getServiceHandle(Clock, named('utc'))).toThrow(
        'There is no service of type @Named(utc) Clock',
      );
    });
  });

  describe('getServiceHandle', () => {
    it('should never destroy a per-lookup service resolved without a handle', () => {
      services.getService(Session);

      services.shutdown();

      expect(events).toEqual([]);
    });

    it('should destroy the per-lookup service when the handle closes', () => {
      const handle = services.getServiceHandle(Session);

      expect(handle.getService()).toBeInstanceOf(Session);

      handle.close();

      expect(events).toEqual(['session closed']);
    });
  });

  // ============================================================================
  // Parameters
  // ============================================================================

  describe('parameters', () => {
    it('should report which parameters could be injected', () => {
      expect(services.supportsParameter(Clock)).toBe(true);
      expect(services.supportsParameter(Transport)).toBe(false);
      expect(services.supportsParameter(param(Transport, { optional: true }))).toBe(true);
      expect(services.supportsParameter(typeVariable(Repository, 'T'), generic(Repository, Clock))).toBe(true);
    });

    it('should resolve parameter values', () => {
      expect(services.resolveParameter(Clock)).toBe(services.getService(Clock));
      expect(services.resolveParameter(param(Transport, { optional: true }))).toBeNull();
    });

    it('should reject a required parameter with no match', () => {
      expect(() => services.resolveParameter(Transport)).toThrow(UnsatisfiedDependencyError);
      expect(() => services.resolveParameter(Transport)).toThrow(
        'Unsatisfied dependency: Transport (parameter 0 of Services)',
      );
    });
  });

  // ============================================================================
  // Lifecycle
  // ============================================================================

  describe('shutdown', () => {
    it('should destroy singletons and refuse further lookups', () => {
      services.getService(Clock);

      services.shutdown();

      expect(events).toEqual(['clock stopped']);
      expect(() => services.getService(Clock)).toThrow(LocatorShutdownError);
      expect(() => services.getService(Clock)).toThrow("Service locator 'app' has been shut down");
    });
  });

  // ============================================================================
  // Module Enablers
  // ============================================================================

  describe('module enablers', () => {
    it('should be idempotent', () => {
      const locator = new ServiceLocator();

      enableProvides(locator);
      enableProvides(locator);
      enableTopics(locator);
      enableTopics(locator);

      expect(locator.getAllServices(ProvidesEnabler)).toHaveLength(1);
      expect(locator.getAllServices(TopicDistributionService)).toHaveLength(1);
    });
  });
});
