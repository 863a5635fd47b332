/**
 * @fileoverview ServiceCollection Unit Tests
 *
 * Tests for the service registration functionality.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  ContainerSealedError,
  NonInstantiableServiceError,
  Scope,
  createToken,
  named,
} from '../../../src/domain';
import { ServiceCollection, createServiceCollection } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IAuditLog {
  record(entry: string): void;
}

const IAuditLog = createToken<IAuditLog>('IAuditLog');

class MemoryAuditLog implements IAuditLog {
  readonly entries: string[] = [];

  record(entry: string): void {
    this.entries.push(entry);
  }
}

class Clock {
  static contract = true;

  now(): number {
    return 0;
  }
}

class FixedClock extends Clock {
  override now(): number {
    return 1_700_000_000;
  }
}

class Ledger {
  static inject = [IAuditLog, Clock] as const;

  constructor(
    readonly audit: IAuditLog,
    readonly clock: Clock,
  ) {}

  post(amount: number): void {
    this.audit.record(`${this.clock.now()}:${amount}`);
  }
}

class NeedsTwo {
  static inject = [Clock];

  constructor(
    readonly first: Clock,
    readonly second: Clock,
  ) {}
}

// ============================================================================
// Tests
// ============================================================================

describe('ServiceCollection', () => {
  let services: ServiceCollection;

  beforeEach(() => {
    services = new ServiceCollection();
  });

  // ============================================================================
  // Registration Tests
  // ============================================================================

  describe('registration', () => {
    it('should support fluent chaining', () => {
      const result = services.addSingleton(IAuditLog, MemoryAuditLog).addPerLookup(Ledger);

      expect(result).toBe(services);
    });

    it('should report registered contracts through has()', () => {
      services.addSingleton(IAuditLog, MemoryAuditLog).addClass(FixedClock);

      expect(services.has(IAuditLog)).toBe(true);
      expect(services.has(FixedClock)).toBe(true);
      expect(services.has(Clock)).toBe(true);
      expect(services.has(Ledger)).toBe(false);
    });

    it('should reject a class that cannot be constructed from its inject list at build', () => {
      services.addSingleton(FixedClock).addPerLookup(NeedsTwo);

      expect(() => services.build()).toThrow(NonInstantiableServiceError);
      expect(() => new ServiceCollection().addPerLookup(NeedsTwo).build()).toThrow(
        "Class 'NeedsTwo' cannot be instantiated: its constructor takes 2 parameter(s) but inject declares 1",
      );
    });
  });

  // ============================================================================
  // Build Tests
  // ============================================================================

  describe('build', () => {
    it('should resolve dependencies through tokens and contracts', () => {
      const locator = services
        .addSingleton(IAuditLog, MemoryAuditLog)
        .addSingleton(FixedClock)
        .addPerLookup(Ledger)
        .build();

      const ledger = locator.getService(Ledger);
      ledger.post(25);

      expect(ledger.clock).toBeInstanceOf(FixedClock);
      expect(locator.getService(IAuditLog)).toBe(ledger.audit);
      expect(ledger.audit).toBeInstanceOf(MemoryAuditLog);
      expect(ledger.audit instanceof MemoryAuditLog && ledger.audit.entries).toEqual(['1700000000:25']);
    });

    it('should apply the scope of the registration method', () => {
      const locator = services.addPerLookup(FixedClock).build();

      expect(locator.getService(FixedClock)).not.toBe(locator.getService(FixedClock));
    });

    it('should register instances with qualifiers', () => {
      const primary = new MemoryAuditLog();
      const backup = new MemoryAuditLog();
      const locator = services
        .addInstance(IAuditLog, primary)
        .addInstance(IAuditLog, backup, named('backup'))
        .build();

      expect(locator.getService(IAuditLog)).toBe(primary);
      expect(locator.getService(IAuditLog, named('backup'))).toBe(backup);
    });

    it('should call factories with the locator', () => {
      let calls = 0;
      const locator = services
        .addSingleton(FixedClock)
        .addFactory(
          IAuditLog,
          (current) => {
            calls++;
            const log = new MemoryAuditLog();
            log.record(`created at ${current.getService(FixedClock).now()}`);
            return log;
          },
          Scope.Singleton,
        )
        .build();

      const log = locator.getService(IAuditLog);

      expect(locator.getService(IAuditLog)).toBe(log);
      expect(calls).toBe(1);
      expect(log instanceof MemoryAuditLog && log.entries).toEqual(['created at 1700000000']);
    });

    it('should name the locator from the build options', () => {
      const locator = services.build({ name: 'billing' });

      locator.shutdown();

      expect(() => locator.getService(IAuditLog)).toThrow("Service locator 'billing' has been shut down");
    });
  });

  // ============================================================================
  // Sealing Tests
  // ============================================================================

  describe('sealing', () => {
    it('should reject registrations after build', () => {
      services.build();

      expect(() => services.addClass(FixedClock)).toThrow(ContainerSealedError);
      expect(() => services.addInstance(IAuditLog, new MemoryAuditLog())).toThrow(
        'Cannot add instance: Container has been sealed. Services must be registered before calling build().',
      );
    });
  });

  describe('createServiceCollection', () => {
    it('should create an empty collection', () => {
      const collection = createServiceCollection();

      expect(collection).toBeInstanceOf(ServiceCollection);
      expect(collection.has(IAuditLog)).toBe(false);
    });
  });
});
