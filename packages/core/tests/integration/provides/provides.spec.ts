/**
 * @fileoverview Provider Member Integration Tests
 *
 * Tests provider members registered through Services: static and instance
 * providers, dispose policies, generic owners, cyclic discovery and
 * classes that exist only for their providers.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  DisposalHandledBy,
  MultiError,
  NonInstantiableServiceError,
  Scope,
  ServiceNotFoundError,
  UnsatisfiedDependencyError,
  arrayOf,
  generic,
  named,
  provides,
  typeVariable,
  type ProvidesDeclaration,
} from '../../../src/domain';
import { Services } from '../../../src/application';
import { ServiceCollection, addClasses } from '../../../src/infrastructure/di';
import {
  NonInstantiableClassDescriptor,
  ProvidesDescriptor,
  ProvidesEnabler,
} from '../../../src/infrastructure/provides';

// ============================================================================
// Test Fixtures
// ============================================================================

let events: string[];

class PoolConfig {
  static scope = Scope.Singleton;

  readonly size = 4;
}

class ConnectionPool {
  constructor(
    readonly name: string,
    readonly size: number,
  ) {}
}

class Pools {
  static provides = {
    primary: provides.method({ type: ConnectionPool, static: true, scope: Scope.Singleton, params: [PoolConfig] }),
  };

  static primary(config: PoolConfig): ConnectionPool {
    return new ConnectionPool('primary', config.size);
  }
}

class Settings {
  constructor(readonly url: string) {}
}

class Client {
  constructor(readonly settings: Settings) {}
}

class Clients {
  static provides = {
    client: provides.method({ type: Client, static: true, params: [Settings] }),
  };

  static client(settings: Settings): Client {
    return new Client(settings);
  }
}

class SettingsModule {
  static provides = {
    settings: provides.method({ type: Settings }),
  };

  settings(): Settings {
    return new Settings('db://test');
  }
}

class Report {
  constructor(readonly label: string) {}
}

class RankedReports {
  static provides = {
    fallback: provides.method({ type: Report, static: true, rank: 1 }),
    preferred: provides.method({ type: Report, static: true, rank: 10 }),
  };

  static fallback(): Report {
    return new Report('fallback');
  }

  static preferred(): Report {
    return new Report('preferred');
  }
}

class BrokenReports {
  static provides = {
    broken: provides.method({ type: Report, static: true }),
  };

  static broken(): Report {
    throw new Error('disk offline');
  }
}

class Connection {
  constructor(readonly label: string) {}

  close(): void {
    events.push(`close ${this.label}`);
  }

  preDestroy(): void {
    events.push(`preDestroy ${this.label}`);
  }
}

class Connections {
  static scope = Scope.Singleton;
  static provides = {
    byHook: provides.method({ type: Connection, scope: Scope.PerLookup, qualifiers: [named('hook')] }),
    byInstance: provides.method({
      type: Connection,
      scope: Scope.PerLookup,
      qualifiers: [named('instance')],
      disposeMethod: 'close',
    }),
    byProvider: provides.method({
      type: Connection,
      scope: Scope.PerLookup,
      qualifiers: [named('provider')],
      disposeMethod: 'release',
      disposalHandledBy: DisposalHandledBy.Provider,
    }),
    byStaticProvider: provides.method({
      type: Connection,
      static: true,
      qualifiers: [named('static')],
      disposeMethod: 'releaseStatic',
      disposalHandledBy: DisposalHandledBy.Provider,
    }),
  };

  static byStaticProvider(): Connection {
    return new Connection('static');
  }

  static releaseStatic(connection: Connection): void {
    events.push(`releaseStatic ${connection.label}`);
  }

  byHook(): Connection {
    return new Connection('hook');
  }

  byInstance(): Connection {
    return new Connection('instance');
  }

  byProvider(): Connection {
    return new Connection('provider');
  }

  release(connection: Connection): void {
    events.push(`release ${connection.label}`);
  }
}

class Sessions {
  static provides = {
    current: provides.method({
      type: Connection,
      static: true,
      nullable: true,
      qualifiers: [named('session')],
      disposeMethod: 'close',
    }),
  };

  static current(): Connection | null {
    return null;
  }
}

class Order {
  constructor(readonly id: string) {}
}

class Store<T> {
  static typeParameters = ['T'];
  static provides: Record<string, ProvidesDeclaration> = {
    items: provides.field({ type: () => arrayOf(typeVariable(Store, 'T')) }),
  };

  readonly items: T[] = [];
}

class OrderStore extends Store<Order> {
  static supertypes = [generic(Store, Order)];

  constructor() {
    super();
    this.items.push(new Order('o-1'));
  }
}

class Box<T> {
  static typeParameters = ['T'];

  constructor(readonly value: T) {}
}

class Boxes {
  static provides = {
    orderBox: provides.method({ type: generic(Box, Order), static: true }),
    connectionBox: provides.method({ type: generic(Box, Connection), static: true }),
  };

  static orderBox(): Box<Order> {
    return new Box(new Order('o-2'));
  }

  static connectionBox(): Box<Connection> {
    return new Box(new Connection('boxed'));
  }
}

class Chain {
  static provides: Record<string, ProvidesDeclaration> = {
    next: provides.method({ type: () => Chain }),
  };

  constructor(readonly depth = 0) {}

  next(): Chain {
    return new Chain(this.depth + 1);
  }
}

class Alpha {
  static provides: Record<string, ProvidesDeclaration> = {
    beta: provides.method({ type: () => Beta }),
  };

  beta(): Beta {
    return new Beta('from alpha');
  }
}

class Beta {
  static provides: Record<string, ProvidesDeclaration> = {
    gamma: provides.method({ type: () => Gamma }),
  };

  constructor(readonly origin = 'constructed') {}

  gamma(): Gamma {
    return new Gamma(`from beta ${this.origin}`);
  }
}

class Gamma {
  static provides: Record<string, ProvidesDeclaration> = {
    alpha: provides.method({ type: () => Alpha }),
  };

  constructor(readonly origin = 'constructed') {}

  alpha(): Alpha {
    return new Alpha();
  }
}

class Clock {
  static contract = true;
  static provides: Record<string, ProvidesDeclaration> = {
    system: provides.method({ type: () => Clock, static: true, scope: Scope.Singleton }),
  };

  static system(): Clock {
    return new Clock();
  }

  now(): number {
    return 42;
  }
}

function providesDescriptorCount(services: Services): number {
  return services.locator.getDescriptors((descriptor) => descriptor instanceof ProvidesDescriptor).length;
}

// ============================================================================
// Tests
// ============================================================================

describe('provider members', () => {
  beforeEach(() => {
    events = [];
  });

  // ============================================================================
  // Static Providers
  // ============================================================================

  describe('static providers', () => {
    it('should register static provider methods with injected parameters', () => {
      const services = new Services(new ServiceCollection().addClass(PoolConfig).addClass(Pools));

      const pool = services.getService(ConnectionPool);

      expect(pool.name).toBe('primary');
      expect(pool.size).toBe(4);
      expect(services.getService(ConnectionPool)).toBe(pool);
    });

    it('should register a utility class as a non-instantiable placeholder', () => {
      const services = new Services(new ServiceCollection().addClass(PoolConfig).addClass(Pools));

      const [placeholder] = services.locator.getDescriptors(
        (descriptor) => descriptor instanceof NonInstantiableClassDescriptor,
      );

      expect(placeholder?.implementationClass).toBe(Pools);
      expect(placeholder?.contractTypes).toEqual([]);
      expect(() => services.getService(Pools)).toThrow(ServiceNotFoundError);
      if (placeholder === undefined) {
        return;
      }
      expect(() => services.locator.getServiceFromDescriptor(placeholder)).toThrow(NonInstantiableServiceError);
      expect(() => services.locator.getServiceFromDescriptor(placeholder)).toThrow(
        "Class 'Pools' cannot be instantiated: it was registered only for its static provider members",
      );
    });

    it('should register a provider whose parameter is missing and fail when it is invoked', () => {
      const services = new Services(new ServiceCollection().addClass(Pools));

      expect(() => services.getService(ConnectionPool)).toThrow(UnsatisfiedDependencyError);
      expect(() => services.getService(ConnectionPool)).toThrow(
        'Unsatisfied dependency: PoolConfig (parameter 0 of static Pools.primary())',
      );
    });

    it('should resolve a provider once its parameter is registered later', () => {
      const services = new Services(new ServiceCollection().addClass(Pools));

      addClasses(services.locator, false, PoolConfig);

      expect(services.getService(ConnectionPool).size).toBe(4);
    });

    it("should resolve a parameter supplied by another class's instance provider", () => {
      const services = new Services(new ServiceCollection().addClass(Clients).addClass(SettingsModule));

      expect(services.getService(Client).settings.url).toBe('db://test');
    });

    it('should surface a failing provider as a MultiError', () => {
      const services = new Services(new ServiceCollection().addClass(BrokenReports));

      expect(() => services.getService(Report)).toThrow(MultiError);
      expect(() => services.getService(Report)).toThrow('Provider static BrokenReports.broken() failed: disk offline');
    });

    it('should prefer the provider with the higher rank', () => {
      const services = new Services(new ServiceCollection().addClass(RankedReports));

      const best = services.locator.getBestDescriptor((descriptor) => descriptor.contractTypes.includes(Report));

      expect(best).toBeInstanceOf(ProvidesDescriptor);
      expect(best?.getRanking()).toBe(10);
      expect(services.getService(Report).label).toBe('preferred');
    });

    it('should represent a contract class by its own static provider', () => {
      const services = new Services(new ServiceCollection().addClass(Clock));

      const clock = services.getService(Clock);

      expect(clock.now()).toBe(42);
      expect(services.getService(Clock)).toBe(clock);
      expect(
        services.locator.getDescriptors((descriptor) => descriptor instanceof NonInstantiableClassDescriptor),
      ).toHaveLength(0);
    });
  });

  // ============================================================================
  // Dispose Policies
  // ============================================================================

  describe('dispose policies', () => {
    let services: Services;

    beforeEach(() => {
      services = new Services(new ServiceCollection().addClass(Connections));
    });

    it.each([
      ['hook', 'preDestroy hook'],
      ['instance', 'close instance'],
      ['provider', 'release provider'],
      ['static', 'releaseStatic static'],
    ])('should dispose the %s connection when its handle closes', (name, expected) => {
      const handle = services.getServiceHandle(Connection, named(name));

      expect(handle.getService().label).toBe(name);

      handle.close();

      expect(events).toEqual([expected]);
    });

    it('should close a handle to a nullable provider that supplied null', () => {
      const sessions = new Services(new ServiceCollection().addClass(Sessions));
      const handle = sessions.getServiceHandle(Connection, named('session'));

      expect(handle.getService()).toBeNull();
      expect(() => handle.close()).not.toThrow();
      expect(events).toEqual([]);
    });

    it('should leave provided singletons to shutdown', () => {
      const clockServices = new Services(new ServiceCollection().addClass(Clock));
      const handle = clockServices.getServiceHandle(Clock);
      const clock = handle.getService();

      handle.close();

      expect(clockServices.getService(Clock)).toBe(clock);
    });
  });

  // ============================================================================
  // Generic Owners
  // ============================================================================

  describe('generic owners', () => {
    it("should resolve a member's type through the owner's supertypes", () => {
      const services = new Services(new ServiceCollection().addClass(OrderStore));

      const items = services.getService(arrayOf(Order));

      expect(items).toEqual([new Order('o-1')]);
    });

    it('should keep providers of distinct specializations independent', () => {
      const services = new Services(new ServiceCollection().addClass(Boxes));

      expect(services.getService(generic(Box, Order))).toEqual(new Box(new Order('o-2')));
      expect(services.getService(generic(Box, Connection))).toEqual(new Box(new Connection('boxed')));
      expect(() => services.getService(generic(Box, PoolConfig))).toThrow(
        'There is no service of type Box<PoolConfig>',
      );
    });

    it('should skip members of a generic owner registered without arguments', () => {
      const services = new Services(new ServiceCollection().addClass(Store));

      expect(providesDescriptorCount(services)).toBe(0);
    });
  });

  // ============================================================================
  // Cyclic Discovery
  // ============================================================================

  describe('cyclic discovery', () => {
    it('should stop when a class provides itself', () => {
      const services = new Services(new ServiceCollection().addClass(Chain));

      const depths = services.locator.getAllServices(Chain).map((chain) => chain.depth);

      expect(depths).toEqual([0, 1]);
    });

    it('should stop when providers form a cycle of three classes', () => {
      const services = new Services(new ServiceCollection().addClass(Alpha));

      expect(services.getService(Gamma).origin).toBe('from beta from alpha');
      expect(services.locator.getAllServices(Alpha)).toHaveLength(2);
      expect(providesDescriptorCount(services)).toBe(3);
    });
  });

  // ============================================================================
  // Enabler
  // ============================================================================

  describe('enabler', () => {
    it('should register nothing twice when a second enabler is added', () => {
      const services = new Services(new ServiceCollection().addClass(PoolConfig).addClass(Pools));
      const before = providesDescriptorCount(services);

      addClasses(services.locator, false, ProvidesEnabler);

      expect(services.locator.getAllServices(ProvidesEnabler)).toHaveLength(2);
      expect(providesDescriptorCount(services)).toBe(before);
      expect(services.locator.getAllServices(ConnectionPool)).toHaveLength(1);
    });

    it('should leave provider members unregistered when disabled', () => {
      const services = new Services(new ServiceCollection().addClass(Connections), { enableProvides: false });

      expect(services.locator.tryGetService(Connection, named('hook'))).toBeUndefined();
      expect(services.getService(Connections)).toBeInstanceOf(Connections);
    });
  });
});
