/**
 * @fileoverview Topics Integration Tests
 *
 * Tests publishing through injected topics, subscriber discovery and
 * message delivery with Services.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  Scope,
  TOPIC_DISTRIBUTION_SERVICE,
  Topic,
  generic,
  messageReceiver,
  named,
  subscribeTo,
} from '../../../src/domain';
import { Services } from '../../../src/application';
import { ServiceCollection } from '../../../src/infrastructure/di';
import { TopicDistributionService } from '../../../src/infrastructure/messaging';

const log = vi.hoisted(() => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock('../../../src/infrastructure/logging/logger', () => ({
  createLogger: () => log,
  rootLogger: log,
}));

// ============================================================================
// Test Fixtures
// ============================================================================

let events: string[];

class UserEvent {
  constructor(readonly user: string) {}
}

class AdminEvent extends UserEvent {}

class OrderEvent {
  constructor(readonly id: string) {}
}

class Clock {
  static scope = Scope.Singleton;

  now(): number {
    return 7;
  }
}

class Transport {}

class AuditTrail {
  static scope = Scope.Singleton;
  static qualifiers = [messageReceiver(UserEvent)];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent), Clock],
  };

  readonly entries: string[] = [];

  onUserEvent(event: UserEvent, clock: Clock): void {
    this.entries.push(`${clock.now()} ${event.user}`);
  }
}

class Accounts {
  static inject = [generic(Topic, UserEvent)] as const;

  constructor(private readonly userEvents: Topic<UserEvent>) {}

  register(user: string): void {
    this.userEvents.publish(new UserEvent(user));
  }
}

class Broadcaster {
  static inject = [Topic] as const;

  constructor(readonly topic: Topic<unknown>) {}
}

class Mailer {
  static qualifiers = [messageReceiver()];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent)],
  };

  onUserEvent(event: UserEvent): void {
    events.push(`mail ${event.user}`);
  }

  preDestroy(): void {
    events.push('mailer destroyed');
  }
}

class Faulty {
  static scope = Scope.Singleton;
  static qualifiers = [messageReceiver()];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent)],
  };

  onUserEvent(): void {
    throw new Error('faulty receiver');
  }
}

class Billing {
  static scope = Scope.Singleton;
  static qualifiers = [messageReceiver()];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent, { qualifiers: [named('billing')] })],
  };

  onUserEvent(event: UserEvent): void {
    events.push(`billing ${event.user}`);
  }
}

class OrderLog {
  static qualifiers = [messageReceiver()];
  static signatures = {
    record: { static: true, params: [subscribeTo(OrderEvent)] },
  };

  static record(event: OrderEvent): void {
    events.push(`order ${event.id}`);
  }
}

class Confused {
  static qualifiers = [messageReceiver()];
  static signatures = {
    onBoth: [subscribeTo(UserEvent), subscribeTo(OrderEvent)],
  };

  onBoth(): void {
    events.push('confused');
  }
}

class NeedsTransport {
  static qualifiers = [messageReceiver()];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent), Transport],
  };

  onUserEvent(): void {
    events.push('needs transport');
  }
}

class Sloppy {
  static qualifiers = [messageReceiver()];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent), 42],
  };

  onUserEvent(): void {
    events.push('sloppy');
  }
}

class Narrow {
  static qualifiers = [messageReceiver(OrderEvent)];
  static signatures = {
    onUserEvent: [subscribeTo(UserEvent)],
  };

  onUserEvent(): void {
    events.push('narrow');
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('topics', () => {
  beforeEach(() => {
    events = [];
  });

  // ============================================================================
  // Delivery
  // ============================================================================

  describe('delivery', () => {
    it('should deliver messages published through an injected topic', () => {
      const services = new Services(
        new ServiceCollection().addClass(Clock).addClass(AuditTrail).addClass(Accounts),
      );

      services.getService(Accounts).register('alice');

      expect(services.getService(AuditTrail).entries).toEqual(['7 alice']);
    });

    it('should deliver subtypes and warn when nothing subscribes', () => {
      const services = new Services(new ServiceCollection().addClass(Clock).addClass(AuditTrail));
      const topics = services.getService(TopicDistributionService);

      topics.topic<AdminEvent>(AdminEvent).publish(new AdminEvent('root'));
      topics.topic<OrderEvent>(OrderEvent).publish(new OrderEvent('o-9'));

      expect(services.getService(AuditTrail).entries).toEqual(['7 root']);
      expect(log.warn).toHaveBeenCalledWith({ topic: 'OrderEvent' }, 'No subscribers for message');
    });

    it('should destroy a per-lookup receiver after delivery', () => {
      const services = new Services(new ServiceCollection().addClass(Mailer));

      services.getService(TopicDistributionService).topic<UserEvent>(UserEvent).publish(new UserEvent('bob'));

      expect(events).toEqual(['mail bob', 'mailer destroyed']);
    });

    it('should keep delivering when a subscriber throws', () => {
      const services = new Services(
        new ServiceCollection().addClass(Clock).addClass(Faulty).addClass(AuditTrail),
      );

      services.getService(TopicDistributionService).topic<UserEvent>(UserEvent).publish(new UserEvent('dana'));

      expect(services.getService(AuditTrail).entries).toEqual(['7 dana']);
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ subscriber: 'Faulty.onUserEvent()' }),
        'Subscriber failed',
      );
    });

    it('should refuse to publish a null or undefined message', () => {
      const services = new Services(new ServiceCollection().addClass(Clock).addClass(AuditTrail));
      const topic = services.getService(TopicDistributionService).topic<UserEvent | null | undefined>(UserEvent);

      expect(() => topic.publish(null)).toThrow(TypeError);
      expect(() => topic.publish(undefined)).toThrow('Cannot publish undefined to Topic<UserEvent>');
      expect(services.getService(AuditTrail).entries).toEqual([]);
    });

    it('should invoke static subscriber methods on the class', () => {
      const services = new Services(new ServiceCollection().addClass(OrderLog));

      services.getService(TopicDistributionService).topic<OrderEvent>(OrderEvent).publish(new OrderEvent('o-1'));

      expect(events).toEqual(['order o-1']);
    });
  });

  // ============================================================================
  // Qualifiers
  // ============================================================================

  describe('qualified topics', () => {
    it('should only reach qualified subscribers through a qualified topic', () => {
      const services = new Services(new ServiceCollection().addClass(Billing));
      const plain = services.getService(TopicDistributionService).topic<UserEvent>(UserEvent);

      plain.publish(new UserEvent('erin'));
      plain.ofType<UserEvent>(UserEvent, named('billing')).publish(new UserEvent('carol'));

      expect(events).toEqual(['billing carol']);
    });
  });

  // ============================================================================
  // Discovery
  // ============================================================================

  describe('discovery', () => {
    it('should reject malformed subscribers and keep those outside the permitted types', () => {
      const services = new Services(
        new ServiceCollection().addClass(Confused).addClass(NeedsTransport).addClass(Narrow),
      );

      const subscribers = services.getService(TopicDistributionService).getSubscribers().map(String);

      expect(subscribers).toEqual(['Narrow.onUserEvent()']);
      expect(log.warn).toHaveBeenCalledWith(
        { method: 'Confused.onBoth()', positions: [0, 1] },
        'Subscriber method has more than one subscribeTo parameter',
      );
      expect(log.warn).toHaveBeenCalledWith(
        { method: 'NeedsTransport.onUserEvent()', position: 1, type: 'Transport' },
        'Subscriber method has an unsupported parameter',
      );
      expect(log.warn).toHaveBeenCalledWith(
        { method: 'Narrow.onUserEvent()', type: 'UserEvent', permitted: ['OrderEvent'] },
        'Subscriber message type is not among the permitted types',
      );
    });

    it('should reject a subscriber whose signature has a malformed entry', () => {
      const services = new Services(new ServiceCollection().addClass(Sloppy));
      const topics = services.getService(TopicDistributionService);

      topics.topic<UserEvent>(UserEvent).publish(new UserEvent('frank'));

      expect(topics.getSubscribers()).toEqual([]);
      expect(events).toEqual([]);
      expect(log.warn).toHaveBeenCalledWith(
        { method: 'Sloppy.onUserEvent()', positions: [1] },
        'Subscriber method has malformed parameter declarations',
      );
    });

    it('should name static subscribers', () => {
      const services = new Services(new ServiceCollection().addClass(OrderLog));

      expect(services.getService(TopicDistributionService).getSubscribers().map(String)).toEqual([
        'OrderLog.static record()',
      ]);
    });
  });

  // ============================================================================
  // Topic Injection
  // ============================================================================

  describe('topic injection', () => {
    it('should read the message type from the injection point', () => {
      const services = new Services(new ServiceCollection().addClass(Broadcaster));

      expect(services.getService(Broadcaster).topic.topicType).toBe(Object);
    });

    it('should leave topics unavailable when disabled', () => {
      const services = new Services(new ServiceCollection().addClass(Clock), { enableTopics: false });

      expect(services.locator.tryGetService(TOPIC_DISTRIBUTION_SERVICE)).toBeUndefined();
      expect(services.locator.tryGetService(TopicDistributionService)).toBeUndefined();
    });
  });
});
