/**
 * =============================================================================
 * GROUP REGISTRY - In-memory backend
 * =============================================================================
 *
 * Membership idempotence, group isolation, pruning of empty groups and
 * fan-out over a snapshot of members.
 * =============================================================================
 */

import { InMemoryGroupRegistry } from '../modules/dispatch/memory-group.registry';
import { OutboundMessage } from '../modules/dispatch/dispatch.types';
import { FakeConnection } from './helpers/dispatch.fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ping: OutboundMessage = { type: 'echo.message', data: { n: 1 } };

describe('InMemoryGroupRegistry', () => {
  let registry: InMemoryGroupRegistry;

  beforeEach(() => {
    registry = new InMemoryGroupRegistry();
  });

  describe('membership', () => {
    it('should treat a second join as a no-op', () => {
      const a = new FakeConnection('a');

      registry.join('drivers', a);
      registry.join('drivers', a);

      expect(registry.memberCount('drivers')).toBe(1);
      registry.send('drivers', ping);
      expect(a.received).toEqual([ping]);
    });

    it('should ignore leaving a group that was never joined', () => {
      const a = new FakeConnection('a');

      expect(() => registry.leave('trip:missing', a)).not.toThrow();
      expect(registry.groupCount()).toBe(0);
    });

    it('should remove a group once its last member leaves', () => {
      const a = new FakeConnection('a');
      const b = new FakeConnection('b');
      registry.join('trip:1', a);
      registry.join('trip:1', b);

      registry.leave('trip:1', a);
      expect(registry.groupCount()).toBe(1);
      expect(registry.members('trip:1')).toEqual(['b']);

      registry.leave('trip:1', b);
      expect(registry.groupCount()).toBe(0);
      expect(registry.memberCount('trip:1')).toBe(0);
    });
  });

  describe('fan-out', () => {
    it('should deliver only to members of the addressed group', () => {
      const inTrip = new FakeConnection('in');
      const outside = new FakeConnection('out');
      registry.join('trip:1', inTrip);
      registry.join('trip:2', outside);

      registry.send('trip:1', ping);

      expect(inTrip.received).toEqual([ping]);
      expect(outside.received).toEqual([]);
    });

    it('should silently drop a send to an empty group', () => {
      expect(() => registry.send('trip:nobody', ping)).not.toThrow();
    });

    it('should deliver directly to a connection without any group', () => {
      const a = new FakeConnection('a');

      registry.sendToConnection(a, ping);

      expect(a.received).toEqual([ping]);
      expect(registry.groupCount()).toBe(0);
    });

    it('should keep delivering when one member throws', () => {
      const broken = new FakeConnection('broken');
      broken.deliver = () => {
        throw new Error('socket gone');
      };
      const healthy = new FakeConnection('healthy');
      registry.join('drivers', broken);
      registry.join('drivers', healthy);

      registry.send('drivers', ping);

      expect(healthy.received).toEqual([ping]);
    });

    it('should fan out to the members present when send was called', () => {
      const late = new FakeConnection('late');
      const first = new FakeConnection('first');
      first.deliver = (message) => {
        first.received.push(message);
        registry.join('drivers', late);
      };
      registry.join('drivers', first);

      registry.send('drivers', ping);

      expect(first.received).toEqual([ping]);
      expect(late.received).toEqual([]);
      expect(registry.memberCount('drivers')).toBe(2);
    });
  });
});
