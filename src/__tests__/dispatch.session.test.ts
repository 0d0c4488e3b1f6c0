/**
 * =============================================================================
 * DISPATCH SESSION & MESSAGE ROUTER
 * =============================================================================
 *
 * Sessions over the in-memory registry with recording connections:
 * - group membership on connect and disconnect
 * - echo, create.trip and update.trip fan-out
 * - error replies for bad input, unknown types and refused actions
 * - per-connection ordering
 * =============================================================================
 */

import { DRIVER_POOL_GROUP, ErrorCode, MessageType, TripStatus, tripGroup } from '../core';
import { DispatchSession } from '../modules/dispatch/dispatch.session';
import { InMemoryGroupRegistry } from '../modules/dispatch/memory-group.registry';
import { MessageRouter, createDispatchRouter } from '../modules/dispatch/message.router';
import { SessionDirectory } from '../modules/dispatch/session.directory';
import { TripService } from '../modules/trip/trip.service';
import { TripView } from '../modules/trip/trip.schema';
import { Principal } from '../modules/user/principal';
import { FakeConnection, buildTrips, driver, flush, owner, rider } from './helpers/dispatch.fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function isTripView(value: unknown): value is TripView {
  return typeof value === 'object' && value !== null && 'id' in value && 'status' in value;
}

/**
 * Data of the last message of the given type a connection received
 */
function lastTrip(connection: FakeConnection, type: string): TripView {
  const message = [...connection.received].reverse().find(m => m.type === type);
  if (!message || !isTripView(message.data)) {
    throw new Error(`${connection.id} received no ${type}`);
  }
  return message.data;
}

describe('DispatchSession', () => {
  let registry: InMemoryGroupRegistry;
  let router: MessageRouter;
  let trips: TripService;
  let directory: SessionDirectory;

  const connect = async (id: string, principal: Principal | null) => {
    const connection = new FakeConnection(id, principal);
    const session = new DispatchSession(connection, { registry, router, trips, directory });
    await session.open();
    return { connection, session };
  };

  beforeEach(async () => {
    registry = new InMemoryGroupRegistry();
    directory = new SessionDirectory();
    ({ trips } = await buildTrips([
      rider(),
      driver(),
      driver('driver-2', '9000000005'),
      owner()
    ]));
    router = createDispatchRouter(trips);
  });

  describe('connect and disconnect', () => {
    it('should put drivers in the driver pool and nobody else', async () => {
      const d = await connect('d', driver());
      const r = await connect('r', rider());

      expect(registry.members(DRIVER_POOL_GROUP)).toEqual(['d']);
      expect(d.connection.groups).toEqual(new Set([DRIVER_POOL_GROUP]));
      expect(r.connection.groups.size).toBe(0);
      expect(d.connection.received).toEqual([]);
    });

    it('should rejoin the groups of open trips', async () => {
      const created = await trips.create({ pickup: 'A', dropoff: 'B' }, rider());
      await trips.update({ id: created.id, driverId: 'driver-1' }, driver());

      const r = await connect('r', rider());
      const d = await connect('d', driver());

      expect(r.connection.groups).toEqual(new Set([tripGroup(created.id)]));
      expect(d.connection.groups).toEqual(new Set([DRIVER_POOL_GROUP, tripGroup(created.id)]));
    });

    it('should not rejoin completed trips', async () => {
      const created = await trips.create({ pickup: 'A', dropoff: 'B' }, rider());
      await trips.update({ id: created.id, status: TripStatus.COMPLETED }, rider());

      const r = await connect('r', rider());

      expect(r.connection.groups.size).toBe(0);
    });

    it('should leave every group on close', async () => {
      const created = await trips.create({ pickup: 'A', dropoff: 'B' }, rider());
      await trips.update({ id: created.id, driverId: 'driver-1' }, driver());
      const d = await connect('d', driver());

      d.session.close();

      expect(d.connection.groups.size).toBe(0);
      expect(registry.groupCount()).toBe(0);
      expect(directory.sessionsOf('driver-1')).toEqual([]);
    });

    it('should ignore joins after close but still broadcast', async () => {
      const watcher = await connect('d2', driver('driver-2', '9000000005'));
      const r = await connect('r', rider());

      const pending = r.session.receive({
        type: MessageType.CREATE_TRIP,
        data: { pickup: 'A', dropoff: 'B' }
      });
      r.session.close();
      await pending;

      expect(r.connection.groups.size).toBe(0);
      expect(registry.groupCount()).toBe(1);
      expect(watcher.connection.typesReceived()).toEqual([MessageType.CREATE_TRIP]);
    });
  });

  describe('echo.message', () => {
    it('should send the message back verbatim', async () => {
      const r = await connect('r', rider());
      const message = { type: MessageType.ECHO, data: { text: 'ping', n: 1 }, ref: 'abc' };

      await r.session.receive(message);

      expect(r.connection.received).toEqual([message]);
    });

    it('should be open to anonymous viewers', async () => {
      const viewer = await connect('v', null);

      await viewer.session.receive({ type: MessageType.ECHO, data: 'hi' });

      expect(viewer.connection.received).toEqual([{ type: MessageType.ECHO, data: 'hi' }]);
    });

    it('should let staff echo to a named group', async () => {
      const d = await connect('d', driver());
      const o = await connect('o', owner());

      await o.session.receive({ type: MessageType.ECHO, data: { text: 'hello drivers' }, group: DRIVER_POOL_GROUP });

      expect(d.connection.received).toEqual([{ type: MessageType.ECHO, data: { text: 'hello drivers' } }]);
      expect(o.connection.received).toEqual([]);
    });

    it('should refuse a group echo from non-staff', async () => {
      const d = await connect('d', driver());
      const r = await connect('r', rider());

      await r.session.receive({ type: MessageType.ECHO, data: 'x', group: DRIVER_POOL_GROUP });

      expect(d.connection.received).toEqual([]);
      expect(r.connection.received).toEqual([{
        type: MessageType.ERROR,
        data: {
          code: ErrorCode.FORBIDDEN,
          message: 'Only staff can echo to a group',
          retryable: false,
          requestType: MessageType.ECHO
        }
      }]);
    });
  });

  describe('create.trip', () => {
    it('should reply to the sender and broadcast to the driver pool', async () => {
      const d1 = await connect('d1', driver());
      const d2 = await connect('d2', driver('driver-2', '9000000005'));
      const r = await connect('r', rider());

      await r.session.receive({
        type: MessageType.CREATE_TRIP,
        data: { pickup: '123 Street Home Address', dropoff: '456 Street Destination', rider: 'rider-1' }
      });

      const reply = lastTrip(r.connection, MessageType.CREATE_TRIP);
      expect(reply.id).toEqual(expect.any(String));
      expect(reply.driver).toBeNull();
      expect(reply.status).toBe(TripStatus.REQUESTED);
      expect(reply.pickup).toBe('123 Street Home Address');
      expect(reply.dropoff).toBe('456 Street Destination');
      expect(reply.rider?.id).toBe('rider-1');

      expect(lastTrip(d1.connection, MessageType.CREATE_TRIP)).toEqual(reply);
      expect(lastTrip(d2.connection, MessageType.CREATE_TRIP)).toEqual(reply);
      expect(r.connection.groups.has(tripGroup(reply.id))).toBe(true);
    });

    it('should refuse anonymous viewers', async () => {
      const viewer = await connect('v', null);

      await viewer.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });

      expect(viewer.connection.received).toEqual([{
        type: MessageType.ERROR,
        data: {
          code: ErrorCode.AUTH_REQUIRED,
          message: 'create.trip requires an authenticated connection',
          retryable: false,
          requestType: MessageType.CREATE_TRIP
        }
      }]);
    });

    it('should report missing addresses field by field', async () => {
      const r = await connect('r', rider());

      await r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: '   ' } });

      expect(r.connection.received).toHaveLength(1);
      expect(r.connection.received[0]).toMatchObject({
        type: MessageType.ERROR,
        data: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Invalid create.trip payload',
          retryable: false,
          requestType: MessageType.CREATE_TRIP,
          details: {
            errors: [
              { field: 'pickup', message: 'Address is required' },
              { field: 'dropoff', message: 'Required' }
            ]
          }
        }
      });
    });
  });

  describe('update.trip', () => {
    it('should broadcast the update to the trip group only', async () => {
      const r = await connect('r', rider());
      const d1 = await connect('d1', driver());
      const d2 = await connect('d2', driver('driver-2', '9000000005'));

      await r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });
      const created = lastTrip(r.connection, MessageType.CREATE_TRIP);

      await d1.session.receive({
        type: MessageType.UPDATE_TRIP,
        data: { id: created.id, status: TripStatus.STARTED, driver: 'driver-1' }
      });

      const seenByRider = lastTrip(r.connection, MessageType.UPDATE_TRIP);
      expect(seenByRider.status).toBe(TripStatus.STARTED);
      expect(seenByRider.driver?.id).toBe('driver-1');
      expect(lastTrip(d1.connection, MessageType.UPDATE_TRIP)).toEqual(seenByRider);
      expect(d1.connection.groups.has(tripGroup(created.id))).toBe(true);

      expect(d2.connection.typesReceived()).toEqual([MessageType.CREATE_TRIP]);
    });

    it('should answer an unknown trip with TRIP_NOT_FOUND and keep the connection usable', async () => {
      const d = await connect('d', driver());

      await d.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: 'missing', status: TripStatus.STARTED } });
      await d.session.receive({ type: MessageType.ECHO, data: 'still here' });

      expect(d.connection.received).toEqual([
        {
          type: MessageType.ERROR,
          data: {
            code: ErrorCode.TRIP_NOT_FOUND,
            message: 'Trip not found: missing',
            details: { tripId: 'missing' },
            retryable: false,
            requestType: MessageType.UPDATE_TRIP
          }
        },
        { type: MessageType.ECHO, data: 'still here' }
      ]);
    });

    it('should reject a status outside the lifecycle', async () => {
      const r = await connect('r', rider());
      await r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });
      const created = lastTrip(r.connection, MessageType.CREATE_TRIP);

      await r.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: created.id, status: 'CANCELLED' } });

      expect(r.connection.received[1]).toMatchObject({
        type: MessageType.ERROR,
        data: { code: ErrorCode.VALIDATION_ERROR, requestType: MessageType.UPDATE_TRIP }
      });
    });
  });

  describe('trip group membership', () => {
    it('should join the rider when an owner books on their behalf', async () => {
      const r = await connect('r', rider());
      const d1 = await connect('d1', driver());
      const o = await connect('o', owner());

      await o.session.receive({
        type: MessageType.CREATE_TRIP,
        data: { pickup: 'A', dropoff: 'B', rider: 'rider-1' }
      });
      const created = lastTrip(o.connection, MessageType.CREATE_TRIP);
      expect(r.connection.groups.has(tripGroup(created.id))).toBe(true);

      await d1.session.receive({
        type: MessageType.UPDATE_TRIP,
        data: { id: created.id, status: TripStatus.STARTED, driver: 'driver-1' }
      });

      expect(r.connection.typesReceived()).toEqual([MessageType.UPDATE_TRIP]);
      expect(lastTrip(r.connection, MessageType.UPDATE_TRIP).status).toBe(TripStatus.STARTED);
    });

    it('should join a driver assigned by an owner', async () => {
      const r = await connect('r', rider());
      const d1 = await connect('d1', driver());
      const o = await connect('o', owner());

      await r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });
      const created = lastTrip(r.connection, MessageType.CREATE_TRIP);

      await o.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: created.id, driver: 'driver-1' } });

      expect(d1.connection.groups.has(tripGroup(created.id))).toBe(true);
      expect(d1.connection.typesReceived()).toEqual([MessageType.CREATE_TRIP, MessageType.UPDATE_TRIP]);
      expect(lastTrip(d1.connection, MessageType.UPDATE_TRIP).driver?.id).toBe('driver-1');
    });

    it('should join every connection of the same principal', async () => {
      const r1 = await connect('r1', rider());
      const r2 = await connect('r2', rider());
      const o = await connect('o', owner());

      await o.session.receive({
        type: MessageType.CREATE_TRIP,
        data: { pickup: 'A', dropoff: 'B', rider: 'rider-1' }
      });
      const group = tripGroup(lastTrip(o.connection, MessageType.CREATE_TRIP).id);

      expect(registry.members(group).sort()).toEqual(['o', 'r1', 'r2']);
    });

    it('should drop a driver who releases the trip after telling them', async () => {
      const r = await connect('r', rider());
      const d1 = await connect('d1', driver());

      await r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });
      const created = lastTrip(r.connection, MessageType.CREATE_TRIP);
      const group = tripGroup(created.id);

      await d1.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: created.id, driver: 'driver-1' } });
      await d1.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: created.id, driver: null } });

      expect(lastTrip(d1.connection, MessageType.UPDATE_TRIP).driver).toBeNull();
      expect(d1.connection.groups).toEqual(new Set([DRIVER_POOL_GROUP]));
      expect(registry.members(group)).toEqual(['r']);

      await r.session.receive({ type: MessageType.UPDATE_TRIP, data: { id: created.id, pickup: 'C' } });

      expect(d1.connection.typesReceived()).toEqual([
        MessageType.CREATE_TRIP,
        MessageType.UPDATE_TRIP,
        MessageType.UPDATE_TRIP
      ]);
      expect(r.connection.typesReceived()).toEqual([
        MessageType.CREATE_TRIP,
        MessageType.UPDATE_TRIP,
        MessageType.UPDATE_TRIP,
        MessageType.UPDATE_TRIP
      ]);
    });
  });

  describe('routing', () => {
    it('should answer an unknown type with an error', async () => {
      const r = await connect('r', rider());

      await r.session.receive({ type: 'trip.cancel', data: {} });

      expect(r.connection.received).toEqual([{
        type: MessageType.ERROR,
        data: {
          code: ErrorCode.UNKNOWN_MESSAGE_TYPE,
          message: 'Unknown message type: trip.cancel',
          retryable: false,
          requestType: 'trip.cancel'
        }
      }]);
    });

    it('should answer a malformed envelope with INVALID_MESSAGE', async () => {
      const r = await connect('r', rider());

      await r.session.receive('not an envelope');

      expect(r.connection.received).toHaveLength(1);
      expect(r.connection.received[0]).toMatchObject({
        type: MessageType.ERROR,
        data: { code: ErrorCode.INVALID_MESSAGE, retryable: false }
      });
      expect(r.connection.received[0].data).not.toHaveProperty('requestType');
    });

    it('should handle messages from one connection in arrival order', async () => {
      const r = await connect('r', rider());

      void r.session.receive({ type: MessageType.CREATE_TRIP, data: { pickup: 'A', dropoff: 'B' } });
      void r.session.receive({ type: 'nope', data: null });
      void r.session.receive({ type: MessageType.ECHO, data: 'last' });
      await flush();
      await flush();

      expect(r.connection.typesReceived()).toEqual([
        MessageType.CREATE_TRIP,
        MessageType.ERROR,
        MessageType.ECHO
      ]);
    });

    it('should list the registered message types', () => {
      expect(router.types()).toEqual([MessageType.ECHO, MessageType.CREATE_TRIP, MessageType.UPDATE_TRIP]);
    });
  });
});
