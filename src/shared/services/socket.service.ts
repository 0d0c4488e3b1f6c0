/**
 * =============================================================================
 * SOCKET SERVICE - Real-time dispatch endpoint (Multi-Server Ready)
 * =============================================================================
 *
 * CONNECTION PIPELINE:
 *   handshake (?token=...) -> trust gate -> admission policy -> session
 *
 * Every message in either direction travels on the `message` event as a
 * `{ type, data }` envelope.
 *
 * MULTI-SERVER SCALING (Socket.IO Redis Adapter):
 * - With GROUP_REGISTRY=socket, groups are socket.io rooms
 * - io.to(room).emit() is synchronized across all server instances once the
 *   Redis adapter is attached
 * - GROUP_REGISTRY=memory keeps groups in this process only
 * =============================================================================
 */

import { Server as HttpServer } from 'http';
import { createAdapter } from '@socket.io/redis-adapter';
import { Server } from 'socket.io';
import { GroupRegistryBackend, config } from '../../config/environment';
import { SOCKET_MESSAGE_EVENT } from '../../core/constants';
import { AdmissionPolicy, createAdmissionMiddleware } from '../../modules/auth/admission.policy';
import { TrustService } from '../../modules/auth/token.service';
import { createTrustGateMiddleware } from '../../modules/auth/trust-gate';
import { DispatchSession } from '../../modules/dispatch/dispatch.session';
import { Connection } from '../../modules/dispatch/dispatch.types';
import { GroupRegistry } from '../../modules/dispatch/group-registry';
import { InMemoryGroupRegistry } from '../../modules/dispatch/memory-group.registry';
import { createDispatchRouter } from '../../modules/dispatch/message.router';
import { SessionDirectory } from '../../modules/dispatch/session.directory';
import { SocketIoGroupRegistry } from '../../modules/dispatch/socket-io-group.registry';
import {
  ClientToServerEvents,
  DispatchServer,
  InterServerEvents,
  ServerToClientEvents,
  SocketData
} from '../../modules/dispatch/socket.types';
import { TripService } from '../../modules/trip/trip.service';
import { StorageService } from '../database/repository.interface';
import { logger } from './logger.service';
import { redisService } from './redis.service';

export interface SocketServiceDeps {
  trust: TrustService;
  storage: StorageService;
  trips: TripService;
  admission: AdmissionPolicy;
  registry: GroupRegistryBackend;
}

export interface ConnectionStats {
  connections: number;
  authenticated: number;
  anonymous: number;
  groups: number;
  registry: GroupRegistryBackend;
  redisAdapter: boolean;
}

let io: DispatchServer | null = null;
let groupRegistry: GroupRegistry | null = null;
let registryBackend: GroupRegistryBackend = 'memory';
let redisAdapterAttached = false;

const sessions = new Map<string, DispatchSession>();

export function initializeSocket(server: HttpServer, deps: SocketServiceDeps): DispatchServer {
  const socketServer: DispatchServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(server, {
    cors: {
      origin: config.cors.origin,
      methods: ['GET', 'POST'],
      credentials: true
    },
    pingTimeout: 20000,           // 20s - How long to wait for pong
    pingInterval: 25000,          // 25s - How often to send ping
    transports: ['websocket', 'polling'],
    maxHttpBufferSize: 1024 * 1024
  });

  registryBackend = deps.registry;
  const registry: GroupRegistry = deps.registry === 'socket'
    ? new SocketIoGroupRegistry(socketServer)
    : new InMemoryGroupRegistry();
  const router = createDispatchRouter(deps.trips);
  const directory = new SessionDirectory();

  // Stage one never refuses; stage two is the only place a handshake is rejected
  socketServer.use(createTrustGateMiddleware({ trust: deps.trust, storage: deps.storage }));
  socketServer.use(createAdmissionMiddleware(deps.admission));

  socketServer.on('connection', (socket) => {
    const identity = socket.data.identity;
    const principal = identity?.kind === 'principal' ? identity.principal : null;

    const connection: Connection = {
      id: socket.id,
      principal,
      groups: new Set(),
      deliver: (message) => {
        socket.emit(SOCKET_MESSAGE_EVENT, message);
      }
    };

    const session = new DispatchSession(connection, { registry, router, trips: deps.trips, directory });
    sessions.set(socket.id, session);

    logger.info(`🔌 Socket connected: ${socket.id}`, {
      principalId: principal?.id,
      role: principal?.role ?? 'anonymous'
    });

    socket.on(SOCKET_MESSAGE_EVENT, (raw) => {
      void session.receive(raw);
    });

    socket.on('disconnect', (reason) => {
      logger.info(`Socket disconnected: ${socket.id} (Reason: ${reason})`);
      session.close();
      sessions.delete(socket.id);
    });

    void session.open();
  });

  io = socketServer;
  groupRegistry = registry;

  logger.info('Socket.IO initialized', {
    registry: deps.registry,
    admission: deps.admission.name
  });

  return socketServer;
}

// =============================================================================
// REDIS ADAPTER SETUP
// =============================================================================

/**
 * Attach @socket.io/redis-adapter so room emits reach other instances.
 * Requires redisService to be initialized.
 */
export async function attachRedisAdapter(socketServer: DispatchServer): Promise<void> {
  const { pubClient, subClient } = await redisService.createAdapterClients();
  socketServer.adapter(createAdapter(pubClient, subClient));
  redisAdapterAttached = true;
  logger.info('[Socket] Redis adapter initialized - cross-instance delivery ENABLED');
}

export function getIO(): DispatchServer | null {
  return io;
}

/**
 * Local connection statistics for health checks
 */
export function getConnectionStats(): ConnectionStats {
  let authenticated = 0;
  for (const session of sessions.values()) {
    if (session.principal) authenticated++;
  }

  return {
    connections: sessions.size,
    authenticated,
    anonymous: sessions.size - authenticated,
    groups: groupRegistry?.groupCount() ?? 0,
    registry: registryBackend,
    redisAdapter: redisAdapterAttached
  };
}

/**
 * Disconnect every client and stop accepting connections.
 * Also closes the HTTP server the endpoint was attached to.
 */
export function closeSocket(): Promise<void> {
  const socketServer = io;
  if (!socketServer) return Promise.resolve();

  for (const session of sessions.values()) {
    session.close();
  }
  sessions.clear();
  io = null;
  groupRegistry = null;
  redisAdapterAttached = false;

  return new Promise((resolve, reject) => {
    socketServer.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      logger.info('Socket.IO closed');
      resolve();
    });
  });
}
