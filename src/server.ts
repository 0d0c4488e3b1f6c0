/**
 * =============================================================================
 * RIDE DISPATCH CORE - MAIN SERVER
 * =============================================================================
 *
 * Real-time matching between riders and drivers over socket.io.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ AUTH       │ Trust gate (JWT) and admission policy                      │
 * │ USER       │ Principals: riders, drivers, owners                        │
 * │ TRIP       │ Trip lifecycle state machine, per-trip write lock          │
 * │ DISPATCH   │ Sessions, message router, group registry                   │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * SCALABILITY:
 * - REDIS_ENABLED=true attaches the socket.io Redis adapter and moves the
 *   trip lock into Redis, so several instances can serve one driver pool
 * =============================================================================
 */

import express from 'express';
import cors from 'cors';
import { createServer } from 'http';

import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { redisService } from './shared/services/redis.service';
import { attachRedisAdapter, closeSocket, initializeSocket } from './shared/services/socket.service';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { healthRoutes } from './shared/routes/health.routes';
import { InMemoryStore } from './shared/database/db';
import { circuitBreakerRegistry } from './shared/resilience/circuit-breaker';
import { JwtTrustService } from './modules/auth/token.service';
import { getAdmissionPolicy } from './modules/auth/admission.policy';
import { InProcessTripLock, RedisTripLock, TripLock } from './modules/trip/trip-lock';
import { TripService, createStorageBreaker } from './modules/trip/trip.service';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

async function bootstrap(): Promise<void> {
  // ===========================================================================
  // COLLABORATORS
  // ===========================================================================
  const storage = new InMemoryStore({ filePath: config.storage.dbFile });
  const trust = new JwtTrustService({ secret: config.jwt.secret, expiresIn: config.jwt.expiresIn });

  const breaker = createStorageBreaker({
    failureThreshold: config.storage.failureThreshold,
    resetTimeout: config.storage.resetTimeoutMs,
    requestTimeout: config.storage.timeoutMs
  });
  circuitBreakerRegistry.register(breaker);

  let lock: TripLock = new InProcessTripLock();
  if (config.redis.enabled) {
    await redisService.initialize(config.redis.url);
    lock = new RedisTripLock(redisService, config.tripLock);
  }

  const trips = new TripService({ storage, lock, breaker });

  // ===========================================================================
  // HTTP + SOCKET.IO
  // ===========================================================================
  const app = express();
  app.use(cors({ origin: config.cors.origin, credentials: true }));
  app.use(express.json({ limit: '100kb' }));
  app.use(healthRoutes);
  app.use(notFoundHandler);
  app.use(errorHandler);

  const server = createServer(app);
  const io = initializeSocket(server, {
    trust,
    storage,
    trips,
    admission: getAdmissionPolicy(config.dispatch.admission),
    registry: config.dispatch.groupRegistry
  });

  if (config.dispatch.groupRegistry === 'socket' && config.redis.enabled) {
    await attachRedisAdapter(io);
  }

  server.listen(config.port, config.host, () => {
    logger.info(`🚀 Dispatch server listening on ${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      registry: config.dispatch.groupRegistry,
      admission: config.dispatch.admission,
      redis: config.redis.enabled
    });
  });

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================
  let shuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Starting graceful shutdown...`);

    // Force shutdown after 30 seconds
    const forceExit = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000);
    forceExit.unref();

    try {
      // Closes the HTTP server as well
      await closeSocket();
      if (config.redis.enabled) {
        await redisService.disconnect();
      }
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason)
  });
  process.exit(1);
});

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
