/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (can it accept connections?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/environment';
import { CircuitState, circuitBreakerRegistry } from '../resilience/circuit-breaker';
import { redisService } from '../services/redis.service';
import { getConnectionStats, getIO } from '../services/socket.service';

const router = Router();

// Track server start time
const startTime = Date.now();

/**
 * Basic health check - for load balancers
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString()
  });
});

/**
 * Liveness probe - is the process alive?
 */
router.get('/health/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    pid: process.pid,
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

/**
 * Readiness probe - the dispatch endpoint is up and its collaborators answer
 */
router.get('/health/ready', (_req: Request, res: Response) => {
  const circuitBreakers = circuitBreakerRegistry.getAllStats();

  const checks: Record<string, boolean> = {
    socket: getIO() !== null,
    circuits: circuitBreakers.every(cb => cb.state !== CircuitState.OPEN)
  };
  if (config.redis.enabled) {
    checks.redis = redisService.isConnected();
  }

  const isReady = Object.values(checks).every(v => v);

  res.status(isReady ? 200 : 503).json({
    status: isReady ? 'ready' : 'not_ready',
    checks,
    connections: getConnectionStats(),
    circuitBreakers: circuitBreakers.map(cb => ({
      name: cb.name,
      state: cb.state,
      failures: cb.failures
    })),
    timestamp: new Date().toISOString()
  });
});

export { router as healthRoutes };
