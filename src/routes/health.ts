import { Hono } from 'hono';
import type { HealthResponse, ComponentHealth } from '../types.js';
import type { SubsystemRegistry } from '../services/subsystem-registry.js';
import type { SnapshotStore } from '../services/snapshot-store.js';
import { checkRedisHealth, type RedisClient } from '../services/redis-client.js';
import { errorMessage } from '../errors.js';

const VERSION = '1.0.0';
const startedAt = Date.now();

export interface HealthDependencies {
  registry: SubsystemRegistry;
  store: SnapshotStore;
  /** Present when the snapshot store is Redis-backed. */
  redisClient?: RedisClient | null;
}

/**
 * GET /: engine health.
 *
 * Overall status:
 * - degraded when the registry has violations or Redis does not answer
 *   (resolution still works, computing directly)
 * - unhealthy when no subsystem is registered
 */
export function createHealthRoutes(deps: HealthDependencies): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    const violations = deps.registry.validateAll();
    const subsystems = deps.registry.count();
    const storeHealth = deps.redisClient ? await getRedisHealth(deps.redisClient) : { status: 'healthy' as const };

    let overallStatus: HealthResponse['status'] = 'healthy';
    if (subsystems === 0) {
      overallStatus = 'unhealthy';
    } else if (violations.length > 0 || storeHealth.status !== 'healthy') {
      overallStatus = 'degraded';
    }

    const response: HealthResponse = {
      status: overallStatus,
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      components: {
        aggregator: { status: 'healthy' },
        registry: {
          status: violations.length > 0 ? 'degraded' : 'healthy',
          subsystems,
          violations,
        },
        snapshot_store: { ...storeHealth, backend: deps.store.backend },
      },
      timestamp: new Date().toISOString(),
    };

    return c.json(response, overallStatus === 'unhealthy' ? 503 : 200);
  });

  return app;
}

async function getRedisHealth(client: RedisClient): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    const latency = await checkRedisHealth(client);
    return { status: 'healthy', latency_ms: latency };
  } catch (err) {
    return { status: 'unreachable', latency_ms: Date.now() - start, error: errorMessage(err) };
  }
}
