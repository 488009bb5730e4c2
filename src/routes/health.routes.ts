import { Hono } from 'hono';
import type { StorageDriver } from '../config/env.js';
import type { AppEnv } from '../types/api.js';
import { success } from '../utils/response.js';

export interface HealthProbe {
  storage: StorageDriver;
  /** Round-trip to the database; rejects when it is unreachable. */
  ping?: () => Promise<void>;
}

export function createHealthRoutes(probe: HealthProbe) {
  const healthRoutes = new Hono<AppEnv>();

  // Store server start time for uptime calculation
  const startTime = Date.now();

  healthRoutes.get('/', async (c) => {
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    let storageStatus = probe.storage === 'memory' ? 'in-memory' : 'unavailable';
    let storageError: string | undefined;

    if (probe.ping) {
      try {
        await probe.ping();
        storageStatus = 'connected';
      } catch (error) {
        storageStatus = 'error';
        storageError = error instanceof Error ? error.message : 'Unknown database error';
      }
    }

    const isHealthy = storageStatus === 'connected' || storageStatus === 'in-memory';

    return c.json(
      success(
        {
          status: isHealthy ? 'healthy' : 'degraded',
          version: '1.0.0',
          uptime: uptimeSeconds,
          storage: {
            driver: probe.storage,
            status: storageStatus,
            error: storageError,
          },
        },
        c.get('requestId')
      ),
      200
    );
  });

  return healthRoutes;
}
