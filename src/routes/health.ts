import { Router, Request, Response } from 'express';

/**
 * Dependency status sources for the health endpoints
 */
export interface HealthProbe {
  database: () => { connected: boolean; readyState: number };
  redis: () => boolean;
}

export const createHealthRoutes = (probe: HealthProbe): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = probe.database();
    const redisConnected = probe.redis();

    const isHealthy = dbStatus.connected && redisConnected;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        redis: {
          connected: redisConnected,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = probe.database().connected && probe.redis();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
