/**
 * @fileoverview Express router composition for the ledger HTTP API.
 *
 * Each domain registers its routes on one router with the shared service bundle.
 */

import { Router, type Request, type Response } from 'express';
import type { RouteDependencies } from './routes/route-helpers';
import { registerMaterialRoutes } from './routes/material-routes';
import { registerRecognitionRoutes } from './routes/recognition-routes';
import { registerSettingsRoutes } from './routes/settings-routes';
import { registerSpoolRoutes } from './routes/spool-routes';
import { registerStatisticsRoutes } from './routes/statistics-routes';
import { registerTransferRoutes } from './routes/transfer-routes';
import { registerUsageRoutes } from './routes/usage-routes';
import type { HealthResponse } from './types/api.types';

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      success: true,
      status: 'ok',
      importing: deps.reconciler.isImporting()
    };
    res.json(response);
  });

  registerSpoolRoutes(router, deps);
  registerUsageRoutes(router, deps);
  registerMaterialRoutes(router, deps);
  registerSettingsRoutes(router, deps);
  registerStatisticsRoutes(router, deps);
  registerTransferRoutes(router, deps);
  registerRecognitionRoutes(router, deps);

  return router;
}
