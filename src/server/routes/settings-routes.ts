/**
 * @fileoverview Inventory settings routes.
 */

import type { Request, Response, Router } from 'express';
import type { SettingsResponse } from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export function registerSettingsRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/settings', async (_req: Request, res: Response) => {
    try {
      const response: SettingsResponse = { success: true, settings: await deps.settings.get() };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.patch('/settings', async (req: Request, res: Response) => {
    try {
      const response: SettingsResponse = { success: true, settings: await deps.settings.update(req.body) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
