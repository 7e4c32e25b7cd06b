/**
 * @fileoverview Export and import of the whole inventory as one JSON document.
 */

import type { Request, Response, Router } from 'express';
import { ErrorCode } from '../../utils/error.utils';
import { parseOrThrow } from '../../utils/validation.utils';
import { ImportQuerySchema } from '../schemas/api.schemas';
import type { ImportResponse } from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export function registerTransferRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/export', async (_req: Request, res: Response) => {
    try {
      const json = await deps.reconciler.exportJson();
      const day = new Date().toISOString().slice(0, 10);
      res.attachment(`filament-inventory-${day}.json`);
      res.type('application/json');
      return res.send(json);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.post('/import', async (req: Request, res: Response) => {
    try {
      const { policy } = parseOrThrow(ImportQuerySchema, req.query, ErrorCode.INVALID_INPUT);
      const report = await deps.reconciler.importDocument(req.body, policy);
      const response: ImportResponse = { success: true, report };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
