/**
 * @fileoverview Material color routes. Reading the color of an unseen material assigns
 * and stores one.
 */

import type { Request, Response, Router } from 'express';
import { ErrorCode } from '../../utils/error.utils';
import { parseOrThrow } from '../../utils/validation.utils';
import { MaterialColorRequestSchema } from '../schemas/api.schemas';
import type { MaterialColorListResponse, MaterialColorResponse } from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export function registerMaterialRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/materials/colors', async (_req: Request, res: Response) => {
    try {
      const response: MaterialColorListResponse = {
        success: true,
        materialColors: await deps.registry.list()
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.get('/materials/colors/:material', async (req: Request, res: Response) => {
    try {
      const material = req.params.material;
      const colorHex = await deps.registry.colorFor(material);
      const response: MaterialColorResponse = { success: true, materialColor: { material, colorHex } };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.put('/materials/colors/:material', async (req: Request, res: Response) => {
    try {
      const { colorHex } = parseOrThrow(MaterialColorRequestSchema, req.body, ErrorCode.INVALID_INPUT);
      const entry = await deps.registry.setColor(req.params.material, colorHex);
      const response: MaterialColorResponse = { success: true, materialColor: entry };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
