/**
 * @fileoverview Statistics routes: usage summary, usage by material and low-stock reminders.
 * `from` and `to` bound a half-open window over usage timestamps.
 */

import type { Request, Response, Router } from 'express';
import { ErrorCode } from '../../utils/error.utils';
import { parseOrThrow } from '../../utils/validation.utils';
import { DateRangeQuerySchema } from '../schemas/api.schemas';
import {
  type MaterialUsageResponse,
  type RemindersResponse,
  type SummaryResponse,
  toSpoolPayload
} from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export function registerStatisticsRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/statistics/summary', async (req: Request, res: Response) => {
    try {
      const range = parseOrThrow(DateRangeQuerySchema, req.query, ErrorCode.INVALID_INPUT);
      const response: SummaryResponse = { success: true, summary: await deps.statistics.summary(range) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.get('/statistics/materials', async (req: Request, res: Response) => {
    try {
      const range = parseOrThrow(DateRangeQuerySchema, req.query, ErrorCode.INVALID_INPUT);
      const response: MaterialUsageResponse = {
        success: true,
        materials: await deps.statistics.usageByMaterial(range)
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.get('/reminders', async (_req: Request, res: Response) => {
    try {
      const reminders = await deps.statistics.reminders();
      const response: RemindersResponse = {
        success: true,
        reminders: reminders.map(reminder => ({
          spool: toSpoolPayload(reminder.view),
          daysUntilEmpty: reminder.daysUntilEmpty
        }))
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
