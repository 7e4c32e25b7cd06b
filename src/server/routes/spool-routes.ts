/**
 * @fileoverview Spool routes: create, list, describe, edit, stock revision, archive and
 * restore, deletion, weigh-in and per-spool usage history.
 */

import type { Request, Response, Router } from 'express';
import { describeSpool } from '../../services/spool-transitions';
import type { Spool } from '../../types/inventory';
import { ErrorCode } from '../../utils/error.utils';
import { parseOrThrow } from '../../utils/validation.utils';
import {
  SpoolListQuerySchema,
  StockRevisionRequestSchema,
  WeighInRequestSchema
} from '../schemas/api.schemas';
import {
  type SpoolDeleteResponse,
  type SpoolListResponse,
  type SpoolPayload,
  type SpoolResponse,
  type UsageHistoryResponse,
  type WeighInResponse,
  toSpoolPayload
} from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export function registerSpoolRoutes(router: Router, deps: RouteDependencies): void {
  const present = async (spool: Spool): Promise<SpoolPayload> =>
    toSpoolPayload(describeSpool(spool, await deps.settings.get()));

  router.get('/spools', async (req: Request, res: Response) => {
    try {
      const query = parseOrThrow(SpoolListQuerySchema, req.query, ErrorCode.INVALID_INPUT);
      const views = await deps.ledger.listViews(query);
      const response: SpoolListResponse = { success: true, spools: views.map(toSpoolPayload) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.post('/spools', async (req: Request, res: Response) => {
    try {
      const spool = await deps.ledger.addSpool(req.body);
      const response: SpoolResponse = { success: true, spool: await present(spool) };
      return res.status(201).json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.get('/spools/:id', async (req: Request, res: Response) => {
    try {
      const view = await deps.ledger.describe(req.params.id);
      const response: SpoolResponse = { success: true, spool: toSpoolPayload(view) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.patch('/spools/:id', async (req: Request, res: Response) => {
    try {
      const spool = await deps.ledger.updateDetails(req.params.id, req.body);
      const response: SpoolResponse = { success: true, spool: await present(spool) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.delete('/spools/:id', async (req: Request, res: Response) => {
    try {
      const result = await deps.ledger.deleteSpool(req.params.id);
      const response: SpoolDeleteResponse = { success: true, ...result };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.put('/spools/:id/stock', async (req: Request, res: Response) => {
    try {
      const { initialMass } = parseOrThrow(StockRevisionRequestSchema, req.body, ErrorCode.INVALID_INPUT);
      const spool = await deps.ledger.reviseStock(req.params.id, initialMass);
      const response: SpoolResponse = { success: true, spool: await present(spool) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.post('/spools/:id/archive', async (req: Request, res: Response) => {
    try {
      const spool = await deps.ledger.archive(req.params.id);
      const response: SpoolResponse = { success: true, spool: await present(spool) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.post('/spools/:id/restore', async (req: Request, res: Response) => {
    try {
      const spool = await deps.ledger.restore(req.params.id);
      const response: SpoolResponse = { success: true, spool: await present(spool) };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  router.post('/spools/:id/weigh', async (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(WeighInRequestSchema, req.body, ErrorCode.INVALID_INPUT);
      const result = await deps.recorder.recordWeighIn(req.params.id, body.grossMass, {
        recordedAt: body.recordedAt,
        label: body.label
      });
      const response: WeighInResponse = {
        success: true,
        spool: await present(result.spool),
        netMass: result.netMass,
        record: result.record
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });

  // Newest first
  router.get('/spools/:id/usage', async (req: Request, res: Response) => {
    try {
      const spool = await deps.ledger.getSpool(req.params.id);
      const usage = await deps.store.listUsageRecords(record => record.spoolId === spool.id);
      usage.sort((a, b) => Date.parse(b.recordedAt) - Date.parse(a.recordedAt));
      const response: UsageHistoryResponse = { success: true, usage };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
