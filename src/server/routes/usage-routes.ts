/**
 * @fileoverview Usage recording route. A batch answers 200 even when some entries are
 * rejected; each outcome says what happened to its entry.
 */

import type { Request, Response, Router } from 'express';
import { describeSpool } from '../../services/spool-transitions';
import type { InventorySettings, UsageOutcome } from '../../types/inventory';
import { ErrorCode } from '../../utils/error.utils';
import { parseOrThrow } from '../../utils/validation.utils';
import { UsageBatchRequestSchema } from '../schemas/api.schemas';
import { type UsageBatchResponse, type UsageOutcomePayload, toSpoolPayload } from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

function toOutcomePayload(outcome: UsageOutcome, settings: InventorySettings): UsageOutcomePayload {
  if (outcome.status === 'rejected') {
    return {
      status: 'rejected',
      entryIndex: outcome.entryIndex,
      code: outcome.error.code,
      error: outcome.error.getUserMessage()
    };
  }
  return {
    status: 'recorded',
    record: outcome.record,
    spool: toSpoolPayload(describeSpool(outcome.spool, settings)),
    notices: outcome.notices
  };
}

export function registerUsageRoutes(router: Router, deps: RouteDependencies): void {
  router.post('/usage', async (req: Request, res: Response) => {
    try {
      const { entries } = parseOrThrow(UsageBatchRequestSchema, req.body, ErrorCode.INVALID_INPUT);
      const outcomes = await deps.recorder.recordUsage(entries);
      const settings = await deps.settings.get();

      const payloads = outcomes.map(outcome => toOutcomePayload(outcome, settings));
      const recorded = payloads.filter(outcome => outcome.status === 'recorded').length;
      const response: UsageBatchResponse = {
        success: true,
        recorded,
        rejected: payloads.length - recorded,
        outcomes: payloads
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
