/**
 * @fileoverview Label recognition route. The request body is the raw photo; the answer is
 * a suggestion for the spool form, never a committed spool.
 */

import express, { type Request, type Response, type Router } from 'express';
import { toSpoolSuggestion } from '../../services/RecognitionService';
import { invalidInputError } from '../../utils/error.utils';
import type { RecognitionResponse, StandardAPIResponse } from '../types/api.types';
import { sendErrorResponse, type RouteDependencies } from './route-helpers';

export const MAX_IMAGE_SIZE = '10mb';

const rawImageBody = express.raw({
  type: ['image/*', 'application/octet-stream'],
  limit: MAX_IMAGE_SIZE
});

export function registerRecognitionRoutes(router: Router, deps: RouteDependencies): void {
  router.post('/recognition', rawImageBody, async (req: Request, res: Response) => {
    try {
      if (!deps.recognition) {
        const response: StandardAPIResponse = {
          success: false,
          error: 'Label recognition is not configured'
        };
        return res.status(503).json(response);
      }

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw invalidInputError('Request body must be an image (image/* or application/octet-stream)');
      }

      const result = await deps.recognition.recognize({
        data: new Uint8Array(body),
        mimeType: req.get('content-type')
      });
      const response: RecognitionResponse = {
        success: true,
        suggestion: result ? toSpoolSuggestion(result.fields) : null,
        confidence: result?.confidence ?? null
      };
      return res.json(response);
    } catch (error) {
      return sendErrorResponse(res, error);
    }
  });
}
