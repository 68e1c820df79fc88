/**
 * Claims Routes
 *
 * Runs a claim document through the decision pipeline.
 */

import { Router, Request, Response } from 'express';
import { toResultRecord, type ClaimSource } from '../../shared/types';
import { createLogger } from '../lib/logger';
import { asyncHandler } from '../middleware/errorHandler';
import { sendSuccess } from '../middleware/responseHelpers';
import { validateBody } from '../middleware/validation';
import { processClaimSchema, type ProcessClaimInput } from '../middleware/validationSchemas';
import type { ClaimsPipeline } from '../services/claimsPipeline';

const log = createLogger({ module: 'claims-routes' });

function toClaimSource(input: ProcessClaimInput): ClaimSource {
  if (input.imagePath !== undefined) {
    return { kind: 'image', imagePath: input.imagePath };
  }
  return { kind: 'text', text: input.text ?? '' };
}

export function createClaimsRouter(pipeline: Pick<ClaimsPipeline, 'run'>): Router {
  const router = Router();

  /**
   * POST /api/claims/process
   * Process a claim from a server-side image path or from raw text.
   * A Failed pipeline result is a normal outcome and returns 200.
   */
  router.post('/process', validateBody(processClaimSchema), asyncHandler(async (req: Request, res: Response) => {
    const input: ProcessClaimInput = req.body;
    const source = toClaimSource(input);

    const result = await pipeline.run(source);

    log.info({ requestId: req.id, source: source.kind, status: result.status }, 'Claim processed');
    sendSuccess(res, toResultRecord(result));
  }));

  return router;
}
