/**
 * Policy Routes
 *
 * Read-only view of the loaded policy catalogue.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Policy } from '../../shared/types';
import { errors } from '../middleware/errorHandler';
import { sendSuccess } from '../middleware/responseHelpers';
import type { IPolicyStore } from '../services/policyStore';

export interface PolicyResponse {
  policyId: string;
  coverage: string[];
  exclusions: string[];
}

function toPolicyResponse(policy: Policy): PolicyResponse {
  return {
    policyId: policy.policyId,
    coverage: [...policy.coverage].sort(),
    exclusions: [...policy.exclusions],
  };
}

export function createPoliciesRouter(store: IPolicyStore): Router {
  const router = Router();

  /**
   * GET /api/policies
   */
  router.get('/', (_req: Request, res: Response) => {
    sendSuccess(res, store.list().map(toPolicyResponse));
  });

  /**
   * GET /api/policies/:policyId
   */
  router.get('/:policyId', (req: Request, res: Response, next: NextFunction) => {
    const policy = store.get(req.params.policyId);
    if (!policy) {
      next(errors.notFound(`Policy ${req.params.policyId}`));
      return;
    }
    sendSuccess(res, toPolicyResponse(policy));
  });

  return router;
}
