/**
 * Engine Routes
 *
 * Direct access to the compliance and routing engines, for re-checking
 * a claim after manual corrections.
 */

import { Router, Request, Response } from 'express';
import type { RoutingConfig } from '../../shared/types';
import { validateBody } from '../middleware/validation';
import {
  complianceCheckSchema,
  routingDecisionSchema,
  type ComplianceCheckInput,
  type RoutingDecisionInput,
} from '../middleware/validationSchemas';
import { sendSuccess } from '../middleware/responseHelpers';
import type { ComplianceChecker } from '../services/complianceEngine';
import { route } from '../services/routingEngine';

/**
 * POST /api/compliance/check
 */
export function createComplianceRouter(checkCompliance: ComplianceChecker): Router {
  const router = Router();

  router.post('/check', validateBody(complianceCheckSchema), (req: Request, res: Response) => {
    const { policyNumber, claimType, claimText }: ComplianceCheckInput = req.body;
    sendSuccess(res, checkCompliance(policyNumber, claimType, claimText));
  });

  return router;
}

/**
 * POST /api/routing/decide
 */
export function createRoutingRouter(config: Readonly<RoutingConfig>): Router {
  const router = Router();

  router.post('/decide', validateBody(routingDecisionSchema), (req: Request, res: Response) => {
    const { claimRecord }: RoutingDecisionInput = req.body;
    sendSuccess(res, route(claimRecord, config));
  });

  return router;
}
