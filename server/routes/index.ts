/**
 * Routes Index
 *
 * Mounts the route modules and the shared request logging, 404 and
 * error handling.
 */

import { Express, Request, Response, NextFunction } from 'express';
import type { RoutingConfig } from '../../shared/types';
import { createLogger } from '../lib/logger';
import { errorHandler, notFoundHandler } from '../middleware/errorHandler';
import type { ClaimsPipeline } from '../services/claimsPipeline';
import { createComplianceChecker } from '../services/complianceEngine';
import type { IPolicyStore } from '../services/policyStore';
import { createClaimsRouter } from './claims';
import { createComplianceRouter, createRoutingRouter } from './engines';
import { createPoliciesRouter } from './policies';

const log = createLogger({ module: 'routes' });

/**
 * Long-lived services built at startup and shared by every request
 */
export interface RouteServices {
  pipeline: Pick<ClaimsPipeline, 'run'>;
  policyStore: IPolicyStore;
  routing: Readonly<RoutingConfig>;
  claimTypes: readonly string[];
}

/**
 * Request logging middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      requestId: req.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
    };

    if (res.statusCode >= 400) {
      log.warn(logData, 'Request completed with error');
    } else if (duration > 1000) {
      log.warn(logData, 'Slow request');
    } else {
      log.debug(logData, 'Request completed');
    }
  });

  next();
}

/**
 * Register all routes with the Express app
 */
export function registerRoutes(app: Express, services: RouteServices): void {
  app.use(requestLogger);

  // =================================================
  // Mount Route Modules
  // =================================================

  app.use('/api/claims', createClaimsRouter(services.pipeline));
  app.use('/api/compliance', createComplianceRouter(createComplianceChecker(services.policyStore)));
  app.use('/api/routing', createRoutingRouter(services.routing));
  app.use('/api/policies', createPoliciesRouter(services.policyStore));

  // =================================================
  // Health Check
  // =================================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      policies: services.policyStore.size,
      claimTypes: services.claimTypes,
    });
  });

  // =================================================
  // Error Handling
  // =================================================

  app.use('/api', notFoundHandler);
  app.use(errorHandler);

  log.info('Routes registered successfully');
}
