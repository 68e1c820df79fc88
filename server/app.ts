/**
 * Application Assembly
 *
 * Builds the long-lived services from a loaded configuration and wires
 * them into an Express app. Nothing here reads the environment or the
 * filesystem; server/index.ts does that once at startup.
 */

import express, { type Express } from 'express';
import type { AppConfig } from './config/appConfig';
import { loggers } from './lib/logger';
import { requestIdMiddleware } from './middleware/requestId';
import { registerRoutes, type RouteServices } from './routes';
import { ClaimClassifier } from './services/claimClassifier';
import { ClaimsPipeline } from './services/claimsPipeline';
import { DocumentExtractor, type TextRecognizer } from './services/documentProcessor';
import { InMemoryPolicyStore } from './services/policyStore';

export interface ServiceOptions {
  /** null when text recognition is not configured */
  recognizer: TextRecognizer | null;
}

/**
 * Load the policy store and train the classifier once, then hand both to
 * the pipeline.
 */
export function createServices(config: AppConfig, options: ServiceOptions): RouteServices {
  const policyStore = InMemoryPolicyStore.fromConfig(config.policyDb);
  const classifier = ClaimClassifier.train(config.trainingData);
  const extractor = new DocumentExtractor(options.recognizer);

  const pipeline = new ClaimsPipeline({
    extractor,
    classifier,
    policyStore,
    routing: config.routing,
    onTransition: ({ from, to, reason }) => {
      loggers.pipeline.trace({ from, to, reason }, 'Stage transition');
    },
  });

  loggers.pipeline.info(
    { policies: policyStore.size, claimTypes: classifier.claimTypes },
    'ClaimsPipeline initialized successfully'
  );

  return {
    pipeline,
    policyStore,
    routing: config.routing,
    claimTypes: classifier.claimTypes,
  };
}

export function createApp(services: RouteServices): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(requestIdMiddleware);

  registerRoutes(app, services);

  return app;
}
