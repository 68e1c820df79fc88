// Load environment variables from .env file BEFORE any other imports
import 'dotenv/config';

import { createServer } from 'http';
import OpenAI from 'openai';
import { createApp, createServices } from './app';
import type { RouteServices } from './routes';
import { ConfigError, loadConfig } from './config/appConfig';
import { logger, logError } from './lib/logger';
import { OpenAIVisionRecognizer, type TextRecognizer } from './services/documentProcessor';

const log = logger.child({ module: 'server' });

function createRecognizer(): TextRecognizer | null {
  if (!process.env.OPENAI_API_KEY) {
    log.warn('OPENAI_API_KEY not configured; image documents cannot be processed');
    return null;
  }

  const client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  return new OpenAIVisionRecognizer(client, process.env.OCR_MODEL || 'gpt-4o');
}

function start() {
  let services: RouteServices;
  try {
    // Configuration, policy store and model are loaded exactly once
    const config = loadConfig();
    services = createServices(config, { recognizer: createRecognizer() });
  } catch (error) {
    if (error instanceof ConfigError) {
      log.fatal({ err: { message: error.message, details: error.details } }, 'Invalid configuration, refusing to start');
    } else {
      logError(log, error, 'Startup failed');
    }
    process.exit(1);
  }

  const app = createApp(services);
  const httpServer = createServer(app);

  const port = parseInt(process.env.PORT || '5000', 10);
  httpServer.listen({ port, host: '0.0.0.0' }, () => {
    log.info({ port }, `serving on port ${port}`);
  });
}

start();
