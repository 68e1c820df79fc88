/**
 * Application Configuration
 *
 * Loads the claims configuration document once at process start and
 * converts it into a frozen AppConfig that is passed explicitly to the
 * policy store, classifier, compliance engine and routing engine.
 *
 * Any problem with the document is a ConfigError: the process must
 * refuse to start rather than run with partial rules.
 */

import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { claimsConfigSchema, type ClaimsConfigDocument, type PolicyRecord } from '../../shared/schema';
import type { RoutingConfig } from '../../shared/types';
import { loggers } from '../lib/logger';

const log = loggers.config;

export const DEFAULT_CONFIG_PATH = path.join('config', 'claims.config.json');

export class ConfigError extends Error {
  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface TrainingExample {
  description: string;
  claimType: string;
}

export interface AppConfig {
  policyDb: Readonly<Record<string, Readonly<PolicyRecord>>>;
  routing: Readonly<RoutingConfig>;
  trainingData: readonly Readonly<TrainingExample>[];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: ZodError): string {
  return error.errors
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-parsed configuration document
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = claimsConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, {
      issues: result.error.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }

  const config = deepFreeze(toAppConfig(result.data));

  if (config.routing.stpThreshold > config.routing.highValueThreshold) {
    // Accepted as-is; the senior adjuster rule is evaluated first
    log.warn(
      { stpThreshold: config.routing.stpThreshold, highValueThreshold: config.routing.highValueThreshold },
      'stp_threshold exceeds high_value_threshold'
    );
  }

  return config;
}

function toAppConfig(doc: ClaimsConfigDocument): AppConfig {
  const policyDb: Record<string, PolicyRecord> = {};
  for (const [policyId, record] of Object.entries(doc.policy_db)) {
    policyDb[policyId] = {
      coverage: [...record.coverage],
      exclusions: [...record.exclusions],
    };
  }

  return {
    policyDb,
    routing: {
      confidenceThreshold: doc.confidence_threshold,
      highValueThreshold: doc.routing_rules.high_value_threshold,
      stpThreshold: doc.routing_rules.stp_threshold,
    },
    trainingData: doc.training_data.map(sample => ({
      description: sample.description,
      claimType: sample.claim_type,
    })),
  };
}

/**
 * Read and validate the configuration document from disk
 */
export function loadConfig(configPath: string = process.env.CLAIMS_CONFIG_PATH || DEFAULT_CONFIG_PATH): AppConfig {
  const resolved = path.resolve(configPath);

  let contents: string;
  try {
    contents = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file not found: ${resolved}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Invalid configuration format in ${resolved}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const config = parseConfig(raw);

  log.info(
    {
      path: resolved,
      policies: Object.keys(config.policyDb).length,
      trainingSamples: config.trainingData.length,
    },
    'Configuration loaded'
  );

  return config;
}
