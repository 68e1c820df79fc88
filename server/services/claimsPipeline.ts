/**
 * Claims Pipeline
 *
 * Runs one claim document through the decision stages:
 *
 *   Extracting -> Classifying -> CheckingCompliance -> Routing -> Done
 *
 * Extraction and classification can fail; the run then moves straight to
 * Failed and later stages are not invoked. Compliance and routing always
 * produce a result, so a run that reaches compliance always completes.
 *
 * The pipeline holds only read-only dependencies handed to its
 * constructor. Each run builds its own claim record.
 */

import { PipelineStage, type ClaimRecord } from '../../shared/schema';
import type {
  ClaimSource,
  ClassificationResult,
  ExtractionOutput,
  PipelineFailure,
  PipelineResult,
  RoutingConfig,
  StageResult,
} from '../../shared/types';
import { loggers, logError, logTiming, type Logger } from '../lib/logger';
import { checkCompliance } from './complianceEngine';
import type { IPolicyStore } from './policyStore';
import { route } from './routingEngine';

export const EXTRACTION_FAILED_REASON = 'Could not process document. The image may be unreadable or blank.';
export const CLASSIFICATION_FAILED_REASON = 'Could not classify the claim from the text.';

export interface ClaimExtractor {
  extract(source: ClaimSource): Promise<ExtractionOutput | null>;
}

export interface ClaimTypeClassifier {
  classify(text: string): ClassificationResult;
}

export interface StageTransition {
  from: PipelineStage | null;
  to: PipelineStage;
  reason?: string;
}

export interface ClaimsPipelineOptions {
  extractor: ClaimExtractor;
  classifier: ClaimTypeClassifier;
  policyStore: IPolicyStore;
  routing: RoutingConfig;
  logger?: Logger;
  onTransition?: (transition: StageTransition) => void;
}

type ClassifiedClaim = Extract<ClassificationResult, { claimType: string }>;

export class ClaimsPipeline {
  private readonly extractor: ClaimExtractor;
  private readonly classifier: ClaimTypeClassifier;
  private readonly policyStore: IPolicyStore;
  private readonly routing: Readonly<RoutingConfig>;
  private readonly log: Logger;
  private readonly onTransition?: (transition: StageTransition) => void;

  constructor(options: ClaimsPipelineOptions) {
    this.extractor = options.extractor;
    this.classifier = options.classifier;
    this.policyStore = options.policyStore;
    this.routing = Object.freeze({ ...options.routing });
    this.log = options.logger ?? loggers.pipeline;
    this.onTransition = options.onTransition;
  }

  /**
   * Process a single claim and return a Success or Failed result.
   * Never throws.
   */
  async run(source: ClaimSource): Promise<PipelineResult> {
    const startTime = Date.now();
    const state: { stage: PipelineStage | null } = { stage: null };

    const enter = (next: PipelineStage, reason?: string) => {
      this.log.debug({ from: state.stage, to: next }, 'Pipeline transition');
      try {
        this.onTransition?.({ from: state.stage, to: next, reason });
      } catch (error) {
        logError(this.log, error, 'Transition listener failed', { to: next });
      }
      state.stage = next;
    };

    const fail = (failedStage: PipelineStage, reason: string): PipelineFailure => {
      enter(PipelineStage.FAILED, reason);
      this.log.warn({ stage: failedStage, reason }, 'Pipeline run failed');
      return { status: 'Failed', stage: failedStage, reason };
    };

    try {
      // 1. Document processing
      enter(PipelineStage.EXTRACTING);
      const extraction = await this.extract(source);
      if (!extraction.ok) {
        return fail(PipelineStage.EXTRACTING, extraction.reason);
      }
      const { entities, text } = extraction.value;

      // 2. Claim classification
      enter(PipelineStage.CLASSIFYING);
      const classification = this.classify(text);
      if (!classification.ok) {
        return fail(PipelineStage.CLASSIFYING, classification.reason);
      }
      const { claimType, confidence, priority } = classification.value;

      // 3. Policy compliance check
      enter(PipelineStage.CHECKING_COMPLIANCE);
      const compliance = checkCompliance(this.policyStore, entities.policyNumber, claimType, text);

      // 4. Routing
      enter(PipelineStage.ROUTING);
      const claimRecord: ClaimRecord = {
        entities,
        claimType,
        confidence,
        priority,
        claimValue: entities.claimValue,
        compliance,
      };
      const finalRouting = route(claimRecord, this.routing);

      enter(PipelineStage.DONE);
      logTiming(this.log, 'Claim pipeline run', startTime, {
        claimType,
        decision: finalRouting.decision,
      });

      return {
        status: 'Success',
        extractedData: entities,
        classification: { type: claimType, priority, confidence },
        compliance: { compliant: compliance.isCompliant, details: compliance.reason },
        finalRouting,
      };
    } catch (error) {
      logError(this.log, error, 'A critical error occurred in the pipeline run', { stage: state.stage });
      const message = error instanceof Error ? error.message : String(error);
      return fail(state.stage ?? PipelineStage.EXTRACTING, `An unexpected error occurred: ${message}`);
    }
  }

  private async extract(source: ClaimSource): Promise<StageResult<ExtractionOutput>> {
    const output = await this.extractor.extract(source);
    if (!output || !output.text) {
      this.log.warn('Document processing failed: no entities or text extracted');
      return { ok: false, reason: EXTRACTION_FAILED_REASON };
    }
    return { ok: true, value: output };
  }

  private classify(text: string): StageResult<ClassifiedClaim> {
    const result = this.classifier.classify(text);
    if (result.claimType === null) {
      this.log.warn('Claim classification failed');
      return { ok: false, reason: CLASSIFICATION_FAILED_REASON };
    }
    return { ok: true, value: result };
  }
}
