/**
 * Shared Types Module
 *
 * Types passed between pipeline stages and returned by the API.
 *
 * NAMING CONVENTIONS:
 * - In-process types use camelCase (e.g., claimType, isCompliant)
 * - The result record handed to presentation layers uses snake_case
 *   (e.g., extracted_data, final_routing); see toResultRecord()
 */

import type { ClaimPriority, ComplianceResult, ExtractedEntities, PipelineStage, RoutingDecisionType } from './schema';

// Re-export schema types
export * from './schema';

// =================================================
// Policies
// =================================================

export interface Policy {
  policyId: string;
  coverage: ReadonlySet<string>;
  /** Lowercase phrases, in the order they are checked */
  exclusions: readonly string[];
}

// =================================================
// Stage outputs
// =================================================

/**
 * Output of the classification collaborator.
 * claimType and priority are both null on failure, and confidence is 0.
 */
export type ClassificationResult =
  | { claimType: string; confidence: number; priority: ClaimPriority }
  | { claimType: null; confidence: 0; priority: null };

export interface RoutingDecision {
  decision: RoutingDecisionType;
  label: string;
  reason: string;
}

export interface RoutingConfig {
  confidenceThreshold: number;
  highValueThreshold: number;
  stpThreshold: number;
}

/**
 * Outcome of a single stage. The orchestrator checks `ok` at every transition.
 */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export interface ExtractionOutput {
  entities: ExtractedEntities;
  text: string;
}

// =================================================
// Pipeline input and output
// =================================================

export type ClaimSource =
  | { kind: 'image'; imagePath: string }
  | { kind: 'text'; text: string };

export interface PipelineSuccess {
  status: 'Success';
  extractedData: ExtractedEntities;
  classification: {
    type: string;
    priority: ClaimPriority;
    confidence: number;
  };
  compliance: {
    compliant: boolean;
    details: string;
  };
  finalRouting: RoutingDecision;
}

export interface PipelineFailure {
  status: 'Failed';
  stage: PipelineStage;
  reason: string;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

// =================================================
// Result record (presentation format - snake_case)
// =================================================

export interface ExtractedDataRecord {
  PERSON: string[];
  DATE: string[];
  POLICY_NO: string | null;
  CLAIM_VALUE: number | null;
}

export type ResultRecord =
  | {
      status: 'Success';
      extracted_data: ExtractedDataRecord;
      classification: { type: string; priority: ClaimPriority; confidence: string };
      compliance: { compliant: boolean; details: string };
      final_routing: { decision: string; code: RoutingDecisionType; reason: string };
    }
  | { status: 'Failed'; reason: string };

/**
 * Convert a pipeline result into the record consumed by presentation layers.
 * Failed results carry only the status and reason.
 */
export function toResultRecord(result: PipelineResult): ResultRecord {
  if (result.status === 'Failed') {
    return { status: 'Failed', reason: result.reason };
  }

  return {
    status: 'Success',
    extracted_data: {
      PERSON: [...result.extractedData.personNames],
      DATE: [...result.extractedData.dates],
      POLICY_NO: result.extractedData.policyNumber,
      CLAIM_VALUE: result.extractedData.claimValue,
    },
    classification: {
      type: result.classification.type,
      priority: result.classification.priority,
      confidence: result.classification.confidence.toFixed(2),
    },
    compliance: {
      compliant: result.compliance.compliant,
      details: result.compliance.details,
    },
    final_routing: {
      decision: result.finalRouting.label,
      code: result.finalRouting.decision,
      reason: result.finalRouting.reason,
    },
  };
}
