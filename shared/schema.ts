import { z } from "zod";

// ============================================
// ROUTING DECISIONS
// ============================================

export enum RoutingDecisionType {
  FLAG_MANUAL_REVIEW = "FlagManualReview",
  AUTO_DENY = "AutoDeny",
  ROUTE_SENIOR_ADJUSTER = "RouteSeniorAdjuster",
  ROUTE_STP = "RouteSTP",
  ROUTE_GENERAL_QUEUE = "RouteGeneralQueue",
}

// Queue labels shown to adjusters
export const ROUTING_DECISION_LABELS: Record<RoutingDecisionType, string> = {
  [RoutingDecisionType.FLAG_MANUAL_REVIEW]: "Flag for Manual Review",
  [RoutingDecisionType.AUTO_DENY]: "Auto-Deny",
  [RoutingDecisionType.ROUTE_SENIOR_ADJUSTER]: "Route to Senior Adjuster",
  [RoutingDecisionType.ROUTE_STP]: "Route to Straight-Through Processing (STP)",
  [RoutingDecisionType.ROUTE_GENERAL_QUEUE]: "Route to General Claims Queue",
};

export enum ClaimPriority {
  HIGH = "High",
  MEDIUM = "Medium",
}

// ============================================
// PIPELINE STAGES
// ============================================

export enum PipelineStage {
  EXTRACTING = "Extracting",
  CLASSIFYING = "Classifying",
  CHECKING_COMPLIANCE = "CheckingCompliance",
  ROUTING = "Routing",
  DONE = "Done",
  FAILED = "Failed",
}

// ============================================
// POLICY NUMBERS
// ============================================

// PN-<uppercase letters>-<digits>, e.g. PN-AUTO-1001
export const POLICY_NUMBER_PATTERN = /^PN-[A-Z]+-\d+$/;

// ============================================
// CLAIM DATA
// ============================================

export const extractedEntitiesSchema = z.object({
  personNames: z.array(z.string()),
  dates: z.array(z.string()),
  policyNumber: z.string().nullable(),
  claimValue: z.number().nonnegative().nullable(),
});

export type ExtractedEntities = z.infer<typeof extractedEntitiesSchema>;

export const complianceResultSchema = z.object({
  isCompliant: z.boolean(),
  reason: z.string(),
});

export type ComplianceResult = z.infer<typeof complianceResultSchema>;

/**
 * Aggregate handed to the routing engine. Built once per pipeline run.
 */
export const claimRecordSchema = z.object({
  entities: extractedEntitiesSchema,
  claimType: z.string().min(1),
  confidence: z.number().min(0).max(1),
  priority: z.nativeEnum(ClaimPriority),
  claimValue: z.number().nonnegative().nullable(),
  compliance: complianceResultSchema,
});

export type ClaimRecord = z.infer<typeof claimRecordSchema>;

// ============================================
// CONFIGURATION DOCUMENT
// ============================================
// Stored snake_case on disk; server/config/appConfig.ts converts it.

export const policyRecordSchema = z.object({
  coverage: z.array(z.string().min(1)).min(1, "Policy must cover at least one claim type"),
  exclusions: z.array(z.string().min(1, "Exclusion phrases cannot be empty")).default([]),
});

export type PolicyRecord = z.infer<typeof policyRecordSchema>;

export const trainingSampleSchema = z.object({
  description: z.string().min(1),
  claim_type: z.string().min(1),
});

export type TrainingSample = z.infer<typeof trainingSampleSchema>;

export const claimsConfigSchema = z.object({
  policy_db: z.record(
    z.string().regex(POLICY_NUMBER_PATTERN, "Policy ids must look like PN-<LETTERS>-<DIGITS>"),
    policyRecordSchema
  ),
  confidence_threshold: z.number().min(0).max(1),
  routing_rules: z.object({
    high_value_threshold: z.number().nonnegative(),
    stp_threshold: z.number().nonnegative(),
  }),
  training_data: z.array(trainingSampleSchema).min(2, "At least 2 training samples are required"),
});

export type ClaimsConfigDocument = z.infer<typeof claimsConfigSchema>;
