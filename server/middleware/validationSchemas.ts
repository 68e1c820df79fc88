/**
 * Validation Schemas for API Endpoints
 *
 * Centralized Zod schemas for request validation
 */

import { z } from 'zod';

// ============================================
// CLAIM PROCESSING SCHEMAS
// ============================================

export const processClaimSchema = z.object({
  imagePath: z.string().min(1, 'Image path cannot be empty').optional(),
  text: z.string().optional(),
}).refine(
  body => (body.imagePath === undefined) !== (body.text === undefined),
  { message: 'Provide exactly one of imagePath or text' }
);

export type ProcessClaimInput = z.infer<typeof processClaimSchema>;

// ============================================
// ENGINE SCHEMAS
// ============================================

// Missing fields are a compliance outcome, not a request error
export const complianceCheckSchema = z.object({
  policyNumber: z.string().nullish(),
  claimType: z.string().nullish(),
  claimText: z.string().nullish(),
});

export type ComplianceCheckInput = z.infer<typeof complianceCheckSchema>;

// The routing engine validates the record shape itself
export const routingDecisionSchema = z.object({
  claimRecord: z.unknown(),
});

export type RoutingDecisionInput = z.infer<typeof routingDecisionSchema>;
