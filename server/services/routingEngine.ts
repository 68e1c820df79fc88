/**
 * Routing Engine
 *
 * Deterministic routing of a classified, compliance-checked claim to a
 * handling queue. Rules are evaluated top to bottom and the first match
 * wins; the order is the policy:
 *
 * 1. Confidence below threshold      -> Flag for Manual Review
 * 2. Not compliant                   -> Auto-Deny
 * 3. High priority or value > high   -> Senior Adjuster
 * 4. Value present and <= STP limit  -> Straight-Through Processing
 * 5. Everything else                 -> General Claims Queue
 *
 * A missing claim value is never treated as zero: such a claim cannot
 * reach STP and falls through to the general queue.
 */

import {
  ClaimPriority,
  ROUTING_DECISION_LABELS,
  RoutingDecisionType,
  claimRecordSchema,
  type ClaimRecord,
} from '../../shared/schema';
import type { RoutingConfig, RoutingDecision } from '../../shared/types';
import { loggers, logError } from '../lib/logger';

const log = loggers.routing;

interface RoutingRule {
  decision: RoutingDecisionType;
  matches: (claim: ClaimRecord, config: RoutingConfig) => boolean;
  reason: (claim: ClaimRecord, config: RoutingConfig) => string;
}

const ROUTING_RULES: readonly RoutingRule[] = [
  {
    decision: RoutingDecisionType.FLAG_MANUAL_REVIEW,
    matches: (claim, config) => claim.confidence < config.confidenceThreshold,
    reason: (claim) => `Low classification confidence (${claim.confidence.toFixed(2)})`,
  },
  {
    decision: RoutingDecisionType.AUTO_DENY,
    matches: (claim) => !claim.compliance.isCompliant,
    reason: (claim) => `Non-compliant: ${claim.compliance.reason}`,
  },
  {
    decision: RoutingDecisionType.ROUTE_SENIOR_ADJUSTER,
    matches: (claim, config) =>
      claim.priority === ClaimPriority.HIGH ||
      (claim.claimValue !== null && claim.claimValue > config.highValueThreshold),
    reason: () => 'High priority or high value claim',
  },
  {
    decision: RoutingDecisionType.ROUTE_STP,
    matches: (claim, config) => claim.claimValue !== null && claim.claimValue <= config.stpThreshold,
    reason: () => 'Low-value, compliant claim',
  },
  {
    decision: RoutingDecisionType.ROUTE_GENERAL_QUEUE,
    matches: () => true,
    reason: () => 'Standard claim',
  },
];

function decide(decision: RoutingDecisionType, reason: string): RoutingDecision {
  return { decision, label: ROUTING_DECISION_LABELS[decision], reason };
}

/**
 * Determine the handling queue for a claim.
 *
 * Accepts an unvalidated record: anything that does not have the
 * ClaimRecord shape is flagged for manual review.
 */
export function route(claimRecord: unknown, config: RoutingConfig): RoutingDecision {
  log.debug('Determining route for claim');

  const parsed = claimRecordSchema.safeParse(claimRecord);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map(issue => `${issue.path.join('.') || '(root)'} ${issue.message.toLowerCase()}`)
      .join('; ');
    log.warn({ issues }, 'Invalid claim record');
    return decide(RoutingDecisionType.FLAG_MANUAL_REVIEW, `Invalid claim record: ${issues}`);
  }

  try {
    const claim = parsed.data;
    for (const rule of ROUTING_RULES) {
      if (rule.matches(claim, config)) {
        const result = decide(rule.decision, rule.reason(claim, config));
        log.info({ decision: result.decision, claimType: claim.claimType }, 'Claim routed');
        return result;
      }
    }
    // The final rule always matches
    return decide(RoutingDecisionType.ROUTE_GENERAL_QUEUE, 'Standard claim');
  } catch (error) {
    logError(log, error, 'Routing error');
    const message = error instanceof Error ? error.message : String(error);
    return decide(RoutingDecisionType.FLAG_MANUAL_REVIEW, `Routing error: ${message}`);
  }
}
