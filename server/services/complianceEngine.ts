/**
 * Compliance Engine
 *
 * Checks a classified claim against its policy's coverage rules.
 *
 * EVALUATION ORDER (first failing rule wins, later rules are not evaluated):
 * 1. Policy number, claim type and claim text must all be present
 * 2. Policy number must match PN-<LETTERS>-<DIGITS>
 * 3. Policy must exist in the store
 * 4. Claim type must be in the policy's coverage
 * 5. No exclusion phrase may appear in the claim text
 *
 * Exclusions are case-insensitive substring matches, checked in stored
 * order: "war" rejects "warranty issue".
 */

import { POLICY_NUMBER_PATTERN, type ComplianceResult } from '../../shared/schema';
import { loggers, logError } from '../lib/logger';
import type { IPolicyStore } from './policyStore';

const log = loggers.compliance;

export type ComplianceChecker = (
  policyNumber: string | null | undefined,
  claimType: string | null | undefined,
  claimText: string | null | undefined
) => ComplianceResult;

function nonCompliant(reason: string): ComplianceResult {
  return { isCompliant: false, reason };
}

export function checkCompliance(
  store: IPolicyStore,
  policyNumber: string | null | undefined,
  claimType: string | null | undefined,
  claimText: string | null | undefined
): ComplianceResult {
  log.info({ policyNumber }, 'Checking policy compliance');

  try {
    if (!policyNumber || !claimType || !claimText) {
      return nonCompliant('Missing required field (policy number, claim type or claim details)');
    }

    if (!POLICY_NUMBER_PATTERN.test(policyNumber)) {
      return nonCompliant(`Invalid policy number format: ${policyNumber}`);
    }

    const policy = store.get(policyNumber);
    if (!policy) {
      return nonCompliant(`Policy ${policyNumber} not found`);
    }

    if (!policy.coverage.has(claimType)) {
      return nonCompliant(`Claim type '${claimType}' is not covered`);
    }

    const text = claimText.toLowerCase();
    const exclusion = policy.exclusions.find(phrase => text.includes(phrase.toLowerCase()));
    if (exclusion !== undefined) {
      log.debug({ policyNumber, exclusion }, 'Exclusion clause matched');
      return nonCompliant(`Claim rejected due to exclusion clause: '${exclusion}'`);
    }

    log.info({ policyNumber, claimType }, 'Policy is compliant');
    return { isCompliant: true, reason: 'Compliant' };
  } catch (error) {
    logError(log, error, 'Compliance check error', { policyNumber });
    const message = error instanceof Error ? error.message : String(error);
    return nonCompliant(`Compliance check failed: ${message}`);
  }
}

/**
 * Bind the engine to a policy store
 */
export function createComplianceChecker(store: IPolicyStore): ComplianceChecker {
  return (policyNumber, claimType, claimText) =>
    checkCompliance(store, policyNumber, claimType, claimText);
}
