/**
 * Entity Extractor
 *
 * Pulls the structured fields the pipeline needs out of recognized claim
 * form text: policy number, claimed amount, people named on the form and
 * the dates it mentions. Values are not validated here; the compliance
 * engine owns policy number validation.
 */

import type { ExtractedEntities } from '../../shared/schema';

const POLICY_NO_REGEX = /Policy No[:\s]+([A-Z0-9-]+)/i;
const CLAIM_AMOUNT_REGEX = /Claim Amount[:\s]+\$?([\d,]+\.?\d*)/i;

// Form labels whose value is a person's name
const PERSON_LABEL_REGEX = /^\s*(?:claimant|insured|policyholder|witness|adjuster|name)(?:\s+name)?\s*:\s*(.+)$/i;
const PERSON_NAME_REGEX = /^[A-Z][A-Za-z.'-]*(?:\s+[A-Z][A-Za-z.'-]*)+/;

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';
const DATE_REGEX = new RegExp(
  `\\b(?:\\d{1,2}/\\d{1,2}/\\d{4}|\\d{4}-\\d{2}-\\d{2}|(?:${MONTHS})\\s+\\d{1,2},\\s*\\d{4})\\b`,
  'g'
);

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function extractPolicyNumber(text: string): string | null {
  const match = text.match(POLICY_NO_REGEX);
  return match ? match[1].trim() : null;
}

/**
 * Parse the claimed amount, e.g. "Claim Amount: $12,000.50" -> 12000.5
 */
export function extractClaimValue(text: string): number | null {
  const match = text.match(CLAIM_AMOUNT_REGEX);
  if (!match) return null;

  const value = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

export function extractPersonNames(text: string): string[] {
  const names: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const labelled = line.match(PERSON_LABEL_REGEX);
    if (!labelled) continue;

    const name = labelled[1].trim().match(PERSON_NAME_REGEX);
    if (name) {
      names.push(name[0].trim());
    }
  }
  return unique(names);
}

export function extractDates(text: string): string[] {
  return unique(text.match(DATE_REGEX) ?? []);
}

export function extractEntities(text: string): ExtractedEntities {
  return {
    personNames: extractPersonNames(text),
    dates: extractDates(text),
    policyNumber: extractPolicyNumber(text),
    claimValue: extractClaimValue(text),
  };
}
