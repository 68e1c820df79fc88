/**
 * Compliance Engine Tests
 *
 * Run with: npx vitest run server/services/__tests__/complianceEngine.test.ts
 *
 * These tests verify:
 * 1. Rule order (first failing rule wins)
 * 2. Policy number format validation regardless of other inputs
 * 3. Exclusions are case-insensitive substring matches, checked in stored order
 * 4. Errors inside the engine become non-compliant results
 */

import { describe, it, expect } from 'vitest';
import { checkCompliance, createComplianceChecker } from '../complianceEngine';
import { InMemoryPolicyStore, type IPolicyStore } from '../policyStore';
import { createTestPolicyStore } from './fixtures';

const MISSING_FIELD_REASON = 'Missing required field (policy number, claim type or claim details)';

describe('ComplianceEngine', () => {
  const store = createTestPolicyStore();

  describe('required fields', () => {
    it.each([
      [null, 'collision', 'major collision damage'],
      [undefined, 'collision', 'major collision damage'],
      ['PN-AUTO-1001', '', 'major collision damage'],
      ['PN-AUTO-1001', 'collision', null],
      ['PN-AUTO-1001', 'collision', ''],
    ])('rejects missing fields (%s, %s, %s)', (policyNumber, claimType, claimText) => {
      const result = checkCompliance(store, policyNumber, claimType, claimText);
      expect(result).toEqual({ isCompliant: false, reason: MISSING_FIELD_REASON });
    });

    it('reports a missing field before an invalid policy number', () => {
      const result = checkCompliance(store, 'not-a-policy', '', 'text');
      expect(result.reason).toBe(MISSING_FIELD_REASON);
    });
  });

  describe('policy number format', () => {
    it.each([
      'pn-auto-1001',
      'PN-AUTO',
      'PN-1001-AUTO',
      'XX-AUTO-1001',
      'PN-AUTO-1001-B',
      'PN--1001',
      ' PN-AUTO-1001',
    ])('rejects %s with a format error', (policyNumber) => {
      const result = checkCompliance(store, policyNumber, 'collision', 'major collision damage');
      expect(result).toEqual({
        isCompliant: false,
        reason: `Invalid policy number format: ${policyNumber}`,
      });
    });

    it('reports the format error even for an unknown claim type', () => {
      const result = checkCompliance(store, 'PN-auto-1001', 'flood', 'water everywhere');
      expect(result.reason).toBe('Invalid policy number format: PN-auto-1001');
    });
  });

  describe('policy lookup and coverage', () => {
    it('rejects a well-formed policy number that is not in the store', () => {
      const result = checkCompliance(store, 'PN-LIFE-9', 'collision', 'major collision damage');
      expect(result).toEqual({ isCompliant: false, reason: 'Policy PN-LIFE-9 not found' });
    });

    it('rejects a claim type outside the policy coverage', () => {
      const result = checkCompliance(store, 'PN-AUTO-1001', 'theft', 'car stolen overnight');
      expect(result.isCompliant).toBe(false);
      expect(result.reason).toBe("Claim type 'theft' is not covered");
    });

    it('matches claim types exactly', () => {
      const result = checkCompliance(store, 'PN-AUTO-1001', 'Collision', 'major collision damage');
      expect(result.reason).toBe("Claim type 'Collision' is not covered");
    });
  });

  describe('exclusions', () => {
    it('matches exclusions as substrings, not whole words', () => {
      const result = checkCompliance(store, 'PN-HOME-2001', 'theft', 'Warranty issue with the stolen items');
      expect(result).toEqual({
        isCompliant: false,
        reason: "Claim rejected due to exclusion clause: 'war'",
      });
    });

    it('reports the first exclusion in stored order', () => {
      // "war" appears earlier in the text, but "flood" is stored first
      const result = checkCompliance(store, 'PN-HOME-2001', 'theft', 'during the war the flood came');
      expect(result.reason).toBe("Claim rejected due to exclusion clause: 'flood'");
    });

    it('matches exclusions case-insensitively on both sides', () => {
      const upperStore = InMemoryPolicyStore.fromConfig({
        'PN-HOME-7': { coverage: ['fire'], exclusions: ['Arson'] },
      });
      const result = checkCompliance(upperStore, 'PN-HOME-7', 'fire', 'Suspected ARSON in the shed');
      expect(result.reason).toBe("Claim rejected due to exclusion clause: 'arson'");
    });
  });

  it('accepts a covered claim with no matching exclusion', () => {
    const result = checkCompliance(store, 'PN-AUTO-1001', 'collision', 'major collision damage');
    expect(result).toEqual({ isCompliant: true, reason: 'Compliant' });
  });

  it('converts store errors into a non-compliant result', () => {
    const brokenStore: IPolicyStore = {
      size: 1,
      get: () => {
        throw new Error('policy record is malformed');
      },
      has: () => true,
      list: () => [],
    };

    const result = checkCompliance(brokenStore, 'PN-AUTO-1001', 'collision', 'major collision damage');
    expect(result).toEqual({
      isCompliant: false,
      reason: 'Compliance check failed: policy record is malformed',
    });
  });

  it('binds a store with createComplianceChecker', () => {
    const check = createComplianceChecker(store);
    expect(check('PN-AUTO-1001', 'collision', 'major collision damage').isCompliant).toBe(true);
    expect(check('PN-AUTO-1001', 'theft', 'stolen').isCompliant).toBe(false);
  });
});
