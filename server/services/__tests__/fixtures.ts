/**
 * Shared test data for the pipeline tests
 */

import { ClaimPriority, type ClaimRecord } from '../../../shared/schema';
import type { RoutingConfig } from '../../../shared/types';
import type { TrainingExample } from '../../config/appConfig';
import { InMemoryPolicyStore } from '../policyStore';

export const ROUTING_CONFIG: RoutingConfig = {
  confidenceThreshold: 0.6,
  highValueThreshold: 10000,
  stpThreshold: 1000,
};

export function createTestPolicyStore(): InMemoryPolicyStore {
  return InMemoryPolicyStore.fromConfig({
    'PN-AUTO-1001': { coverage: ['collision'], exclusions: [] },
    'PN-HOME-2001': { coverage: ['theft', 'fire'], exclusions: ['flood', 'war'] },
  });
}

export const TRAINING_SAMPLES: TrainingExample[] = [
  { description: 'car collided with a truck at the intersection', claimType: 'collision' },
  { description: 'rear ended at a red light bumper damaged', claimType: 'collision' },
  { description: 'vehicle collision on the highway', claimType: 'collision' },
  { description: 'my bicycle was stolen from the garage', claimType: 'theft' },
  { description: 'burglar stole jewelry and a laptop', claimType: 'theft' },
  { description: 'wallet stolen on the train', claimType: 'theft' },
];

export function buildClaimRecord(overrides: Partial<ClaimRecord> = {}): ClaimRecord {
  return {
    entities: {
      personNames: ['Jane Doe'],
      dates: ['03/14/2024'],
      policyNumber: 'PN-AUTO-1001',
      claimValue: 5000,
    },
    claimType: 'collision',
    confidence: 0.9,
    priority: ClaimPriority.MEDIUM,
    claimValue: 5000,
    compliance: { isCompliant: true, reason: 'Compliant' },
    ...overrides,
  };
}
