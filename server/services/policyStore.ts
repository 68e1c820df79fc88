/**
 * Policy Store
 *
 * Read-only lookup of policy coverage rules, keyed by policy number.
 * Built once from configuration at startup; there is no write path.
 * Lookups return copies, so callers cannot change the stored coverage.
 */

import type { PolicyRecord } from '../../shared/schema';
import type { Policy } from '../../shared/types';

export interface IPolicyStore {
  readonly size: number;
  get(policyId: string): Policy | undefined;
  has(policyId: string): boolean;
  list(): Policy[];
}

function copyPolicy(policy: Policy): Policy {
  return Object.freeze({
    policyId: policy.policyId,
    coverage: new Set(policy.coverage),
    exclusions: Object.freeze([...policy.exclusions]),
  });
}

export class InMemoryPolicyStore implements IPolicyStore {
  private readonly policies: ReadonlyMap<string, Policy>;

  constructor(policies: Iterable<Policy>) {
    const entries = new Map<string, Policy>();
    for (const policy of policies) {
      if (entries.has(policy.policyId)) {
        throw new Error(`Duplicate policy id: ${policy.policyId}`);
      }
      entries.set(policy.policyId, copyPolicy({
        ...policy,
        exclusions: policy.exclusions.map(phrase => phrase.toLowerCase()),
      }));
    }
    this.policies = entries;
  }

  static fromConfig(policyDb: Readonly<Record<string, Readonly<PolicyRecord>>>): InMemoryPolicyStore {
    return new InMemoryPolicyStore(
      Object.entries(policyDb).map(([policyId, record]) => ({
        policyId,
        coverage: new Set(record.coverage),
        exclusions: record.exclusions,
      }))
    );
  }

  get size(): number {
    return this.policies.size;
  }

  get(policyId: string): Policy | undefined {
    const policy = this.policies.get(policyId);
    return policy ? copyPolicy(policy) : undefined;
  }

  has(policyId: string): boolean {
    return this.policies.has(policyId);
  }

  list(): Policy[] {
    return [...this.policies.values()].map(copyPolicy);
  }
}
