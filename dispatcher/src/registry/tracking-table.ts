/**
 * In-memory policy tracking table.
 *
 * Holds a bounded pool of wire identifiers, handed out in FIFO order and
 * returned to the back of the pool on removal. Entries are keyed by
 * (policyId, principal), so two applications may use the same policy id.
 */

import {
  WIRE_ID_MAX,
  WIRE_ID_MIN,
  uniformStatusList,
  type PolicyId,
  type Principal,
  type QosPolicy,
  type QosRequestStatus,
  type TrackedPolicy,
  type WireId,
  type WirePolicy,
} from "@qosd/core";
import { QosError } from "@qosd/common";
import type { PolicyRegistry, RegistrySnapshot } from "./policy-registry.js";

function entryKey(policyId: PolicyId, principal: Principal): string {
  return `${principal}:${policyId}`;
}

export class PolicyTrackingTable implements PolicyRegistry {
  private availableWireIds: WireId[] = [];
  private entries = new Map<string, TrackedPolicy>();
  private readonly capacity: number;

  constructor(params: { minWireId?: WireId; maxWireId?: WireId } = {}) {
    const min = params.minWireId ?? WIRE_ID_MIN;
    const max = params.maxWireId ?? WIRE_ID_MAX;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
      throw new QosError({
        code: "INVALID_ARGUMENT",
        message: `policy-tracking-table:constructor - Invalid wire id range [${min}, ${max}]`,
      });
    }
    for (let id = min; id <= max; id++) {
      this.availableWireIds.push(id);
    }
    this.capacity = this.availableWireIds.length;
  }

  admit(policies: readonly QosPolicy[], principal: Principal): QosRequestStatus[] {
    if (this.availableWireIds.length < policies.length) {
      return uniformStatusList(policies.length, "insufficient-resources");
    }

    return policies.map((policy): QosRequestStatus => {
      const key = entryKey(policy.policyId, principal);
      if (this.entries.has(key)) return "already-active";

      const wireId = this.availableWireIds.shift();
      if (wireId === undefined) return "insufficient-resources";
      this.entries.set(key, { policy, wireId, principal });
      return "tracking";
    });
  }

  remove(policyIds: readonly PolicyId[], principal: Principal): void {
    for (const policyId of policyIds) {
      const key = entryKey(policyId, principal);
      const entry = this.entries.get(key);
      if (!entry) continue;
      this.entries.delete(key);
      this.availableWireIds.push(entry.wireId);
    }
  }

  evict(policies: readonly WirePolicy[], principal: Principal): void {
    for (const { policyId, wireId } of policies) {
      const key = entryKey(policyId, principal);
      const entry = this.entries.get(key);
      if (!entry || entry.wireId !== wireId) continue;
      this.entries.delete(key);
      this.availableWireIds.push(entry.wireId);
    }
  }

  translate(policyIds: readonly PolicyId[], principal: Principal): WireId[] {
    return this.tracked(policyIds, principal).map((entry) => entry.wireId);
  }

  tracked(policyIds: readonly PolicyId[], principal: Principal): TrackedPolicy[] {
    const found: TrackedPolicy[] = [];
    for (const policyId of policyIds) {
      const entry = this.entries.get(entryKey(policyId, principal));
      if (entry) found.push(entry);
    }
    return found;
  }

  ownedBy(principal: Principal): WireId[] {
    return this.entriesOf(principal).map((entry) => entry.wireId);
  }

  policyIdsOwnedBy(principal: Principal): PolicyId[] {
    return this.entriesOf(principal).map((entry) => entry.policy.policyId);
  }

  hasAnyPolicyFor(principal: Principal): boolean {
    for (const entry of this.entries.values()) {
      if (entry.principal === principal) return true;
    }
    return false;
  }

  allCurrentPolicies(): TrackedPolicy[] {
    return [...this.entries.values()];
  }

  snapshot(): RegistrySnapshot {
    return {
      capacity: this.capacity,
      available: this.availableWireIds.length,
      tracked: this.allCurrentPolicies(),
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private entriesOf(principal: Principal): TrackedPolicy[] {
    return [...this.entries.values()].filter((entry) => entry.principal === principal);
  }
}
