/**
 * Policy registry contract consumed by the dispatcher.
 *
 * The registry is the single source of truth for ownership and for the
 * PolicyId ↔ WireId mapping. The dispatcher never invents wire identifiers.
 */

import type { PolicyId, Principal, QosPolicy, QosRequestStatus, TrackedPolicy, WireId, WirePolicy } from "@qosd/core";

export interface RegistrySnapshot {
  capacity: number;
  available: number;
  tracked: TrackedPolicy[];
}

export interface PolicyRegistry {
  /**
   * Admit policies for a principal. Returns one status per input policy, in order;
   * `tracking` means the policy was added and assigned a wire id.
   */
  admit(policies: readonly QosPolicy[], principal: Principal): QosRequestStatus[];
  /** Remove policies owned by the principal. Unknown ids are ignored. */
  remove(policyIds: readonly PolicyId[], principal: Principal): void;
  /**
   * Remove policies owned by the principal only while they still hold the given wire id.
   * An entry removed and re-admitted under another wire id is kept.
   */
  evict(policies: readonly WirePolicy[], principal: Principal): void;
  /** Wire ids of the given policies owned by the principal; untracked ids are dropped. */
  translate(policyIds: readonly PolicyId[], principal: Principal): WireId[];
  /** Tracked entries for the given policies owned by the principal, in input order. */
  tracked(policyIds: readonly PolicyId[], principal: Principal): TrackedPolicy[];
  /** Wire ids of every policy owned by the principal. */
  ownedBy(principal: Principal): WireId[];
  /** Policy ids of every policy owned by the principal. */
  policyIdsOwnedBy(principal: Principal): PolicyId[];
  hasAnyPolicyFor(principal: Principal): boolean;
  allCurrentPolicies(): TrackedPolicy[];
  snapshot(): RegistrySnapshot;
}
