/**
 * QoS policy data model shared by the dispatcher, its link transports and the daemon.
 *
 * Policy fields are carried to the link unchanged; only identifiers are
 * interpreted by the dispatch engine.
 */

// ── Identifiers ─────────────────────────────────────────────────────

/** Application-visible policy identifier, chosen by the caller. Range [1, 255]. */
export type PolicyId = number;

/** Link-layer policy identifier assigned by the registry. Range [-128, 127]. */
export type WireId = number;

/** Opaque numeric principal identifying the requesting application. */
export type Principal = number;

export const POLICY_ID_MIN = 1;
export const POLICY_ID_MAX = 255;
export const WIRE_ID_MIN = -128;
export const WIRE_ID_MAX = 127;

// ── Policy ──────────────────────────────────────────────────────────

export type PolicyDirection = "downlink" | "uplink";

export type PolicyProtocol = "any" | "tcp" | "udp" | "esp";

/**
 * A QoS marking rule for one traffic flow.
 */
export interface QosPolicy {
  policyId: PolicyId;
  direction: PolicyDirection;
  /** 802.11 user priority, 0..7 */
  userPriority?: number;
  /** DSCP value, 0..63 */
  dscp?: number;
  protocol?: PolicyProtocol;
  sourcePort?: number;
  /** Inclusive [start, end] */
  destinationPortRange?: [number, number];
  sourceAddress?: string;
  destinationAddress?: string;
}

/**
 * A policy as it goes over the link: the caller's fields plus its wire identifier.
 */
export interface WirePolicy extends QosPolicy {
  wireId: WireId;
}

/**
 * A policy held by the registry together with its owner and wire identifier.
 */
export interface TrackedPolicy {
  policy: QosPolicy;
  wireId: WireId;
  principal: Principal;
}

export function toWirePolicy(tracked: TrackedPolicy): WirePolicy {
  return { ...tracked.policy, wireId: tracked.wireId };
}
