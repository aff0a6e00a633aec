/**
 * NATS wire messages: the link-layer control channel and the caller-facing
 * request API exposed by the daemon.
 */

import type { PolicyId, Principal, WireId, WirePolicy, QosPolicy } from "./policy.js";
import type { ConfirmationStatus, LinkSubmissionStatus, QosRequestStatus } from "./status.js";

// ── Link control channel ────────────────────────────────────────────

/** Body of `<prefix>.link.<link>.add` */
export type LinkAddRequestWire = {
  policies: WirePolicy[];
};

/** Body of `<prefix>.link.<link>.remove` */
export type LinkRemoveRequestWire = {
  wireIds: WireId[];
};

export type LinkPolicyStatusWire = {
  wireId: WireId;
  status: LinkSubmissionStatus;
};

export type WireErrorDetail = {
  code: string;
  message: string;
  retryable?: boolean;
  details?: unknown;
};

/** Reply to a link add/remove request: one status per submitted policy, in order. */
export type LinkSubmitResponseWire =
  | { ok: true; statuses: LinkPolicyStatusWire[] }
  | { ok: false; error: WireErrorDetail };

export type ConfirmationResultWire = {
  wireId: WireId;
  status: ConfirmationStatus;
};

/** Event published on `<prefix>.link.<link>.confirmation` */
export type LinkConfirmationEventWire = {
  linkName: string;
  results: ConfirmationResultWire[];
};

/** Event published on `<prefix>.link.added` */
export type LinkAddedEventWire = {
  linkName: string;
};

// ── Caller request API ──────────────────────────────────────────────

export type AddPoliciesRequestWire = {
  principal: Principal;
  policies: QosPolicy[];
};

export type RemovePoliciesRequestWire = {
  principal: Principal;
  policyIds: PolicyId[];
};

export type RemoveAllPoliciesRequestWire = {
  principal: Principal;
};

export type SessionMessageWire = {
  principal: Principal;
};

export type AddPoliciesResponseWire =
  | { ok: true; statuses: QosRequestStatus[] }
  | { ok: false; error: WireErrorDetail };

export type AckResponseWire = { ok: true } | { ok: false; error: WireErrorDetail };

/** Reply to `<prefix>.dump` */
export type DumpResponseWire = { ok: true; dump: string } | { ok: false; error: WireErrorDetail };
