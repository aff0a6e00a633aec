/**
 * Link transport contract.
 *
 * One implementation per link-layer protocol, chosen once when the
 * dispatcher is constructed. Submissions are local, best-effort calls that
 * yield an immediate per-policy status; the access point's verdict arrives
 * later as a confirmation event.
 */

import type { ConfirmationResultWire, LinkPolicyStatusWire, WireErrorDetail, WireId, WirePolicy } from "@qosd/core";

/** Immediate result of a submission: one status per submitted item, in order. */
export type LinkSubmitResult =
  | { ok: true; statuses: LinkPolicyStatusWire[] }
  | { ok: false; error: WireErrorDetail };

export type ConfirmationHandler = (linkName: string, results: ConfirmationResultWire[]) => void;

export interface LinkTransport {
  /** Largest batch the link accepts in one submission. */
  readonly maxPoliciesPerRequest: number;
  submit(linkName: string, policies: WirePolicy[]): Promise<LinkSubmitResult>;
  submitRemoval(linkName: string, wireIds: WireId[]): Promise<LinkSubmitResult>;
  /** Register the confirmation-event handler. Returns a function that removes it. */
  onConfirmation(handler: ConfirmationHandler): () => void;
}
