/**
 * Status codes reported to callers, returned synchronously by links,
 * and carried by asynchronous confirmation events.
 */

export const QOS_REQUEST_STATUSES = [
  "tracking",
  "already-active",
  "insufficient-resources",
  "invalid-parameters",
  "failure-unknown",
] as const;

/** Per-policy outcome delivered to the requesting application. */
export type QosRequestStatus = (typeof QOS_REQUEST_STATUSES)[number];

export const LINK_SUBMISSION_STATUSES = ["sent", "already-active", "invalid", "failure"] as const;

/** Immediate per-policy status of a link submission. */
export type LinkSubmissionStatus = (typeof LINK_SUBMISSION_STATUSES)[number];

export const CONFIRMATION_STATUSES = [
  "success",
  "declined",
  "unsupported",
  "insufficient-resources",
  "timeout",
  "failure",
] as const;

/** Final per-policy verdict reported by the access point. */
export type ConfirmationStatus = (typeof CONFIRMATION_STATUSES)[number];

/**
 * Map a synchronous link status onto the status reported to the caller.
 * Only `sent` keeps the policy tracked.
 */
export function toRequestStatus(status: LinkSubmissionStatus): QosRequestStatus {
  switch (status) {
    case "sent":
      return "tracking";
    case "already-active":
      return "already-active";
    case "invalid":
      return "invalid-parameters";
    default:
      return "failure-unknown";
  }
}

/** Whether a synchronous link status means a confirmation event will follow. */
export function awaitsConfirmation(status: LinkSubmissionStatus): boolean {
  return status === "sent";
}

/** Status list of the given size with every entry set to `status`. */
export function uniformStatusList(size: number, status: QosRequestStatus): QosRequestStatus[] {
  return Array.from({ length: size }, () => status);
}
