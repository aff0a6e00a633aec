/**
 * Zod runtime schemas for policies and wire messages.
 *
 * These mirror the TypeScript types in policy.ts and wire.ts and validate
 * everything that arrives over NATS or through the public dispatcher API.
 */

import { z } from "zod";
import { POLICY_ID_MAX, POLICY_ID_MIN, WIRE_ID_MAX, WIRE_ID_MIN } from "./policy.js";
import { CONFIRMATION_STATUSES, LINK_SUBMISSION_STATUSES } from "./status.js";

const PortSchema = z.number().int().min(0).max(65_535);

export const PolicyIdSchema = z.number().int().min(POLICY_ID_MIN).max(POLICY_ID_MAX);

export const WireIdSchema = z.number().int().min(WIRE_ID_MIN).max(WIRE_ID_MAX);

export const PrincipalSchema = z.number().int();

export const QosPolicySchema = z.object({
  policyId: PolicyIdSchema,
  direction: z.enum(["downlink", "uplink"]),
  userPriority: z.number().int().min(0).max(7).optional(),
  dscp: z.number().int().min(0).max(63).optional(),
  protocol: z.enum(["any", "tcp", "udp", "esp"]).optional(),
  sourcePort: PortSchema.optional(),
  destinationPortRange: z
    .tuple([PortSchema, PortSchema])
    .refine(([start, end]) => start <= end, { message: "port range start must not exceed end" })
    .optional(),
  sourceAddress: z.string().min(1).optional(),
  destinationAddress: z.string().min(1).optional(),
});

export const PolicyListSchema = z.array(QosPolicySchema).min(1);

export const PolicyIdListSchema = z.array(PolicyIdSchema).min(1);

// ── Link control channel ────────────────────────────────────────────

export const LinkPolicyStatusSchema = z.object({
  wireId: WireIdSchema,
  status: z.enum(LINK_SUBMISSION_STATUSES),
});

export const WireErrorDetailSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean().optional(),
  details: z.unknown().optional(),
});

export const LinkSubmitResponseSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), statuses: z.array(LinkPolicyStatusSchema) }),
  z.object({ ok: z.literal(false), error: WireErrorDetailSchema }),
]);

export const LinkConfirmationEventSchema = z.object({
  linkName: z.string().min(1),
  results: z.array(
    z.object({
      wireId: WireIdSchema,
      status: z.enum(CONFIRMATION_STATUSES),
    })
  ),
});

export const LinkAddedEventSchema = z.object({
  linkName: z.string().min(1),
});

// ── Caller request API ──────────────────────────────────────────────

export const AddPoliciesRequestSchema = z.object({
  principal: PrincipalSchema,
  policies: PolicyListSchema,
});

export const RemovePoliciesRequestSchema = z.object({
  principal: PrincipalSchema,
  policyIds: PolicyIdListSchema,
});

export const RemoveAllPoliciesRequestSchema = z.object({
  principal: PrincipalSchema,
});

export const SessionMessageSchema = z.object({
  principal: PrincipalSchema,
});
