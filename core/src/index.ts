// Data model
export * from "./policy.js";
export * from "./status.js";

// Batching
export { splitIntoBatches } from "./batching.js";

// Wire messages (NATS link channel and caller API)
export * from "./wire.js";

// Zod schemas (runtime validation)
export {
  PolicyIdSchema,
  WireIdSchema,
  PrincipalSchema,
  QosPolicySchema,
  PolicyListSchema,
  PolicyIdListSchema,
  LinkPolicyStatusSchema,
  WireErrorDetailSchema,
  LinkSubmitResponseSchema,
  LinkConfirmationEventSchema,
  LinkAddedEventSchema,
  AddPoliciesRequestSchema,
  RemovePoliciesRequestSchema,
  RemoveAllPoliciesRequestSchema,
  SessionMessageSchema,
} from "./schemas.js";
