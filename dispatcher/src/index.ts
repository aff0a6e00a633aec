export * from "./config.js";
export * from "./dispatch/confirmation-reconciler.js";
export * from "./dispatch/dump.js";
export * from "./dispatch/operations.js";
export * from "./dispatch/request-dispatcher.js";
export * from "./dispatch/result-sink.js";
export * from "./lifecycle/caller-tracker.js";
export * from "./lifecycle/liveness.js";
export * from "./links/link-directory.js";
export * from "./registry/policy-registry.js";
export * from "./registry/tracking-table.js";
export * from "./transport/link-transport.js";
export * from "./transport/nats-link-transport.js";
