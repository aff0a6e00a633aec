/**
 * Operations queued on link queues.
 *
 * The same operation object is enqueued on every eligible link; its
 * `resolved` flag records whether any link has completed it.
 */

import type { Principal, QosPolicy, QosRequestStatus, TrackedPolicy, WireId } from "@qosd/core";
import type { Owner } from "../lifecycle/liveness.js";
import type { ResultSink } from "./result-sink.js";

/** One caller add request, shared by all of its batches. */
export interface AddRequest {
  owner: Owner;
  policies: QosPolicy[];
  /** Status per input policy; filled by admission, then by the first completion of each batch. */
  statuses: QosRequestStatus[];
  /** Wire id handed out at admission per input policy; undefined when not admitted */
  wireIds: (WireId | undefined)[];
  sink: ResultSink;
  unresolvedBatches: number;
}

export interface AddOperation {
  kind: "add";
  request: AddRequest;
  /** Indexes into request.policies carried by this batch */
  indexes: number[];
  resolved: boolean;
}

/** Already-admitted policies re-sent to a newly available link. No caller is waiting. */
export interface ReplayOperation {
  kind: "replay";
  policies: TrackedPolicy[];
}

export interface RemoveOperation {
  kind: "remove";
  principal: Principal;
  wireIds: WireId[];
}

export type LinkOperation = AddOperation | ReplayOperation | RemoveOperation;

export function describeOperation(op: LinkOperation): string {
  switch (op.kind) {
    case "add": {
      const ids = op.indexes.map((i) => op.request.policies[i]?.policyId);
      return `add(policyIds=[${ids.join(",")}], principal=${op.request.owner.principal}, resolved=${op.resolved})`;
    }
    case "replay":
      return `replay(wireIds=[${op.policies.map((p) => p.wireId).join(",")}])`;
    case "remove":
      return `remove(wireIds=[${op.wireIds.join(",")}], principal=${op.principal})`;
  }
}
