/**
 * Human-readable dump of dispatcher state for diagnostics.
 */

import type { Principal } from "@qosd/core";
import type { RegistrySnapshot } from "../registry/policy-registry.js";
import type { LinkQueueSnapshot } from "./confirmation-reconciler.js";

export interface DispatcherSnapshot {
  links: LinkQueueSnapshot[];
  registry: RegistrySnapshot;
  watchedPrincipals: Principal[];
}

export function renderDump(snapshot: DispatcherSnapshot): string {
  const lines: string[] = [];
  const { registry } = snapshot;

  lines.push(`Policy table: ${registry.tracked.length} tracked, ${registry.available}/${registry.capacity} wire ids free`);
  for (const entry of registry.tracked) {
    lines.push(`  principal=${entry.principal} policyId=${entry.policy.policyId} wireId=${entry.wireId}`);
  }

  lines.push(`Watched callers: ${snapshot.watchedPrincipals.length}`);
  for (const principal of snapshot.watchedPrincipals) {
    lines.push(`  ${principal}`);
  }

  lines.push(`Links: ${snapshot.links.length}`);
  for (const link of snapshot.links) {
    lines.push(`  ${link.linkName}: ${link.state}`);
    if (link.current) lines.push(`    current: ${link.current}`);
    if (link.outstanding) {
      lines.push(
        `    awaiting wireIds=[${link.outstanding.expectedWireIds.join(",")}] since ${link.outstanding.armedAt}`
      );
    }
    for (const queued of link.queued) {
      lines.push(`    queued: ${queued}`);
    }
  }

  return lines.join("\n");
}
