/**
 * Active-link directory: the set of link names currently eligible to carry traffic.
 */

import { resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";

const SERVICE_NAME = "qos-dispatcher:link-directory";

export interface LinkDirectory {
  eligibleLinks(): string[];
}

export type LinkAddedListener = (linkName: string) => void;

/**
 * Directory backed by an in-memory set. Listeners hear about links added after construction.
 */
export class StaticLinkDirectory implements LinkDirectory {
  private links: Set<string>;
  private listeners: LinkAddedListener[] = [];
  private log: Logger;

  constructor(params: { links?: Iterable<string>; loggerFactory?: LoggerFactory } = {}) {
    this.links = new Set(params.links ?? []);
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  eligibleLinks(): string[] {
    return [...this.links];
  }

  onLinkAdded(listener: LinkAddedListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** Add a link. Returns false when it was already eligible (no listeners are called). */
  add(linkName: string): boolean {
    if (this.links.has(linkName)) return false;
    this.links.add(linkName);
    this.log.info?.({ linkName }, `${SERVICE_NAME}:add - Link available`);
    for (const listener of this.listeners) {
      listener(linkName);
    }
    return true;
  }

  remove(linkName: string): boolean {
    const removed = this.links.delete(linkName);
    if (removed) {
      this.log.info?.({ linkName }, `${SERVICE_NAME}:remove - Link no longer available`);
    }
    return removed;
  }
}
