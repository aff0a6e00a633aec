/**
 * Unit tests for daemon request handling against an in-process dispatcher.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { WireId, WirePolicy } from "@qosd/core";
import type { Logger } from "@qosd/common";
import {
  QosRequestDispatcher,
  StaticLinkDirectory,
  type LinkSubmitResult,
  type LinkTransport,
} from "@qosd/dispatcher";
import { handleRequest, type DaemonServices, type RequestKind } from "./handle-request.js";
import { SessionMonitor } from "./session-monitor.js";

const silentLogger: Logger = {
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

// ── Mocks ───────────────────────────────────────────────────────────

function allSent(wireIds: WireId[]): LinkSubmitResult {
  return { ok: true, statuses: wireIds.map((wireId) => ({ wireId, status: "sent" })) };
}

/** Link transport that accepts everything and never confirms. */
class AcceptingLinkTransport implements LinkTransport {
  readonly maxPoliciesPerRequest = 16;
  readonly submissions: string[] = [];

  submit(linkName: string, policies: WirePolicy[]): Promise<LinkSubmitResult> {
    const wireIds = policies.map((p) => p.wireId);
    this.submissions.push(`${linkName} add [${wireIds.join(",")}]`);
    return Promise.resolve(allSent(wireIds));
  }

  submitRemoval(linkName: string, wireIds: WireId[]): Promise<LinkSubmitResult> {
    this.submissions.push(`${linkName} remove [${wireIds.join(",")}]`);
    return Promise.resolve(allSent(wireIds));
  }

  onConfirmation(): () => void {
    return () => undefined;
  }
}

function createServices() {
  const transport = new AcceptingLinkTransport();
  const links = new StaticLinkDirectory({ links: ["wlan0"], loggerFactory: silentLogger });
  const dispatcher = new QosRequestDispatcher({ transport, links, loggerFactory: silentLogger });
  const sessions = new SessionMonitor({ sessionTimeoutMs: 10_000, loggerFactory: silentLogger });
  links.onLinkAdded((linkName) => dispatcher.onLinkAdded(linkName));
  const services: DaemonServices = { dispatcher, sessions, links };
  return { transport, services };
}

function request(kind: RequestKind, services: DaemonServices, body: unknown) {
  return handleRequest({ kind, body: JSON.stringify(body), services, log: silentLogger });
}

// ── Tests ───────────────────────────────────────────────────────────

describe("handleRequest", () => {
  let running: DaemonServices | undefined;

  function setup() {
    const created = createServices();
    running = created.services;
    return created;
  }

  afterEach(() => {
    running?.dispatcher.stop();
    running?.sessions.stop();
    running = undefined;
  });

  it("should reply to an add request with per-policy statuses", async () => {
    const { services } = setup();

    const response = await request("add", services, {
      principal: 1000,
      policies: [
        { policyId: 1, direction: "downlink", dscp: 46 },
        { policyId: 2, direction: "uplink", protocol: "udp", destinationPortRange: [5000, 5010] },
      ],
    });

    expect(response).toEqual({ ok: true, statuses: ["tracking", "tracking"] });
    expect(services.sessions.isActive(1000)).toBe(true);
  });

  it("should reject a body that is not JSON", async () => {
    const { services } = setup();

    const response = await handleRequest({ kind: "add", body: "{", services, log: silentLogger });

    expect(response).toEqual({
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid JSON body", retryable: false },
    });
  });

  it("should reject a request that fails validation", async () => {
    const { services } = setup();

    const response = await request("add", services, { principal: 1000, policies: [] });

    expect(response.ok).toBe(false);
    if (!response.ok) {
      expect(response.error.code).toBe("INVALID_ARGUMENT");
      expect(response.error.message).toBe("Invalid request");
    }
  });

  it("should acknowledge removals and update the registry", async () => {
    const { transport, services } = setup();
    await request("add", services, { principal: 1000, policies: [{ policyId: 1, direction: "downlink" }] });

    const response = await request("remove", services, { principal: 1000, policyIds: [1] });

    expect(response).toEqual({ ok: true });
    expect(services.dispatcher.snapshot().registry.tracked).toEqual([]);
    expect(transport.submissions).toEqual(["wlan0 add [-128]"]);
  });

  it("should remove every policy of a caller on remove-all", async () => {
    const { services } = setup();
    await request("add", services, {
      principal: 1000,
      policies: [
        { policyId: 1, direction: "downlink" },
        { policyId: 2, direction: "downlink" },
      ],
    });

    const response = await request("remove-all", services, { principal: 1000 });

    expect(response).toEqual({ ok: true });
    expect(services.dispatcher.snapshot().registry.tracked).toEqual([]);
  });

  it("should clean up a caller that ends its session", async () => {
    const { services } = setup();
    await request("add", services, { principal: 1000, policies: [{ policyId: 1, direction: "downlink" }] });
    expect(services.dispatcher.snapshot().watchedPrincipals).toEqual([1000]);

    const response = await request("end", services, { principal: 1000 });

    expect(response).toEqual({ ok: true });
    expect(services.dispatcher.snapshot().registry.tracked).toEqual([]);
    expect(services.dispatcher.snapshot().watchedPrincipals).toEqual([]);
  });

  it("should open a session on heartbeat", async () => {
    const { services } = setup();

    const response = await request("heartbeat", services, { principal: 2000 });

    expect(response).toEqual({ ok: true });
    expect(services.sessions.activePrincipals()).toEqual([2000]);
  });

  it("should replay tracked policies when a link is announced", async () => {
    const { transport, services } = setup();
    await request("add", services, { principal: 1000, policies: [{ policyId: 1, direction: "downlink" }] });

    const response = await request("link-added", services, { linkName: "wlan1" });

    expect(response).toEqual({ ok: true });
    expect(services.links.eligibleLinks()).toEqual(["wlan0", "wlan1"]);
    expect(transport.submissions).toEqual(["wlan0 add [-128]", "wlan1 add [-128]"]);
  });

  it("should reply to dump requests with the dispatcher state", async () => {
    const { services } = setup();

    const response = await request("dump", services, {});

    expect(response).toEqual({
      ok: true,
      dump: ["Policy table: 0 tracked, 256/256 wire ids free", "Watched callers: 0", "Links: 0"].join("\n"),
    });
  });
});
