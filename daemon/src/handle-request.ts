/**
 * Request handling: decode one caller message, run it against the dispatcher, build the reply.
 */

import type { z } from "zod";
import {
  AddPoliciesRequestSchema,
  LinkAddedEventSchema,
  RemoveAllPoliciesRequestSchema,
  RemovePoliciesRequestSchema,
  SessionMessageSchema,
  type AckResponseWire,
  type AddPoliciesResponseWire,
  type DumpResponseWire,
  type WireErrorDetail,
} from "@qosd/core";
import { QosError, errorMessage, type Logger } from "@qosd/common";
import type { QosRequestDispatcher, StaticLinkDirectory } from "@qosd/dispatcher";
import type { SessionMonitor } from "./session-monitor.js";

const LOG_PREFIX = "qosd:handle-request";

export type RequestKind = "add" | "remove" | "remove-all" | "heartbeat" | "end" | "link-added" | "dump";

export const REQUEST_KINDS: readonly RequestKind[] = [
  "add",
  "remove",
  "remove-all",
  "heartbeat",
  "end",
  "link-added",
  "dump",
];

export type RequestResponse = AddPoliciesResponseWire | AckResponseWire | DumpResponseWire;

export interface DaemonServices {
  dispatcher: QosRequestDispatcher;
  sessions: SessionMonitor;
  links: StaticLinkDirectory;
}

export interface HandleRequestParams {
  kind: RequestKind;
  /** Raw request body (JSON string or buffer) */
  body: string | Uint8Array;
  services: DaemonServices;
  log?: Logger;
}

type Decoded<T> = { ok: true; data: T } | { ok: false; error: WireErrorDetail };

function decode<T>(body: string | Uint8Array, schema: z.ZodType<T, z.ZodTypeDef, unknown>, log: Logger): Decoded<T> {
  const text = typeof body === "string" ? body : new TextDecoder().decode(body);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    log.warn?.({ error: errorMessage(err) }, `${LOG_PREFIX}:decode - Invalid JSON`);
    return {
      ok: false,
      error: { code: "INVALID_REQUEST", message: "Invalid JSON body", retryable: false },
    };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.warn?.({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:decode - Invalid request`);
    return {
      ok: false,
      error: {
        code: "INVALID_ARGUMENT",
        message: "Invalid request",
        retryable: false,
        details: parsed.error.flatten(),
      },
    };
  }
  return { ok: true, data: parsed.data };
}

function toErrorDetail(err: unknown): WireErrorDetail {
  if (err instanceof QosError) {
    return { code: err.code, message: err.message, retryable: err.retryable, details: err.details };
  }
  return { code: "INTERNAL_ERROR", message: errorMessage(err), retryable: true };
}

const ACK: AckResponseWire = { ok: true };

/**
 * Decode and validate a caller message, apply it, and return the reply payload.
 * Add requests resolve once the dispatcher reports per-policy statuses.
 */
export async function handleRequest(params: HandleRequestParams): Promise<RequestResponse> {
  const { kind, body, services, log = console } = params;
  const { dispatcher, sessions, links } = services;

  try {
    switch (kind) {
      case "add": {
        const request = decode(body, AddPoliciesRequestSchema, log);
        if (!request.ok) return request;
        const { principal, policies } = request.data;
        log.info?.({ principal, size: policies.length }, `${LOG_PREFIX}:handleRequest - Add request received`);
        const owner = { principal, liveness: sessions.livenessFor(principal) };
        return await new Promise<AddPoliciesResponseWire>((resolve) => {
          dispatcher.requestAdd(policies, owner, (statuses) => resolve({ ok: true, statuses }));
        });
      }

      case "remove": {
        const request = decode(body, RemovePoliciesRequestSchema, log);
        if (!request.ok) return request;
        const { principal, policyIds } = request.data;
        log.info?.({ principal, size: policyIds.length }, `${LOG_PREFIX}:handleRequest - Remove request received`);
        dispatcher.requestRemove(policyIds, { principal });
        return ACK;
      }

      case "remove-all": {
        const request = decode(body, RemoveAllPoliciesRequestSchema, log);
        if (!request.ok) return request;
        log.info?.({ principal: request.data.principal }, `${LOG_PREFIX}:handleRequest - Remove-all request received`);
        dispatcher.requestRemoveAll({ principal: request.data.principal });
        return ACK;
      }

      case "heartbeat": {
        const request = decode(body, SessionMessageSchema, log);
        if (!request.ok) return request;
        sessions.heartbeat(request.data.principal);
        return ACK;
      }

      case "end": {
        const request = decode(body, SessionMessageSchema, log);
        if (!request.ok) return request;
        sessions.end(request.data.principal);
        return ACK;
      }

      case "link-added": {
        const event = decode(body, LinkAddedEventSchema, log);
        if (!event.ok) return event;
        links.add(event.data.linkName);
        return ACK;
      }

      case "dump":
        return { ok: true, dump: dispatcher.dump() };
    }
  } catch (err) {
    log.error?.({ kind, error: errorMessage(err) }, `${LOG_PREFIX}:handleRequest - Request failed`);
    return { ok: false, error: toErrorDetail(err) };
  }
}
