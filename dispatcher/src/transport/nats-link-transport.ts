/**
 * NATS link transport.
 *
 * Talks to the link-layer control daemon over NATS request/reply:
 *   add:          <prefix>.link.<linkName>.add           { policies }
 *   remove:       <prefix>.link.<linkName>.remove        { wireIds }
 *   confirmation: <prefix>.link.<linkName>.confirmation  { linkName, results }
 */

import { StringCodec } from "nats";
import {
  LinkConfirmationEventSchema,
  LinkSubmitResponseSchema,
  type WireId,
  type WirePolicy,
} from "@qosd/core";
import { QosError, errorMessage, resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";
import type { ConfirmationHandler, LinkSubmitResult, LinkTransport } from "./link-transport.js";

const SERVICE_NAME = "qos-dispatcher:nats-link-transport";
const sc = StringCodec();

export interface NatsLinkTransportConfig {
  /** Subject prefix shared with the link daemon. Default: "qos" */
  subjectPrefix: string;
  /** Request timeout for add/remove submissions in milliseconds. Default: 500 */
  requestTimeoutMs: number;
  /** Largest batch the link daemon accepts. Default: 16 */
  maxPoliciesPerRequest: number;
}

export const defaultNatsLinkTransportConfig: NatsLinkTransportConfig = {
  subjectPrefix: "qos",
  requestTimeoutMs: 500,
  maxPoliciesPerRequest: 16,
};

/** The part of a NatsConnection the transport uses. */
export interface LinkConnection {
  request(subject: string, payload: Uint8Array, opts: { timeout: number }): Promise<{ data: Uint8Array }>;
  subscribe(subject: string): LinkSubscription;
}

type LinkSubscription = AsyncIterable<{ data: Uint8Array }> & { unsubscribe(): void };

export class NatsLinkTransport implements LinkTransport {
  private connection: LinkConnection;
  private config: NatsLinkTransportConfig;
  private handlers: ConfirmationHandler[] = [];
  private subscription?: LinkSubscription;
  private log: Logger;

  constructor(params: {
    connection: LinkConnection;
    config?: Partial<NatsLinkTransportConfig>;
    loggerFactory?: LoggerFactory;
  }) {
    this.connection = params.connection;
    this.config = { ...defaultNatsLinkTransportConfig, ...params.config };
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    if (!Number.isInteger(this.config.maxPoliciesPerRequest) || this.config.maxPoliciesPerRequest < 1) {
      throw new QosError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:constructor - maxPoliciesPerRequest must be a positive integer`,
      });
    }
  }

  get maxPoliciesPerRequest(): number {
    return this.config.maxPoliciesPerRequest;
  }

  /**
   * Subscribe to confirmation events for every link.
   */
  start(): void {
    if (this.subscription) {
      this.log.warn?.({}, `${SERVICE_NAME}:start - Already running`);
      return;
    }
    const subject = `${this.config.subjectPrefix}.link.*.confirmation`;
    const sub = this.connection.subscribe(subject);
    this.subscription = sub;
    this.log.info?.({ subject }, `${SERVICE_NAME}:start - Subscribed to confirmations`);

    (async () => {
      for await (const msg of sub) {
        this.handleConfirmationMessage(msg.data);
      }
    })().catch((err: unknown) => {
      this.log.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:start - Confirmation loop error`);
    });
  }

  stop(): void {
    if (!this.subscription) return;
    this.subscription.unsubscribe();
    this.subscription = undefined;
    this.log.info?.({}, `${SERVICE_NAME}:stop - Unsubscribed from confirmations`);
  }

  onConfirmation(handler: ConfirmationHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  submit(linkName: string, policies: WirePolicy[]): Promise<LinkSubmitResult> {
    return this.request(linkName, "add", { policies });
  }

  submitRemoval(linkName: string, wireIds: WireId[]): Promise<LinkSubmitResult> {
    return this.request(linkName, "remove", { wireIds });
  }

  /**
   * Decode one confirmation event and hand it to the registered handlers.
   * Invalid payloads are logged and dropped.
   */
  handleConfirmationMessage(data: Uint8Array): void {
    let raw: unknown;
    try {
      raw = JSON.parse(sc.decode(data));
    } catch (err) {
      this.log.warn?.({ error: errorMessage(err) }, `${SERVICE_NAME}:handleConfirmationMessage - Invalid JSON`);
      return;
    }

    const parsed = LinkConfirmationEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn?.(
        { errors: parsed.error.flatten() },
        `${SERVICE_NAME}:handleConfirmationMessage - Invalid confirmation event`
      );
      return;
    }

    const { linkName, results } = parsed.data;
    this.log.info?.(
      { linkName, size: results.length },
      `${SERVICE_NAME}:handleConfirmationMessage - Received confirmation`
    );
    this.log.debug?.(
      { linkName, accepted: results.filter((r) => r.status === "success").length },
      `${SERVICE_NAME}:handleConfirmationMessage - Access point verdicts`
    );
    for (const handler of this.handlers) {
      try {
        handler(linkName, results);
      } catch (err) {
        this.log.error?.(
          { linkName, error: errorMessage(err) },
          `${SERVICE_NAME}:handleConfirmationMessage - Handler error`
        );
      }
    }
  }

  private async request(linkName: string, action: "add" | "remove", body: unknown): Promise<LinkSubmitResult> {
    const subject = `${this.config.subjectPrefix}.link.${linkName}.${action}`;
    let data: Uint8Array;
    try {
      const response = await this.connection.request(subject, sc.encode(JSON.stringify(body)), {
        timeout: this.config.requestTimeoutMs,
      });
      data = response.data;
    } catch (err) {
      this.log.warn?.({ subject, error: errorMessage(err) }, `${SERVICE_NAME}:request - Link request failed`);
      return {
        ok: false,
        error: { code: "TRANSPORT_ERROR", message: errorMessage(err), retryable: true },
      };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(sc.decode(data));
    } catch (err) {
      return {
        ok: false,
        error: { code: "DECODE_ERROR", message: `Invalid response (not JSON): ${errorMessage(err)}` },
      };
    }

    const parsed = LinkSubmitResponseSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        error: { code: "DECODE_ERROR", message: "Invalid link response", details: parsed.error.flatten() },
      };
    }
    return parsed.data;
  }
}
