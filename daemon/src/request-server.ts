/**
 * QoS request server: connects to NATS, builds the dispatcher and its link
 * transport, and serves the caller API, session and link events.
 */

import { connect, StringCodec, type NatsConnection, type Subscription } from "nats";
import { errorMessage, resolveLogger, type Logger, type LoggerFactory } from "@qosd/common";
import { NatsLinkTransport, QosRequestDispatcher, StaticLinkDirectory } from "@qosd/dispatcher";
import type { DaemonConfig } from "./config.js";
import { REQUEST_KINDS, handleRequest, type DaemonServices, type RequestKind } from "./handle-request.js";
import { SessionMonitor } from "./session-monitor.js";

const LOG_PREFIX = "qosd:request-server";
const sc = StringCodec();

/** Subject served for each request kind under the configured prefix. */
export function requestSubjects(prefix: string): Record<RequestKind, string> {
  return {
    add: `${prefix}.request.add`,
    remove: `${prefix}.request.remove`,
    "remove-all": `${prefix}.request.remove-all`,
    heartbeat: `${prefix}.session.heartbeat`,
    end: `${prefix}.session.end`,
    "link-added": `${prefix}.link.added`,
    dump: `${prefix}.dump`,
  };
}

export interface QosRequestServerParams {
  config: DaemonConfig;
  loggerFactory?: LoggerFactory;
  /** Receives invariant breaks raised by the dispatcher */
  onFatalError?: (err: unknown) => void;
}

interface Running {
  connection: NatsConnection;
  transport: NatsLinkTransport;
  services: DaemonServices;
  subscriptions: Subscription[];
}

export class QosRequestServer {
  private config: DaemonConfig;
  private loggerFactory?: LoggerFactory;
  private onFatalError?: (err: unknown) => void;
  private log: Logger;
  private running: Running | null = null;

  constructor(params: QosRequestServerParams) {
    this.config = params.config;
    this.loggerFactory = params.loggerFactory;
    this.onFatalError = params.onFatalError;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  /**
   * Connect to NATS, start the link transport and subscribe to every request subject.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log.warn?.({}, `${LOG_PREFIX}:start - Already running`);
      return;
    }

    this.log.info?.(
      { natsUrl: this.config.natsUrl, connectionName: this.config.connectionName },
      `${LOG_PREFIX}:start - Connecting`
    );
    const connection = await connect({
      servers: this.config.natsUrl,
      name: this.config.connectionName,
    });
    this.log.info?.({}, `${LOG_PREFIX}:start - Connected`);

    const transport = new NatsLinkTransport({
      connection,
      config: {
        subjectPrefix: this.config.subjectPrefix,
        requestTimeoutMs: this.config.linkRequestTimeoutMs,
        maxPoliciesPerRequest: this.config.maxPoliciesPerRequest,
      },
      loggerFactory: this.loggerFactory,
    });
    const links = new StaticLinkDirectory({ links: this.config.links, loggerFactory: this.loggerFactory });
    const dispatcher = new QosRequestDispatcher({
      transport,
      links,
      config: { confirmationTimeoutMs: this.config.confirmationTimeoutMs },
      onFatalError: this.onFatalError,
      loggerFactory: this.loggerFactory,
    });
    const sessions = new SessionMonitor({
      sessionTimeoutMs: this.config.sessionTimeoutMs,
      loggerFactory: this.loggerFactory,
    });
    links.onLinkAdded((linkName) => dispatcher.onLinkAdded(linkName));
    transport.start();

    const services: DaemonServices = { dispatcher, sessions, links };
    const subscriptions: Subscription[] = [];
    const subjects = requestSubjects(this.config.subjectPrefix);
    for (const kind of REQUEST_KINDS) {
      const sub = connection.subscribe(subjects[kind]);
      subscriptions.push(sub);
      this.serve(sub, kind, services);
    }

    this.running = { connection, transport, services, subscriptions };
    this.log.info?.(
      { subjectPrefix: this.config.subjectPrefix, links: this.config.links },
      `${LOG_PREFIX}:start - Serving requests`
    );
  }

  /**
   * Run one subscription loop: handle each message and reply when a reply subject is set.
   */
  private serve(sub: Subscription, kind: RequestKind, services: DaemonServices): void {
    (async () => {
      for await (const msg of sub) {
        // Add requests wait for link results; keep reading while they do.
        handleRequest({ kind, body: msg.data, services, log: this.log })
          .then((response) => {
            if (msg.reply) msg.respond(sc.encode(JSON.stringify(response)));
          })
          .catch((err: unknown) => {
            this.log.error?.(
              { subject: sub.getSubject(), error: errorMessage(err) },
              `${LOG_PREFIX}:serve - Reply failed`
            );
          });
      }
    })().catch((err: unknown) => {
      this.log.error?.({ subject: sub.getSubject(), error: errorMessage(err) }, `${LOG_PREFIX}:serve - Loop error`);
    });
  }

  /**
   * Stop: drain subscriptions, stop the dispatcher and close the connection.
   */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = null;

    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of running.subscriptions) {
      await sub.drain();
    }
    running.transport.stop();
    running.services.dispatcher.stop();
    running.services.sessions.stop();
    await running.connection.close();
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }
}
