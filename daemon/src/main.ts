/**
 * QoS daemon process: loads config, connects to NATS and serves QoS policy
 * requests until SIGTERM/SIGINT.
 */

import "dotenv/config";
import { createNodeJSLogger, errorMessage } from "@qosd/common";
import { loadConfig } from "./config.js";
import { QosRequestServer } from "./request-server.js";

const SERVICE_NAME = "qosd";

async function main(): Promise<void> {
  const config = loadConfig({ log: createNodeJSLogger(SERVICE_NAME).get(`${SERVICE_NAME}:config`) });
  const loggerFactory = createNodeJSLogger(config.connectionName, { verbose: config.verboseLogging });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const server = new QosRequestServer({
    config,
    loggerFactory,
    onFatalError: (err) => {
      log.error?.({ error: errorMessage(err) }, `${SERVICE_NAME}:main - Invariant violated, exiting`);
      process.exit(1);
    },
  });

  await server.start();
  log.info?.(
    { links: config.links.length, subjectPrefix: config.subjectPrefix },
    `${SERVICE_NAME}:main - Started`
  );

  const shutdown = async (signal: string): Promise<void> => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await server.stop();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error?.({ signal, error: errorMessage(err) }, `${SERVICE_NAME}:main - Shutdown failed`);
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
