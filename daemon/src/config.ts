/**
 * QoS daemon configuration: NATS connection, subject prefix, links and timeouts.
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { QosError, errorMessage, type Logger } from "@qosd/common";

const LOG_PREFIX = "qosd:config";

export const DaemonConfigSchema = z.object({
  /** NATS server URL */
  natsUrl: z.string().min(1).default("nats://127.0.0.1:4222"),
  /** Connection name (for debugging) */
  connectionName: z.string().min(1).default("qosd"),
  /** Prefix shared by the caller API and the link control channel */
  subjectPrefix: z
    .string()
    .regex(/^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, "must be dot-separated NATS tokens without wildcards")
    .default("qos"),
  /** Links eligible at startup */
  links: z.array(z.string().min(1)).default([]),
  confirmationTimeoutMs: z.coerce.number().int().positive().default(1500),
  linkRequestTimeoutMs: z.coerce.number().int().positive().default(500),
  maxPoliciesPerRequest: z.coerce.number().int().positive().default(16),
  /** Heartbeat lease; a caller silent for longer is treated as terminated */
  sessionTimeoutMs: z.coerce.number().int().positive().default(10_000),
  verboseLogging: z.boolean().default(false),
});

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

const ConfigFileSchema = z.record(z.string(), z.unknown());

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {
    natsUrl: env.NATS_URL,
    connectionName: env.SERVICE_NAME,
    subjectPrefix: env.QOS_SUBJECT_PREFIX,
    links: env.QOS_LINKS?.split(",")
      .map((link) => link.trim())
      .filter((link) => link.length > 0),
    confirmationTimeoutMs: env.QOS_CONFIRMATION_TIMEOUT_MS,
    linkRequestTimeoutMs: env.QOS_LINK_REQUEST_TIMEOUT_MS,
    maxPoliciesPerRequest: env.QOS_MAX_POLICIES_PER_REQUEST,
    sessionTimeoutMs: env.QOS_SESSION_TIMEOUT_MS,
    verboseLogging:
      env.QOS_VERBOSE_LOGGING === undefined ? undefined : ["1", "true", "yes"].includes(env.QOS_VERBOSE_LOGGING),
  };
  // Unset variables must not hide values from the config file.
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function readConfigFile(configPath: string, log: Logger): Record<string, unknown> {
  if (!existsSync(configPath)) {
    log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new QosError({
      code: "CONFIG_ERROR",
      message: `${LOG_PREFIX}:loadConfig - Failed to read config file ${configPath}: ${errorMessage(err)}`,
      cause: err,
    });
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new QosError({
      code: "CONFIG_ERROR",
      message: `${LOG_PREFIX}:loadConfig - Config file ${configPath} must contain a JSON object`,
    });
  }
  log.info?.({ configPath }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
  return parsed.data;
}

/**
 * Load config from environment and optional config file.
 * Env: NATS_URL, SERVICE_NAME, QOS_SUBJECT_PREFIX, QOS_LINKS (comma-separated),
 * QOS_CONFIRMATION_TIMEOUT_MS, QOS_LINK_REQUEST_TIMEOUT_MS,
 * QOS_MAX_POLICIES_PER_REQUEST, QOS_SESSION_TIMEOUT_MS, QOS_VERBOSE_LOGGING, CONFIG_PATH.
 * Environment variables override the file.
 *
 * @throws QosError CONFIG_ERROR when the file is unreadable or a value is invalid
 */
export function loadConfig(params: { log?: Logger; env?: NodeJS.ProcessEnv } = {}): DaemonConfig {
  const log = params.log ?? console;
  const env = params.env ?? process.env;

  const fromFile = env.CONFIG_PATH ? readConfigFile(env.CONFIG_PATH, log) : {};
  const parsed = DaemonConfigSchema.safeParse({ ...fromFile, ...readEnv(env) });
  if (!parsed.success) {
    log.error?.({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:loadConfig - Invalid configuration`);
    throw new QosError({
      code: "CONFIG_ERROR",
      message: `${LOG_PREFIX}:loadConfig - Invalid configuration`,
      details: parsed.error.flatten(),
    });
  }
  return parsed.data;
}
