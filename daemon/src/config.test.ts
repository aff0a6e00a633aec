/**
 * Unit tests for daemon config loading.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { QosError, type Logger } from "@qosd/common";
import { loadConfig } from "./config.js";

const silentLogger: Logger = {
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function configError(env: NodeJS.ProcessEnv): QosError | undefined {
  try {
    loadConfig({ log: silentLogger, env });
  } catch (err) {
    if (err instanceof QosError) return err;
    throw err;
  }
  return undefined;
}

describe("loadConfig", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "qosd-config-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should fall back to defaults", () => {
    expect(loadConfig({ log: silentLogger, env: {} })).toEqual({
      natsUrl: "nats://127.0.0.1:4222",
      connectionName: "qosd",
      subjectPrefix: "qos",
      links: [],
      confirmationTimeoutMs: 1500,
      linkRequestTimeoutMs: 500,
      maxPoliciesPerRequest: 16,
      sessionTimeoutMs: 10_000,
      verboseLogging: false,
    });
  });

  it("should read and convert environment variables", () => {
    const config = loadConfig({
      log: silentLogger,
      env: {
        NATS_URL: "nats://broker:4222",
        SERVICE_NAME: "qosd-lab",
        QOS_SUBJECT_PREFIX: "lab.qos",
        QOS_LINKS: "wlan0, wlan1,,",
        QOS_CONFIRMATION_TIMEOUT_MS: "2000",
        QOS_MAX_POLICIES_PER_REQUEST: "4",
        QOS_VERBOSE_LOGGING: "true",
      },
    });

    expect(config.natsUrl).toBe("nats://broker:4222");
    expect(config.connectionName).toBe("qosd-lab");
    expect(config.subjectPrefix).toBe("lab.qos");
    expect(config.links).toEqual(["wlan0", "wlan1"]);
    expect(config.confirmationTimeoutMs).toBe(2000);
    expect(config.maxPoliciesPerRequest).toBe(4);
    expect(config.verboseLogging).toBe(true);
  });

  it("should let environment variables override the config file", () => {
    const configPath = join(dir, "override.json");
    writeFileSync(
      configPath,
      JSON.stringify({ natsUrl: "nats://file:4222", links: ["wlan2"], sessionTimeoutMs: 3000 })
    );

    const config = loadConfig({
      log: silentLogger,
      env: { CONFIG_PATH: configPath, NATS_URL: "nats://env:4222" },
    });

    expect(config.natsUrl).toBe("nats://env:4222");
    expect(config.links).toEqual(["wlan2"]);
    expect(config.sessionTimeoutMs).toBe(3000);
  });

  it("should warn and use defaults when the config file is missing", () => {
    const configPath = join(dir, "missing.json");

    const config = loadConfig({ log: silentLogger, env: { CONFIG_PATH: configPath } });

    expect(config.links).toEqual([]);
    expect(silentLogger.warn).toHaveBeenCalledWith({ configPath }, "qosd:config:loadConfig - Config file not found");
  });

  it("should reject a config file that is not JSON", () => {
    const configPath = join(dir, "broken.json");
    writeFileSync(configPath, "{ links: ");

    expect(configError({ CONFIG_PATH: configPath })?.code).toBe("CONFIG_ERROR");
  });

  it("should reject a config file that is not an object", () => {
    const configPath = join(dir, "array.json");
    writeFileSync(configPath, JSON.stringify(["wlan0"]));

    expect(configError({ CONFIG_PATH: configPath })?.message).toBe(
      `qosd:config:loadConfig - Config file ${configPath} must contain a JSON object`
    );
  });

  it("should reject out-of-range values", () => {
    expect(configError({ QOS_MAX_POLICIES_PER_REQUEST: "0" })?.code).toBe("CONFIG_ERROR");
    expect(configError({ QOS_SESSION_TIMEOUT_MS: "soon" })?.code).toBe("CONFIG_ERROR");
    expect(configError({ QOS_SUBJECT_PREFIX: "qos.*" })?.code).toBe("CONFIG_ERROR");
  });
});
