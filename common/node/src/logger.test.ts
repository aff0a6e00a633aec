/**
 * Unit tests for the logger factory helpers.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createNodeJSLogger, resolveLogger, type Logger } from "./logger.js";

describe("resolveLogger", () => {
  it("should fall back to console without a factory", () => {
    expect(resolveLogger(undefined, "svc")).toBe(console);
  });

  it("should call get(name) on a factory", () => {
    const named: Logger = { info: vi.fn() };
    const factory = { get: vi.fn().mockReturnValue(named) };

    expect(resolveLogger(factory, "svc:component")).toBe(named);
    expect(factory.get).toHaveBeenCalledWith("svc:component");
  });

  it("should use a plain logger as is", () => {
    const plain: Logger = { warn: vi.fn() };
    expect(resolveLogger(plain, "svc")).toBe(plain);
  });
});

describe("createNodeJSLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write one JSON line with level, prefix and context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const log = createNodeJSLogger("qosd").get("qosd:test");

    log.info?.({ linkName: "wlan0" }, "qosd:test - hello");

    expect(spy).toHaveBeenCalledTimes(1);
    const line: Record<string, unknown> = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.level).toBe("info");
    expect(line.service).toBe("qosd");
    expect(line.prefix).toBe("qosd:test");
    expect(line.linkName).toBe("wlan0");
    expect(line.msg).toBe("qosd:test - hello");
  });

  it("should route errors to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createNodeJSLogger("qosd").get("p").error?.({}, "boom");
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("should drop debug lines unless verbose", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createNodeJSLogger("qosd").get("p").debug?.({}, "quiet");
    expect(spy).not.toHaveBeenCalled();

    createNodeJSLogger("qosd", { verbose: true }).get("p").debug?.({}, "loud");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
