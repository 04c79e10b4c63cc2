import { describe, expect, it } from "vitest";

import { createLogger, normalizeError } from "./logger.js";

describe("createLogger", () => {
  it("writes JSON records with the level label and service to the given destination", () => {
    const lines: string[] = [];
    const logger = createLogger(
      { level: "info", serviceName: "test-service", bindings: { component: "IdentityResolver" } },
      { write: (message: string) => lines.push(message) },
    );

    logger.info({ degradationLevel: "full" }, "identity resolved");
    logger.debug("not written");

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0]);
    expect(record).toMatchObject({
      level: "info",
      service: "test-service",
      component: "IdentityResolver",
      degradationLevel: "full",
      msg: "identity resolved",
    });
  });
});

describe("normalizeError", () => {
  it("keeps the message, code and cause chain of an error", () => {
    const inner = Object.assign(new Error("no such file"), { code: "ENOENT" });
    const outer = new Error("bootstrap unreadable", { cause: inner });

    const normalized = normalizeError(outer);

    expect(normalized).toMatchObject({
      message: "bootstrap unreadable",
      name: "Error",
      cause: { message: "no such file", name: "Error", code: "ENOENT" },
    });
    expect(normalized.stack).toContain("bootstrap unreadable");
  });

  it("wraps thrown non-errors", () => {
    expect(normalizeError("disk unplugged")).toEqual({ message: "disk unplugged" });
    expect(normalizeError(42)).toEqual({ message: "42" });
  });
});
