import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BOOTSTRAP_PATH_ENV, defaultBootstrapPath, resolveBootstrapPath } from "./settings.js";

describe("resolveBootstrapPath", () => {
  const original = {
    value: process.env[BOOTSTRAP_PATH_ENV],
    file: process.env[`${BOOTSTRAP_PATH_ENV}_FILE`],
  };

  beforeEach(() => {
    delete process.env[BOOTSTRAP_PATH_ENV];
    delete process.env[`${BOOTSTRAP_PATH_ENV}_FILE`];
  });

  afterEach(() => {
    if (original.value === undefined) {
      delete process.env[BOOTSTRAP_PATH_ENV];
    } else {
      process.env[BOOTSTRAP_PATH_ENV] = original.value;
    }
    if (original.file === undefined) {
      delete process.env[`${BOOTSTRAP_PATH_ENV}_FILE`];
    } else {
      process.env[`${BOOTSTRAP_PATH_ENV}_FILE`] = original.file;
    }
  });

  it("defaults to the persona home directory", () => {
    expect(resolveBootstrapPath(undefined, "/home/tester")).toBe(
      path.join("/home/tester", ".persona", "instance.jsonc")
    );
    expect(defaultBootstrapPath("/home/tester")).toBe(path.join("/home/tester", ".persona", "instance.jsonc"));
  });

  it("uses the environment variable when set", () => {
    process.env[BOOTSTRAP_PATH_ENV] = "~/custom/bootstrap.jsonc";

    expect(resolveBootstrapPath(undefined, "/home/tester")).toBe(
      path.join("/home/tester", "custom/bootstrap.jsonc")
    );
  });

  it("prefers an explicit override over the environment", () => {
    process.env[BOOTSTRAP_PATH_ENV] = "/from/env.jsonc";

    expect(resolveBootstrapPath("/from/flag.jsonc", "/home/tester")).toBe("/from/flag.jsonc");
  });

  it("resolves a relative override against the working directory", () => {
    expect(resolveBootstrapPath("config/instance.jsonc", "/home/tester")).toBe(
      path.resolve(process.cwd(), "config/instance.jsonc")
    );
  });
});
