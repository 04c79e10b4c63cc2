import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileDocumentReader } from "./DocumentReader.js";
import { IdentityDocumentError } from "./errors.js";

describe("FileDocumentReader", () => {
  let tempDir: string;
  const reader = new FileDocumentReader();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "persona-reader-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeDocument(name: string, contents: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, contents, "utf-8");
    return filePath;
  }

  it("parses a document after stripping comments", async () => {
    const filePath = writeDocument("instance.jsonc", '{\n  // who\n  "identity": { "name": "Aria" }\n}');

    const result = await reader.read(filePath);

    expect(result.found).toBe(true);
    expect(result.parseable).toBe(true);
    if (!result.parseable) {
      throw new Error("expected a parsed document");
    }
    expect(result.document).toEqual({ identity: { name: "Aria" } });
    expect(result.text).toBe('{\n  // who\n  "identity": { "name": "Aria" }\n}');
  });

  it("reports a missing file as not found", async () => {
    const missing = path.join(tempDir, "missing.jsonc");

    const result = await reader.read(missing);

    expect(result.found).toBe(false);
    expect(result.parseable).toBe(false);
    if (result.found) {
      throw new Error("expected a missing document");
    }
    expect(result.error).toBeInstanceOf(IdentityDocumentError);
    expect(result.error.kind).toBe("not_found");
    expect(result.error.path).toBe(missing);
    expect(result.error.message).toContain("ENOENT");
  });

  it("reports a directory as not found", async () => {
    const result = await reader.read(tempDir);

    expect(result.found).toBe(false);
  });

  it("reports an empty path as not found without touching the disk", async () => {
    const result = await reader.read("");

    expect(result.found).toBe(false);
    if (result.found) {
      throw new Error("expected a missing document");
    }
    expect(result.error.message).toBe("No document path configured");
  });

  it("reports malformed content as unparseable and keeps the raw text", async () => {
    const filePath = writeDocument("broken.jsonc", '{ "identity": { "name": "Aria", } ');

    const result = await reader.read(filePath);

    expect(result.found).toBe(true);
    expect(result.parseable).toBe(false);
    if (!result.found || result.parseable) {
      throw new Error("expected an unparseable document");
    }
    expect(result.text).toBe('{ "identity": { "name": "Aria", } ');
    expect(result.error.kind).toBe("unparseable");
    expect(result.error.message.startsWith(`Failed to parse ${filePath}:`)).toBe(true);
  });
});
