import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DocumentReader } from "../documents/DocumentReader.js";
import { CountingDocumentReader, DocumentFixture, INSTANCE_DOCUMENT, USER_DOCUMENT } from "../test/documents.js";
import { IdentityLoader } from "./IdentityLoader.js";

describe("IdentityLoader", () => {
  let fixture: DocumentFixture;
  let reader: CountingDocumentReader;
  let loader: IdentityLoader;

  beforeEach(() => {
    fixture = new DocumentFixture("persona-loader-");
    reader = new CountingDocumentReader();
    loader = new IdentityLoader({ reader });
  });

  afterEach(() => {
    fixture.cleanup();
  });

  describe("loadInstance", () => {
    it("loads and decodes the instance document", async () => {
      const instancePath = fixture.write("instance.jsonc", INSTANCE_DOCUMENT);

      const result = await loader.loadInstance(instancePath);

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.document.identity?.name).toBe("Aria");
      expect(result.document.thinking?.love_to_think_about).toEqual(["compilers", "gardens"]);
      expect(Object.isFrozen(result.document.identity)).toBe(true);
      expect(reader.reads).toEqual([instancePath]);
    });

    it("fails with not_found for a missing document", async () => {
      const result = await loader.loadInstance(fixture.path("missing.jsonc"));

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.failure.kind).toBe("not_found");
      expect(result.path).toBe(fixture.path("missing.jsonc"));
    });

    it("fails with unparseable when a field has the wrong type", async () => {
      const instancePath = fixture.write("instance.jsonc", { identity: { name: 42 } });

      const result = await loader.loadInstance(instancePath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.failure.kind).toBe("unparseable");
      expect(result.failure.message).toBe(
        `Invalid instance document ${instancePath}: identity.name: Expected string, received number`,
      );
    });
  });

  describe("loadUser", () => {
    it("loads and decodes the user document", async () => {
      const userPath = fixture.write("user.jsonc", USER_DOCUMENT);

      const result = await loader.loadUser(userPath);

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.document.identity?.display_name).toBe("Sam");
      expect(result.document.faith?.is_religious).toBe(true);
    });

    it("fails with unparseable for malformed JSON", async () => {
      const userPath = fixture.write("user.jsonc", '{ "identity": { "name": "Sam" ');

      const result = await loader.loadUser(userPath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.failure.kind).toBe("unparseable");
    });

    it("treats an empty path as not found", async () => {
      const result = await loader.loadUser("");

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.failure.kind).toBe("not_found");
      expect(result.failure.message).toBe("No document path configured");
    });
  });

  it("turns a throwing reader into a not_found failure", async () => {
    const throwingReader: DocumentReader = {
      read: () => Promise.reject(new Error("disk unplugged")),
    };
    const fragileLoader = new IdentityLoader({ reader: throwingReader });

    const result = await fragileLoader.loadInstance("/cfg/instance.jsonc");

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.failure.kind).toBe("not_found");
    expect(result.failure.message).toBe("Failed to read /cfg/instance.jsonc (disk unplugged)");
  });
});
