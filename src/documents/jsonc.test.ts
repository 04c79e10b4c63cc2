import { describe, expect, it } from "vitest";

import { parseJsonc, stripComments } from "./jsonc.js";

describe("stripComments", () => {
  it("removes line comments up to the end of the line", () => {
    const source = '{\n  "name": "Aria", // instance name\n  "age": 2\n}';

    expect(stripComments(source)).toBe('{\n  "name": "Aria", \n  "age": 2\n}');
  });

  it("removes inline block comments", () => {
    expect(stripComments('{"a": 1, /* note */ "b": 2}')).toBe('{"a": 1,  "b": 2}');
  });

  it("keeps line breaks of multi-line block comments", () => {
    const source = '{\n/* first\n   second\n*/\n"a": 1}';

    expect(stripComments(source)).toBe('{\n\n\n\n"a": 1}');
  });

  it("leaves comment markers inside strings alone", () => {
    const source = '{"url": "https://example.test/path", "glob": "src/*.ts /* x */"}';

    expect(stripComments(source)).toBe(source);
  });

  it("respects escaped quotes inside strings", () => {
    const source = '{"quote": "say \\"hi\\" // not a comment"} // trailing';

    expect(stripComments(source)).toBe('{"quote": "say \\"hi\\" // not a comment"} ');
  });

  it("drops everything after an unterminated block comment", () => {
    expect(stripComments('{"a": 1}\n/* never closed\n"b": 2')).toBe('{"a": 1}\n\n');
  });

  it("drops a leading byte order mark", () => {
    expect(stripComments('\uFEFF{"a": 1}')).toBe('{"a": 1}');
  });

  it("handles a comment on the last line without a newline", () => {
    expect(stripComments('{"a": 1} // end')).toBe('{"a": 1} ');
  });
});

describe("parseJsonc", () => {
  it("parses a commented document", () => {
    const source = `{
      // identity block
      "identity": {
        "name": "Aria", /* display */
        "pronouns": "she/her"
      }
    }`;

    expect(parseJsonc(source)).toEqual({ identity: { name: "Aria", pronouns: "she/her" } });
  });

  it("throws on trailing commas", () => {
    expect(() => parseJsonc('{"a": 1,}')).toThrow(SyntaxError);
  });
});
