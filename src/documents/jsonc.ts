const BYTE_ORDER_MARK = 0xfeff;

/**
 * Removes `//` line comments and `/* *\/` block comments that sit outside
 * string literals. Line breaks inside block comments are kept so that JSON
 * parse errors still point at the right line of the original document.
 */
export function stripComments(source: string): string {
  const chunks: string[] = [];
  const length = source.length;
  let index = source.charCodeAt(0) === BYTE_ORDER_MARK ? 1 : 0;
  let segmentStart = index;
  let inString = false;

  while (index < length) {
    const ch = source[index];

    if (inString) {
      if (ch === "\\") {
        index += 2;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      index += 1;
      continue;
    }

    if (ch === '"') {
      inString = true;
      index += 1;
      continue;
    }

    if (ch === "/" && source[index + 1] === "/") {
      chunks.push(source.slice(segmentStart, index));
      const lineEnd = source.indexOf("\n", index + 2);
      index = lineEnd === -1 ? length : lineEnd;
      segmentStart = index;
      continue;
    }

    if (ch === "/" && source[index + 1] === "*") {
      chunks.push(source.slice(segmentStart, index));
      const commentEnd = source.indexOf("*/", index + 2);
      const stop = commentEnd === -1 ? length : commentEnd + 2;
      chunks.push(source.slice(index, stop).replace(/[^\r\n]/g, ""));
      index = stop;
      segmentStart = index;
      continue;
    }

    index += 1;
  }

  chunks.push(source.slice(segmentStart, Math.min(index, length)));
  return chunks.join("");
}

/** Parses JSON-with-comments. Throws the `JSON.parse` SyntaxError on malformed input. */
export function parseJsonc(source: string): unknown {
  return JSON.parse(stripComments(source));
}
