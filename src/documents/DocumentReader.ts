import { readFile } from "node:fs/promises";

import { IdentityDocumentError } from "./errors.js";
import { parseJsonc } from "./jsonc.js";

export type DocumentNotFound = {
  path: string;
  found: false;
  parseable: false;
  error: IdentityDocumentError;
};

export type DocumentUnparseable = {
  path: string;
  found: true;
  parseable: false;
  text: string;
  error: IdentityDocumentError;
};

export type DocumentParsed = {
  path: string;
  found: true;
  parseable: true;
  text: string;
  document: unknown;
};

export type DocumentReadResult = DocumentNotFound | DocumentUnparseable | DocumentParsed;

/**
 * Source of JSON-with-comments documents. Implementations never reject:
 * a missing file resolves to `found: false`, a malformed one to
 * `parseable: false`.
 */
export interface DocumentReader {
  read(path: string): Promise<DocumentReadResult>;
}

export function notFound(path: string, message: string, cause?: unknown): DocumentNotFound {
  return {
    path,
    found: false,
    parseable: false,
    error: new IdentityDocumentError("not_found", path, message, { cause }),
  };
}

function describeReadError(error: unknown): string {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return code ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

export class FileDocumentReader implements DocumentReader {
  async read(path: string): Promise<DocumentReadResult> {
    if (path.trim().length === 0) {
      return notFound(path, "No document path configured");
    }

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      return notFound(path, `Failed to read ${path} (${describeReadError(error)})`, error);
    }

    try {
      const document = parseJsonc(text);
      return { path, found: true, parseable: true, text, document };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        path,
        found: true,
        parseable: false,
        text,
        error: new IdentityDocumentError("unparseable", path, `Failed to parse ${path}: ${reason}`, { cause: error }),
      };
    }
  }
}

/**
 * Reads through `reader`, turning a rejected promise from a misbehaving
 * implementation into a `found: false` result.
 */
export async function readDocument(reader: DocumentReader, path: string): Promise<DocumentReadResult> {
  try {
    return await reader.read(path);
  } catch (error) {
    return notFound(path, `Failed to read ${path} (${describeReadError(error)})`, error);
  }
}
