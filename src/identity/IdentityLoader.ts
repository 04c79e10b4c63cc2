import type { z } from "zod";

import {
  describeIssues,
  InstanceDocumentSchema,
  UserDocumentSchema,
  type InstanceDocument,
  type UserDocument,
} from "../config/schema.js";
import { FileDocumentReader, readDocument, type DocumentReader } from "../documents/DocumentReader.js";
import { IdentityDocumentError } from "../documents/errors.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import { deepFreeze } from "../utils/freeze.js";

export type TierLoadResult<T> =
  | { ok: true; path: string; document: T }
  | { ok: false; path: string; failure: IdentityDocumentError };

export type IdentityLoaderOptions = {
  reader?: DocumentReader;
  logger?: AppLogger;
};

/**
 * Loads the full instance and user identity documents. Each load stands
 * alone; which of them runs is decided by the caller.
 */
export class IdentityLoader {
  private readonly reader: DocumentReader;
  private readonly logger: AppLogger;

  constructor(options: IdentityLoaderOptions = {}) {
    this.reader = options.reader ?? new FileDocumentReader();
    this.logger = options.logger ?? appLogger.child({ component: "IdentityLoader" });
  }

  loadInstance(path: string): Promise<TierLoadResult<InstanceDocument>> {
    return this.load(path, InstanceDocumentSchema, "instance");
  }

  loadUser(path: string): Promise<TierLoadResult<UserDocument>> {
    return this.load(path, UserDocumentSchema, "user");
  }

  private async load<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: "instance" | "user",
  ): Promise<TierLoadResult<T>> {
    const result = await readDocument(this.reader, path);
    if (!result.parseable) {
      return { ok: false, path, failure: result.error };
    }

    const decoded = schema.safeParse(result.document);
    if (!decoded.success) {
      const failure = new IdentityDocumentError(
        "unparseable",
        path,
        `Invalid ${label} document ${path}: ${describeIssues(decoded.error)}`,
        { cause: decoded.error },
      );
      return { ok: false, path, failure };
    }

    this.logger.debug({ path, document: label }, "identity document loaded");
    return { ok: true, path, document: deepFreeze(decoded.data) };
  }
}
