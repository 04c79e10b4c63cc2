import { homedir } from "node:os";
import path from "node:path";

import { BootstrapDocumentSchema, describeIssues } from "../config/schema.js";
import { resolveBootstrapPath } from "../config/settings.js";
import { FileDocumentReader, readDocument, type DocumentReader } from "../documents/DocumentReader.js";
import { IdentityDocumentError } from "../documents/errors.js";
import type { BootstrapConfig } from "../identity/types.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import { expandPath } from "../utils/env.js";
import { deepFreeze } from "../utils/freeze.js";

export type BootstrapLoadResult =
  | { ok: true; config: BootstrapConfig }
  | { ok: false; config: BootstrapConfig; failure: IdentityDocumentError };

export const EMPTY_BOOTSTRAP: BootstrapConfig = deepFreeze({
  sourcePath: "",
  instanceConfigPath: "",
  userConfigPath: "",
  systemPaths: {},
  display: {},
});

export type BootstrapResolverOptions = {
  /** Bootstrap document location. Defaults to {@link resolveBootstrapPath}. */
  path?: string;
  reader?: DocumentReader;
  homeDir?: string;
  logger?: AppLogger;
};

/**
 * Loads the pointer document naming where the instance and user documents
 * live. Failure is reported, never replaced with defaults here.
 */
export class BootstrapResolver {
  readonly path: string;
  private readonly reader: DocumentReader;
  private readonly homeDir: string;
  private readonly logger: AppLogger;

  constructor(options: BootstrapResolverOptions = {}) {
    this.homeDir = options.homeDir ?? homedir();
    this.path = options.path ?? resolveBootstrapPath(undefined, this.homeDir);
    this.reader = options.reader ?? new FileDocumentReader();
    this.logger = options.logger ?? appLogger.child({ component: "BootstrapResolver" });
  }

  async loadBootstrap(): Promise<BootstrapLoadResult> {
    const result = await readDocument(this.reader, this.path);
    if (!result.parseable) {
      return { ok: false, config: EMPTY_BOOTSTRAP, failure: result.error };
    }

    const decoded = BootstrapDocumentSchema.safeParse(result.document);
    if (!decoded.success) {
      const failure = new IdentityDocumentError(
        "unparseable",
        this.path,
        `Invalid bootstrap document ${this.path}: ${describeIssues(decoded.error)}`,
        { cause: decoded.error },
      );
      return { ok: false, config: EMPTY_BOOTSTRAP, failure };
    }

    const systemPaths = { ...(decoded.data.system_paths ?? {}) };
    const baseDir = path.dirname(this.path);
    const config: BootstrapConfig = deepFreeze({
      sourcePath: this.path,
      instanceConfigPath: expandPath(systemPaths.instance_config ?? "", baseDir, this.homeDir),
      userConfigPath: expandPath(systemPaths.user_config ?? "", baseDir, this.homeDir),
      systemPaths,
      display: { ...(decoded.data.display ?? {}) },
    });

    this.logger.debug(
      {
        path: this.path,
        instanceConfigPath: config.instanceConfigPath,
        userConfigPath: config.userConfigPath,
      },
      "bootstrap document loaded",
    );
    return { ok: true, config };
  }
}
