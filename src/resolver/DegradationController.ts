import type { InstanceDocument, UserDocument } from "../config/schema.js";
import { BootstrapResolver, type BootstrapLoadResult } from "../bootstrap/BootstrapResolver.js";
import type { DocumentReader } from "../documents/DocumentReader.js";
import { toDocumentFailure, type DocumentFailure, type DocumentTier } from "../documents/errors.js";
import { IdentityLoader } from "../identity/IdentityLoader.js";
import { mapInstanceFields, mergeIdentity } from "../identity/merge.js";
import {
  DegradationLevel,
  type BootstrapConfig,
  type Resolution,
  type ResolutionState,
  type ResolvedIdentity,
} from "../identity/types.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { deepFreeze } from "../utils/freeze.js";
import { DEFAULT_IDENTITY } from "./defaults.js";

/** What each terminal state had in hand when the pipeline stopped. */
export type ResolutionSources =
  | { level: typeof DegradationLevel.AllDefaulted }
  | { level: typeof DegradationLevel.InstanceDefaulted; bootstrap: BootstrapConfig }
  | { level: typeof DegradationLevel.UserDefaulted; bootstrap: BootstrapConfig; instance: InstanceDocument }
  | {
      level: typeof DegradationLevel.Full;
      bootstrap: BootstrapConfig;
      instance: InstanceDocument;
      user: UserDocument;
    };

const TIERS_BY_LEVEL: Record<DegradationLevel, { loaded: DocumentTier[]; defaulted: DocumentTier[] }> = {
  full: { loaded: ["bootstrap", "instance", "user"], defaulted: [] },
  user_defaulted: { loaded: ["bootstrap", "instance"], defaulted: ["user"] },
  instance_defaulted: { loaded: ["bootstrap"], defaulted: ["instance", "user"] },
  all_defaulted: { loaded: [], defaulted: ["bootstrap", "instance", "user"] },
};

/**
 * Builds the consumer identity for a terminal state. This is the only place
 * a {@link ResolvedIdentity} comes into being, whichever tier failed.
 */
export function composeIdentity(sources: ResolutionSources, defaults: ResolvedIdentity): ResolvedIdentity {
  switch (sources.level) {
    case DegradationLevel.AllDefaulted:
      return defaults;
    case DegradationLevel.InstanceDefaulted:
      return deepFreeze({
        ...defaults,
        display: { ...sources.bootstrap.display },
        systemPaths: { ...sources.bootstrap.systemPaths },
      });
    case DegradationLevel.UserDefaulted:
      return deepFreeze({
        ...mapInstanceFields(sources.instance),
        user: defaults.user,
        display: { ...sources.bootstrap.display },
        systemPaths: { ...sources.bootstrap.systemPaths },
      });
    case DegradationLevel.Full:
      return mergeIdentity(sources.bootstrap, sources.instance, sources.user);
  }
}

/** Anything that can produce the bootstrap tier. */
export type BootstrapSource = Pick<BootstrapResolver, "loadBootstrap">;

/** Anything that can produce the instance and user tiers. */
export type IdentitySource = Pick<IdentityLoader, "loadInstance" | "loadUser">;

export type DegradationControllerOptions = {
  bootstrapPath?: string;
  reader?: DocumentReader;
  homeDir?: string;
  bootstrap?: BootstrapSource;
  loader?: IdentitySource;
  /** Identity used for every tier that falls back. Defaults to {@link DEFAULT_IDENTITY}. */
  defaults?: ResolvedIdentity;
  logger?: AppLogger;
};

/**
 * Runs bootstrap → instance → user, stopping at the first tier that fails
 * and substituting defaults for it and everything after it.
 *
 * The user document is only attempted once the instance document loaded,
 * so a failed instance tier leaves the user tier unread.
 */
export class DegradationController {
  private readonly bootstrap: BootstrapSource;
  private readonly loader: IdentitySource;
  private readonly defaults: ResolvedIdentity;
  private readonly logger: AppLogger;

  constructor(options: DegradationControllerOptions = {}) {
    this.bootstrap =
      options.bootstrap ??
      new BootstrapResolver({
        path: options.bootstrapPath,
        reader: options.reader,
        homeDir: options.homeDir,
        logger: options.logger?.child({ component: "BootstrapResolver" }),
      });
    this.loader =
      options.loader ??
      new IdentityLoader({ reader: options.reader, logger: options.logger?.child({ component: "IdentityLoader" }) });
    this.defaults = options.defaults ?? DEFAULT_IDENTITY;
    this.logger = (options.logger ?? appLogger).child({ component: "DegradationController" });
  }

  async run(): Promise<Resolution> {
    const states: ResolutionState[] = ["start"];
    const failures: DocumentFailure[] = [];
    try {
      const sources = await this.advance(states, failures);
      return this.finish(sources, states, failures);
    } catch (error) {
      this.logger.error({ err: normalizeError(error), states }, "identity resolution pipeline failed");
      return this.finish({ level: DegradationLevel.AllDefaulted }, states, failures);
    }
  }

  private async advance(states: ResolutionState[], failures: DocumentFailure[]): Promise<ResolutionSources> {
    const bootstrap: BootstrapLoadResult = await this.bootstrap.loadBootstrap();
    states.push("bootstrap_attempted");
    if (!bootstrap.ok) {
      failures.push(toDocumentFailure("bootstrap", bootstrap.failure));
      return { level: DegradationLevel.AllDefaulted };
    }

    const instance = await this.loader.loadInstance(bootstrap.config.instanceConfigPath);
    states.push("instance_attempted");
    if (!instance.ok) {
      failures.push(toDocumentFailure("instance", instance.failure));
      return { level: DegradationLevel.InstanceDefaulted, bootstrap: bootstrap.config };
    }

    const user = await this.loader.loadUser(bootstrap.config.userConfigPath);
    states.push("user_attempted");
    if (!user.ok) {
      failures.push(toDocumentFailure("user", user.failure));
      return {
        level: DegradationLevel.UserDefaulted,
        bootstrap: bootstrap.config,
        instance: instance.document,
      };
    }

    return {
      level: DegradationLevel.Full,
      bootstrap: bootstrap.config,
      instance: instance.document,
      user: user.document,
    };
  }

  private finish(
    sources: ResolutionSources,
    states: ResolutionState[],
    failures: DocumentFailure[],
  ): Resolution {
    const identity = composeIdentity(sources, this.defaults);
    const { level, ...documents } = sources;
    this.report(level, identity, failures);
    const resolution: Resolution = {
      ...documents,
      identity,
      level,
      states: [...states, "resolved"],
      failures: [...failures],
    };
    return deepFreeze(resolution);
  }

  private report(level: DegradationLevel, identity: ResolvedIdentity, failures: DocumentFailure[]): void {
    for (const failure of failures) {
      this.logger.warn(
        { tier: failure.tier, kind: failure.kind, path: failure.path, reason: failure.message },
        "identity document unavailable",
      );
    }

    const tiers = TIERS_BY_LEVEL[level];
    if (level === DegradationLevel.Full) {
      this.logger.info(
        { degradationLevel: level, loaded: tiers.loaded, instanceName: identity.name, userName: identity.user.name },
        "identity resolved",
      );
      return;
    }
    this.logger.warn(
      { degradationLevel: level, loaded: tiers.loaded, defaulted: tiers.defaulted },
      "identity resolution fell back to defaults",
    );
  }
}
