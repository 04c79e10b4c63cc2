import type { InstanceDocument, UserDocument } from "../config/schema.js";
import type { DegradationLevel, Resolution, ResolvedIdentity } from "../identity/types.js";
import { DegradationController, type DegradationControllerOptions } from "./DegradationController.js";

export type IdentityResolverOptions = DegradationControllerOptions;

/**
 * Owns the memoized identity for one process. Construct it once at startup
 * and hand it to whatever needs the identity.
 *
 * @example
 * ```typescript
 * const resolver = new IdentityResolver();
 * const identity = await resolver.getResolved();
 * console.log(`${identity.name} working with ${identity.user.displayName}`);
 * ```
 */
export class IdentityResolver {
  private readonly controller: DegradationController;
  private pending: Promise<Resolution> | undefined;
  private settled: Resolution | undefined;

  constructor(options: IdentityResolverOptions = {}) {
    this.controller = new DegradationController(options);
  }

  /**
   * Resolution with diagnostics. The pipeline starts on the first call; every
   * later or concurrent call shares that single run.
   */
  getResolution(): Promise<Resolution> {
    if (this.settled) {
      return Promise.resolve(this.settled);
    }
    if (!this.pending) {
      this.pending = this.controller.run().then(resolution => {
        this.settled = resolution;
        return resolution;
      });
    }
    return this.pending;
  }

  async getResolved(): Promise<ResolvedIdentity> {
    const resolution = await this.getResolution();
    return resolution.identity;
  }

  async getLevel(): Promise<DegradationLevel> {
    const resolution = await this.getResolution();
    return resolution.level;
  }

  /** The full instance document, or `undefined` when that tier fell back. */
  async getInstanceDocument(): Promise<InstanceDocument | undefined> {
    const resolution = await this.getResolution();
    return resolution.instance;
  }

  /** The full user document, or `undefined` when that tier fell back. */
  async getUserDocument(): Promise<UserDocument | undefined> {
    const resolution = await this.getResolution();
    return resolution.user;
  }

  /** The identity if resolution already finished, without starting it. */
  peek(): ResolvedIdentity | undefined {
    return this.settled?.identity;
  }

  isResolved(): boolean {
    return this.settled !== undefined;
  }
}
