/**
 * Tiered identity resolution for a personal assistant.
 *
 * @example
 * ```typescript
 * import { IdentityResolver } from "persona-resolver";
 *
 * const resolver = new IdentityResolver();
 *
 * // Always resolves, falling back to defaults for any tier that fails
 * const identity = await resolver.getResolved();
 * console.log(identity.name, identity.user.displayName);
 *
 * // Diagnostics
 * const { level, failures } = await resolver.getResolution();
 * ```
 */

// Resolution
export { IdentityResolver } from "./resolver/IdentityResolver.js";
export type { IdentityResolverOptions } from "./resolver/IdentityResolver.js";
export { DegradationController, composeIdentity } from "./resolver/DegradationController.js";
export type {
  BootstrapSource,
  DegradationControllerOptions,
  IdentitySource,
  ResolutionSources,
} from "./resolver/DegradationController.js";
export { DEFAULT_IDENTITY, buildDefaultIdentity, buildDefaultSystemPaths } from "./resolver/defaults.js";

// Tiers
export { BootstrapResolver, EMPTY_BOOTSTRAP } from "./bootstrap/BootstrapResolver.js";
export type { BootstrapLoadResult, BootstrapResolverOptions } from "./bootstrap/BootstrapResolver.js";
export { IdentityLoader } from "./identity/IdentityLoader.js";
export type { IdentityLoaderOptions, TierLoadResult } from "./identity/IdentityLoader.js";
export { mapInstanceFields, mapUserFields, mergeIdentity } from "./identity/merge.js";

// Documents
export { FileDocumentReader, readDocument } from "./documents/DocumentReader.js";
export type {
  DocumentNotFound,
  DocumentParsed,
  DocumentReadResult,
  DocumentReader,
  DocumentUnparseable,
} from "./documents/DocumentReader.js";
export { IdentityDocumentError, toDocumentFailure } from "./documents/errors.js";
export type { DocumentErrorKind, DocumentFailure, DocumentTier } from "./documents/errors.js";
export { parseJsonc, stripComments } from "./documents/jsonc.js";

// Schemas and settings
export {
  BootstrapDocumentSchema,
  InstanceDocumentSchema,
  UserDocumentSchema,
  describeIssues,
} from "./config/schema.js";
export type { BootstrapDocument, InstanceDocument, UserDocument } from "./config/schema.js";
export {
  BOOTSTRAP_PATH_ENV,
  defaultBootstrapPath,
  personaHome,
  resolveBootstrapPath,
} from "./config/settings.js";

// Logging
export { appLogger, createLogger, normalizeError } from "./observability/logger.js";
export type { AppLogger } from "./observability/logger.js";

// Types
export { DegradationLevel } from "./identity/types.js";
export type {
  BootstrapConfig,
  CreatorInfo,
  DisplayPreferences,
  InstanceFields,
  Resolution,
  ResolutionState,
  ResolvedIdentity,
  SystemPaths,
  ThinkingStyle,
  UserIdentity,
  WorkspaceInfo,
} from "./identity/types.js";
