import type { DocumentFailure } from "../documents/errors.js";
import type { InstanceDocument, UserDocument } from "../config/schema.js";

/** Raw `system_paths` table from the bootstrap document, keys as written. */
export type SystemPaths = Readonly<Record<string, string>>;

/** Cosmetic display preferences (banner title, tagline, footer text...). */
export type DisplayPreferences = Readonly<Record<string, string>>;

export type BootstrapConfig = {
  readonly sourcePath: string;
  readonly instanceConfigPath: string;
  readonly userConfigPath: string;
  readonly systemPaths: SystemPaths;
  readonly display: DisplayPreferences;
};

export type CreatorInfo = {
  readonly name: string;
  readonly relationship: string;
};

export type ThinkingStyle = {
  readonly learningStyle: string;
  readonly problemSolving: string;
  readonly loveToThinkAbout: readonly string[];
};

export type WorkspaceInfo = {
  readonly primaryPath: string;
};

export type UserIdentity = {
  readonly name: string;
  readonly displayName: string;
  readonly pronouns: string;
  readonly age: number;
  readonly isReligious: boolean;
  readonly faith: string;
  readonly denomination: string;
  readonly practiceLevel: string;
  readonly faithCommunicationPrefs: string;
  readonly organization: string;
  readonly role: string;
  readonly calling: string;
  readonly passions: readonly string[];
  readonly workStyle: string;
  readonly timezone: string;
};

/** The flattened identity every consumer reads. Never null, never partial. */
export type ResolvedIdentity = {
  readonly name: string;
  readonly emoji: string;
  readonly tagline: string;
  readonly pronouns: string;
  readonly domain: string;
  readonly callingShort: string;
  readonly creator: CreatorInfo;
  readonly thinking: ThinkingStyle;
  readonly user: UserIdentity;
  readonly workspace: WorkspaceInfo;
  readonly display: DisplayPreferences;
  readonly systemPaths: SystemPaths;
};

/** Instance-derived part of {@link ResolvedIdentity}. */
export type InstanceFields = Omit<ResolvedIdentity, "user" | "display" | "systemPaths">;

export const DegradationLevel = {
  Full: "full",
  UserDefaulted: "user_defaulted",
  InstanceDefaulted: "instance_defaulted",
  AllDefaulted: "all_defaulted",
} as const;
export type DegradationLevel = (typeof DegradationLevel)[keyof typeof DegradationLevel];

export type ResolutionState =
  | "start"
  | "bootstrap_attempted"
  | "instance_attempted"
  | "user_attempted"
  | "resolved";

/** Diagnostics for one run of the resolution pipeline. */
export type Resolution = {
  readonly identity: ResolvedIdentity;
  readonly level: DegradationLevel;
  readonly states: readonly ResolutionState[];
  readonly failures: readonly DocumentFailure[];
  readonly bootstrap?: BootstrapConfig;
  readonly instance?: InstanceDocument;
  readonly user?: UserDocument;
};
