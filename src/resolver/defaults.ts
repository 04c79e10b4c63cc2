import { homedir } from "node:os";
import path from "node:path";

import { defaultBootstrapPath, personaHome } from "../config/settings.js";
import type { ResolvedIdentity, SystemPaths } from "../identity/types.js";
import { deepFreeze } from "../utils/freeze.js";

export function buildDefaultSystemPaths(homeDir: string): SystemPaths {
  const root = personaHome(homeDir);
  const configRoot = path.join(root, "config");
  const dataRoot = path.join(root, "data");
  return {
    bootstrap: defaultBootstrapPath(homeDir),
    config_root: configRoot,
    instance_config: path.join(configRoot, "instance", "config.jsonc"),
    user_config: path.join(configRoot, "user", "config.jsonc"),
    data_root: dataRoot,
    session_data: path.join(dataRoot, "session"),
    temporal_data: path.join(dataRoot, "temporal"),
    projects_data: path.join(dataRoot, "projects"),
    skills: path.join(root, "skills"),
    system_bin: path.join(root, "bin"),
  };
}

/**
 * The identity every fallback tier draws from. `all_defaulted` returns it
 * as-is; the other degraded levels replace only the parts that were loaded.
 */
export function buildDefaultIdentity(homeDir: string): ResolvedIdentity {
  return deepFreeze({
    name: "Assistant",
    emoji: "✨",
    tagline: "Personal Assistant Instance",
    pronouns: "they/them",
    domain: "Software Development",
    callingShort: "Helping the operator build and maintain their projects",
    creator: {
      name: "Operator",
      relationship: "Owner",
    },
    thinking: {
      learningStyle: "Learns by building small pieces and connecting them",
      problemSolving: "Breaks problems into steps and verifies each one",
      loveToThinkAbout: ["systems design", "clear writing"],
    },
    user: {
      name: "Operator",
      displayName: "Operator",
      pronouns: "they/them",
      age: 0,
      isReligious: false,
      faith: "",
      denomination: "",
      practiceLevel: "",
      faithCommunicationPrefs: "",
      organization: "",
      role: "Owner",
      calling: "",
      passions: [],
      workStyle: "",
      timezone: "UTC",
    },
    workspace: {
      primaryPath: path.join(homeDir, "workspace"),
    },
    display: {
      banner_title: "Assistant",
      banner_tagline: "Personal Assistant Tooling",
    },
    systemPaths: buildDefaultSystemPaths(homeDir),
  });
}

export const DEFAULT_IDENTITY: ResolvedIdentity = buildDefaultIdentity(homedir());
