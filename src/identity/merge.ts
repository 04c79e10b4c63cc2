import type { InstanceDocument, UserDocument } from "../config/schema.js";
import { deepFreeze } from "../utils/freeze.js";
import type { BootstrapConfig, InstanceFields, ResolvedIdentity, UserIdentity } from "./types.js";

function text(value: string | null | undefined): string {
  return value ?? "";
}

function list(value: readonly string[] | null | undefined): string[] {
  return value ? [...value] : [];
}

export function mapInstanceFields(instance: InstanceDocument): InstanceFields {
  const identity = instance.identity;
  const workspace = instance.workspace;
  const covenant = instance.covenant;
  const thinking = instance.thinking;
  return {
    name: text(identity?.name),
    emoji: text(identity?.emoji),
    tagline: text(identity?.tagline),
    pronouns: text(identity?.pronouns),
    domain: text(workspace?.domain),
    callingShort: text(workspace?.calling),
    creator: {
      name: text(covenant?.creator),
      relationship: text(covenant?.relationship),
    },
    thinking: {
      learningStyle: text(thinking?.learning_style),
      problemSolving: text(thinking?.problem_solving),
      loveToThinkAbout: list(thinking?.love_to_think_about),
    },
    workspace: {
      primaryPath: text(workspace?.primary_path),
    },
  };
}

export function mapUserFields(user: UserDocument): UserIdentity {
  return {
    name: text(user.identity?.name),
    displayName: text(user.identity?.display_name),
    pronouns: text(user.identity?.pronouns),
    age: user.identity?.age ?? 0,
    isReligious: user.faith?.is_religious ?? false,
    faith: text(user.faith?.tradition),
    denomination: text(user.faith?.denomination),
    practiceLevel: text(user.faith?.practice_level),
    faithCommunicationPrefs: text(user.faith?.communication_preferences),
    organization: text(user.workspace?.organization),
    role: text(user.workspace?.role),
    calling: text(user.workspace?.calling),
    passions: list(user.personhood?.passions),
    workStyle: text(user.personality?.work_style),
    timezone: text(user.preferences?.timezone),
  };
}

/**
 * Flattens the three loaded documents into the consumer view. Fields the
 * documents leave out come back as `""`, `0`, `false` or `[]`.
 */
export function mergeIdentity(
  bootstrap: BootstrapConfig,
  instance: InstanceDocument,
  user: UserDocument,
): ResolvedIdentity {
  return deepFreeze({
    ...mapInstanceFields(instance),
    user: mapUserFields(user),
    display: { ...bootstrap.display },
    systemPaths: { ...bootstrap.systemPaths },
  });
}
