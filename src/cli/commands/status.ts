import type { IdentityResolver } from "../../resolver/IdentityResolver.js";

export async function showStatus(resolver: IdentityResolver): Promise<string[]> {
  const resolution = await resolver.getResolution();
  const lines = [
    `level: ${resolution.level}`,
    `states: ${resolution.states.join(" -> ")}`,
    `identity: ${resolution.identity.name} / ${resolution.identity.user.displayName}`,
  ];
  if (resolution.bootstrap) {
    lines.push(`bootstrap: ${resolution.bootstrap.sourcePath}`);
  }
  for (const failure of resolution.failures) {
    lines.push(`failure: ${failure.tier} ${failure.kind} ${failure.message}`);
  }
  return lines;
}
