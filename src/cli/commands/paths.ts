import type { IdentityResolver } from "../../resolver/IdentityResolver.js";

/** The path table, one `key=value` per line, sorted by key. */
export async function showPaths(resolver: IdentityResolver): Promise<string[]> {
  const identity = await resolver.getResolved();
  return Object.keys(identity.systemPaths)
    .sort()
    .map(key => `${key}=${identity.systemPaths[key] ?? ""}`);
}
