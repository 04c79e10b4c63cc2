import type { IdentityResolver } from "../../resolver/IdentityResolver.js";

/** The resolved identity as indented JSON. */
export async function showIdentity(resolver: IdentityResolver): Promise<string[]> {
  const identity = await resolver.getResolved();
  return JSON.stringify(identity, null, 2).split("\n");
}
