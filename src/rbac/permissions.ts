import type { Role } from "./types.js";

export type Capability =
  | "chat.group"
  | "chat.private"
  | "config.write.global"
  | "config.write.managed_group"
  | "roles.edit"
  | "counts.reset"
  | "config.read.sensitive";

/** Held by every sender that is not globally blacklisted. */
const IMPLICIT_CAPABILITIES: ReadonlySet<Capability> = new Set(["chat.group"]);

/** Capabilities granted to each role. */
const ROLE_CAPABILITIES: Record<Role, ReadonlySet<Capability>> = {
  admin: new Set([
    "chat.group",
    "chat.private",
    "config.write.global",
    "config.write.managed_group",
    "roles.edit",
    "counts.reset",
    "config.read.sensitive",
  ]),
  group_manager: new Set(["config.write.managed_group"]),
  private_user: new Set(["chat.private"]),
  global_blacklisted: new Set(),
};

/**
 * Check whether a role set grants a capability. A global blacklist
 * revokes everything, including the implicit ones.
 */
export function hasCapability(roles: ReadonlySet<Role>, capability: Capability): boolean {
  if (roles.has("global_blacklisted")) {
    return false;
  }
  if (IMPLICIT_CAPABILITIES.has(capability)) {
    return true;
  }
  for (const role of roles) {
    if (ROLE_CAPABILITIES[role].has(capability)) {
      return true;
    }
  }
  return false;
}

/**
 * Return every capability a role set grants, sorted.
 */
export function listCapabilities(roles: ReadonlySet<Role>): Capability[] {
  if (roles.has("global_blacklisted")) {
    return [];
  }
  const granted = new Set<Capability>(IMPLICIT_CAPABILITIES);
  for (const role of roles) {
    for (const capability of ROLE_CAPABILITIES[role]) {
      granted.add(capability);
    }
  }
  return Array.from(granted).sort();
}
