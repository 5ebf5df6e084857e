/**
 * Closed role set.
 *
 * - admin:               configured bot owner; may change any setting or role
 * - group_manager:       may change the settings of the groups listed in `managed_groups`
 * - private_user:        may talk to the bot in private chat
 * - global_blacklisted:  ignored everywhere
 *
 * Per-group blacklisting is a (user, group) relation, not a role; the
 * `group_blacklisted` token only exists so commands can grant/revoke it.
 */
export const ROLES = ["admin", "group_manager", "private_user", "global_blacklisted"] as const;

export type Role = (typeof ROLES)[number];

export const GROUP_BLACKLIST_TOKEN = "group_blacklisted";

export const ROLE_TOKENS = [...ROLES, GROUP_BLACKLIST_TOKEN] as const;

export type RoleToken = (typeof ROLE_TOKENS)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function isRoleToken(value: string): value is RoleToken {
  return ROLE_TOKENS.some((token) => token === value);
}

/** In-memory view of one `permissions.users.<id>` entry. */
export type PermissionEntry = {
  userId: string;
  roles: ReadonlySet<Role>;
  /** Only meaningful while `roles` has `group_manager`. */
  managedGroups: ReadonlySet<string>;
  blacklistedIn: ReadonlySet<string>;
};

export type PermissionChange =
  | { ok: true; entry: PermissionEntry; message: string }
  | { ok: false; reason: string };
