import type { ChannelType, PermissionEntryRecord, RoleBlockName } from "../config/types.js";
import { isRole, type PermissionEntry } from "./types.js";

/** Role block read for senders without any role that changes it. */
const IMPLICIT_ROLE_BLOCK: RoleBlockName = "user";

/**
 * Build an in-memory entry from a persisted record. Unknown role strings
 * are dropped here; the document schema already rejects them on load.
 */
export function toPermissionEntry(userId: string, record: PermissionEntryRecord | undefined): PermissionEntry {
  return {
    userId,
    roles: new Set((record?.roles ?? []).filter(isRole)),
    managedGroups: new Set(record?.managed_groups ?? []),
    blacklistedIn: new Set(record?.blacklisted_in ?? []),
  };
}

export function isBlacklistedIn(entry: PermissionEntry, groupId: string | undefined): boolean {
  if (entry.roles.has("global_blacklisted")) {
    return true;
  }
  return groupId !== undefined && entry.blacklistedIn.has(groupId);
}

/**
 * Pick the role block a sender reads in a scope.
 *
 * Priority order:
 * 1. blacklisted globally or in this group → `blacklisted`
 * 2. admin → `manager` in groups, `user` in private chat
 * 3. manager of this group → `manager`
 * 4. implicit default (`user`)
 */
export function selectRoleBlock(params: {
  entry: PermissionEntry;
  channelType: ChannelType;
  groupId?: string;
}): RoleBlockName {
  const { entry, channelType, groupId } = params;
  const inGroup = channelType === "group" ? groupId : undefined;

  if (isBlacklistedIn(entry, inGroup)) {
    return "blacklisted";
  }
  if (entry.roles.has("admin")) {
    return channelType === "group" ? "manager" : "user";
  }
  if (inGroup !== undefined && entry.roles.has("group_manager") && entry.managedGroups.has(inGroup)) {
    return "manager";
  }
  return IMPLICIT_ROLE_BLOCK;
}
