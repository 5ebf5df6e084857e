/**
 * Roles and blacklist relations stored under `permissions.users`.
 *
 * Mutations never check who is asking; the command layer does that. Rule
 * violations come back as `{ ok: false, reason }`, only an unknown role
 * token throws.
 */
import { isUnsetValue } from "../config/defaults.js";
import { InvalidRoleError } from "../config/errors.js";
import type { ConfigStore } from "../config/store.js";
import {
  normalizeId,
  type ConfigDocument,
  type PermissionEntryRecord,
  type RoleBlockName,
  type ScopeContext,
} from "../config/types.js";
import { logDebug, logInfo } from "../logger.js";
import { hasCapability } from "./permissions.js";
import { isBlacklistedIn, selectRoleBlock, toPermissionEntry } from "./resolve.js";
import {
  isRoleToken,
  ROLE_TOKENS,
  type PermissionChange,
  type PermissionEntry,
  type Role,
  type RoleToken,
} from "./types.js";

type Id = string | number;

type WorkingEntry = {
  roles: Set<Role>;
  managedGroups: Set<string>;
  blacklistedIn: Set<string>;
};

type Transition = { ok: true; message: string } | { ok: false; reason: string };

export function parseRoleToken(token: string): RoleToken {
  const normalized = token.trim().toLowerCase();
  if (!isRoleToken(normalized)) {
    throw new InvalidRoleError(token, ROLE_TOKENS);
  }
  return normalized;
}

function readRecord(doc: Readonly<ConfigDocument>, userId: string): PermissionEntryRecord | undefined {
  const users = doc.permissions.users;
  return Object.hasOwn(users, userId) ? users[userId] : undefined;
}

function toRecord(entry: WorkingEntry): PermissionEntryRecord | undefined {
  if (entry.roles.size === 0 && entry.managedGroups.size === 0 && entry.blacklistedIn.size === 0) {
    return undefined;
  }
  return {
    roles: Array.from(entry.roles).sort(),
    managed_groups: Array.from(entry.managedGroups).sort(),
    blacklisted_in: Array.from(entry.blacklistedIn).sort(),
  };
}

function describeEntry(entry: WorkingEntry): string {
  const list = (values: Iterable<string>) => Array.from(values).sort().join(",") || "-";
  return `roles=${list(entry.roles)} managed=${list(entry.managedGroups)} blacklisted_in=${list(entry.blacklistedIn)}`;
}

export class PermissionRegistry {
  private readonly store: ConfigStore;

  constructor(store: ConfigStore) {
    this.store = store;
  }

  /** Configured `qq_bot.admin_qq`, or undefined while it is still a placeholder. */
  get adminId(): string | undefined {
    const raw = this.store.read(["qq_bot", "admin_qq"]);
    if (typeof raw !== "string" && typeof raw !== "number") {
      return undefined;
    }
    const id = normalizeId(raw);
    return isUnsetValue(id) ? undefined : id;
  }

  isConfiguredAdmin(userId: Id): boolean {
    return this.adminId !== undefined && normalizeId(userId) === this.adminId;
  }

  /**
   * Snapshot of a user's entry. The configured admin always reads as `admin`,
   * whatever is stored; `ensureAdminEntry` writes the role back at load.
   */
  entry(userId: Id): PermissionEntry {
    const id = normalizeId(userId);
    const entry = toPermissionEntry(id, readRecord(this.store.snapshot(), id));
    if (!this.isConfiguredAdmin(id) || entry.roles.has("admin")) {
      return entry;
    }
    return { ...entry, roles: new Set<Role>([...entry.roles, "admin"]) };
  }

  roles(userId: Id): ReadonlySet<Role> {
    return this.entry(userId).roles;
  }

  hasRole(userId: Id, role: Role): boolean {
    return this.roles(userId).has(role);
  }

  isAdmin(userId: Id): boolean {
    return this.hasRole(userId, "admin");
  }

  isGlobalBlacklisted(userId: Id): boolean {
    return this.hasRole(userId, "global_blacklisted");
  }

  /** The scoped `(user, group)` relation only; see `isBlacklisted` for the effective check. */
  isBlacklistedInGroup(userId: Id, groupId: Id): boolean {
    return this.entry(userId).blacklistedIn.has(normalizeId(groupId));
  }

  /** Globally blacklisted, or blacklisted in `groupId` when given. */
  isBlacklisted(userId: Id, groupId?: Id): boolean {
    return isBlacklistedIn(this.entry(userId), groupId === undefined ? undefined : normalizeId(groupId));
  }

  managesGroup(userId: Id, groupId: Id): boolean {
    const entry = this.entry(userId);
    return entry.roles.has("group_manager") && entry.managedGroups.has(normalizeId(groupId));
  }

  canUsePrivateChat(userId: Id): boolean {
    return hasCapability(this.roles(userId), "chat.private");
  }

  roleBlockFor(context: ScopeContext): RoleBlockName {
    return selectRoleBlock({
      entry: this.entry(context.userId),
      channelType: context.channelType,
      groupId: context.groupId,
    });
  }

  /** Users with a stored entry, sorted by id. */
  listUsers(): string[] {
    return Object.keys(this.store.snapshot().permissions.users).sort();
  }

  // ── Mutations ────────────────────────────────────────────────

  grantRole(userId: Id, token: string, groupId?: Id): PermissionChange {
    const role = parseRoleToken(token);
    const id = normalizeId(userId);
    const group = groupId === undefined ? undefined : normalizeId(groupId);
    return this.change(`grant ${role} ${id}`, id, (entry) => this.applyGrant(id, entry, role, group));
  }

  revokeRole(userId: Id, token: string, groupId?: Id): PermissionChange {
    const role = parseRoleToken(token);
    const id = normalizeId(userId);
    const group = groupId === undefined ? undefined : normalizeId(groupId);
    return this.change(`revoke ${role} ${id}`, id, (entry) => this.applyRevoke(id, entry, role, group));
  }

  addManagedGroup(userId: Id, groupId: Id): PermissionChange {
    return this.grantRole(userId, "group_manager", groupId);
  }

  removeManagedGroup(userId: Id, groupId: Id): PermissionChange {
    return this.revokeRole(userId, "group_manager", groupId);
  }

  blacklistInGroup(userId: Id, groupId: Id): PermissionChange {
    return this.grantRole(userId, "group_blacklisted", groupId);
  }

  /** Lift a scoped blacklist, or the global one when no group is given. */
  unblacklist(userId: Id, groupId?: Id): PermissionChange {
    return groupId === undefined
      ? this.revokeRole(userId, "global_blacklisted")
      : this.revokeRole(userId, "group_blacklisted", groupId);
  }

  setGlobalBlacklist(userId: Id, blacklisted: boolean): PermissionChange {
    return blacklisted ? this.grantRole(userId, "global_blacklisted") : this.revokeRole(userId, "global_blacklisted");
  }

  /**
   * Make sure the configured admin has a stored entry with `admin` and
   * `private_user`. Returns whether anything was written.
   */
  ensureAdminEntry(): boolean {
    const adminId = this.adminId;
    if (adminId === undefined) {
      return false;
    }
    const current = toPermissionEntry(adminId, readRecord(this.store.snapshot(), adminId));
    if (current.roles.has("admin") && current.roles.has("private_user")) {
      return false;
    }
    this.store.mutate(`ensure admin ${adminId}`, (draft) => {
      const working = this.working(draft, adminId);
      working.roles.add("admin");
      working.roles.add("private_user");
      this.write(draft, adminId, working);
    });
    logInfo(`Ensured permission entry for admin ${adminId}`);
    return true;
  }

  // ── Internals ────────────────────────────────────────────────

  private working(doc: Readonly<ConfigDocument>, userId: string): WorkingEntry {
    const entry = toPermissionEntry(userId, readRecord(doc, userId));
    const roles = new Set(entry.roles);
    if (this.isConfiguredAdmin(userId)) {
      roles.add("admin");
    }
    return {
      roles,
      managedGroups: new Set(entry.managedGroups),
      blacklistedIn: new Set(entry.blacklistedIn),
    };
  }

  private write(draft: ConfigDocument, userId: string, entry: WorkingEntry): void {
    const record = toRecord(entry);
    if (record) {
      draft.permissions.users[userId] = record;
    } else {
      delete draft.permissions.users[userId];
    }
  }

  /**
   * Evaluate the transition on a working copy first; only a successful one
   * opens a mutation, so refusals never schedule a save.
   */
  private change(label: string, userId: string, apply: (entry: WorkingEntry) => Transition): PermissionChange {
    const probe = this.working(this.store.snapshot(), userId);
    const verdict = apply(probe);
    if (!verdict.ok) {
      logDebug(`Permission change '${label}' refused: ${verdict.reason}`);
      return verdict;
    }
    this.store.mutate(label, (draft) => {
      this.write(draft, userId, probe);
    });
    logInfo(`${verdict.message} (${describeEntry(probe)})`);
    return { ok: true, entry: toPermissionEntry(userId, toRecord(probe)), message: verdict.message };
  }

  private applyGrant(userId: string, entry: WorkingEntry, role: RoleToken, groupId: string | undefined): Transition {
    const isTargetAdmin = this.isConfiguredAdmin(userId);
    const globallyBlacklisted = entry.roles.has("global_blacklisted");

    switch (role) {
      case "admin":
      case "private_user":
        if (globallyBlacklisted) {
          return { ok: false, reason: `User ${userId} is globally blacklisted and cannot be granted ${role}` };
        }
        entry.roles.add(role);
        return { ok: true, message: `Granted ${role} to ${userId}` };

      case "group_manager":
        if (groupId === undefined) {
          return { ok: false, reason: "Granting group_manager requires a group id" };
        }
        if (globallyBlacklisted) {
          return { ok: false, reason: `User ${userId} is globally blacklisted and cannot be granted ${role}` };
        }
        entry.roles.add("group_manager");
        entry.managedGroups.add(groupId);
        entry.blacklistedIn.delete(groupId);
        return { ok: true, message: `User ${userId} now manages group ${groupId}` };

      case "group_blacklisted":
        if (groupId === undefined) {
          return { ok: false, reason: "Blacklisting in a group requires a group id" };
        }
        if (isTargetAdmin) {
          return { ok: false, reason: "The configured admin cannot be blacklisted" };
        }
        entry.managedGroups.delete(groupId);
        if (entry.managedGroups.size === 0) {
          entry.roles.delete("group_manager");
        }
        entry.blacklistedIn.add(groupId);
        return { ok: true, message: `User ${userId} blacklisted in group ${groupId}` };

      case "global_blacklisted":
        if (isTargetAdmin) {
          return { ok: false, reason: "The configured admin cannot be blacklisted" };
        }
        entry.roles.clear();
        entry.roles.add("global_blacklisted");
        entry.managedGroups.clear();
        entry.blacklistedIn.clear();
        return { ok: true, message: `User ${userId} globally blacklisted` };
    }
  }

  private applyRevoke(userId: string, entry: WorkingEntry, role: RoleToken, groupId: string | undefined): Transition {
    switch (role) {
      case "admin":
        if (this.isConfiguredAdmin(userId)) {
          return { ok: false, reason: "The configured admin always keeps the admin role" };
        }
        return this.dropRole(userId, entry, role);

      case "private_user":
      case "global_blacklisted":
        return this.dropRole(userId, entry, role);

      case "group_manager":
        if (groupId === undefined) {
          if (!entry.roles.has("group_manager") && entry.managedGroups.size === 0) {
            return { ok: false, reason: `User ${userId} does not have role group_manager` };
          }
          entry.roles.delete("group_manager");
          entry.managedGroups.clear();
          return { ok: true, message: `Revoked group_manager from ${userId} for every group` };
        }
        if (!entry.managedGroups.has(groupId)) {
          return { ok: false, reason: `User ${userId} does not manage group ${groupId}` };
        }
        entry.managedGroups.delete(groupId);
        if (entry.managedGroups.size === 0) {
          entry.roles.delete("group_manager");
        }
        return { ok: true, message: `User ${userId} no longer manages group ${groupId}` };

      case "group_blacklisted":
        if (groupId === undefined) {
          return { ok: false, reason: "Lifting a group blacklist requires a group id" };
        }
        if (!entry.blacklistedIn.delete(groupId)) {
          return { ok: false, reason: `User ${userId} is not blacklisted in group ${groupId}` };
        }
        return { ok: true, message: `User ${userId} no longer blacklisted in group ${groupId}` };
    }
  }

  private dropRole(userId: string, entry: WorkingEntry, role: Role): Transition {
    if (!entry.roles.delete(role)) {
      return { ok: false, reason: `User ${userId} does not have role ${role}` };
    }
    return { ok: true, message: `Revoked ${role} from ${userId}` };
  }
}
