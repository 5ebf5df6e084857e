/**
 * Role commands (`addrole`, `removerole`, `viewroles`). Admin only; refusals
 * from the registry come back as replies, never as throws.
 */
import { InvalidRoleError } from "../config/errors.js";
import { normalizeId } from "../config/types.js";
import type { PolicyEngine } from "../gateway/policy-engine.js";
import type { PermissionChange, PermissionEntry } from "../rbac/types.js";
import { firstRejection, rejectDisabledCommands, rejectWithoutCapability } from "./gates.js";
import type { CommandHandlerResult, CommandInvocation } from "./types.js";

export type RoleRequest = {
  userId: string | number;
  /** A role name or `group_blacklisted`; case-insensitive. */
  role: string;
  /** Required for `group_manager` and `group_blacklisted`. */
  groupId?: string | number;
};

function rejectNonAdmin(engine: PolicyEngine, invocation: CommandInvocation, label: string) {
  return firstRejection(
    () => rejectDisabledCommands(engine, invocation),
    () => rejectWithoutCapability(engine, invocation, "roles.edit", label),
  );
}

function runChange(apply: () => PermissionChange): CommandHandlerResult {
  let change: PermissionChange;
  try {
    change = apply();
  } catch (error) {
    if (error instanceof InvalidRoleError) {
      return { ok: false, reply: { text: `❌ ${error.message}` }, error };
    }
    throw error;
  }
  return change.ok
    ? { ok: true, reply: { text: `✅ ${change.message}` } }
    : { ok: false, reply: { text: `❌ ${change.reason}` } };
}

export function addRole(engine: PolicyEngine, invocation: CommandInvocation, request: RoleRequest): CommandHandlerResult {
  const rejected = rejectNonAdmin(engine, invocation, "addrole");
  if (rejected) {
    return rejected;
  }
  return runChange(() => engine.registry.grantRole(request.userId, request.role, request.groupId));
}

export function removeRole(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  request: RoleRequest,
): CommandHandlerResult {
  const rejected = rejectNonAdmin(engine, invocation, "removerole");
  if (rejected) {
    return rejected;
  }
  return runChange(() => engine.registry.revokeRole(request.userId, request.role, request.groupId));
}

function describeRoles(entry: PermissionEntry): string {
  const list = (values: ReadonlySet<string>) => (values.size > 0 ? Array.from(values).sort().join(", ") : "-");
  return `User ${entry.userId}: roles ${list(entry.roles)}; manages ${list(entry.managedGroups)}; blacklisted in ${list(entry.blacklistedIn)}`;
}

/** One user's roles, or every stored entry when no user is given. */
export function viewRoles(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  userId?: string | number,
): CommandHandlerResult {
  const rejected = rejectNonAdmin(engine, invocation, "viewroles");
  if (rejected) {
    return rejected;
  }
  if (userId !== undefined) {
    return { ok: true, reply: { text: describeRoles(engine.registry.entry(normalizeId(userId))) } };
  }
  const users = engine.registry.listUsers();
  if (users.length === 0) {
    return { ok: true, reply: { text: "No stored permission entries." } };
  }
  return { ok: true, reply: { text: users.map((id) => describeRoles(engine.registry.entry(id))).join("\n") } };
}
