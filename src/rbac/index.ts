export { hasCapability, listCapabilities } from "./permissions.js";
export { isBlacklistedIn, selectRoleBlock, toPermissionEntry } from "./resolve.js";
export { parseRoleToken, PermissionRegistry } from "./registry.js";
export { filterConfigValue, isSensitiveKeyPath, redactConfigForRoles } from "./config-filter.js";
export { GROUP_BLACKLIST_TOKEN, isRole, isRoleToken, ROLE_TOKENS, ROLES } from "./types.js";
export type { Capability } from "./permissions.js";
export type { PermissionChange, PermissionEntry, Role, RoleToken } from "./types.js";
