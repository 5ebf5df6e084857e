export { firstRejection, invocationContext, rejectDisabledCommands, rejectWithoutCapability } from "./gates.js";
export { addRole, removeRole, viewRoles, type RoleRequest } from "./permissions.js";
export {
  ALLOWED_KEY_PREFIXES,
  applySettingsCommand,
  describeEffectiveSettings,
  describeTarget,
  formatSettingValue,
  parseSettingValue,
  resetCounts,
  showRawSettings,
  targetRootSegments,
  type SettingsRequest,
  type SettingsSubject,
  type SettingsTarget,
  type SettingsTargetKind,
} from "./settings.js";
export type { CommandHandlerResult, CommandInvocation, ReplyPayload } from "./types.js";
