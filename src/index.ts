export {
  findMissingRequiredKeys,
  groupScopeOf,
  loadPolicyEngine,
  PolicyEngine,
  toScopeContext,
  type Admission,
  type AdmissionReason,
  type InboundMessage,
  type LoadPolicyEngineOptions,
  type PolicyEngineOptions,
  type SetConfigError,
  type SetConfigResult,
} from "./gateway/policy-engine.js";

export { ConfigStore } from "./config/store.js";
export { createDefaultDocument, REQUIRED_PLACEHOLDER } from "./config/defaults.js";
export {
  CONFIG_PATH_ENV,
  createJsonFilePersistence,
  createMemoryPersistence,
  resolveConfigPath,
  type ConfigPersistence,
} from "./config/io.js";
export { listRequiredKeys, validateKeyPath } from "./config/key-paths.js";
export { RESOLUTION_LEVELS, Resolver, type Resolution, type ResolutionLevel } from "./config/resolve.js";
export { validateConfigDocument } from "./config/schema.js";
export {
  ConcurrentMutationConflictError,
  ConfigKeyMissingError,
  InvalidConfigValueError,
  InvalidKeyPathError,
  InvalidRoleError,
  isPolicyError,
  MalformedDocumentError,
  PermissionDeniedError,
  PolicyError,
  type PolicyErrorCode,
} from "./config/errors.js";
export type { ChannelType, ConfigDocument, RoleBlockName, ScopeContext } from "./config/types.js";

export { HOUR_MS, RateLimiter, rateScopeKey, type RateDecision } from "./channels/rate-limit.js";
export {
  EventCooldownTracker,
  evaluateEventTrigger,
  personalCooldownKey,
  sharedCooldownKey,
  type TriggerParams,
} from "./random-events/cooldown.js";
export { RandomEventDispatcher } from "./random-events/dispatch.js";

export * from "./rbac/index.js";
export * from "./commands/index.js";

export { LOG_LEVEL_ENV, getLogLevel, setLogLevel, type LogLevelName } from "./logger.js";
