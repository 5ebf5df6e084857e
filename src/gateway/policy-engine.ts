/**
 * Facade the message and command layers talk to. Owns one store and the
 * resolver, permission registry, rate limiter and cooldown tracker built
 * on it.
 */
import { RateLimiter, rateScopeKey, type RateDecision } from "../channels/rate-limit.js";
import { isUnsetValue } from "../config/defaults.js";
import {
  ConcurrentMutationConflictError,
  ConfigKeyMissingError,
  describeValueKind,
  InvalidConfigValueError,
  InvalidKeyPathError,
  PermissionDeniedError,
} from "../config/errors.js";
import {
  createJsonFilePersistence,
  resolveConfigPath,
  type ConfigPersistence,
} from "../config/io.js";
import {
  findValueMismatch,
  joinKeyPath,
  listRequiredKeys,
  splitKeyPath,
  validateKeyPath,
} from "../config/key-paths.js";
import { setPath } from "../config/merge.js";
import { Resolver, type Resolution } from "../config/resolve.js";
import { validateConfigDocument } from "../config/schema.js";
import { ConfigStore } from "../config/store.js";
import {
  DEFAULT_SCOPE_KEY,
  normalizeId,
  ROLE_BLOCK_NAMES,
  scopeLabel,
  type ChannelType,
  type RoleBlockName,
  type ScopeContext,
} from "../config/types.js";
import { LOG_LEVEL_ENV, logError, logInfo, logWarn, parseLogLevel, setLogLevel } from "../logger.js";
import { EventCooldownTracker, type RandomSource } from "../random-events/cooldown.js";
import { RandomEventDispatcher } from "../random-events/dispatch.js";
import { PermissionRegistry } from "../rbac/registry.js";
import type { Role } from "../rbac/types.js";

export type InboundMessage = {
  channelType: ChannelType;
  groupId?: string | number;
  userId: string | number;
};

export type AdmissionReason =
  | "global_blacklisted"
  | "group_blacklisted"
  | "private_not_allowed"
  | "rate_limited";

export type Admission = {
  accepted: boolean;
  reason?: AdmissionReason;
  context: ScopeContext;
  roles: Role[];
  roleBlock: RoleBlockName;
  aiChatEnabled: boolean;
  commandsEnabled: boolean;
  sendVoice: boolean;
  /** Present when AI chat is enabled and the message was counted against the hourly budget. */
  rate?: RateDecision;
};

export type SetConfigError =
  | PermissionDeniedError
  | InvalidKeyPathError
  | InvalidConfigValueError
  | ConcurrentMutationConflictError;

export type SetConfigResult =
  | { ok: true; keyPath: string; previous: unknown; value: unknown; materialized: boolean }
  | { ok: false; error: SetConfigError };

export type PolicyEngineOptions = {
  random?: RandomSource;
  now?: () => number;
};

/** Normalise ids and drop a group id outside group scope. */
export function toScopeContext(message: InboundMessage & { role?: RoleBlockName }): ScopeContext {
  const context: ScopeContext = { channelType: message.channelType, userId: normalizeId(message.userId) };
  if (message.channelType === "group" && message.groupId !== undefined) {
    context.groupId = normalizeId(message.groupId);
  }
  if (message.role) {
    context.role = message.role;
  }
  return context;
}

function scopeRateKey(context: ScopeContext): string {
  return context.channelType === "group" && context.groupId !== undefined
    ? rateScopeKey("group", context.groupId)
    : rateScopeKey("private", context.userId);
}

/** `group.<id>.…` paths below a concrete group; undefined for everything else. */
export function groupScopeOf(segments: readonly string[]): string | undefined {
  if (segments[0] !== "group" || segments.length < 2 || segments[1] === DEFAULT_SCOPE_KEY) {
    return undefined;
  }
  return segments[1];
}

function roleBlockOf(segments: readonly string[]): RoleBlockName | undefined {
  return ROLE_BLOCK_NAMES.find((name) => name === segments[2]);
}

export class PolicyEngine {
  readonly store: ConfigStore;
  readonly resolver: Resolver;
  readonly registry: PermissionRegistry;
  readonly rateLimiter: RateLimiter;
  readonly cooldowns: EventCooldownTracker;
  readonly events: RandomEventDispatcher;
  private readonly now: () => number;

  constructor(store: ConfigStore, options: PolicyEngineOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => Date.now());
    this.registry = new PermissionRegistry(store);
    this.resolver = new Resolver(store, { roleBlockFor: (context) => this.registry.roleBlockFor(context) });
    this.rateLimiter = new RateLimiter({ now: options.now });
    this.cooldowns = new EventCooldownTracker({ random: options.random, now: options.now });
    this.events = new RandomEventDispatcher({
      store,
      resolver: this.resolver,
      registry: this.registry,
      tracker: this.cooldowns,
    });
  }

  // ── Reads ────────────────────────────────────────────────────

  resolve(keyPath: string, context: InboundMessage & { role?: RoleBlockName }): Resolution {
    return this.resolver.resolve(keyPath, toScopeContext(context));
  }

  resolveBoolean(keyPath: string, context: InboundMessage): boolean {
    return this.resolver.resolveBoolean(keyPath, toScopeContext(context));
  }

  resolveNumber(keyPath: string, context: InboundMessage): number {
    return this.resolver.resolveNumber(keyPath, toScopeContext(context));
  }

  resolveInteger(keyPath: string, context: InboundMessage): number {
    return this.resolver.resolveInteger(keyPath, toScopeContext(context));
  }

  resolveString(keyPath: string, context: InboundMessage): string {
    return this.resolver.resolveString(keyPath, toScopeContext(context));
  }

  resolveStringList(keyPath: string, context: InboundMessage): string[] {
    return this.resolver.resolveStringList(keyPath, toScopeContext(context));
  }

  roles(userId: string | number): ReadonlySet<Role> {
    return this.registry.roles(userId);
  }

  isBlacklistedInGroup(userId: string | number, groupId: string | number): boolean {
    return this.registry.isBlacklistedInGroup(userId, groupId);
  }

  managesGroup(userId: string | number, groupId: string | number): boolean {
    return this.registry.managesGroup(userId, groupId);
  }

  // ── Gates ────────────────────────────────────────────────────

  checkRate(context: InboundMessage, limitPerHour: number): RateDecision {
    const key = scopeRateKey(toScopeContext(context));
    try {
      return this.rateLimiter.check(key, limitPerHour);
    } catch (error) {
      if (!(error instanceof ConcurrentMutationConflictError)) {
        throw error;
      }
      logError(`Internal error while checking rate for ${key}`, error);
      return { allowed: false, remaining: 0, resetAt: this.now() };
    }
  }

  tryRandomEvent(
    eventId: string,
    context: InboundMessage,
    probability: number,
    personalIntervalSec: number,
    sharedIntervalSec: number,
  ): boolean {
    try {
      return this.cooldowns.tryTrigger(eventId, toScopeContext(context), {
        probability,
        personalIntervalSec,
        sharedIntervalSec,
      });
    } catch (error) {
      if (!(error instanceof ConcurrentMutationConflictError)) {
        throw error;
      }
      logError(`Internal error while evaluating random event '${eventId}'`, error);
      return false;
    }
  }

  /** Random events that fire for this message, after the global and blacklist checks. */
  selectRandomEvents(context: InboundMessage): string[] {
    return this.events.select(toScopeContext(context));
  }

  /**
   * Everything the message layer needs to decide how to handle an inbound
   * message. Only messages with AI chat enabled count against the hourly budget.
   */
  admitInbound(message: InboundMessage): Admission {
    const base = toScopeContext(message);
    const roleBlock = this.registry.roleBlockFor(base);
    const context: ScopeContext = { ...base, role: roleBlock };
    const roles = Array.from(this.registry.roles(context.userId)).sort();
    const closed = {
      context,
      roles,
      roleBlock,
      aiChatEnabled: false,
      commandsEnabled: false,
      sendVoice: false,
    };

    if (this.registry.isGlobalBlacklisted(context.userId)) {
      return { ...closed, accepted: false, reason: "global_blacklisted" };
    }
    if (context.groupId !== undefined && this.registry.isBlacklistedInGroup(context.userId, context.groupId)) {
      return { ...closed, accepted: false, reason: "group_blacklisted" };
    }
    if (context.channelType === "private" && !this.registry.canUsePrivateChat(context.userId)) {
      return { ...closed, accepted: false, reason: "private_not_allowed" };
    }

    const aiChatEnabled = this.resolver.resolveBoolean("settings.enable_ai_chat", context);
    const commandsEnabled = this.resolver.resolveBoolean("settings.enable_chat_commands", context);
    const sendVoice = this.resolver.resolveBoolean("settings.send_voice", context);
    const admission: Admission = {
      accepted: true,
      context,
      roles,
      roleBlock,
      aiChatEnabled,
      commandsEnabled,
      sendVoice,
    };
    if (!aiChatEnabled) {
      return admission;
    }

    const limit = this.resolver.resolveNumber("settings.message_rate_limit", context);
    const rate = this.checkRate(context, limit);
    if (!rate.allowed) {
      logInfo(`Rate limit reached for ${scopeLabel(context)} (user ${context.userId}, limit ${limit}/h)`);
      return { ...admission, accepted: false, reason: "rate_limited", rate };
    }
    return { ...admission, rate };
  }

  // ── Writes ───────────────────────────────────────────────────

  /**
   * Write one key. Global keys need `admin`; keys under `group.<id>` are also
   * open to managers of that group. Group role blocks are copied down before
   * the write so the untouched fields keep their defaults.
   */
  setConfig(keyPath: string, value: unknown, context: InboundMessage, requesterId: string | number): SetConfigResult {
    const requester = normalizeId(requesterId);
    let segments: string[];
    try {
      const validated = validateKeyPath(keyPath);
      segments = validated.segments;
      if (segments[0] === "permissions") {
        throw new InvalidKeyPathError(validated.keyPath, "roles are changed with the role commands");
      }
      const mismatch = findValueMismatch(validated.node, value);
      if (mismatch) {
        const at = joinKeyPath([...segments, ...mismatch.path]);
        const received = mismatch.path.reduce<unknown>(
          (current, key) => (current !== null && typeof current === "object" ? Reflect.get(current, key) : undefined),
          value,
        );
        throw new InvalidConfigValueError(at, `must be ${mismatch.expected}, got ${describeValueKind(received)}`);
      }
    } catch (error) {
      if (error instanceof InvalidKeyPathError || error instanceof InvalidConfigValueError) {
        return { ok: false, error };
      }
      throw error;
    }

    const normalizedPath = joinKeyPath(segments);
    const groupId = groupScopeOf(segments);
    const allowed =
      this.registry.isAdmin(requester) || (groupId !== undefined && this.registry.managesGroup(requester, groupId));
    if (!allowed) {
      const reason =
        groupId === undefined
          ? `Only the admin may change '${normalizedPath}'`
          : `User ${requester} does not manage group ${groupId}`;
      return { ok: false, error: new PermissionDeniedError({ requesterId: requester, keyPath: normalizedPath, reason }) };
    }

    const role = roleBlockOf(segments);
    try {
      const outcome = this.store.mutate(`set ${normalizedPath}`, (draft) => {
        const materialized =
          groupId !== undefined && role !== undefined ? this.store.materializeGroupRoleBlock(groupId, role) : false;
        const previous = setPath(draft, segments, structuredClone(value));
        const check = validateConfigDocument(draft);
        if (!check.success) {
          throw new InvalidConfigValueError(normalizedPath, check.issues.join("; "));
        }
        return { previous, materialized };
      });
      if (normalizedPath === "log.level" && typeof value === "string") {
        this.applyLogLevel(value);
      }
      logInfo(`Config '${normalizedPath}' set by ${requester} from ${scopeLabel(toScopeContext(context))}`);
      return { ok: true, keyPath: normalizedPath, previous: outcome.previous, value, materialized: outcome.materialized };
    } catch (error) {
      if (error instanceof InvalidConfigValueError) {
        return { ok: false, error };
      }
      if (error instanceof ConcurrentMutationConflictError) {
        logError(`Internal error while setting '${normalizedPath}'`, error);
        return { ok: false, error };
      }
      throw error;
    }
  }

  /** Forget every hourly counter. */
  resetRateCounts(): void {
    this.rateLimiter.reset();
    logInfo("Hourly message counters reset");
  }

  applyLogLevel(raw: string): void {
    const level = parseLogLevel(raw);
    if (!level) {
      logWarn(`Unknown log level '${raw}'; keeping the current level`);
      return;
    }
    setLogLevel(level);
  }

  flush(): Promise<void> {
    return this.store.flush();
  }

  async close(): Promise<void> {
    await this.store.close();
    logInfo("Policy engine closed");
  }
}

/** Top-level mandatory keys still missing or left at the placeholder. */
export function findMissingRequiredKeys(store: ConfigStore): string[] {
  return listRequiredKeys().filter((key) => isUnsetValue(store.read(splitKeyPath(key))));
}

export type LoadPolicyEngineOptions = PolicyEngineOptions & {
  persistence?: ConfigPersistence;
  configPath?: string;
};

/**
 * Load the document, refuse to start without identity and credential keys,
 * make sure the admin has a permission entry and apply `log.level` (unless
 * the environment pins the level).
 */
export async function loadPolicyEngine(options: LoadPolicyEngineOptions = {}): Promise<PolicyEngine> {
  const persistence = options.persistence ?? createJsonFilePersistence(options.configPath ?? resolveConfigPath());
  const store = await ConfigStore.open(persistence);

  const missing = findMissingRequiredKeys(store);
  if (missing.length > 0) {
    throw new ConfigKeyMissingError(missing, store.source);
  }

  const engine = new PolicyEngine(store, options);
  const level = process.env[LOG_LEVEL_ENV]?.trim() || store.read(["log", "level"]);
  if (typeof level === "string") {
    engine.applyLogLevel(level);
  }
  engine.registry.ensureAdminEntry();
  logInfo(`Policy engine ready (config: ${store.source}, admin: ${engine.registry.adminId ?? "?"})`);
  return engine;
}
