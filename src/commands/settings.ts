/**
 * Settings commands: set a key in one scope, show the effective settings for
 * a user and context, show a raw override block, reset the hourly counters.
 *
 * Requests arrive already parsed; every write goes through
 * `PolicyEngine.setConfig`, which owns authorization and validation.
 */
import { InvalidKeyPathError, PermissionDeniedError, type PolicyError } from "../config/errors.js";
import { isPlainObject, joinKeyPath, splitKeyPath } from "../config/key-paths.js";
import {
  DEFAULT_SCOPE_KEY,
  normalizeId,
  SPECIFIC_USER_KEY,
  type RoleBlockName,
} from "../config/types.js";
import { groupScopeOf, type InboundMessage, type PolicyEngine } from "../gateway/policy-engine.js";
import { filterConfigValue, redactConfigForRoles } from "../rbac/config-filter.js";
import { firstRejection, invocationContext, rejectDisabledCommands, rejectWithoutCapability } from "./gates.js";
import type { CommandHandlerResult, CommandInvocation } from "./types.js";

export type SettingsTarget =
  | { kind: "global" }
  /** `group.__default__.<role>`, or `group.<id>.<role>` when a group is given. */
  | { kind: "default"; role: RoleBlockName; groupId?: string | number }
  | { kind: "user_private"; userId: string | number }
  | { kind: "user_group"; userId: string | number; groupId: string | number };

export type SettingsTargetKind = SettingsTarget["kind"];

const OVERRIDE_SECTIONS = ["settings", "random_events", "gemini", "qq_bot"] as const;

/** First key segment each target accepts. */
export const ALLOWED_KEY_PREFIXES: Record<SettingsTargetKind, readonly string[]> = {
  global: ["settings", "gemini", "qq_bot", "random_events", "log", "service", "proxy"],
  default: OVERRIDE_SECTIONS,
  user_private: OVERRIDE_SECTIONS,
  user_group: OVERRIDE_SECTIONS,
};

export type SettingsRequest = {
  target: SettingsTarget;
  /** Relative to the target, e.g. `settings.send_voice`. */
  key: string;
  /** Raw text as typed; see `parseSettingValue`. */
  value: string;
};

export function targetRootSegments(target: SettingsTarget): string[] {
  switch (target.kind) {
    case "global":
      return [];
    case "default":
      return [
        "group",
        target.groupId === undefined ? DEFAULT_SCOPE_KEY : normalizeId(target.groupId),
        target.role,
      ];
    case "user_private":
      return ["private", SPECIFIC_USER_KEY, normalizeId(target.userId)];
    case "user_group":
      return ["group", normalizeId(target.groupId), SPECIFIC_USER_KEY, normalizeId(target.userId)];
  }
}

export function describeTarget(target: SettingsTarget): string {
  switch (target.kind) {
    case "global":
      return "global";
    case "default":
      return target.groupId === undefined
        ? `${target.role} defaults`
        : `${target.role} defaults of group ${normalizeId(target.groupId)}`;
    case "user_private":
      return `user ${normalizeId(target.userId)} in private chat`;
    case "user_group":
      return `user ${normalizeId(target.userId)} in group ${normalizeId(target.groupId)}`;
  }
}

const NUMBER_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * `true`/`false` (any case) become booleans, numeric text becomes a number,
 * JSON arrays, objects and quoted strings are parsed; anything else is kept
 * as the trimmed string.
 */
export function parseSettingValue(raw: string): unknown {
  const text = raw.trim();
  const lower = text.toLowerCase();
  if (lower === "true" || lower === "false") {
    return lower === "true";
  }
  if (NUMBER_PATTERN.test(text)) {
    return Number(text);
  }
  if (text.startsWith("[") || text.startsWith("{") || text.startsWith('"')) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

export function formatSettingValue(value: unknown): string {
  if (value === undefined) {
    return "[unset]";
  }
  if (typeof value === "boolean") {
    return value ? "on" : "off";
  }
  return JSON.stringify(value);
}

function failure(error: PolicyError): CommandHandlerResult {
  const icon = error instanceof PermissionDeniedError ? "⛔" : "❌";
  return { ok: false, reply: { text: `${icon} ${error.message}` }, error };
}

function denied(senderId: string, reason: string): CommandHandlerResult {
  return failure(new PermissionDeniedError({ requesterId: senderId, reason }));
}

export function applySettingsCommand(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  request: SettingsRequest,
): CommandHandlerResult {
  const rejected = rejectDisabledCommands(engine, invocation);
  if (rejected) {
    return rejected;
  }

  let segments: string[];
  try {
    segments = splitKeyPath(request.key);
  } catch (error) {
    if (error instanceof InvalidKeyPathError) {
      return failure(error);
    }
    throw error;
  }
  const allowed = ALLOWED_KEY_PREFIXES[request.target.kind];
  if (!allowed.includes(segments[0])) {
    return failure(
      new InvalidKeyPathError(
        request.key,
        `not settable for ${describeTarget(request.target)} (allowed prefixes: ${allowed.join(", ")})`,
      ),
    );
  }

  const value = parseSettingValue(request.value);
  const keyPath = joinKeyPath([...targetRootSegments(request.target), ...segments]);
  const result = engine.setConfig(keyPath, value, invocationContext(invocation), invocation.senderId);
  if (!result.ok) {
    return failure(result.error);
  }
  return {
    ok: true,
    reply: {
      text: `✅ ${describeTarget(request.target)}: '${joinKeyPath(segments)}' is now ${formatSettingValue(value)}.`,
    },
  };
}

// ── Views ────────────────────────────────────────────────────

const EFFECTIVE_SECTIONS: ReadonlyArray<{ title: string; keys: readonly string[] }> = [
  {
    title: "Switches",
    keys: [
      "settings.enable_ai_chat",
      "settings.enable_chat_commands",
      "settings.enable_random_events",
      "settings.enable_repeat_event",
      "settings.enable_personality_retrain",
      "settings.enable_history_edit",
      "settings.send_voice",
    ],
  },
  {
    title: "Limits and behaviour",
    keys: [
      "settings.message_rate_limit",
      "qq_bot.max_length",
      "qq_bot.bot_name",
      "qq_bot.group_keyword",
      "qq_bot.voice",
    ],
  },
  {
    title: "Model",
    keys: ["gemini.model", "gemini.generation_config.temperature", "gemini.api_keys", "proxy.https_proxy"],
  },
  {
    title: "Repeat event",
    keys: [
      "random_events.repeat.enabled",
      "random_events.repeat.probability",
      "random_events.repeat.min_interval",
      "random_events.repeat.shared_min_interval",
    ],
  },
];

const PROMPT_PREVIEW_LENGTH = 40;

export type SettingsSubject = {
  userId?: string | number;
  groupId?: string | number;
};

/** Viewing yourself is always allowed; others need the admin or a manager of the group. */
function canInspect(engine: PolicyEngine, senderId: string, userId: string, groupId: string | undefined): boolean {
  return (
    senderId === userId ||
    engine.registry.isAdmin(senderId) ||
    (groupId !== undefined && engine.managesGroup(senderId, groupId))
  );
}

/**
 * Effective values of the main switches, limits and model parameters for a
 * user in a context (the sender's own context by default).
 */
export function describeEffectiveSettings(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  subject: SettingsSubject = {},
): CommandHandlerResult {
  const rejected = rejectDisabledCommands(engine, invocation);
  if (rejected) {
    return rejected;
  }
  const senderId = normalizeId(invocation.senderId);
  const userId = normalizeId(subject.userId ?? invocation.senderId);
  const rawGroup = subject.groupId ?? (invocation.channelType === "group" ? invocation.groupId : undefined);
  const groupId = rawGroup === undefined ? undefined : normalizeId(rawGroup);
  if (!canInspect(engine, senderId, userId, groupId)) {
    return denied(senderId, `Viewing the settings of user ${userId} requires admin access`);
  }

  const context: InboundMessage =
    groupId === undefined ? { channelType: "private", userId } : { channelType: "group", groupId, userId };
  const viewerRoles = engine.roles(senderId);
  const where = groupId === undefined ? "private chat" : `group ${groupId}`;
  const lines = [`Effective settings for user ${userId} (${where})`];
  const roles = Array.from(engine.roles(userId)).sort();
  lines.push(`Roles: ${roles.length > 0 ? roles.join(", ") : "-"}`);

  for (const section of EFFECTIVE_SECTIONS) {
    lines.push("", `[${section.title}]`);
    for (const key of section.keys) {
      const { value, hidden } = filterConfigValue({
        path: key,
        value: engine.resolve(key, context).value,
        roles: viewerRoles,
      });
      lines.push(`• ${key}: ${hidden && typeof value === "string" ? value : formatSettingValue(value)}`);
    }
  }

  const prompt = engine.resolveString("gemini.system_prompt", context);
  const preview = prompt.length > PROMPT_PREVIEW_LENGTH ? `${prompt.slice(0, PROMPT_PREVIEW_LENGTH)}...` : prompt;
  lines.push(`• gemini.system_prompt: ${JSON.stringify(preview)}`);

  return { ok: true, reply: { text: lines.join("\n") } };
}

/** The stored block of one target as JSON, without cascade; sensitive keys redacted for non-admins. */
export function showRawSettings(
  engine: PolicyEngine,
  invocation: CommandInvocation,
  target: SettingsTarget,
): CommandHandlerResult {
  const rejected = rejectDisabledCommands(engine, invocation);
  if (rejected) {
    return rejected;
  }
  const senderId = normalizeId(invocation.senderId);
  const root = targetRootSegments(target);
  const groupId = groupScopeOf(root);
  const allowed =
    engine.registry.isAdmin(senderId) || (groupId !== undefined && engine.managesGroup(senderId, groupId));
  if (!allowed) {
    return denied(senderId, `Viewing the raw ${describeTarget(target)} block requires admin access`);
  }

  const block: Record<string, unknown> = {};
  if (target.kind === "global") {
    for (const section of ALLOWED_KEY_PREFIXES.global) {
      block[section] = engine.store.read([section]);
    }
  } else {
    const stored = engine.store.read(root);
    Object.assign(block, isPlainObject(stored) ? structuredClone(stored) : {});
  }
  const redacted = redactConfigForRoles({
    config: block,
    roles: engine.roles(senderId),
    pathPrefix: joinKeyPath(root),
  });
  const body = Object.keys(redacted).length > 0 ? JSON.stringify(redacted, null, 2) : "(nothing stored; inherits)";
  return { ok: true, reply: { text: `--- ${describeTarget(target)} (raw) ---\n${body}\n--- end ---` } };
}

/** Admin command: forget every hourly message counter. */
export function resetCounts(engine: PolicyEngine, invocation: CommandInvocation): CommandHandlerResult {
  const rejected = firstRejection(
    () => rejectDisabledCommands(engine, invocation),
    () => rejectWithoutCapability(engine, invocation, "counts.reset", "Resetting message counts"),
  );
  if (rejected) {
    return rejected;
  }
  engine.resetRateCounts();
  return { ok: true, reply: { text: "✅ Hourly message counters reset." } };
}
