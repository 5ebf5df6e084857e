/**
 * Cascading lookup over the policy document.
 *
 * For a key in a cascading section (`settings`, `random_events`, `gemini`,
 * `qq_bot`) the levels below are searched most specific first. Leaves come
 * from the first level that defines them; objects are merged field by field
 * so a partial override inherits its siblings from the levels beneath it.
 *
 *   group_specific_user   group.<gid>.__specific_user__.<uid>
 *   private_specific_user private.__specific_user__.<uid>     (private only)
 *   group_scope           group.<gid>.settings / .random_events
 *   group_role            group.<gid>.<role>                  (copied down on first touch)
 *   private_role_default  private.__default__.<role>          (private only)
 *   group_role_default    group.__default__.<role>            (group only)
 *   global                top-level section
 *   fallback              compiled-in default document
 *
 * Global `settings.enable_*` switches veto: a false top-level flag forces
 * the effective value false whatever the lower levels say.
 */
import { logWarn } from "../logger.js";
import { createDefaultDocument, isUnsetValue, RANDOM_EVENT_FALLBACK } from "./defaults.js";
import { ConfigKeyMissingError } from "./errors.js";
import {
  GLOBAL_ONLY_KEYS,
  isCascadingKey,
  isPlainObject,
  isRequiredKey,
  isSettingsKey,
  joinKeyPath,
  validateKeyPath,
  type KeySchemaNode,
} from "./key-paths.js";
import { deepMerge, getPath } from "./merge.js";
import type { ConfigStore } from "./store.js";
import {
  DEFAULT_SCOPE_KEY,
  SPECIFIC_USER_KEY,
  type ConfigDocument,
  type RoleBlockName,
  type ScopeContext,
} from "./types.js";

export const RESOLUTION_LEVELS = [
  "group_specific_user",
  "private_specific_user",
  "group_scope",
  "group_role",
  "private_role_default",
  "group_role_default",
  "global",
  "fallback",
] as const;

export type ResolutionLevel = (typeof RESOLUTION_LEVELS)[number];

export type Resolution<T = unknown> = {
  value: T;
  /** Most specific level that contributed to the value. */
  source: ResolutionLevel;
  /** A false global switch forced (part of) the value off. */
  vetoed: boolean;
  /** This call copied `group.__default__.<role>` into the group. */
  materialized: boolean;
};

export type RoleBlockLookup = (context: ScopeContext) => RoleBlockName;

export type ResolverOptions = {
  /** Picks the role block when the context does not name one. Defaults to `user`. */
  roleBlockFor?: RoleBlockLookup;
};

type Layer = { level: ResolutionLevel; value: unknown };

const FALLBACK_DOCUMENT = createDefaultDocument();

const ENABLE_PREFIX = "enable_";

function isObjectNode(node: KeySchemaNode): boolean {
  return node.kind !== "leaf";
}

/** Compiled-in value for a path; unknown random events get the disabled template. */
export function fallbackValue(segments: readonly string[]): unknown {
  const value = getPath(FALLBACK_DOCUMENT, segments);
  if (value !== undefined || segments[0] !== "random_events" || segments.length < 2) {
    return structuredClone(value);
  }
  return structuredClone(getPath(RANDOM_EVENT_FALLBACK, segments.slice(2)));
}

function eventGateFlag(eventId: string): string | undefined {
  const flag = `${ENABLE_PREFIX}${eventId}_event`;
  return isSettingsKey(flag) ? flag : undefined;
}

export class Resolver {
  private readonly store: ConfigStore;
  private readonly roleBlockFor: RoleBlockLookup;

  constructor(store: ConfigStore, options: ResolverOptions = {}) {
    this.store = store;
    this.roleBlockFor = options.roleBlockFor ?? (() => "user");
  }

  resolve(keyPath: string, context: ScopeContext): Resolution {
    const { keyPath: normalized, segments, node } = validateKeyPath(keyPath);
    if (!isCascadingKey(segments)) {
      return this.resolveTopLevel(normalized, segments, node);
    }

    // Veto short-circuit: nothing below can turn a false global switch back on.
    if (segments[0] === "settings" && segments.length === 2 && segments[1].startsWith(ENABLE_PREFIX)) {
      if (this.store.read(segments) === false) {
        return { value: false, source: "global", vetoed: true, materialized: false };
      }
    }

    const role = context.role ?? this.roleBlockFor(context);
    const groupId = context.channelType === "group" ? context.groupId : undefined;
    const materialized =
      groupId !== undefined && groupId !== DEFAULT_SCOPE_KEY
        ? this.store.materializeGroupRoleBlock(groupId, role)
        : false;

    const doc = this.store.snapshot();
    const required = isRequiredKey(normalized);
    const layers = this.collectLayers(doc, segments, context, role, groupId).filter(
      (layer) => !(required && isUnsetValue(layer.value)),
    );
    if (!required) {
      const fallback = fallbackValue(segments);
      if (fallback !== undefined) {
        layers.push({ level: "fallback", value: fallback });
      }
    }

    const combined = combineLayers(layers, isObjectNode(node));
    if (!combined) {
      if (required) {
        throw new ConfigKeyMissingError([normalized], this.store.source);
      }
      logWarn(`No value for optional key '${normalized}' at any level; using undefined`);
      return { value: undefined, source: "fallback", vetoed: false, materialized };
    }
    if (combined.source === "fallback") {
      logWarn(`Optional key '${normalized}' missing from the document; using compiled-in default`);
    }

    const pinned = pinGlobalOnlyFields(doc, segments, combined.value);
    const { value, vetoed } = applyVeto(doc, segments, pinned);
    return { value, source: combined.source, vetoed, materialized };
  }

  resolveBoolean(keyPath: string, context: ScopeContext): boolean {
    return this.resolveTyped(keyPath, context, "a boolean", (v): v is boolean => typeof v === "boolean", false);
  }

  resolveNumber(keyPath: string, context: ScopeContext): number {
    return this.resolveTyped(
      keyPath,
      context,
      "a number",
      (v): v is number => typeof v === "number" && Number.isFinite(v),
      0,
    );
  }

  resolveInteger(keyPath: string, context: ScopeContext): number {
    return this.resolveTyped(keyPath, context, "an integer", (v): v is number => Number.isInteger(v), 0);
  }

  resolveString(keyPath: string, context: ScopeContext): string {
    return this.resolveTyped(keyPath, context, "a string", (v): v is string => typeof v === "string", "");
  }

  resolveStringList(keyPath: string, context: ScopeContext): string[] {
    return this.resolveTyped(
      keyPath,
      context,
      "a list of strings",
      (v): v is string[] => Array.isArray(v) && v.every((item) => typeof item === "string"),
      [],
    );
  }

  private resolveTyped<T>(
    keyPath: string,
    context: ScopeContext,
    expected: string,
    guard: (value: unknown) => value is T,
    empty: T,
  ): T {
    const { value, source } = this.resolve(keyPath, context);
    if (guard(value)) {
      return value;
    }
    const fallback = fallbackValue(validateKeyPath(keyPath).segments);
    logWarn(`Key '${keyPath}' resolved from ${source} is not ${expected}; using compiled-in default`);
    return guard(fallback) ? fallback : empty;
  }

  private collectLayers(
    doc: Readonly<ConfigDocument>,
    segments: readonly string[],
    context: ScopeContext,
    role: RoleBlockName,
    groupId: string | undefined,
  ): Layer[] {
    const layers: Layer[] = [];
    const add = (level: ResolutionLevel, base: unknown) => {
      const value = getPath(base, segments);
      if (value !== undefined) {
        layers.push({ level, value });
      }
    };
    const isPrivate = context.channelType === "private";

    if (groupId !== undefined) {
      add("group_specific_user", getPath(doc.group, [groupId, SPECIFIC_USER_KEY, context.userId]));
    }
    if (isPrivate) {
      add("private_specific_user", getPath(doc.private, [SPECIFIC_USER_KEY, context.userId]));
    }
    if (groupId !== undefined && groupId !== DEFAULT_SCOPE_KEY) {
      add("group_scope", getPath(doc.group, [groupId]));
      add("group_role", getPath(doc.group, [groupId, role]));
    }
    if (isPrivate) {
      add("private_role_default", getPath(doc.private, [DEFAULT_SCOPE_KEY, role]));
    } else {
      add("group_role_default", getPath(doc.group, [DEFAULT_SCOPE_KEY, role]));
    }
    add("global", doc);
    return layers;
  }

  /** Keys outside the cascade: `log.*`, `service.*`, `permissions.*`, global-only `qq_bot` keys, … */
  private resolveTopLevel(keyPath: string, segments: readonly string[], node: KeySchemaNode): Resolution {
    const value = this.store.read(segments);
    if (isRequiredKey(keyPath)) {
      if (isUnsetValue(value)) {
        throw new ConfigKeyMissingError([keyPath], this.store.source);
      }
      return { value: structuredClone(value), source: "global", vetoed: false, materialized: false };
    }
    if (value !== undefined) {
      const merged = isObjectNode(node) ? deepMerge(fallbackValue(segments) ?? {}, value) : structuredClone(value);
      return { value: merged, source: "global", vetoed: false, materialized: false };
    }
    logWarn(`Key '${keyPath}' missing from the document; using compiled-in default`);
    return { value: fallbackValue(segments), source: "fallback", vetoed: false, materialized: false };
  }
}

/**
 * Leaves: most specific layer wins. Objects: merge least specific first,
 * ignoring layers that hold a non-object.
 */
function combineLayers(
  layers: readonly Layer[],
  objectNode: boolean,
): { value: unknown; source: ResolutionLevel } | undefined {
  if (!objectNode) {
    const top = layers[0];
    return top ? { value: structuredClone(top.value), source: top.level } : undefined;
  }
  const objects = layers.filter((layer) => isPlainObject(layer.value));
  const top = objects[0];
  if (!top) {
    return undefined;
  }
  const value = objects.reduceRight<unknown>((acc, layer) => deepMerge(acc, layer.value), {});
  return { value, source: top.level };
}

/** Whole-section reads (`qq_bot`) must not pick up overrides of global-only keys. */
function pinGlobalOnlyFields(doc: Readonly<ConfigDocument>, segments: readonly string[], value: unknown): unknown {
  if (segments.length !== 1 || !isPlainObject(value)) {
    return value;
  }
  for (const key of GLOBAL_ONLY_KEYS) {
    const [section, field] = key.split(".");
    if (section === segments[0] && field !== undefined) {
      value[field] = structuredClone(getPath(doc, [section, field]));
    }
  }
  return value;
}

function applyVeto(
  doc: Readonly<ConfigDocument>,
  segments: readonly string[],
  value: unknown,
): { value: unknown; vetoed: boolean } {
  const globalFalse = (flag: string) => getPath(doc, ["settings", flag]) === false;
  const path = joinKeyPath(segments);

  // settings (whole section): AND every enable_* field with its global switch.
  if (path === "settings" && isPlainObject(value)) {
    let vetoed = false;
    for (const key of Object.keys(value)) {
      if (key.startsWith(ENABLE_PREFIX) && globalFalse(key)) {
        value[key] = false;
        vetoed = true;
      }
    }
    return { value, vetoed };
  }

  if (segments[0] !== "random_events") {
    return { value, vetoed: false };
  }

  // random_events.<id>.enabled and containing objects: AND with settings.enable_<id>_event.
  const gateEvent = (eventId: string, config: unknown): boolean => {
    const flag = eventGateFlag(eventId);
    if (!flag || !globalFalse(flag) || !isPlainObject(config)) {
      return false;
    }
    config.enabled = false;
    return true;
  };

  if (segments.length === 1 && isPlainObject(value)) {
    let vetoed = false;
    for (const [eventId, config] of Object.entries(value)) {
      vetoed = gateEvent(eventId, config) || vetoed;
    }
    return { value, vetoed };
  }
  if (segments.length === 2) {
    return { value, vetoed: gateEvent(segments[1], value) };
  }
  if (segments.length === 3 && segments[2] === "enabled") {
    const flag = eventGateFlag(segments[1]);
    if (flag && globalFalse(flag)) {
      return { value: false, vetoed: true };
    }
  }
  return { value, vetoed: false };
}
