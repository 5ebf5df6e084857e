/**
 * Closed key-path schema for the policy document.
 *
 * Every path handed to the resolver or to `setConfig` is checked against this
 * tree, so typos fail loudly instead of silently reading `undefined`.
 */
import { InvalidKeyPathError } from "./errors.js";
import { DEFAULT_SCOPE_KEY, SPECIFIC_USER_KEY } from "./types.js";

// ── Schema nodes ───────────────────────────────────────────────

export type LeafKind = "boolean" | "number" | "string" | "string[]";

export type KeySchemaNode =
  | { kind: "leaf"; type: LeafKind; required?: boolean }
  /** Free-form string map (e.g. `gemini.safety_settings`). */
  | { kind: "record"; valueType: LeafKind }
  | { kind: "object"; fields: Record<string, KeySchemaNode> }
  /** Wildcard segment: `random_events.<id>`, `group.<id>`, … */
  | { kind: "map"; label: string; entry: KeySchemaNode };

type ObjectSchemaNode = Extract<KeySchemaNode, { kind: "object" }>;

const leaf = (type: LeafKind, required = false): KeySchemaNode => ({ kind: "leaf", type, required });
const object = (fields: Record<string, KeySchemaNode>): ObjectSchemaNode => ({ kind: "object", fields });
const map = (label: string, entry: KeySchemaNode): KeySchemaNode => ({ kind: "map", label, entry });

const QQ_BOT = object({
  qq_no: leaf("string", true),
  admin_qq: leaf("string", true),
  auto_confirm: leaf("boolean"),
  cqhttp_url: leaf("string"),
  image_path: leaf("string"),
  voice_path: leaf("string"),
  voice: leaf("string"),
  max_length: leaf("number"),
  bot_name: leaf("string"),
  group_keyword: leaf("string"),
});

const GEMINI = object({
  api_keys: leaf("string[]", true),
  model: leaf("string"),
  safety_settings: { kind: "record", valueType: "string" },
  generation_config: object({
    top_p: leaf("number"),
    top_k: leaf("number"),
    temperature: leaf("number"),
    max_output_tokens: leaf("number"),
  }),
  system_prompt: leaf("string"),
});

const SETTINGS = object({
  enable_personality_retrain: leaf("boolean"),
  enable_history_edit: leaf("boolean"),
  enable_ai_chat: leaf("boolean"),
  enable_chat_commands: leaf("boolean"),
  enable_random_events: leaf("boolean"),
  enable_repeat_event: leaf("boolean"),
  send_voice: leaf("boolean"),
  message_rate_limit: leaf("number"),
});

const RANDOM_EVENT = object({
  id: leaf("string"),
  name: leaf("string"),
  description: leaf("string"),
  enabled: leaf("boolean"),
  probability: leaf("number"),
  min_interval: leaf("number"),
  shared_min_interval: leaf("number"),
});

const RANDOM_EVENTS = map("event id", RANDOM_EVENT);

/** Sections a role block or specific-user block may override. */
const OVERRIDE_BLOCK = object({
  settings: SETTINGS,
  random_events: RANDOM_EVENTS,
  gemini: GEMINI,
  qq_bot: QQ_BOT,
});

const SCOPE_NODE = object({
  user: OVERRIDE_BLOCK,
  manager: OVERRIDE_BLOCK,
  blacklisted: OVERRIDE_BLOCK,
  [SPECIFIC_USER_KEY]: map("user id", OVERRIDE_BLOCK),
  settings: SETTINGS,
  random_events: RANDOM_EVENTS,
});

export const DOCUMENT_KEY_SCHEMA = object({
  qq_bot: QQ_BOT,
  gemini: GEMINI,
  log: object({ level: leaf("string"), file_path: leaf("string") }),
  settings: SETTINGS,
  random_events: RANDOM_EVENTS,
  proxy: object({ https_proxy: leaf("string") }),
  permissions: object({
    users: map(
      "user id",
      object({
        roles: leaf("string[]"),
        managed_groups: leaf("string[]"),
        blacklisted_in: leaf("string[]"),
      }),
    ),
  }),
  group: map("group id", SCOPE_NODE),
  private: object({
    [DEFAULT_SCOPE_KEY]: SCOPE_NODE,
    [SPECIFIC_USER_KEY]: map("user id", OVERRIDE_BLOCK),
  }),
  service: object({
    host: leaf("string"),
    port: leaf("number"),
    use_reloader: leaf("boolean"),
  }),
});

// ── Paths ──────────────────────────────────────────────────────

/** Sections whose keys cascade through the scope hierarchy. */
export const CASCADING_SECTIONS: ReadonlySet<string> = new Set([
  "settings",
  "random_events",
  "gemini",
  "qq_bot",
]);

/** Keys inside cascading sections that are nevertheless read only at top level. */
export const GLOBAL_ONLY_KEYS: ReadonlySet<string> = new Set([
  "qq_bot.qq_no",
  "qq_bot.admin_qq",
  "qq_bot.cqhttp_url",
  "qq_bot.image_path",
  "qq_bot.voice_path",
]);

export function splitKeyPath(keyPath: string): string[] {
  const trimmed = keyPath.trim();
  if (!trimmed) {
    throw new InvalidKeyPathError(keyPath, "path is empty");
  }
  const segments = trimmed.split(".");
  if (segments.some((segment) => segment.trim() === "")) {
    throw new InvalidKeyPathError(keyPath, "path contains an empty segment");
  }
  return segments.map((segment) => segment.trim());
}

export function joinKeyPath(segments: readonly string[]): string {
  return segments.join(".");
}

/**
 * Walk the schema along `segments`. Returns the node addressed by the path,
 * or throws `InvalidKeyPathError` naming the first unknown segment.
 */
export function lookupKeySchema(segments: readonly string[]): KeySchemaNode {
  let node: KeySchemaNode = DOCUMENT_KEY_SCHEMA;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const walked = joinKeyPath(segments.slice(0, i + 1));
    switch (node.kind) {
      case "object": {
        const next: KeySchemaNode | undefined = node.fields[segment];
        if (!next) {
          const known = Object.keys(node.fields).join(", ");
          throw new InvalidKeyPathError(walked, `unknown key '${segment}' (expected one of: ${known})`);
        }
        node = next;
        break;
      }
      case "map":
        node = node.entry;
        break;
      case "record":
        node = leaf(node.valueType);
        break;
      case "leaf":
        throw new InvalidKeyPathError(walked, `'${joinKeyPath(segments.slice(0, i))}' is a ${node.type} value`);
    }
  }
  return node;
}

export type ValidatedKeyPath = {
  keyPath: string;
  segments: string[];
  node: KeySchemaNode;
};

export function validateKeyPath(keyPath: string): ValidatedKeyPath {
  const segments = splitKeyPath(keyPath);
  return { keyPath: joinKeyPath(segments), segments, node: lookupKeySchema(segments) };
}

export function isCascadingKey(segments: readonly string[]): boolean {
  return CASCADING_SECTIONS.has(segments[0]) && !GLOBAL_ONLY_KEYS.has(joinKeyPath(segments));
}

/** Mandatory top-level keys: no compiled-in fallback may satisfy them. */
export function listRequiredKeys(): string[] {
  return Object.entries(DOCUMENT_KEY_SCHEMA.fields).flatMap(([section, node]) =>
    node.kind === "object"
      ? Object.entries(node.fields)
          .filter(([, child]) => child.kind === "leaf" && child.required === true)
          .map(([key]) => `${section}.${key}`)
      : [],
  );
}

export function isRequiredKey(keyPath: string): boolean {
  return listRequiredKeys().includes(keyPath);
}

// ── Values ─────────────────────────────────────────────────────

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function matchesLeaf(type: LeafKind, value: unknown): boolean {
  switch (type) {
    case "boolean":
      return typeof value === "boolean";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "string":
      return typeof value === "string";
    case "string[]":
      return Array.isArray(value) && value.every((item) => typeof item === "string");
  }
}

export function describeNode(node: KeySchemaNode): string {
  switch (node.kind) {
    case "leaf":
      return node.type === "string[]" ? "a list of strings" : `a ${node.type}`;
    case "record":
      return `an object of ${node.valueType} values`;
    case "object":
      return "an object";
    case "map":
      return `an object keyed by ${node.label}`;
  }
}

/**
 * Check `value` against the schema node it would be written to.
 * Returns the offending sub-path (relative to the node) and what was
 * expected there, or undefined when the value fits.
 */
export function findValueMismatch(
  node: KeySchemaNode,
  value: unknown,
  path: readonly string[] = [],
): { path: string[]; expected: string } | undefined {
  const mismatch = (at: readonly string[], expected: string) => ({ path: [...at], expected });
  switch (node.kind) {
    case "leaf":
      return matchesLeaf(node.type, value) ? undefined : mismatch(path, describeNode(node));
    case "record": {
      if (!isPlainObject(value)) {
        return mismatch(path, describeNode(node));
      }
      const bad = Object.entries(value).find(([, item]) => !matchesLeaf(node.valueType, item));
      return bad ? mismatch([...path, bad[0]], describeNode(leaf(node.valueType))) : undefined;
    }
    case "object": {
      if (!isPlainObject(value)) {
        return mismatch(path, describeNode(node));
      }
      for (const [key, item] of Object.entries(value)) {
        const child = node.fields[key];
        if (!child) {
          return mismatch([...path, key], `one of: ${Object.keys(node.fields).join(", ")}`);
        }
        const nested = findValueMismatch(child, item, [...path, key]);
        if (nested) {
          return nested;
        }
      }
      return undefined;
    }
    case "map": {
      if (!isPlainObject(value)) {
        return mismatch(path, describeNode(node));
      }
      for (const [key, item] of Object.entries(value)) {
        const nested = findValueMismatch(node.entry, item, [...path, key]);
        if (nested) {
          return nested;
        }
      }
      return undefined;
    }
  }
}

/** Whether `settings.<name>` is a known key (used for per-event gate flags). */
export function isSettingsKey(name: string): boolean {
  return Object.hasOwn(SETTINGS.fields, name);
}
