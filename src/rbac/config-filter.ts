import { isPlainObject } from "../config/key-paths.js";
import { hasCapability } from "./permissions.js";
import type { Role } from "./types.js";

const HIDDEN_PLACEHOLDER = "[hidden, admin only]";

/** Leaf names that hold credentials wherever they appear (top level or inside an override block). */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set(["api_keys", "https_proxy"]);

export function isSensitiveKeyPath(path: string): boolean {
  const last = path.split(".").at(-1);
  return last !== undefined && SENSITIVE_KEYS.has(last);
}

/**
 * Filter a single value for display.
 *
 * @returns `{ value, hidden }`; `hidden` is true when the value was replaced.
 */
export function filterConfigValue(params: { path: string; value: unknown; roles: ReadonlySet<Role> }): {
  value: unknown;
  hidden: boolean;
} {
  const { path, value, roles } = params;
  if (hasCapability(roles, "config.read.sensitive") || !isSensitiveKeyPath(path)) {
    return { value, hidden: false };
  }
  return { value: HIDDEN_PLACEHOLDER, hidden: true };
}

/**
 * Recursively redact sensitive fields of a config block for display
 * (`settings raw`, …). Returns the input unchanged for admins.
 */
export function redactConfigForRoles(params: {
  config: Record<string, unknown>;
  roles: ReadonlySet<Role>;
  pathPrefix?: string;
}): Record<string, unknown> {
  const { config, roles, pathPrefix = "" } = params;
  if (hasCapability(roles, "config.read.sensitive")) {
    return config;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    const path = pathPrefix ? `${pathPrefix}.${key}` : key;
    if (isSensitiveKeyPath(path)) {
      result[key] = HIDDEN_PLACEHOLDER;
    } else if (isPlainObject(value)) {
      result[key] = redactConfigForRoles({ config: value, roles, pathPrefix: path });
    } else {
      result[key] = value;
    }
  }
  return result;
}
