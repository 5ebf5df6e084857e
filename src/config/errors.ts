/**
 * Error taxonomy shared by the config store, resolver, permission registry
 * and the command layer.
 */

export type PolicyErrorCode =
  | "CONFIG_KEY_MISSING"
  | "INVALID_ROLE"
  | "PERMISSION_DENIED"
  | "MALFORMED_DOCUMENT"
  | "CONCURRENT_MUTATION_CONFLICT"
  | "INVALID_KEY_PATH"
  | "INVALID_CONFIG_VALUE";

export abstract class PolicyError extends Error {
  abstract readonly code: PolicyErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No value at any cascade level (including compiled-in fallback) for a mandatory key. */
export class ConfigKeyMissingError extends PolicyError {
  readonly code = "CONFIG_KEY_MISSING";
  readonly keys: string[];

  constructor(keys: string[], configPath?: string) {
    const where = configPath ? ` Edit ${configPath}.` : "";
    super(`Missing required config keys (or still set to "REQUIRED"): ${keys.join(", ")}.${where}`);
    this.keys = keys;
  }
}

export class InvalidRoleError extends PolicyError {
  readonly code = "INVALID_ROLE";
  readonly token: string;

  constructor(token: string, allowed: readonly string[]) {
    super(`Unknown role '${token}'. Valid roles: ${allowed.join(", ")}`);
    this.token = token;
  }
}

export class PermissionDeniedError extends PolicyError {
  readonly code = "PERMISSION_DENIED";
  readonly requesterId: string;
  readonly keyPath?: string;

  constructor(params: { requesterId: string; keyPath?: string; reason: string }) {
    super(params.reason);
    this.requesterId = params.requesterId;
    this.keyPath = params.keyPath;
  }
}

export class MalformedDocumentError extends PolicyError {
  readonly code = "MALFORMED_DOCUMENT";
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Config document ${source} is malformed: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class ConcurrentMutationConflictError extends PolicyError {
  readonly code = "CONCURRENT_MUTATION_CONFLICT";

  constructor(active: string, attempted: string) {
    super(`Mutation '${attempted}' entered while '${active}' holds the mutation gate`);
  }
}

export class InvalidKeyPathError extends PolicyError {
  readonly code = "INVALID_KEY_PATH";
  readonly keyPath: string;

  constructor(keyPath: string, reason: string) {
    super(`Invalid key path '${keyPath}': ${reason}`);
    this.keyPath = keyPath;
  }
}

export class InvalidConfigValueError extends PolicyError {
  readonly code = "INVALID_CONFIG_VALUE";
  readonly keyPath: string;

  constructor(keyPath: string, detail: string) {
    super(`Invalid value for '${keyPath}': ${detail}`);
    this.keyPath = keyPath;
  }
}

/** `string`, `number`, `array`, `null`, … for error messages. */
export function describeValueKind(value: unknown): string {
  if (Array.isArray(value)) {
    return "array";
  }
  return value === null ? "null" : typeof value;
}

export function isPolicyError(error: unknown): error is PolicyError {
  return error instanceof PolicyError;
}
