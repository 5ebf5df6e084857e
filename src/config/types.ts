/**
 * Typed shape of the layered policy document.
 *
 * Top-level sections hold the global values (level 6 of the cascade);
 * `group` and `private` hold scope nodes with per-role override blocks.
 */

export type ChannelType = "group" | "private";

/** Name of a role block inside a scope node. */
export type RoleBlockName = "user" | "manager" | "blacklisted";

export const ROLE_BLOCK_NAMES: readonly RoleBlockName[] = ["user", "manager", "blacklisted"];

/** Reserved scope-node keys. */
export const DEFAULT_SCOPE_KEY = "__default__";
export const SPECIFIC_USER_KEY = "__specific_user__";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type QqBotSection = {
  qq_no: string;
  admin_qq: string;
  auto_confirm: boolean;
  cqhttp_url: string;
  image_path: string;
  voice_path: string;
  voice: string;
  max_length: number;
  bot_name: string;
  group_keyword: string;
};

export type GeminiSection = {
  api_keys: string[];
  model: string;
  safety_settings: Record<string, string>;
  generation_config: {
    top_p: number;
    top_k: number;
    temperature: number;
    max_output_tokens: number;
  };
  system_prompt: string;
};

export type LogSection = {
  level: string;
  file_path: string;
};

export type SettingsSection = {
  enable_personality_retrain: boolean;
  enable_history_edit: boolean;
  enable_ai_chat: boolean;
  enable_chat_commands: boolean;
  enable_random_events: boolean;
  enable_repeat_event: boolean;
  send_voice: boolean;
  /** Messages per hour; `<= 0` means unlimited. */
  message_rate_limit: number;
};

export type RandomEventConfig = {
  id?: string;
  name?: string;
  description?: string;
  enabled: boolean;
  probability: number;
  /** Personal cooldown in seconds; `-1` disables the personal gate. */
  min_interval: number;
  /** Group-shared cooldown in seconds; only used when `min_interval` is `-1`. */
  shared_min_interval: number;
};

export type PermissionEntryRecord = {
  roles: string[];
  managed_groups: string[];
  blacklisted_in: string[];
};

export type GeminiOverride = Partial<Omit<GeminiSection, "generation_config">> & {
  generation_config?: Partial<GeminiSection["generation_config"]>;
};

/** Partial overrides carried by role blocks and specific-user blocks. */
export type OverrideBlock = {
  settings?: Partial<SettingsSection>;
  random_events?: Record<string, Partial<RandomEventConfig>>;
  gemini?: GeminiOverride;
  qq_bot?: Partial<QqBotSection>;
};

export type RoleBlock = OverrideBlock;

export type ScopeNode = {
  user?: RoleBlock;
  manager?: RoleBlock;
  blacklisted?: RoleBlock;
  [SPECIFIC_USER_KEY]?: Record<string, OverrideBlock>;
  /** Flat group-wide overrides shared by every role of this scope. */
  settings?: Partial<SettingsSection>;
  random_events?: Record<string, Partial<RandomEventConfig>>;
};

export type PrivateSection = {
  [DEFAULT_SCOPE_KEY]: ScopeNode;
  [SPECIFIC_USER_KEY]?: Record<string, OverrideBlock>;
};

export type GroupSection = {
  [DEFAULT_SCOPE_KEY]: ScopeNode;
  [groupId: string]: ScopeNode;
};

export type ServiceSection = {
  host: string;
  port: number;
  use_reloader: boolean;
};

export type ConfigDocument = {
  qq_bot: QqBotSection;
  gemini: GeminiSection;
  log: LogSection;
  settings: SettingsSection;
  random_events: Record<string, RandomEventConfig>;
  proxy: { https_proxy?: string };
  permissions: { users: Record<string, PermissionEntryRecord> };
  group: GroupSection;
  private: PrivateSection;
  service: ServiceSection;
};

/** Conversational context a value is resolved for. */
export type ScopeContext = {
  channelType: ChannelType;
  groupId?: string;
  userId: string;
  /** Role block to read; derived from the permission registry when omitted. */
  role?: RoleBlockName;
};

export function scopeLabel(context: Pick<ScopeContext, "channelType" | "groupId">): string {
  return context.channelType === "group" ? `group:${context.groupId ?? "?"}` : "private";
}

/** Ids arrive as numbers from the gateway and as strings from the document. */
export function normalizeId(id: string | number): string {
  return String(id).trim();
}
