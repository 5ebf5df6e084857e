/**
 * Structural validation for persisted policy documents.
 *
 * Runs after the file has been merged over the compiled-in defaults, so every
 * section is expected to be complete here; override blocks stay partial.
 */
import { z } from "zod";
import { ROLES } from "../rbac/types.js";
import { MalformedDocumentError } from "./errors.js";
import type { ConfigDocument } from "./types.js";

// ── Zod Schemas ────────────────────────────────────────────────

/** QQ ids are written as numbers or strings; always keep them as strings. */
const IdSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const QqBotSchema = z
  .object({
    qq_no: IdSchema,
    admin_qq: IdSchema,
    auto_confirm: z.boolean(),
    cqhttp_url: z.string(),
    image_path: z.string(),
    voice_path: z.string(),
    voice: z.string(),
    max_length: z.number().int().positive(),
    bot_name: z.string(),
    group_keyword: z.string(),
  })
  .strict();

const GenerationConfigSchema = z
  .object({
    top_p: z.number(),
    top_k: z.number(),
    temperature: z.number(),
    max_output_tokens: z.number().int().positive(),
  })
  .strict();

export const GeminiSchema = z
  .object({
    api_keys: z.array(z.string()),
    model: z.string(),
    safety_settings: z.record(z.string(), z.string()),
    generation_config: GenerationConfigSchema,
    system_prompt: z.string(),
  })
  .strict();

const GeminiOverrideSchema = GeminiSchema.extend({
  generation_config: GenerationConfigSchema.partial(),
}).partial();

export const SettingsSchema = z
  .object({
    enable_personality_retrain: z.boolean(),
    enable_history_edit: z.boolean(),
    enable_ai_chat: z.boolean(),
    enable_chat_commands: z.boolean(),
    enable_random_events: z.boolean(),
    enable_repeat_event: z.boolean(),
    send_voice: z.boolean(),
    message_rate_limit: z.number().int(),
  })
  .strict();

export const RandomEventSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    enabled: z.boolean(),
    probability: z.number().min(0).max(1),
    min_interval: z.number().int().min(-1),
    shared_min_interval: z.number().int().min(0),
  })
  .strict();

const OverrideBlockSchema = z
  .object({
    settings: SettingsSchema.partial().optional(),
    random_events: z.record(z.string(), RandomEventSchema.partial()).optional(),
    gemini: GeminiOverrideSchema.optional(),
    qq_bot: QqBotSchema.partial().optional(),
  })
  .strict();

export const ScopeNodeSchema = z
  .object({
    user: OverrideBlockSchema.optional(),
    manager: OverrideBlockSchema.optional(),
    blacklisted: OverrideBlockSchema.optional(),
    __specific_user__: z.record(z.string(), OverrideBlockSchema).optional(),
    settings: SettingsSchema.partial().optional(),
    random_events: z.record(z.string(), RandomEventSchema.partial()).optional(),
  })
  .strict();

export const PermissionEntrySchema = z
  .object({
    roles: z.array(z.enum(ROLES)).default([]),
    managed_groups: z.array(IdSchema).default([]),
    blacklisted_in: z.array(IdSchema).default([]),
  })
  .strict();

export const ConfigDocumentSchema = z
  .object({
    qq_bot: QqBotSchema,
    gemini: GeminiSchema,
    log: z.object({ level: z.string(), file_path: z.string() }).strict(),
    settings: SettingsSchema,
    random_events: z.record(z.string(), RandomEventSchema),
    proxy: z.object({ https_proxy: z.string().optional() }).strict(),
    permissions: z.object({ users: z.record(z.string(), PermissionEntrySchema) }).strict(),
    group: z.object({ __default__: ScopeNodeSchema }).catchall(ScopeNodeSchema),
    private: z
      .object({
        __default__: ScopeNodeSchema,
        __specific_user__: z.record(z.string(), OverrideBlockSchema).optional(),
      })
      .strict(),
    service: z
      .object({
        host: z.string(),
        port: z.number().int().min(0).max(65535),
        use_reloader: z.boolean(),
      })
      .strict(),
  })
  .strict();

// ── Validation ─────────────────────────────────────────────────

export type DocumentValidationResult =
  | { success: true; data: ConfigDocument }
  | { success: false; issues: string[] };

export function validateConfigDocument(input: unknown): DocumentValidationResult {
  const parseResult = ConfigDocumentSchema.safeParse(input);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return { success: false, issues };
  }
  return { success: true, data: parseResult.data };
}

/** Validate or fail with `MalformedDocumentError`; never returns a partial document. */
export function parseConfigDocument(input: unknown, source: string): ConfigDocument {
  const result = validateConfigDocument(input);
  if (!result.success) {
    throw new MalformedDocumentError(source, result.issues);
  }
  return result.data;
}
