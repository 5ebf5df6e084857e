import type { ConfigDocument, RandomEventConfig } from "./types.js";

/** Placeholder for values the operator must supply before the bot can start. */
export const REQUIRED_PLACEHOLDER = "REQUIRED";

/** Fallback for any `random_events.<id>` the document does not describe. */
export const RANDOM_EVENT_FALLBACK: RandomEventConfig = {
  enabled: false,
  probability: 0,
  min_interval: -1,
  shared_min_interval: 0,
};

const DEFAULT_SYSTEM_PROMPT =
  "You are Yui, a sharp-tongued cat-girl assistant. You tease and complain, " +
  "put your real thoughts in parentheses and like to end sentences with 'nya~'.";

/**
 * The compiled-in document. Used when no file exists, as the merge base for
 * loaded files and as the last cascade level for optional keys.
 */
export function createDefaultDocument(): ConfigDocument {
  return {
    qq_bot: {
      qq_no: REQUIRED_PLACEHOLDER,
      admin_qq: REQUIRED_PLACEHOLDER,
      auto_confirm: false,
      cqhttp_url: "http://127.0.0.1:5700",
      image_path: "./data/images",
      voice_path: "./data/voices",
      voice: "zh-CN-YunxiNeural",
      max_length: 2000,
      bot_name: "Yui",
      group_keyword: "Yui",
    },
    gemini: {
      api_keys: [REQUIRED_PLACEHOLDER],
      model: "gemini-1.5-pro",
      safety_settings: {
        HARM_CATEGORY_HATE_SPEECH: "BLOCK_NONE",
        HARM_CATEGORY_SEXUALLY_EXPLICIT: "BLOCK_NONE",
        HARM_CATEGORY_DANGEROUS_CONTENT: "BLOCK_NONE",
        HARM_CATEGORY_HARASSMENT: "BLOCK_NONE",
      },
      generation_config: {
        top_p: 1,
        top_k: 1,
        temperature: 0.7,
        max_output_tokens: 2000,
      },
      system_prompt: DEFAULT_SYSTEM_PROMPT,
    },
    log: {
      level: "INFO",
      file_path: "./logs/app.log",
    },
    settings: {
      enable_personality_retrain: false,
      enable_history_edit: false,
      enable_ai_chat: true,
      enable_chat_commands: true,
      enable_random_events: false,
      enable_repeat_event: false,
      send_voice: false,
      message_rate_limit: 30,
    },
    random_events: {
      repeat: {
        id: "repeat",
        name: "Random repeat",
        description: "Repeats a group message at random",
        enabled: false,
        probability: 0.05,
        min_interval: -1,
        shared_min_interval: 60,
      },
    },
    proxy: {},
    permissions: { users: {} },
    group: {
      __default__: {
        user: {
          settings: { message_rate_limit: 20 },
          random_events: {
            repeat: { probability: 0.03, shared_min_interval: 60, min_interval: -1, enabled: true },
          },
        },
        manager: {
          settings: { message_rate_limit: 100 },
          random_events: {
            repeat: { probability: 0.01, shared_min_interval: 30, min_interval: -1, enabled: true },
          },
        },
        blacklisted: {
          settings: {
            enable_ai_chat: false,
            enable_chat_commands: false,
            enable_random_events: false,
          },
        },
      },
    },
    private: {
      __default__: {
        user: {
          settings: { message_rate_limit: 50 },
          random_events: {},
        },
      },
    },
    service: {
      host: "127.0.0.1",
      port: 5555,
      use_reloader: false,
    },
  };
}

/** `"REQUIRED"`, an empty value, or a list holding nothing but placeholders. */
export function isUnsetValue(value: unknown): boolean {
  if (value === undefined || value === null || value === REQUIRED_PLACEHOLDER) {
    return true;
  }
  if (typeof value === "string") {
    return value.trim() === "";
  }
  if (Array.isArray(value)) {
    return value.every((item) => item === REQUIRED_PLACEHOLDER || item === "");
  }
  return false;
}
