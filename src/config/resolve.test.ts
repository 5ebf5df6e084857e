import { describe, expect, it } from "vitest";
import { openTestStore } from "./__tests__/fixtures.js";
import { createDefaultDocument, RANDOM_EVENT_FALLBACK } from "./defaults.js";
import { ConfigKeyMissingError, InvalidKeyPathError } from "./errors.js";
import { setPath } from "./merge.js";
import { Resolver } from "./resolve.js";
import type { ScopeContext } from "./types.js";

const inGroup = (groupId: string, userId = "u1", role: ScopeContext["role"] = "user"): ScopeContext => ({
  channelType: "group",
  groupId,
  userId,
  role,
});

const inPrivate = (userId = "u1", role: ScopeContext["role"] = "user"): ScopeContext => ({
  channelType: "private",
  userId,
  role,
});

async function setup(overrides: Record<string, unknown> = {}) {
  const { store, persistence } = await openTestStore(overrides);
  return { store, persistence, resolver: new Resolver(store) };
}

describe("Resolver veto", () => {
  it("forces a feature off when the global switch is off", async () => {
    const { resolver } = await setup({
      settings: { enable_ai_chat: false },
      group: { "12345": { user: { settings: { enable_ai_chat: true } } } },
    });

    expect(resolver.resolve("settings.enable_ai_chat", inGroup("12345"))).toEqual({
      value: false,
      source: "global",
      vetoed: true,
      materialized: false,
    });
  });

  it("lets lower levels turn a globally enabled feature off", async () => {
    const { resolver } = await setup({
      group: { "12345": { user: { settings: { enable_ai_chat: false } } } },
    });

    const result = resolver.resolve("settings.enable_ai_chat", inGroup("12345"));
    expect(result.value).toBe(false);
    expect(result.source).toBe("group_role");
    expect(result.vetoed).toBe(false);
  });

  it("vetoes enable_* fields of a whole-section read", async () => {
    const { resolver } = await setup({
      settings: { enable_chat_commands: false },
      group: { "50": { user: { settings: { enable_chat_commands: true, send_voice: true } } } },
    });

    const result = resolver.resolve("settings", inGroup("50"));
    expect(result.vetoed).toBe(true);
    expect(result.value).toMatchObject({ enable_chat_commands: false, send_voice: true, enable_ai_chat: true });
  });

  it("gates random_events.<id>.enabled on settings.enable_<id>_event", async () => {
    const { resolver } = await setup();

    expect(resolver.resolve("random_events.repeat.enabled", inGroup("555"))).toMatchObject({
      value: false,
      vetoed: true,
    });
    expect(resolver.resolve("random_events.repeat", inGroup("555"))).toMatchObject({
      value: { enabled: false, probability: 0.03 },
      vetoed: true,
    });
  });
});

describe("Resolver cascade", () => {
  it("reads a copied-down role block for an untouched group", async () => {
    const { resolver } = await setup();

    expect(resolver.resolve("settings.message_rate_limit", inGroup("777"))).toEqual({
      value: 20,
      source: "group_role",
      vetoed: false,
      materialized: true,
    });
    expect(resolver.resolve("settings.message_rate_limit", inGroup("777"))).toEqual({
      value: 20,
      source: "group_role",
      vetoed: false,
      materialized: false,
    });
  });

  it("prefers the group specific-user override over every other level", async () => {
    const { resolver } = await setup({
      group: { "777": { __specific_user__: { u9: { settings: { message_rate_limit: 5 } } } } },
    });

    expect(resolver.resolve("settings.message_rate_limit", inGroup("777", "u9"))).toMatchObject({
      value: 5,
      source: "group_specific_user",
    });
    expect(resolver.resolve("settings.message_rate_limit", inGroup("777", "u8")).value).toBe(20);
  });

  it("uses flat group settings for keys the role block does not set", async () => {
    const { resolver } = await setup({ group: { "777": { settings: { send_voice: true } } } });

    expect(resolver.resolve("settings.send_voice", inGroup("777"))).toMatchObject({
      value: true,
      source: "group_scope",
    });
  });

  it("ranks flat group settings above the copied role block", async () => {
    const { resolver, store } = await setup({ group: { "777": { settings: { message_rate_limit: 5 } } } });

    expect(resolver.resolve("settings.message_rate_limit", inGroup("777"))).toMatchObject({
      value: 5,
      source: "group_scope",
      materialized: true,
    });
    expect(store.read(["group", "777", "user", "settings", "message_rate_limit"])).toBe(20);
  });

  it("applies private specific-user overrides in private scope only", async () => {
    const { resolver } = await setup({
      private: { __specific_user__: { u9: { settings: { message_rate_limit: 7 } } } },
    });

    expect(resolver.resolve("settings.message_rate_limit", inPrivate("u9"))).toMatchObject({
      value: 7,
      source: "private_specific_user",
    });
    expect(resolver.resolve("settings.message_rate_limit", inGroup("777", "u9"))).toMatchObject({
      value: 20,
      source: "group_role",
    });
  });

  it("falls from the private default role block to the global section", async () => {
    const { resolver } = await setup();

    expect(resolver.resolve("settings.message_rate_limit", inPrivate("u1"))).toMatchObject({
      value: 50,
      source: "private_role_default",
    });
    expect(resolver.resolve("settings.message_rate_limit", inPrivate("u1", "manager"))).toMatchObject({
      value: 30,
      source: "global",
    });
  });

  it("inherits sibling fields of a partially overridden object", async () => {
    const { resolver } = await setup({
      settings: { enable_repeat_event: true },
      group: { "555": { user: { random_events: { repeat: { probability: 0.5 } } } } },
    });

    const result = resolver.resolve("random_events.repeat", inGroup("555"));
    expect(result.source).toBe("group_role");
    expect(result.vetoed).toBe(false);
    expect(result.value).toEqual({
      id: "repeat",
      name: "Random repeat",
      description: "Repeats a group message at random",
      enabled: true,
      probability: 0.5,
      min_interval: -1,
      shared_min_interval: 60,
    });
  });

  it("asks the role lookup when the context has no role", async () => {
    const { store } = await openTestStore();
    const resolver = new Resolver(store, { roleBlockFor: () => "manager" });

    expect(
      resolver.resolve("settings.message_rate_limit", { channelType: "group", groupId: "321", userId: "u1" }),
    ).toMatchObject({ value: 100, source: "group_role" });
    expect(store.read(["group", "321", "manager"])).toBeDefined();
    expect(store.read(["group", "321", "user"])).toBeUndefined();
  });

  it("reads global-only keys from the top level", async () => {
    const { resolver } = await setup({
      group: { "1": { user: { qq_bot: { cqhttp_url: "http://elsewhere", bot_name: "Bot1" } } } },
    });

    expect(resolver.resolve("qq_bot.cqhttp_url", inGroup("1"))).toMatchObject({
      value: "http://127.0.0.1:5700",
      source: "global",
    });
    expect(resolver.resolve("qq_bot.bot_name", inGroup("1"))).toMatchObject({
      value: "Bot1",
      source: "group_role",
    });
    expect(resolver.resolve("qq_bot", inGroup("1")).value).toMatchObject({
      cqhttp_url: "http://127.0.0.1:5700",
      bot_name: "Bot1",
    });
  });
});

describe("Resolver copy-down", () => {
  it("is idempotent and detached from later default edits", async () => {
    const { store, persistence, resolver } = await setup();
    const first = resolver.resolve("random_events.repeat", inGroup("888"));
    const second = resolver.resolve("random_events.repeat", inGroup("888"));

    expect(second.value).toEqual(first.value);
    expect(store.read(["group", "888", "user"])).toEqual(createDefaultDocument().group.__default__.user);

    store.mutate("edit default", (draft) => {
      setPath(draft, ["group", "__default__", "user", "settings", "message_rate_limit"], 99);
    });

    expect(resolver.resolve("settings.message_rate_limit", inGroup("888")).value).toBe(20);
    expect(resolver.resolve("settings.message_rate_limit", inGroup("889")).value).toBe(99);

    await store.flush();
    expect(persistence.saved.at(-1)?.group["888"]?.user?.settings?.message_rate_limit).toBe(20);
  });
});

describe("Resolver required and optional keys", () => {
  it("fails on a mandatory key left at its placeholder", async () => {
    const { resolver } = await setup({ qq_bot: { admin_qq: "REQUIRED" } });

    expect(() => resolver.resolve("qq_bot.admin_qq", inPrivate())).toThrow(ConfigKeyMissingError);
  });

  it("lets a group override satisfy a cascading mandatory key", async () => {
    const { resolver } = await setup({
      gemini: { api_keys: ["REQUIRED"] },
      group: { "42": { user: { gemini: { api_keys: ["group-key"] } } } },
    });

    expect(resolver.resolve("gemini.api_keys", inGroup("42"))).toMatchObject({
      value: ["group-key"],
      source: "group_role",
    });
    expect(() => resolver.resolve("gemini.api_keys", inGroup("43"))).toThrow(ConfigKeyMissingError);
  });

  it("falls back to the disabled template for unknown events", async () => {
    const { resolver } = await setup();

    expect(resolver.resolve("random_events.mystery", inPrivate())).toEqual({
      value: RANDOM_EVENT_FALLBACK,
      source: "fallback",
      vetoed: false,
      materialized: false,
    });
  });

  it("rejects paths outside the key-path schema", async () => {
    const { resolver } = await setup();

    expect(() => resolver.resolve("settings.enable_teleport", inPrivate())).toThrow(InvalidKeyPathError);
  });
});

describe("Resolver typed accessors", () => {
  it("returns values of the requested kind", async () => {
    const { resolver } = await setup();

    expect(resolver.resolveNumber("settings.message_rate_limit", inGroup("9"))).toBe(20);
    expect(resolver.resolveBoolean("settings.enable_ai_chat", inGroup("9"))).toBe(true);
    expect(resolver.resolveString("gemini.model", inPrivate())).toBe("gemini-1.5-pro");
    expect(resolver.resolveStringList("gemini.api_keys", inPrivate())).toEqual(["test-key"]);
  });

  it("separates integers from other numbers", async () => {
    const { resolver } = await setup();

    expect(resolver.resolveInteger("qq_bot.max_length", inPrivate())).toBe(2000);
    expect(resolver.resolveNumber("gemini.generation_config.temperature", inPrivate())).toBe(0.7);
    expect(resolver.resolveInteger("gemini.generation_config.temperature", inPrivate())).toBe(0);
  });

  it("substitutes the compiled-in default for a value of the wrong kind", async () => {
    const { store, resolver } = await setup();
    store.mutate("corrupt", (draft) => {
      setPath(draft, ["settings", "message_rate_limit"], "lots");
    });

    expect(resolver.resolveNumber("settings.message_rate_limit", inPrivate("u1", "manager"))).toBe(30);
  });
});
