import { describe, expect, it } from "vitest";
import { InvalidKeyPathError, PermissionDeniedError } from "../config/errors.js";
import { ADMIN_ID, openTestEngine } from "../gateway/__tests__/engine.js";
import {
  applySettingsCommand,
  describeEffectiveSettings,
  parseSettingValue,
  resetCounts,
  showRawSettings,
} from "./settings.js";
import type { CommandHandlerResult, CommandInvocation } from "./types.js";

const ADMIN_DM: CommandInvocation = { senderId: ADMIN_ID, channelType: "private" };
const MANAGER_IN_GROUP: CommandInvocation = { senderId: 555, channelType: "group", groupId: 100 };

function replyLines(result: CommandHandlerResult): string[] {
  return result.reply.text.split("\n");
}

/** Body of a `--- … ---` framed reply. */
function rawBody(result: CommandHandlerResult): unknown {
  return JSON.parse(replyLines(result).slice(1, -1).join("\n"));
}

describe("parseSettingValue", () => {
  it.each([
    ["True", true],
    ["false", false],
    ["42", 42],
    ["-0.5", -0.5],
    ["1e3", 1000],
    ['["a", "b"]', ["a", "b"]],
    ['{"x": 1}', { x: 1 }],
    ['"quoted text"', "quoted text"],
    ["[broken", "[broken"],
    ["12abc", "12abc"],
    ["  hello  ", "hello"],
  ])("parses %j", (raw, expected) => {
    expect(parseSettingValue(raw)).toEqual(expected);
  });
});

describe("applySettingsCommand", () => {
  it("writes global keys for the admin", async () => {
    const { engine } = await openTestEngine();

    const result = applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "global" },
      key: "settings.send_voice",
      value: "true",
    });

    expect(result).toEqual({ ok: true, reply: { text: "✅ global: 'settings.send_voice' is now on." } });
    expect(engine.store.read(["settings", "send_voice"])).toBe(true);
  });

  it("lets a manager change the role defaults of their group", async () => {
    const { engine } = await openTestEngine();
    engine.registry.addManagedGroup("555", "100");

    const result = applySettingsCommand(engine, MANAGER_IN_GROUP, {
      target: { kind: "default", role: "user", groupId: 100 },
      key: "settings.message_rate_limit",
      value: "5",
    });

    expect(result.reply.text).toBe("✅ user defaults of group 100: 'settings.message_rate_limit' is now 5.");
    expect(engine.store.read(["group", "100", "user", "settings", "message_rate_limit"])).toBe(5);
    expect(engine.resolveNumber("settings.message_rate_limit", { channelType: "group", groupId: 100, userId: 777 })).toBe(
      5,
    );
  });

  it("refuses global writes from a manager", async () => {
    const { engine } = await openTestEngine();
    engine.registry.addManagedGroup("555", "100");

    const result = applySettingsCommand(engine, MANAGER_IN_GROUP, {
      target: { kind: "global" },
      key: "settings.send_voice",
      value: "true",
    });

    expect(result.ok).toBe(false);
    expect(result.reply.text).toBe("⛔ Only the admin may change 'settings.send_voice'");
    expect(!result.ok && result.error).toBeInstanceOf(PermissionDeniedError);
  });

  it("limits each target to its key prefixes", async () => {
    const { engine } = await openTestEngine();

    const result = applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "user_private", userId: 555 },
      key: "log.level",
      value: "DEBUG",
    });

    expect(result.reply.text).toBe(
      "❌ Invalid key path 'log.level': not settable for user 555 in private chat " +
        "(allowed prefixes: settings, random_events, gemini, qq_bot)",
    );
    expect(!result.ok && result.error).toBeInstanceOf(InvalidKeyPathError);
  });

  it("scopes a user-in-group override to that user", async () => {
    const { engine } = await openTestEngine();

    const result = applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "user_group", userId: 555, groupId: 100 },
      key: "settings.enable_ai_chat",
      value: "false",
    });

    expect(result.ok).toBe(true);
    expect(engine.store.read(["group", "100", "__specific_user__", "555", "settings", "enable_ai_chat"])).toBe(false);
    expect(engine.resolveBoolean("settings.enable_ai_chat", { channelType: "group", groupId: 100, userId: 555 })).toBe(
      false,
    );
    expect(engine.resolveBoolean("settings.enable_ai_chat", { channelType: "group", groupId: 100, userId: 556 })).toBe(
      true,
    );
  });

  it("reports values of the wrong kind", async () => {
    const { engine } = await openTestEngine();

    const result = applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "global" },
      key: "settings.message_rate_limit",
      value: "lots",
    });

    expect(result.reply.text).toBe(
      "❌ Invalid value for 'settings.message_rate_limit': must be a number, got string",
    );
  });

  it("does nothing while chat commands are switched off", async () => {
    const { engine } = await openTestEngine({ settings: { enable_chat_commands: false } });

    const result = applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "global" },
      key: "settings.enable_chat_commands",
      value: "true",
    });

    expect(result).toEqual({
      ok: false,
      reply: { text: "⚠️ Chat commands are disabled. Set settings.enable_chat_commands=true to enable." },
    });
    expect(engine.store.read(["settings", "enable_chat_commands"])).toBe(false);
  });
});

describe("describeEffectiveSettings", () => {
  it("shows the sender's own context with credentials hidden", async () => {
    const { engine } = await openTestEngine();

    const lines = replyLines(describeEffectiveSettings(engine, MANAGER_IN_GROUP));

    expect(lines[0]).toBe("Effective settings for user 555 (group 100)");
    expect(lines[1]).toBe("Roles: -");
    expect(lines).toContain("• settings.enable_ai_chat: on");
    expect(lines).toContain("• settings.message_rate_limit: 20");
    expect(lines).toContain('• qq_bot.bot_name: "Yui"');
    expect(lines).toContain("• random_events.repeat.enabled: off");
    expect(lines).toContain("• gemini.api_keys: [hidden, admin only]");
    expect(lines).toContain("• proxy.https_proxy: [hidden, admin only]");
    expect(lines.at(-1)).toBe('• gemini.system_prompt: "You are Yui, a sharp-tongued cat-girl as..."');
  });

  it("shows credentials to the admin", async () => {
    const { engine } = await openTestEngine();

    const lines = replyLines(describeEffectiveSettings(engine, ADMIN_DM, { userId: 555 }));

    expect(lines[0]).toBe("Effective settings for user 555 (private chat)");
    expect(lines).toContain("• settings.message_rate_limit: 50");
    expect(lines).toContain('• gemini.api_keys: ["test-key"]');
    expect(lines).toContain("• proxy.https_proxy: [unset]");
  });

  it("lets a manager inspect members of their group", async () => {
    const { engine } = await openTestEngine();
    engine.registry.addManagedGroup("555", "100");

    const lines = replyLines(describeEffectiveSettings(engine, MANAGER_IN_GROUP, { userId: 777 }));

    expect(lines.slice(0, 2)).toEqual(["Effective settings for user 777 (group 100)", "Roles: -"]);
  });

  it("keeps other users' settings private", async () => {
    const { engine } = await openTestEngine();

    const result = describeEffectiveSettings(engine, { senderId: 556, channelType: "private" }, { userId: 555 });

    expect(result.ok).toBe(false);
    expect(result.reply.text).toBe("⛔ Viewing the settings of user 555 requires admin access");
  });
});

describe("showRawSettings", () => {
  it("shows a group's stored block to its manager, redacted", async () => {
    const { engine } = await openTestEngine();
    engine.registry.addManagedGroup("555", "100");
    applySettingsCommand(engine, ADMIN_DM, {
      target: { kind: "default", role: "user", groupId: 100 },
      key: "gemini.api_keys",
      value: '["group-key"]',
    });

    const result = showRawSettings(engine, MANAGER_IN_GROUP, { kind: "default", role: "user", groupId: 100 });

    expect(replyLines(result)[0]).toBe("--- user defaults of group 100 (raw) ---");
    expect(rawBody(result)).toEqual({
      settings: { message_rate_limit: 20 },
      random_events: {
        repeat: { probability: 0.03, shared_min_interval: 60, min_interval: -1, enabled: true },
      },
      gemini: { api_keys: "[hidden, admin only]" },
    });
  });

  it("marks empty blocks as inherited", async () => {
    const { engine } = await openTestEngine();

    const result = showRawSettings(engine, ADMIN_DM, { kind: "user_private", userId: 777 });

    expect(result.reply.text).toBe(
      "--- user 777 in private chat (raw) ---\n(nothing stored; inherits)\n--- end ---",
    );
  });

  it("refuses users who do not manage the group", async () => {
    const { engine } = await openTestEngine();

    const result = showRawSettings(engine, MANAGER_IN_GROUP, { kind: "default", role: "user", groupId: 100 });

    expect(result.reply.text).toBe("⛔ Viewing the raw user defaults of group 100 block requires admin access");
  });
});

describe("resetCounts", () => {
  it("clears the hourly counters for the admin only", async () => {
    const { engine } = await openTestEngine();
    engine.checkRate({ channelType: "group", groupId: 100, userId: 555 }, 10);

    const denied = resetCounts(engine, MANAGER_IN_GROUP);
    expect(denied.reply.text).toBe("⛔ Resetting message counts requires admin access.");
    expect(engine.rateLimiter.size).toBe(1);

    const done = resetCounts(engine, ADMIN_DM);
    expect(done).toEqual({ ok: true, reply: { text: "✅ Hourly message counters reset." } });
    expect(engine.rateLimiter.size).toBe(0);
  });
});
