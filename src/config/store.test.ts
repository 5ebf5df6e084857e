import { describe, expect, it } from "vitest";
import { openTestStore } from "./__tests__/fixtures.js";
import { createDefaultDocument } from "./defaults.js";
import { setPath } from "./merge.js";

describe("ConfigStore.mutate", () => {
  it("commits the draft and persists it write-behind", async () => {
    const { store, persistence } = await openTestStore();

    store.mutate("voice on", (draft) => {
      draft.settings.send_voice = true;
    });

    expect(store.read(["settings", "send_voice"])).toBe(true);
    await store.flush();
    expect(persistence.saved).toHaveLength(1);
    expect(persistence.saved[0]?.settings.send_voice).toBe(true);
  });

  it("leaves earlier snapshots untouched", async () => {
    const { store } = await openTestStore();
    const before = store.snapshot();

    store.mutate("limit", (draft) => {
      draft.settings.message_rate_limit = 5;
    });

    expect(before.settings.message_rate_limit).toBe(30);
    expect(store.snapshot().settings.message_rate_limit).toBe(5);
  });

  it("discards the draft when the mutation throws", async () => {
    const { store, persistence } = await openTestStore();

    expect(() =>
      store.mutate("broken", (draft) => {
        draft.settings.enable_ai_chat = false;
        throw new Error("rejected");
      }),
    ).toThrow("rejected");

    expect(store.read(["settings", "enable_ai_chat"])).toBe(true);
    await store.flush();
    expect(persistence.saved).toHaveLength(0);
  });

  it("lets nested mutations edit the outer draft", async () => {
    const { store, persistence } = await openTestStore();

    store.mutate("outer", (draft) => {
      draft.settings.send_voice = true;
      store.mutate("inner", (inner) => {
        inner.settings.message_rate_limit = 12;
      });
    });

    expect(store.read(["settings", "send_voice"])).toBe(true);
    expect(store.read(["settings", "message_rate_limit"])).toBe(12);
    await store.flush();
    expect(persistence.saved).toHaveLength(1);
  });

  it("refuses mutations after close", async () => {
    const { store } = await openTestStore();
    await store.close();

    expect(store.isClosed).toBe(true);
    expect(() => store.mutate("late", () => undefined)).toThrow(
      "Config store is closed; refusing mutation 'late'",
    );
  });
});

describe("ConfigStore.materializeGroupRoleBlock", () => {
  it("copies the default role block once", async () => {
    const { store } = await openTestStore();
    const template = createDefaultDocument().group.__default__.manager;

    expect(store.materializeGroupRoleBlock("4242", "manager")).toBe(true);
    expect(store.materializeGroupRoleBlock("4242", "manager")).toBe(false);
    expect(store.read(["group", "4242", "manager"])).toEqual(template);
  });

  it("keeps a materialized block independent of later default edits", async () => {
    const { store } = await openTestStore();
    store.materializeGroupRoleBlock("4242", "user");

    store.mutate("edit default", (draft) => {
      setPath(draft, ["group", "__default__", "user", "settings", "message_rate_limit"], 99);
    });

    expect(store.read(["group", "4242", "user", "settings", "message_rate_limit"])).toBe(20);
  });

  it("does not overwrite an existing group block", async () => {
    const { store } = await openTestStore({
      group: { "4242": { user: { settings: { message_rate_limit: 3 } } } },
    });

    expect(store.materializeGroupRoleBlock("4242", "user")).toBe(false);
    expect(store.read(["group", "4242", "user"])).toEqual({ settings: { message_rate_limit: 3 } });
  });

  it("adds missing roles next to existing ones", async () => {
    const { store } = await openTestStore({
      group: { "4242": { user: { settings: { message_rate_limit: 3 } } } },
    });

    expect(store.materializeGroupRoleBlock("4242", "blacklisted")).toBe(true);
    expect(store.read(["group", "4242", "user", "settings", "message_rate_limit"])).toBe(3);
    expect(store.read(["group", "4242", "blacklisted", "settings", "enable_ai_chat"])).toBe(false);
  });

  it("never materializes into the default scope or from a missing template", async () => {
    const { store } = await openTestStore();
    store.mutate("drop template", (draft) => {
      delete draft.group.__default__.blacklisted;
    });

    expect(store.materializeGroupRoleBlock("__default__", "user")).toBe(false);
    expect(store.materializeGroupRoleBlock("77", "blacklisted")).toBe(false);
    expect(store.read(["group", "77"])).toBeUndefined();
  });
});
