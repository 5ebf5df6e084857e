import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDefaultDocument } from "./defaults.js";
import { MalformedDocumentError } from "./errors.js";
import {
  createJsonFilePersistence,
  createMemoryPersistence,
  materializeDocument,
  resolveConfigPath,
} from "./io.js";

describe("resolveConfigPath", () => {
  it("defaults to config.json in the working directory", () => {
    expect(resolveConfigPath({}, "/srv/bot")).toBe(path.resolve("/srv/bot", "config.json"));
  });

  it("honours CHATBOT_POLICY_CONFIG relative to the working directory", () => {
    expect(resolveConfigPath({ CHATBOT_POLICY_CONFIG: "conf/policy.json" }, "/srv/bot")).toBe(
      path.resolve("/srv/bot", "conf/policy.json"),
    );
  });

  it("expands a leading ~", () => {
    expect(resolveConfigPath({ CHATBOT_POLICY_CONFIG: "~/bot/config.json" }, "/srv/bot")).toBe(
      path.join(os.homedir(), "bot/config.json"),
    );
  });
});

describe("materializeDocument", () => {
  it("merges a partial document over the defaults and normalises ids", () => {
    const doc = materializeDocument(
      {
        qq_bot: { qq_no: 10001, admin_qq: 20002 },
        settings: { send_voice: true },
        permissions: { users: { "30003": { roles: ["private_user"] } } },
      },
      "inline",
    );

    expect(doc.qq_bot.qq_no).toBe("10001");
    expect(doc.qq_bot.admin_qq).toBe("20002");
    expect(doc.qq_bot.bot_name).toBe("Yui");
    expect(doc.settings.send_voice).toBe(true);
    expect(doc.settings.message_rate_limit).toBe(30);
    expect(doc.permissions.users["30003"]).toEqual({
      roles: ["private_user"],
      managed_groups: [],
      blacklisted_in: [],
    });
  });

  it("reports every structural problem with its path", () => {
    let caught: unknown;
    try {
      materializeDocument(
        {
          settings: { enable_ai_chat: "yes" },
          permissions: { users: { "30003": { roles: ["superuser"] } } },
        },
        "inline",
      );
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MalformedDocumentError);
    expect(caught).toMatchObject({ code: "MALFORMED_DOCUMENT" });
    const issues = caught instanceof MalformedDocumentError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^settings\.enable_ai_chat: /);
    expect(issues[1]).toMatch(/^permissions\.users\.30003\.roles\.0: /);
  });

  it("rejects a non-object root", () => {
    expect(() => materializeDocument([1, 2], "inline")).toThrow(MalformedDocumentError);
  });

  it("rejects unknown sections", () => {
    expect(() => materializeDocument({ plugins: {} }, "inline")).toThrow(MalformedDocumentError);
  });
});

describe("createJsonFilePersistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "policy-io-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes and returns the defaults when the file is missing", async () => {
    const file = path.join(dir, "nested", "config.json");
    const persistence = createJsonFilePersistence(file);

    const doc = await persistence.load();

    expect(doc).toEqual(createDefaultDocument());
    const written: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(written).toEqual(createDefaultDocument());
  });

  it("fails loudly on invalid JSON", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, "{ not json", "utf-8");

    await expect(createJsonFilePersistence(file).load()).rejects.toBeInstanceOf(MalformedDocumentError);
  });

  it("saves atomically and loads the saved document back", async () => {
    const file = path.join(dir, "config.json");
    const persistence = createJsonFilePersistence(file);
    const doc = materializeDocument({ qq_bot: { qq_no: "10001", admin_qq: "20002" } }, "inline");
    doc.settings.enable_random_events = true;

    await persistence.save(doc);

    expect(await fs.readdir(dir)).toEqual(["config.json"]);
    const loaded = await persistence.load();
    expect(loaded.settings.enable_random_events).toBe(true);
    expect(loaded.qq_bot.admin_qq).toBe("20002");
  });
});

describe("createMemoryPersistence", () => {
  it("records saved copies", async () => {
    const persistence = createMemoryPersistence();
    const doc = await persistence.load();
    await persistence.save(doc);
    doc.settings.send_voice = true;

    expect(persistence.saved).toHaveLength(1);
    expect(persistence.saved[0]?.settings.send_voice).toBe(false);
  });
});
