/**
 * Persistence for the policy document.
 *
 * The store only depends on the `ConfigPersistence` contract; the JSON file
 * implementation below is what the bot uses in production, the in-memory one
 * backs tests and embedders that keep the document elsewhere.
 */
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { logInfo, logWarn } from "../logger.js";
import { createDefaultDocument } from "./defaults.js";
import { MalformedDocumentError } from "./errors.js";
import { isPlainObject } from "./key-paths.js";
import { deepMerge } from "./merge.js";
import { parseConfigDocument } from "./schema.js";
import type { ConfigDocument } from "./types.js";

export type ConfigPersistence = {
  /** Human-readable origin used in diagnostics (file path, "memory", …). */
  readonly source: string;
  /** Load the document, producing (and persisting) the compiled-in default when none exists. */
  load(): Promise<ConfigDocument>;
  /** Atomically replace the stored document. */
  save(doc: ConfigDocument): Promise<void>;
};

export const CONFIG_PATH_ENV = "CHATBOT_POLICY_CONFIG";
export const DEFAULT_CONFIG_FILENAME = "config.json";

function expandHome(filePath: string): string {
  if (filePath.startsWith("~/") || filePath === "~") {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(cwd, expandHome(override));
  }
  return path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

/**
 * Merge a raw (possibly partial) document over the defaults and validate it.
 * Throws `MalformedDocumentError` for anything structurally invalid.
 */
export function materializeDocument(raw: unknown, source: string): ConfigDocument {
  if (!isPlainObject(raw)) {
    throw new MalformedDocumentError(source, ["document root must be a JSON object"]);
  }
  return parseConfigDocument(deepMerge(createDefaultDocument(), raw), source);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function serializeDocument(doc: ConfigDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tempPath, contents, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export function createJsonFilePersistence(filePath: string): ConfigPersistence {
  return {
    source: filePath,

    async load() {
      let text: string;
      try {
        text = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
        logWarn(`Config file ${filePath} not found; writing compiled-in defaults`);
        const doc = createDefaultDocument();
        await writeFileAtomic(filePath, serializeDocument(doc));
        return doc;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        throw new MalformedDocumentError(filePath, [`invalid JSON: ${msg}`]);
      }
      const doc = materializeDocument(raw, filePath);
      logInfo(`Loaded config from ${filePath}`);
      return doc;
    },

    async save(doc) {
      await writeFileAtomic(filePath, serializeDocument(doc));
    },
  };
}

/** In-process persistence; `saved` records every document handed to `save`. */
export function createMemoryPersistence(initial?: unknown): ConfigPersistence & {
  saved: ConfigDocument[];
} {
  const saved: ConfigDocument[] = [];
  return {
    source: "memory",
    saved,

    async load() {
      if (initial === undefined) {
        return createDefaultDocument();
      }
      return materializeDocument(structuredClone(initial), "memory");
    },

    async save(doc) {
      saved.push(structuredClone(doc));
    },
  };
}
