import { createMemoryPersistence } from "../io.js";
import { deepMerge } from "../merge.js";
import { ConfigStore } from "../store.js";

/** Minimal operator-supplied values; everything else comes from the defaults. */
export const BASE_DOCUMENT = {
  qq_bot: { qq_no: "10001", admin_qq: "20002" },
  gemini: { api_keys: ["test-key"] },
};

export async function openTestStore(overrides: Record<string, unknown> = {}) {
  const persistence = createMemoryPersistence(deepMerge(BASE_DOCUMENT, overrides));
  const store = await ConfigStore.open(persistence);
  return { store, persistence };
}
