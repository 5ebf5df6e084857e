/**
 * Owner of the policy document.
 *
 * Reads see the latest committed document without locking. Mutations clone
 * it, edit the draft under the store's mutation gate, swap the reference and
 * hand the new document to the write-behind saver.
 */
import { MutationGate } from "../infra/mutation-gate.js";
import { WriteBehindSaver } from "../infra/write-behind.js";
import { logDebug, logInfo } from "../logger.js";
import type { ConfigPersistence } from "./io.js";
import { isPlainObject } from "./key-paths.js";
import { getPath } from "./merge.js";
import { DEFAULT_SCOPE_KEY, type ConfigDocument, type RoleBlockName } from "./types.js";

export class ConfigStore {
  private committed: ConfigDocument;
  private draft: ConfigDocument | null = null;
  private closed = false;
  private readonly gate = new MutationGate("config");
  private readonly saver: WriteBehindSaver<ConfigDocument>;
  readonly source: string;

  constructor(doc: ConfigDocument, persistence: ConfigPersistence) {
    this.committed = doc;
    this.source = persistence.source;
    this.saver = new WriteBehindSaver(`config(${persistence.source})`, (next) => persistence.save(next));
  }

  static async open(persistence: ConfigPersistence): Promise<ConfigStore> {
    const doc = await persistence.load();
    return new ConfigStore(doc, persistence);
  }

  /**
   * Latest committed document, or the open draft when called from inside a
   * mutation. Never mutate the returned object.
   */
  snapshot(): Readonly<ConfigDocument> {
    return this.draft ?? this.committed;
  }

  read(segments: readonly string[]): unknown {
    return getPath(this.snapshot(), segments);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Apply `fn` to a private copy of the document and commit it atomically.
   * A throw from `fn` leaves the committed document untouched. Calls made
   * from inside `fn` edit the same draft.
   */
  mutate<T>(label: string, fn: (draft: ConfigDocument) => T): T {
    if (this.draft) {
      return fn(this.draft);
    }
    if (this.closed) {
      throw new Error(`Config store is closed; refusing mutation '${label}'`);
    }
    const result = this.gate.run(label, () => {
      const draft = structuredClone(this.committed);
      this.draft = draft;
      try {
        const out = fn(draft);
        this.committed = draft;
        return out;
      } finally {
        this.draft = null;
      }
    });
    logDebug(`config mutation '${label}' committed`);
    this.saver.schedule(this.committed);
    return result;
  }

  /**
   * Copy `group.__default__.<role>` into `group.<groupId>.<role>` when the
   * group has no block for that role yet. Returns whether a copy was made.
   */
  materializeGroupRoleBlock(groupId: string, role: RoleBlockName): boolean {
    if (groupId === DEFAULT_SCOPE_KEY || !this.needsCopyDown(this.snapshot(), groupId, role)) {
      return false;
    }
    return this.mutate(`copy-down group.${groupId}.${role}`, (draft) => {
      if (!this.needsCopyDown(draft, groupId, role)) {
        return false;
      }
      const template = structuredClone(draft.group[DEFAULT_SCOPE_KEY][role]);
      const existing = Object.hasOwn(draft.group, groupId) ? draft.group[groupId] : undefined;
      draft.group[groupId] = { ...existing, [role]: template };
      logInfo(`Materialized group.${groupId}.${role} from group.${DEFAULT_SCOPE_KEY}.${role}`);
      return true;
    });
  }

  private needsCopyDown(doc: Readonly<ConfigDocument>, groupId: string, role: RoleBlockName): boolean {
    const template = doc.group[DEFAULT_SCOPE_KEY][role];
    if (!isPlainObject(template)) {
      return false;
    }
    return getPath(doc.group, [groupId, role]) === undefined;
  }

  /** Wait for pending write-behind saves; rethrows the last save failure. */
  flush(): Promise<void> {
    return this.saver.flush();
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.saver.flush();
  }
}
