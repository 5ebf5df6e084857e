/**
 * Write-behind persistence: callers hand over the latest committed value and
 * return immediately; at most one save runs at a time and intermediate values
 * are coalesced so only the newest pending one is written next.
 */
import { logDebug, logError } from "../logger.js";

export type SaveFn<T> = (value: T) => Promise<void>;

export class WriteBehindSaver<T> {
  private readonly label: string;
  private readonly save: SaveFn<T>;
  private pending: { value: T } | null = null;
  private inFlight: Promise<void> | null = null;
  private lastError: unknown = null;
  private writes = 0;

  constructor(label: string, save: SaveFn<T>) {
    this.label = label;
    this.save = save;
  }

  /** Number of completed save attempts (successful or not). */
  get completedWrites(): number {
    return this.writes;
  }

  get isIdle(): boolean {
    return this.inFlight === null && this.pending === null;
  }

  schedule(value: T): void {
    this.pending = { value };
    if (!this.inFlight) {
      this.inFlight = this.drain();
    }
  }

  /**
   * Resolve once every scheduled value has been written. Rethrows the most
   * recent save failure (once) so shutdown can report it.
   */
  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
    if (this.lastError !== null) {
      const error = this.lastError;
      this.lastError = null;
      throw error;
    }
  }

  private async drain(): Promise<void> {
    try {
      while (this.pending) {
        const { value } = this.pending;
        this.pending = null;
        try {
          await this.save(value);
          logDebug(`${this.label}: write-behind save completed`);
        } catch (error) {
          this.lastError = error;
          const msg = error instanceof Error ? error.message : String(error);
          logError(`${this.label}: write-behind save failed: ${msg}`);
        } finally {
          this.writes += 1;
        }
      }
    } finally {
      this.inFlight = null;
    }
  }
}
