/**
 * Checkpointer
 * Single writer for the output document, saving every N applied changes
 */

import type { RecordStore } from "./record-store";
import type { IllustrationRecord } from "../types";

export interface CheckpointerOptions {
  interval: number; // Changes between two saves
  onSaved?: (changes: number) => void;
}

export class Checkpointer {
  private pending = 0;
  private saves = 0;
  private queue: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;

  constructor(
    private readonly store: RecordStore,
    private readonly path: string,
    private readonly records: IllustrationRecord[],
    private readonly options: CheckpointerOptions,
  ) {}

  get savedCount(): number {
    return this.saves;
  }

  get pendingChanges(): number {
    return this.pending;
  }

  /**
   * Note unsaved changes without triggering a save
   */
  markDirty(changes = 1): void {
    this.pending += changes;
  }

  /**
   * Count one applied change; saves once the interval is reached
   * Resolves after that save (if any) has completed.
   */
  async recordChange(): Promise<void> {
    this.pending++;
    if (this.pending >= this.options.interval) {
      await this.commit();
    }
  }

  /**
   * Queue a save of the whole collection behind any save already running
   *
   * @throws the first save failure; the document stays at the last good checkpoint
   */
  async commit(): Promise<void> {
    const changes = this.pending;
    this.pending = 0;

    const save = this.queue.then(async () => {
      if (this.failure) return;
      await this.store.save(this.records, this.path);
      this.saves++;
      this.options.onSaved?.(changes);
    });

    this.queue = save.catch((error: unknown) => {
      this.failure ??= { error };
    });

    await this.queue;
    if (this.failure) {
      throw this.failure.error;
    }
  }

  /**
   * Save outstanding changes and wait for every queued save
   */
  async flush(): Promise<void> {
    if (this.pending > 0) {
      await this.commit();
      return;
    }

    await this.queue;
    if (this.failure) {
      throw this.failure.error;
    }
  }
}
