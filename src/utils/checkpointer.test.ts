import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Checkpointer } from "./checkpointer";
import { RecordStore } from "./record-store";
import type { IllustrationRecord } from "../types";

class CountingStore extends RecordStore {
  saved: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly failures: unknown[] = []) {
    super();
  }

  override async save(records: IllustrationRecord[], path: string): Promise<void> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await sleep(5);
      const failure = this.failures.shift();
      if (failure !== undefined) throw failure;
      this.saved.push(`${path}:${records.length}`);
    } finally {
      this.active--;
    }
  }
}

describe("Checkpointer", () => {
  it("saves once the interval is reached", async () => {
    const store = new CountingStore();
    const onSaved = vi.fn();
    const checkpointer = new Checkpointer(store, "out.json", [{}], { interval: 3, onSaved });

    await checkpointer.recordChange();
    await checkpointer.recordChange();
    expect(store.saved).toEqual([]);
    expect(checkpointer.pendingChanges).toBe(2);

    await checkpointer.recordChange();
    expect(store.saved).toEqual(["out.json:1"]);
    expect(checkpointer.savedCount).toBe(1);
    expect(checkpointer.pendingChanges).toBe(0);
    expect(onSaved).toHaveBeenCalledWith(3);
  });

  it("counts dirty changes towards the next save", async () => {
    const store = new CountingStore();
    const onSaved = vi.fn();
    const checkpointer = new Checkpointer(store, "out.json", [], { interval: 3, onSaved });

    checkpointer.markDirty(2);
    expect(store.saved).toEqual([]);

    await checkpointer.recordChange();
    expect(onSaved).toHaveBeenCalledWith(3);
    expect(checkpointer.savedCount).toBe(1);
  });

  it("flushes only when changes are pending", async () => {
    const store = new CountingStore();
    const checkpointer = new Checkpointer(store, "out.json", [], { interval: 10 });

    await checkpointer.flush();
    expect(store.saved).toEqual([]);

    await checkpointer.recordChange();
    await checkpointer.flush();
    expect(store.saved).toEqual(["out.json:0"]);
  });

  it("never runs two saves at once", async () => {
    const store = new CountingStore();
    const checkpointer = new Checkpointer(store, "out.json", [], { interval: 1 });

    await Promise.all([
      checkpointer.recordChange(),
      checkpointer.recordChange(),
      checkpointer.recordChange(),
    ]);

    expect(store.saved).toHaveLength(3);
    expect(store.maxActive).toBe(1);
  });

  it("keeps reporting the first failed save and stops writing", async () => {
    const failure = new Error("disk full");
    const store = new CountingStore([failure]);
    const checkpointer = new Checkpointer(store, "out.json", [], { interval: 1 });

    await expect(checkpointer.recordChange()).rejects.toBe(failure);
    await expect(checkpointer.flush()).rejects.toBe(failure);
    await expect(checkpointer.commit()).rejects.toBe(failure);
    expect(store.saved).toEqual([]);
    expect(checkpointer.savedCount).toBe(0);
  });
});

describe("Checkpointer with RecordStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "checkpointer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the shared collection as it stands", async () => {
    const records: IllustrationRecord[] = [{ title: "ねこ" }];
    const path = join(dir, "catalogue.json");
    const checkpointer = new Checkpointer(new RecordStore({ indent: 2 }), path, records, {
      interval: 1,
    });

    records[0] = { ...records[0], title_en: "Cat" };
    await checkpointer.recordChange();

    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual([
      { title: "ねこ", title_en: "Cat" },
    ]);
  });
});
