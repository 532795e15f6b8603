import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { RecordStore } from "./record-store";
import { CorruptDataError } from "./errors";
import type { IllustrationRecord } from "../types";

const records: IllustrationRecord[] = [
  {
    title: "たいまつのイラスト",
    description: "聖火のイラストです。",
    categories: ["スポーツ用品", "お祭り", "オリンピック"],
    entry_url: "https://example.com/entry/1",
    image_url: "https://img.example.com/s800/taimatsu_olympic.png",
    image_alt: "たいまつ",
    published_at: "2016-10-02 00:00:00",
  },
  {
    title: "ねこ",
    description: "",
    categories: [],
    entry_url: "https://example.com/entry/2",
    image_url: "https://img.example.com/s800/cat.png",
    image_alt: "",
    published_at: "2017-01-05 00:00:00",
    title_en: "Cat",
    description_en: "",
    categories_en: [],
    image_alt_en: "",
    rating: 5,
  },
];

describe("RecordStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "record-store-"));
    path = join(dir, "catalogue.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a missing document as an empty collection", async () => {
    expect(await new RecordStore().load(path)).toEqual([]);
  });

  it("round-trips records, keeping category order and extra keys", async () => {
    const store = new RecordStore();
    await store.save(records, path);
    const loaded = await store.load(path);
    await store.save(loaded, path);

    expect(await store.load(path)).toEqual(records);
    expect(loaded[0].categories).toEqual(["スポーツ用品", "お祭り", "オリンピック"]);
    expect(loaded[1].rating).toBe(5);
  });

  it("writes UTF-8 text with the configured indent and a trailing newline", async () => {
    await new RecordStore({ indent: 2 }).save([{ title: "ねこ" }], path);
    expect(await readFile(path, "utf-8")).toBe('[\n  {\n    "title": "ねこ"\n  }\n]\n');
  });

  it("leaves no temporary files behind", async () => {
    const store = new RecordStore();
    await store.save(records, path);
    await store.save(records.slice(0, 1), path);

    expect(await readdir(dir)).toEqual(["catalogue.json"]);
    expect(await store.load(path)).toEqual(records.slice(0, 1));
  });

  it("rejects invalid JSON as corrupt data", async () => {
    await writeFile(path, '[{"title": "ねこ"', "utf-8");
    await expect(new RecordStore().load(path)).rejects.toBeInstanceOf(CorruptDataError);
  });

  it("rejects documents that do not match the record schema", async () => {
    await writeFile(path, JSON.stringify({ records: [] }), "utf-8");
    await expect(new RecordStore().load(path)).rejects.toBeInstanceOf(CorruptDataError);

    await writeFile(path, JSON.stringify([{ categories: "festival" }]), "utf-8");
    await expect(new RecordStore().load(path)).rejects.toThrow(/0\.categories/);
  });
});
