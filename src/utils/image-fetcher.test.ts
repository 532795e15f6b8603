import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ImageFetcher } from "./image-fetcher";
import type { ImageSource } from "./image-fetcher";
import { FetchFailedError, HttpError, InvalidRecordError, InvalidResponseError } from "./errors";
import type { IllustrationRecord } from "../types";

class FakeImageSource implements ImageSource {
  readonly requests: string[] = [];

  constructor(private readonly respond: (url: string) => Uint8Array | Error) {}

  async fetch(url: string): Promise<Uint8Array> {
    this.requests.push(url);
    const result = this.respond(url);
    if (result instanceof Error) throw result;
    return result;
  }
}

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

const record: IllustrationRecord = {
  title: "たいまつのイラスト",
  image_url: "https://img.example.com/s800/taimatsu_olympic.png",
  published_at: "2016-10-02 00:00:00",
};

describe("ImageFetcher", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "image-fetcher-"));
    target = join(dir, "images/2016/10/taimatsu_olympic.png");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("downloads into year/month directories it creates", async () => {
    const source = new FakeImageSource(() => PNG);
    const fetcher = new ImageFetcher(source, { baseDir: dir });

    expect(await fetcher.fetch(record)).toBe("downloaded");
    expect(new Uint8Array(await readFile(target))).toEqual(PNG);
    expect(source.requests).toEqual([record.image_url]);
  });

  it("is a no-op when a non-empty file already exists", async () => {
    await mkdir(join(dir, "images/2016/10"), { recursive: true });
    await writeFile(target, "existing");
    const source = new FakeImageSource(() => PNG);

    expect(await new ImageFetcher(source, { baseDir: dir }).fetch(record)).toBe("cached");
    expect(source.requests).toEqual([]);
    expect(await readFile(target, "utf-8")).toBe("existing");
  });

  it("replaces an empty leftover file", async () => {
    await mkdir(join(dir, "images/2016/10"), { recursive: true });
    await writeFile(target, "");

    const fetcher = new ImageFetcher(new FakeImageSource(() => PNG), { baseDir: dir });
    expect(await fetcher.fetch(record)).toBe("downloaded");
    expect((await readFile(target)).byteLength).toBe(4);
  });

  it("wraps source failures and writes nothing", async () => {
    const cause = new HttpError(record.image_url ?? "", 404, "Not Found");
    const fetcher = new ImageFetcher(new FakeImageSource(() => cause), { baseDir: dir });

    const error = await fetcher.fetch(record).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchFailedError);
    if (error instanceof FetchFailedError) {
      expect(error.url).toBe(record.image_url);
      expect(error.cause).toBe(cause);
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it("rejects empty bodies", async () => {
    const fetcher = new ImageFetcher(
      new FakeImageSource(() => new Uint8Array()),
      { baseDir: dir },
    );

    const error = await fetcher.fetch(record).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchFailedError);
    if (error instanceof FetchFailedError) {
      expect(error.cause).toBeInstanceOf(InvalidResponseError);
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it("fails records whose path cannot be derived", async () => {
    const source = new FakeImageSource(() => PNG);
    const fetcher = new ImageFetcher(source, { baseDir: dir });

    const error = await fetcher
      .fetch({ ...record, published_at: "someday" })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchFailedError);
    if (error instanceof FetchFailedError) {
      expect(error.cause).toBeInstanceOf(InvalidRecordError);
    }
    expect(source.requests).toEqual([]);
  });

  it("leaves only the final file in the target directory", async () => {
    const fetcher = new ImageFetcher(new FakeImageSource(() => PNG), { baseDir: dir });
    await fetcher.fetch(record);
    expect(await readdir(join(dir, "images/2016/10"))).toEqual(["taimatsu_olympic.png"]);
  });
});
