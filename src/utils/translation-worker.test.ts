import { describe, it, expect } from "vitest";
import { TranslationWorker } from "./translation-worker";
import type { Translator } from "./translation-worker";
import { HttpError, InvalidResponseError, TranslationFailedError } from "./errors";
import { isTranslated } from "./record-state";
import type { IllustrationRecord } from "../types";

const DICTIONARY: Record<string, string> = {
  たいまつのイラスト: "Torch illustration",
  "オリンピックの聖火のイラストです。": "An illustration of the Olympic flame.",
  スポーツ用品: "Sports equipment",
  お祭り: "Festival",
  たいまつ: "Torch",
};

class FakeTranslator implements Translator {
  readonly requests: string[] = [];

  constructor(private readonly failOn?: { text: string; error: unknown }) {}

  async translate(text: string, targetLanguage: string): Promise<string> {
    this.requests.push(text);
    if (this.failOn?.text === text) throw this.failOn.error;
    // Text already in the target language comes back unchanged
    return targetLanguage === "en" ? (DICTIONARY[text] ?? text) : text;
  }
}

const record: IllustrationRecord = {
  title: "たいまつのイラスト",
  description: "オリンピックの聖火のイラストです。",
  categories: ["スポーツ用品", "お祭り"],
  entry_url: "https://example.com/entry/1",
  image_url: "https://img.example.com/s800/taimatsu_olympic.png",
  image_alt: "たいまつ",
  published_at: "2016-10-02 00:00:00",
};

describe("TranslationWorker", () => {
  it("translates every unit in order and keeps category alignment", async () => {
    const translator = new FakeTranslator();
    const worker = new TranslationWorker(translator, { targetLanguage: "en" });

    const result = await worker.translate(record);

    expect(result.title_en).toBe("Torch illustration");
    expect(result.description_en).toBe("An illustration of the Olympic flame.");
    expect(result.categories_en).toEqual(["Sports equipment", "Festival"]);
    expect(result.image_alt_en).toBe("Torch");
    expect(translator.requests).toEqual([
      "たいまつのイラスト",
      "オリンピックの聖火のイラストです。",
      "スポーツ用品",
      "お祭り",
      "たいまつ",
    ]);
    expect(isTranslated(result)).toBe(true);
  });

  it("keeps categories already in the target language aligned", async () => {
    const worker = new TranslationWorker(new FakeTranslator(), { targetLanguage: "en" });

    const result = await worker.translate({
      ...record,
      categories: ["Sports equipment", "Festival"],
    });

    expect(result.categories_en).toHaveLength(2);
    expect(result.categories_en).toEqual(["Sports equipment", "Festival"]);
    expect(isTranslated(result)).toBe(true);
  });

  it("does not mutate the input record", async () => {
    const input = { ...record, categories: [...(record.categories ?? [])] };
    const worker = new TranslationWorker(new FakeTranslator(), { targetLanguage: "en" });

    await worker.translate(input);

    expect(input).toEqual(record);
    expect(input.title_en).toBeUndefined();
  });

  it("skips requests for empty text", async () => {
    const translator = new FakeTranslator();
    const worker = new TranslationWorker(translator, { targetLanguage: "en" });

    const result = await worker.translate({
      ...record,
      description: "",
      image_alt: undefined,
      categories: [],
    });

    expect(result.description_en).toBe("");
    expect(result.image_alt_en).toBe("");
    expect(result.categories_en).toEqual([]);
    expect(translator.requests).toEqual(["たいまつのイラスト"]);
  });

  it("names the failing field and returns nothing partial", async () => {
    const cause = new HttpError("https://translate.example.com", 403, "Forbidden");
    const worker = new TranslationWorker(
      new FakeTranslator({ text: "お祭り", error: cause }),
      { targetLanguage: "en" },
    );

    const error = await worker.translate(record).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranslationFailedError);
    if (error instanceof TranslationFailedError) {
      expect(error.field).toBe("categories[1]");
      expect(error.cause).toBe(cause);
    }
    expect(record.title_en).toBeUndefined();
  });

  it("rejects blank translations of non-blank text", async () => {
    const blank: Translator = { translate: async () => " " };
    const worker = new TranslationWorker(blank, { targetLanguage: "en" });

    const error = await worker.translate(record).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranslationFailedError);
    if (error instanceof TranslationFailedError) {
      expect(error.field).toBe("title");
      expect(error.cause).toBeInstanceOf(InvalidResponseError);
    }
  });
});
