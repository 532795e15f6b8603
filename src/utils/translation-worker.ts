/**
 * Translation Worker
 * Produces the English fields of one record, all or nothing
 */

import { InvalidResponseError, TranslationFailedError } from "./errors";
import type { IllustrationRecord, TranslatedFields } from "../types";

/**
 * Translation backend capability
 */
export interface Translator {
  translate(
    text: string,
    targetLanguage: string,
    signal?: AbortSignal,
  ): Promise<string>;
}

export interface TranslationWorkerOptions {
  targetLanguage: string;
}

export class TranslationWorker {
  constructor(
    private readonly translator: Translator,
    private readonly options: TranslationWorkerOptions,
  ) {}

  /**
   * Translate title, description, every category and image_alt, in that order
   *
   * The input record is left untouched. Any failing request discards the
   * results gathered so far.
   *
   * @throws TranslationFailedError naming the field whose request failed
   */
  async translate(
    record: IllustrationRecord,
    signal?: AbortSignal,
  ): Promise<IllustrationRecord> {
    const title_en = await this.translateField("title", record.title, signal);
    const description_en = await this.translateField(
      "description",
      record.description,
      signal,
    );

    const categories_en: string[] = [];
    for (const [i, category] of (record.categories ?? []).entries()) {
      categories_en.push(
        await this.translateField(`categories[${i}]`, category, signal),
      );
    }

    const image_alt_en = await this.translateField(
      "image_alt",
      record.image_alt,
      signal,
    );

    const fields: TranslatedFields = {
      title_en,
      description_en,
      categories_en,
      image_alt_en,
    };
    return { ...record, ...fields };
  }

  private async translateField(
    field: string,
    text: string | undefined,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!text?.trim()) {
      return "";
    }

    let translated: string;
    try {
      translated = await this.translator.translate(
        text,
        this.options.targetLanguage,
        signal,
      );
    } catch (error) {
      throw new TranslationFailedError(field, error);
    }

    if (!translated.trim()) {
      throw new TranslationFailedError(
        field,
        new InvalidResponseError("Translator returned an empty string"),
      );
    }
    return translated;
  }
}
