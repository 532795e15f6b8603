/**
 * Google Translate client
 * Talks to the public translate_a/single endpoint, one text per request
 */

import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { InvalidResponseError } from "./errors";
import { fetchWithTimeout } from "./fetch-with-timeout";
import { toHttpError } from "./http-error";
import type { Translator } from "./translation-worker";
import type { TranslationConfig } from "../types";

// [[["Hello", "こんにちは", null, null, 10], ...], null, "ja", ...]
const ResponseSchema = z.array(z.unknown()).min(1);
const SegmentsSchema = z.array(z.array(z.unknown()));

export type GoogleTranslateOptions = Pick<
  TranslationConfig,
  "sourceLanguage" | "serviceUrls" | "timeout" | "delay"
>;

/**
 * Join the translated segments of a translate_a/single payload
 */
export function extractTranslation(payload: unknown): string {
  const response = ResponseSchema.safeParse(payload);
  if (!response.success) {
    throw new InvalidResponseError("Unexpected translation payload");
  }

  const segments = SegmentsSchema.safeParse(response.data[0]);
  if (!segments.success) {
    throw new InvalidResponseError("Translation payload has no segments");
  }

  return segments.data
    .map((segment) => (typeof segment[0] === "string" ? segment[0] : ""))
    .join("");
}

export class GoogleTranslateClient implements Translator {
  private next = 0;

  constructor(private readonly options: GoogleTranslateOptions) {}

  async translate(
    text: string,
    targetLanguage: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const url = this.buildUrl(text, targetLanguage);

    const payload = await fetchWithTimeout(
      url,
      { headers: { Accept: "application/json" } },
      this.options.timeout,
      async (response): Promise<unknown> => {
        if (!response.ok) {
          throw toHttpError(url, response);
        }
        try {
          return await response.json();
        } catch (error) {
          // A body cut short by the caller is not a bad payload
          if (signal?.aborted) throw error;
          throw new InvalidResponseError("Translation response is not JSON", {
            cause: error,
          });
        }
      },
      signal,
    );

    const translated = extractTranslation(payload);
    await this.pause(signal);
    return translated;
  }

  /**
   * Request URL, rotating across the configured hosts
   */
  buildUrl(text: string, targetLanguage: string): string {
    const hosts = this.options.serviceUrls;
    const host = hosts[this.next % hosts.length];
    this.next++;

    const url = new URL(`https://${host}/translate_a/single`);
    url.searchParams.set("client", "gtx");
    url.searchParams.set("sl", this.options.sourceLanguage);
    url.searchParams.set("tl", targetLanguage);
    url.searchParams.set("dt", "t");
    url.searchParams.set("q", text);
    return url.toString();
  }

  private async pause(signal?: AbortSignal): Promise<void> {
    const { min, max } = this.options.delay;
    const low = Math.min(min, max);
    const ms = low + Math.floor(Math.random() * (Math.max(min, max) - low + 1));
    if (ms > 0) {
      await sleep(ms, undefined, { signal });
    }
  }
}
