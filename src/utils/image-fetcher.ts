/**
 * Image Fetcher
 * Downloads a record's image to its deterministic local path
 */

import { FetchFailedError, InvalidResponseError } from "./errors";
import { isNonEmptyFile, writeFileAtomic } from "./fs";
import { resolveDirectoryPath, resolveImageFile } from "./record-paths";
import type { IllustrationRecord } from "../types";

/**
 * Image hosting capability
 */
export interface ImageSource {
  fetch(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export type FetchOutcome = "downloaded" | "cached";

export interface ImageFetcherOptions {
  baseDir: string; // Directory that directory_path resolves against
  imageDirectory?: string; // First segment of directory_path (default: "images")
}

export class ImageFetcher {
  constructor(
    private readonly source: ImageSource,
    private readonly options: ImageFetcherOptions,
  ) {}

  /**
   * Absolute target path of a record's image
   */
  resolve(record: IllustrationRecord): string {
    return resolveImageFile(
      this.options.baseDir,
      resolveDirectoryPath(record, this.options.imageDirectory),
    );
  }

  /**
   * Download the image unless a non-empty file is already in place
   *
   * @throws FetchFailedError on invalid records, network or HTTP errors, empty bodies and write errors
   */
  async fetch(
    record: IllustrationRecord,
    signal?: AbortSignal,
  ): Promise<FetchOutcome> {
    const url = record.image_url ?? "";

    let target: string;
    try {
      target = this.resolve(record);
    } catch (error) {
      throw new FetchFailedError(url, error);
    }

    if (await isNonEmptyFile(target)) {
      return "cached";
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.source.fetch(url, signal);
    } catch (error) {
      throw new FetchFailedError(url, error);
    }

    if (bytes.byteLength === 0) {
      throw new FetchFailedError(
        url,
        new InvalidResponseError("Empty response body"),
      );
    }

    try {
      await writeFileAtomic(target, bytes, "part");
    } catch (error) {
      throw new FetchFailedError(url, error);
    }

    return "downloaded";
  }
}
