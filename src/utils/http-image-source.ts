/**
 * HTTP image source
 */

import { InvalidResponseError } from "./errors";
import { fetchWithTimeout } from "./fetch-with-timeout";
import { toHttpError } from "./http-error";
import type { ImageSource } from "./image-fetcher";
import type { ImagesConfig } from "../types";

export type HttpImageSourceOptions = Pick<
  ImagesConfig,
  "timeout" | "maxSize" | "userAgent"
>;

export class HttpImageSource implements ImageSource {
  constructor(private readonly options: HttpImageSourceOptions) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    return fetchWithTimeout(
      url,
      { headers: { "User-Agent": this.options.userAgent } },
      this.options.timeout,
      (response) => this.readImage(url, response),
      signal,
    );
  }

  private async readImage(url: string, response: Response): Promise<Uint8Array> {
    if (!response.ok) {
      throw toHttpError(url, response);
    }

    const declared = Number(response.headers.get("content-length"));
    if (Number.isFinite(declared) && declared > this.options.maxSize) {
      throw new InvalidResponseError(
        `Image is ${declared} bytes, limit is ${this.options.maxSize}`,
      );
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    if (bytes.byteLength > this.options.maxSize) {
      throw new InvalidResponseError(
        `Image is ${bytes.byteLength} bytes, limit is ${this.options.maxSize}`,
      );
    }
    return bytes;
  }
}
