import { createWriteStream } from "fs";
import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { fetch, type Dispatcher, type Response } from "undici";
import { DownloadFailedError } from "./errors";
import type { Downloader } from "./types";

export type HttpDownloaderConfig = {
  userAgent: string;
  dispatcher?: Dispatcher;
};

export class HttpDownloader implements Downloader {
  private readonly config: HttpDownloaderConfig;

  constructor(config?: Partial<HttpDownloaderConfig>) {
    this.config = {
      userAgent: config?.userAgent ?? "model-provisioner/1.0.0",
      dispatcher: config?.dispatcher
    };
  }

  /**
   * Streams `url` into `destPath` and returns the number of bytes written.
   * A failed transfer leaves whatever was written so far; callers own cleanup.
   */
  async download(url: string, destPath: string): Promise<number> {
    await fs.mkdir(path.dirname(destPath), { recursive: true });

    let res: Response;
    try {
      res = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": this.config.userAgent },
        ...(this.config.dispatcher ? { dispatcher: this.config.dispatcher } : {})
      });
    } catch (error) {
      throw new DownloadFailedError(url, describeCause(error));
    }

    if (!res.ok) {
      throw new DownloadFailedError(url, `HTTP ${res.status} ${res.statusText}`.trim());
    }
    if (!res.body) {
      throw new DownloadFailedError(url, "empty response body");
    }

    try {
      await pipeline(Readable.fromWeb(res.body), createWriteStream(destPath));
    } catch (error) {
      throw new DownloadFailedError(url, describeCause(error));
    }

    const stats = await fs.stat(destPath);
    return stats.size;
  }
}

// undici wraps socket errors as "fetch failed" with the real reason in `cause`
function describeCause(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}
