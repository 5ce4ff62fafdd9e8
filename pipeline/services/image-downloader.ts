import { existsSync } from "node:fs";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ImageDownloadOutcome } from "../../packages/shared/src/contracts.js";
import { fetchBytes, type FetchOptions } from "./station-page-fetcher.js";

export interface ImageDownloaderOptions extends FetchOptions {
  imageDirectory: string;
}

type ImageStoreOutcome = Extract<ImageDownloadOutcome, { kind: "saved" | "exists" }>;

export class ImageDownloader {
  private readonly options: ImageDownloaderOptions;

  constructor(options: ImageDownloaderOptions) {
    this.options = options;
  }

  pathFor(filename: string): string {
    return join(this.options.imageDirectory, filename);
  }

  /**
   * Saves `url` under `filename` unless that file already exists. Bytes land
   * in a temporary sibling first and are renamed into place, so an
   * interrupted download never leaves a truncated file under the final name.
   * Network failures throw {@link FetchError}.
   */
  async download(url: string, filename: string): Promise<ImageStoreOutcome> {
    const targetPath = this.pathFor(filename);
    if (existsSync(targetPath)) {
      return { kind: "exists", path: targetPath };
    }

    const { body } = await fetchBytes(url, "image/avif,image/webp,image/*,*/*;q=0.8", this.options);

    await mkdir(this.options.imageDirectory, { recursive: true });
    const temporaryPath = `${targetPath}.${process.pid}.part`;

    try {
      await writeFile(temporaryPath, body);
      await rename(temporaryPath, targetPath);
    } catch (error) {
      await rm(temporaryPath, { force: true });
      throw error;
    }

    return { kind: "saved", path: targetPath, bytes: body.byteLength };
  }
}
