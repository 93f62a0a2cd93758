import { readdirSync, statSync } from "fs";
import { join, extname } from "path";
import type { PhotoFile, PhotoSource } from "./types";
import { PathNotFoundError } from "../errors";
import { isPhotoFile } from "../albums/keys";
import { createLogger } from "../logger";

const logger = createLogger("local-source");

/**
 * Photos directly inside one directory. Subdirectories are not descended into.
 */
export class LocalPhotoSource implements PhotoSource {
  name = "local";
  private dirPath: string;
  private extensions: string[];

  constructor(dirPath: string, extensions: string[]) {
    this.dirPath = dirPath;
    this.extensions = extensions.map((e) => e.toLowerCase());
  }

  /** Throws PathNotFoundError when the directory is missing or not a directory. */
  assertExists(): void {
    let stats;
    try {
      stats = statSync(this.dirPath);
    } catch {
      throw new PathNotFoundError(this.dirPath);
    }
    if (!stats.isDirectory()) {
      throw new PathNotFoundError(this.dirPath);
    }
  }

  async *scan(): AsyncGenerator<PhotoFile> {
    this.assertExists();

    const entries = readdirSync(this.dirPath, { withFileTypes: true });
    const files: PhotoFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        if (entry.isDirectory()) {
          logger.debug({ directory: entry.name }, "Skipping subdirectory");
        }
        continue;
      }
      if (!isPhotoFile(entry.name, this.extensions)) {
        logger.debug({ file: entry.name }, "Skipping non-photo file");
        continue;
      }

      const fullPath = join(this.dirPath, entry.name);
      const stats = statSync(fullPath);
      files.push({
        path: fullPath,
        filename: entry.name,
        extension: extname(entry.name).toLowerCase(),
        size: stats.size,
      });
    }

    // Stable upload order regardless of filesystem
    files.sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));

    for (const file of files) {
      yield file;
    }
  }
}
