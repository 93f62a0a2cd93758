import { mkdirSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import { createLogger } from "../logger";

const log = createLogger("staging");

/**
 * Local scratch directory for one site build. The directory name is fixed, so
 * files left over from an earlier run are simply overwritten.
 */
export class StagingArea {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  open(): void {
    mkdirSync(this.root, { recursive: true });
    log.debug({ root: this.root }, "Staging directory ready");
  }

  /**
   * Album-prefixed local name for a photo. The encoded album never contains
   * "%2F", so the first occurrence separates album from filename.
   */
  photoName(album: string, filename: string): string {
    return `${encodeURIComponent(album)}%2F${filename}`;
  }

  async writePhoto(album: string, filename: string, data: Uint8Array): Promise<string> {
    const path = join(this.root, this.photoName(album, filename));
    await writeFile(path, data);
    return path;
  }

  async writePage(name: string, html: string): Promise<string> {
    const path = join(this.root, name);
    await writeFile(path, html, "utf-8");
    return path;
  }

  async readPage(path: string): Promise<string> {
    return readFile(path, "utf-8");
  }
}
