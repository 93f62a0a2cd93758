import { readFile } from "fs/promises";
import type { ObjectStore } from "../store/types";
import { LocalPhotoSource } from "../sources/local";
import { PartialDeleteFailureError, StoreUnavailableError } from "../errors";
import { createLogger } from "../logger";
import {
  DEFAULT_PHOTO_EXTENSIONS,
  KEY_DELIMITER,
  albumPrefix,
  assertAlbumName,
  assertNewAlbumName,
  contentTypeFor,
  deriveAlbums,
  isPhotoFile,
  photoFilename,
  photoKey,
} from "./keys";
import type { DeleteAlbumResult, Photo, UploadAlbumResult } from "./types";

const log = createLogger("albums");

export interface AlbumRepositoryOptions {
  /** Lower-case extensions, including the dot. */
  extensions?: string[];
}

/**
 * Album/photo view over a flat object namespace. Albums are the first path
 * segment of keys; nothing else records them.
 */
export class AlbumRepository {
  private store: ObjectStore;
  private extensions: string[];

  constructor(store: ObjectStore, options: AlbumRepositoryOptions = {}) {
    this.store = store;
    this.extensions = (options.extensions ?? DEFAULT_PHOTO_EXTENSIONS).map((e) => e.toLowerCase());
  }

  async listAlbums(): Promise<string[]> {
    const { prefixes } = await this.store.listObjects({ prefix: "", delimiter: KEY_DELIMITER });
    return deriveAlbums(prefixes);
  }

  /** Photos directly under the album prefix, in store listing order. */
  async listPhotos(album: string): Promise<Photo[]> {
    assertAlbumName(album);
    const { keys } = await this.store.listObjects({
      prefix: albumPrefix(album),
      delimiter: KEY_DELIMITER,
    });

    const photos: Photo[] = [];
    for (const key of keys) {
      const filename = photoFilename(album, key);
      if (filename !== null && isPhotoFile(filename, this.extensions)) {
        photos.push({ album, filename, key });
      }
    }
    return photos;
  }

  /**
   * Upload every photo directly inside `sourceDir` to `<album>/<filename>`.
   * Existing keys are overwritten, so repeated uploads are idempotent.
   */
  async uploadAlbum(
    album: string,
    sourceDir: string,
    onUploaded?: (key: string) => void
  ): Promise<UploadAlbumResult> {
    assertNewAlbumName(album);
    const source = new LocalPhotoSource(sourceDir, this.extensions);
    source.assertExists();

    await this.store.ensureBucketExists();

    const keys: string[] = [];
    for await (const file of source.scan()) {
      const key = photoKey(album, file.filename);
      const body = await readFile(file.path);
      await this.store.putObject(key, body, { contentType: contentTypeFor(file.filename) });
      keys.push(key);
      onUploaded?.(key);
    }

    log.info({ album, count: keys.length }, "Uploaded album");
    return { album, keys };
  }

  /**
   * Delete every object under the album prefix. Not atomic: on failure the
   * objects already removed stay removed.
   */
  async deleteAlbum(album: string): Promise<DeleteAlbumResult> {
    assertAlbumName(album);
    const { keys } = await this.store.listObjects({ prefix: albumPrefix(album) });
    if (keys.length === 0) {
      return { status: "not_found", album };
    }

    const deleted: string[] = [];
    const failed: string[] = [];
    let firstError: unknown;

    for (const key of keys) {
      try {
        await this.store.deleteObject(key);
        deleted.push(key);
      } catch (error) {
        if (!(error instanceof StoreUnavailableError)) throw error;
        log.error({ key, error: error.message }, "Failed to delete object");
        failed.push(key);
        firstError ??= error;
      }
    }

    if (failed.length > 0) {
      throw new PartialDeleteFailureError(album, deleted, failed, firstError);
    }

    log.info({ album, count: deleted.length }, "Deleted album");
    return { status: "deleted", album, deleted: deleted.length };
  }
}
