import type { AlbumRepository } from "../albums/repository";
import { INDEX_KEY, albumPageKey, contentTypeFor, isReservedAlbumName } from "../albums/keys";
import type { ObjectStore } from "../store/types";
import { InvalidAlbumNameError, RenderFailureError } from "../errors";
import { createLogger } from "../logger";
import type { StagingArea } from "./staging";
import { renderAlbumPage, renderIndexPage, type IndexEntry } from "./render";
import { albumPageUrl, encodeKeyPath } from "./urls";

const log = createLogger("site");

export type SiteProgress =
  | { phase: "enumerate" }
  | { phase: "album"; album: string; index: number; total: number }
  | { phase: "index"; total: number };

export interface SiteAlbum {
  name: string;
  photoCount: number;
  pageKey: string;
}

export interface SiteBuildResult {
  albums: SiteAlbum[];
  indexKey: string;
}

export interface SiteGeneratorOptions {
  repository: AlbumRepository;
  store: ObjectStore;
  staging: StagingArea;
  /** Public site base URL (trailing slash) used for index links. */
  baseUrl: string;
  title?: string;
  onProgress?: (progress: SiteProgress) => void;
}

const HTML_CONTENT_TYPE = contentTypeFor(INDEX_KEY);

/**
 * Rebuilds the whole site from the current album listing: one page per album
 * plus the index. Any failure stops the run; pages already uploaded stay.
 */
export class SiteGenerator {
  private repository: AlbumRepository;
  private store: ObjectStore;
  private staging: StagingArea;
  private baseUrl: string;
  private title: string;
  private onProgress?: (progress: SiteProgress) => void;

  constructor(options: SiteGeneratorOptions) {
    this.repository = options.repository;
    this.store = options.store;
    this.staging = options.staging;
    this.baseUrl = options.baseUrl;
    this.title = options.title ?? "Photo albums";
    this.onProgress = options.onProgress;
  }

  async generate(): Promise<SiteBuildResult> {
    this.onProgress?.({ phase: "enumerate" });
    try {
      this.staging.open();
    } catch (error) {
      throw new RenderFailureError(null, error);
    }
    const albumNames = await this.repository.listAlbums();
    await this.store.ensureBucketExists();

    const albums: SiteAlbum[] = [];
    for (const [index, name] of albumNames.entries()) {
      this.onProgress?.({ phase: "album", album: name, index, total: albumNames.length });
      albums.push(await this.buildAlbum(name));
    }

    this.onProgress?.({ phase: "index", total: albums.length });
    const entries: IndexEntry[] = albums.map((album) => ({
      title: album.name,
      url: albumPageUrl(this.baseUrl, album.name),
    }));
    await this.publishPage(null, INDEX_KEY, () => renderIndexPage(this.title, entries));

    log.info({ albums: albums.length }, "Site generated");
    return { albums, indexKey: INDEX_KEY };
  }

  private async buildAlbum(name: string): Promise<SiteAlbum> {
    if (isReservedAlbumName(name)) {
      throw new RenderFailureError(
        name,
        new InvalidAlbumNameError(name, `its page would replace ${INDEX_KEY}`)
      );
    }
    const photos = await this.repository.listPhotos(name);

    for (const photo of photos) {
      const data = await this.store.getObject(photo.key);
      try {
        await this.staging.writePhoto(name, photo.filename, data);
      } catch (error) {
        throw new RenderFailureError(name, error);
      }
    }

    const refs = photos.map((photo) => encodeKeyPath(photo.key));
    const pageKey = albumPageKey(name);
    await this.publishPage(name, pageKey, () => renderAlbumPage(name, refs));

    log.debug({ album: name, photos: photos.length }, "Album page published");
    return { name, photoCount: photos.length, pageKey };
  }

  private async publishPage(
    album: string | null,
    key: string,
    render: () => string
  ): Promise<void> {
    let html: string;
    try {
      const path = await this.staging.writePage(key, render());
      html = await this.staging.readPage(path);
    } catch (error) {
      throw new RenderFailureError(album, error);
    }
    await this.store.putObject(key, html, { contentType: HTML_CONTENT_TYPE });
  }
}
