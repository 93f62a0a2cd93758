import { loadConfig, type Config } from "./config";
import { AlbumRepository } from "./albums";
import { S3ObjectStore } from "./store/s3";
import type { ObjectStore } from "./store/types";
import { Publisher, StagingArea, SiteGenerator, type SiteProgress } from "./site";

/**
 * Everything a command needs, built once from configuration.
 */
export interface AppContext {
  config: Config;
  store: ObjectStore;
  repository: AlbumRepository;
  staging: StagingArea;
  publisher: Publisher;
  createSiteGenerator(onProgress?: (progress: SiteProgress) => void): SiteGenerator;
}

export function createContext(config: Config, store: ObjectStore): AppContext {
  const repository = new AlbumRepository(store, { extensions: config.albums.extensions });
  const staging = new StagingArea(config.staging.path);
  const publisher = new Publisher(store, config.website.domain);

  return {
    config,
    store,
    repository,
    staging,
    publisher,
    createSiteGenerator: (onProgress) =>
      new SiteGenerator({
        repository,
        store,
        staging,
        baseUrl: publisher.url,
        onProgress,
      }),
  };
}

export function loadContext(): AppContext {
  const config = loadConfig();
  return createContext(config, new S3ObjectStore(config.storage));
}
