export * from "./keys";
export * from "./types";
export { AlbumRepository, type AlbumRepositoryOptions } from "./repository";
