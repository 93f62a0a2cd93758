export { StagingArea } from "./staging";
export { SiteGenerator, type SiteAlbum, type SiteBuildResult, type SiteProgress } from "./generator";
export { Publisher } from "./publisher";
export { renderAlbumPage, renderIndexPage, escapeHtml, type IndexEntry } from "./render";
export { websiteUrl, albumPageUrl, encodeKeyPath } from "./urls";
