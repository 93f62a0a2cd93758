import { INDEX_KEY } from "../albums/keys";
import type { ObjectStore } from "../store/types";
import { createLogger } from "../logger";
import { websiteUrl } from "./urls";

const log = createLogger("publisher");

/**
 * Turns on static website hosting for the store's bucket. Safe to repeat.
 */
export class Publisher {
  private store: ObjectStore;
  private websiteDomain: string;

  constructor(store: ObjectStore, websiteDomain: string) {
    this.store = store;
    this.websiteDomain = websiteDomain;
  }

  get url(): string {
    return websiteUrl(this.store.bucket, this.websiteDomain);
  }

  async publish(): Promise<string> {
    await this.store.configureStaticWebsite(INDEX_KEY);
    log.info({ bucket: this.store.bucket, url: this.url }, "Website hosting enabled");
    return this.url;
  }
}
