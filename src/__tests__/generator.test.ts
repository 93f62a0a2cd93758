import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { AlbumRepository } from "../albums/repository";
import { InvalidAlbumNameError, RenderFailureError, StoreUnavailableError } from "../errors";
import { SiteGenerator, type SiteProgress } from "../site/generator";
import { Publisher } from "../site/publisher";
import { StagingArea } from "../site/staging";
import { MemoryObjectStore } from "./helpers/memory-store";
import { makeTempDir, removeDir } from "./helpers/fs";

const BASE_URL = "https://test-bucket.website.example.test/";

describe("SiteGenerator", () => {
  let tmp: string;
  let staging: StagingArea;

  beforeEach(async () => {
    tmp = await makeTempDir();
    staging = new StagingArea(join(tmp, "site"));
  });

  afterEach(async () => {
    await removeDir(tmp);
  });

  function generatorFor(store: MemoryObjectStore, onProgress?: (p: SiteProgress) => void) {
    return new SiteGenerator({
      repository: new AlbumRepository(store),
      store,
      staging,
      baseUrl: BASE_URL,
      onProgress,
    });
  }

  test("publishes a page per album and an index linking them", async () => {
    const store = new MemoryObjectStore().seed(["a/1.jpg", "a/2.jpg", "b/3.jpeg"]);

    const result = await generatorFor(store).generate();

    expect(result).toEqual({
      albums: [
        { name: "a", photoCount: 2, pageKey: "a.html" },
        { name: "b", photoCount: 1, pageKey: "b.html" },
      ],
      indexKey: "index.html",
    });
    expect(store.objects.has("a.html")).toBe(true);
    expect(store.objects.has("b.html")).toBe(true);

    const index = store.text("index.html") ?? "";
    expect(index).toContain(`<li><a href="${BASE_URL}a.html">a</a></li>`);
    expect(index).toContain(`<li><a href="${BASE_URL}b.html">b</a></li>`);
    expect(store.objects.get("index.html")?.contentType).toBe("text/html; charset=utf-8");
  });

  test("album page references photos in listing order", async () => {
    const store = new MemoryObjectStore().seed(["a/2.jpg", "a/1.jpg"]);

    await generatorFor(store).generate();

    const page = store.text("a.html") ?? "";
    expect(page.indexOf('src="a/1.jpg"')).toBeGreaterThan(-1);
    expect(page.indexOf('src="a/2.jpg"')).toBeGreaterThan(page.indexOf('src="a/1.jpg"'));
  });

  test("downloads photos into staging under album-prefixed names", async () => {
    const store = new MemoryObjectStore().seed(["a/1.jpg", "b/1.jpg"]);

    await generatorFor(store).generate();

    expect(readFileSync(join(staging.root, "a%2F1.jpg"), "utf-8")).toBe("data:a/1.jpg");
    expect(readFileSync(join(staging.root, "b%2F1.jpg"), "utf-8")).toBe("data:b/1.jpg");
    expect(existsSync(join(staging.root, "index.html"))).toBe(true);
    expect(store.calls.get).toBe(2);
  });

  test("builds an empty index for a bucket without albums", async () => {
    const store = new MemoryObjectStore();

    const result = await generatorFor(store).generate();

    expect(result.albums).toEqual([]);
    expect([...store.objects.keys()]).toEqual(["index.html"]);
    expect(store.text("index.html")).toContain('<ul class="albums">\n  </ul>');
  });

  test("emits a page for an album with no photos", async () => {
    const store = new MemoryObjectStore().seed(["docs/readme.txt"]);

    const result = await generatorFor(store).generate();

    expect(result.albums).toEqual([{ name: "docs", photoCount: 0, pageKey: "docs.html" }]);
    expect(store.text("docs.html")).toContain("<p>No photos yet.</p>");
  });

  test("overwrites stale staging content from earlier runs", async () => {
    staging.open();
    writeFileSync(join(staging.root, "index.html"), "stale");
    const store = new MemoryObjectStore().seed(["a/1.jpg"]);

    await generatorFor(store).generate();

    expect(readFileSync(join(staging.root, "index.html"), "utf-8")).toBe(store.text("index.html"));
  });

  test("uses the configured site title on the index", async () => {
    const store = new MemoryObjectStore();
    const generator = new SiteGenerator({
      repository: new AlbumRepository(store),
      store,
      staging,
      baseUrl: BASE_URL,
      title: "Family & Friends",
    });

    await generator.generate();

    expect(store.text("index.html")).toContain("  <h1>Family &amp; Friends</h1>\n");
  });

  test("refuses to let an album page replace the index", async () => {
    const store = new MemoryObjectStore().seed(["index/1.jpg", "a/2.jpg"]);

    const error = await generatorFor(store).generate().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderFailureError);
    if (!(error instanceof RenderFailureError)) return;
    expect(error.album).toBe("index");
    expect(error.cause).toBeInstanceOf(InvalidAlbumNameError);
    expect(store.objects.has("index.html")).toBe(false);
  });

  test("raises RenderFailureError when the staging directory cannot be created", async () => {
    writeFileSync(join(tmp, "file"), "not a directory");
    const store = new MemoryObjectStore().seed(["a/1.jpg"]);
    const generator = new SiteGenerator({
      repository: new AlbumRepository(store),
      store,
      staging: new StagingArea(join(tmp, "file", "site")),
      baseUrl: BASE_URL,
    });

    const error = await generator.generate().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderFailureError);
    if (!(error instanceof RenderFailureError)) return;
    expect(error.album).toBeNull();
    expect(store.calls.put).toBe(0);
  });

  test("reports progress for each phase", async () => {
    const store = new MemoryObjectStore().seed(["a/1.jpg", "b/1.jpg"]);
    const events: SiteProgress[] = [];

    await generatorFor(store, (p) => events.push(p)).generate();

    expect(events).toEqual([
      { phase: "enumerate" },
      { phase: "album", album: "a", index: 0, total: 2 },
      { phase: "album", album: "b", index: 1, total: 2 },
      { phase: "index", total: 2 },
    ]);
  });

  test("stops the run when an album page upload fails", async () => {
    const store = new MemoryObjectStore().seed(["a/1.jpg", "b/1.jpg"]);
    store.failingPuts.add("a.html");

    await expect(generatorFor(store).generate()).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(store.objects.has("b.html")).toBe(false);
    expect(store.objects.has("index.html")).toBe(false);
  });

  test("raises RenderFailureError when staging cannot be written", async () => {
    const store = new MemoryObjectStore().seed(["a/1.jpg"]);
    staging.open();
    // A directory where the page file should go makes the write fail
    mkdirSync(join(staging.root, "a.html"));

    const error = await generatorFor(store).generate().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderFailureError);
    if (!(error instanceof RenderFailureError)) return;
    expect(error.album).toBe("a");
    expect(store.objects.has("a.html")).toBe(false);
  });
});

describe("Publisher", () => {
  test("enables website hosting with index.html and returns the URL", async () => {
    const store = new MemoryObjectStore("my-photos");
    const publisher = new Publisher(store, "website.yandexcloud.net");

    const url = await publisher.publish();

    expect(url).toBe("https://my-photos.website.yandexcloud.net/");
    expect(store.websiteIndexDocument).toBe("index.html");
  });

  test("is idempotent", async () => {
    const store = new MemoryObjectStore("my-photos");
    const publisher = new Publisher(store, "website.example.test");

    const first = await publisher.publish();
    const second = await publisher.publish();

    expect(second).toBe(first);
    expect(store.calls.website).toBe(2);
    expect(store.websiteIndexDocument).toBe("index.html");
  });
});
