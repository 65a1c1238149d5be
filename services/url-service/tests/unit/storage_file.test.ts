import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PingNotSupportedError } from "../../src/errors.js";
import { FileUrlStore } from "../../src/storage_file.js";
import { silentLogger } from "./helpers.js";

const logger = silentLogger();

async function readEntries(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf8"));
}

describe("FileUrlStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "url-store-"));
    path = join(dir, "urls.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("creates an empty file when none exists", async () => {
    await FileUrlStore.open(path, logger);
    expect(await readEntries(path)).toEqual([]);
  });

  test("creates missing parent directories", async () => {
    const nested = join(dir, "a", "b", "urls.json");
    await FileUrlStore.open(nested, logger);
    expect(await readEntries(nested)).toEqual([]);
  });

  test("writes saved records to disk", async () => {
    const store = await FileUrlStore.open(path, logger);
    await store.save("abc12345", "https://example.com", "u1");
    await store.flush();

    expect(await readEntries(path)).toEqual([
      { short_id: "abc12345", original_url: "https://example.com", user_id: "u1", is_deleted: false }
    ]);
    await expect(stat(`${path}.tmp`)).rejects.toThrow();
  });

  test("reloads records and deletion flags", async () => {
    const first = await FileUrlStore.open(path, logger);
    await first.saveBatch(
      new Map([
        ["keep", "https://keep.test"],
        ["gone", "https://gone.test"]
      ]),
      "u1"
    );
    await first.deleteUrls(["gone"], "u1");
    await first.close();

    const second = await FileUrlStore.open(path, logger);
    expect(await second.get("keep")).toBe("https://keep.test");
    expect(await second.get("gone")).toBeNull();
    expect(await second.findByOriginalUrl("https://gone.test")).toBeNull();
    expect(await second.getUrlsByUserId("u1")).toEqual([{ shortId: "keep", originalUrl: "https://keep.test" }]);
  });

  test("concurrent saves all reach the file", async () => {
    const store = await FileUrlStore.open(path, logger);
    await Promise.all(
      Array.from({ length: 25 }, (_, i) => store.save(`id${i}`, `https://site.test/${i}`, "u1"))
    );
    await store.flush();

    expect(await readEntries(path)).toHaveLength(25);
  });

  test("a delete by a non-owner changes nothing", async () => {
    const store = await FileUrlStore.open(path, logger);
    await store.save("abc", "https://a.test", "u1");
    await store.flush();
    const before = await readFile(path, "utf8");

    await store.deleteUrls(["abc"], "u2");
    await store.flush();

    expect(await readFile(path, "utf8")).toBe(before);
    expect(await store.get("abc")).toBe("https://a.test");
  });

  test("refuses a file that is not a JSON array of records", async () => {
    await writeFile(path, JSON.stringify({ short_id: "x" }));
    await expect(FileUrlStore.open(path, logger)).rejects.toThrow(`${path}: expected a JSON array`);

    await writeFile(path, JSON.stringify([{ short_id: "x" }]));
    await expect(FileUrlStore.open(path, logger)).rejects.toThrow(`${path}: malformed entry at index 0`);
  });

  test("ping is not supported", async () => {
    const store = await FileUrlStore.open(path, logger);
    await expect(store.ping()).rejects.toBeInstanceOf(PingNotSupportedError);
  });
});
