import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DirectoryArchiveStore } from "../../src/storage/directory";
import { ArchiveWriteError } from "../../src/storage/errors";

describe("DirectoryArchiveStore", () => {
  let tempDir: string;
  let counter = 0;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "tierback-directory-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function freshRoot(): Promise<string> {
    counter++;
    return path.join(tempDir, `store-${counter}`);
  }

  async function stage(name: string, content = "archive"): Promise<{ name: string; path: string }> {
    const stagingDir = path.join(tempDir, `staging-${counter}-${name}`);
    await mkdir(stagingDir, { recursive: true });
    const stagedPath = path.join(stagingDir, `${name}.tgz`);
    await writeFile(stagedPath, content);
    return { name, path: stagedPath };
  }

  describe("list", () => {
    test("returns nothing when the store does not exist yet", async () => {
      const store = new DirectoryArchiveStore(path.join(tempDir, "missing"));
      expect(await store.list()).toEqual([]);
    });

    test("reads createdAt from the file modification time", async () => {
      const root = await freshRoot();
      await mkdir(root, { recursive: true });
      const filePath = path.join(root, "20240101_000000.tgz");
      await writeFile(filePath, "12345");
      const mtime = new Date("2024-01-01T00:00:00Z");
      await utimes(filePath, mtime, mtime);

      const entries = await new DirectoryArchiveStore(root).list();

      expect(entries).toEqual([{ name: "20240101_000000", createdAt: mtime, sizeBytes: 5 }]);
    });

    test("ignores files that are not cycle archives", async () => {
      const root = await freshRoot();
      await mkdir(path.join(root, ".cycle-20240101_000000"), { recursive: true });
      await writeFile(path.join(root, "logs.txt"), "log");
      await writeFile(path.join(root, ".tierback.lock"), "1");
      await writeFile(path.join(root, "notes.tgz"), "x");
      await writeFile(path.join(root, "20240101_000000.tar"), "x");
      await writeFile(path.join(root, "20240102_000000.tgz"), "x");

      const entries = await new DirectoryArchiveStore(root).list();

      expect(entries.map((e) => e.name)).toEqual(["20240102_000000"]);
    });

    test("sorts entries oldest first", async () => {
      const root = await freshRoot();
      await mkdir(root, { recursive: true });
      const times: Array<[string, string]> = [
        ["20240103_000000", "2024-01-03T00:00:00Z"],
        ["20240101_000000", "2024-01-01T00:00:00Z"],
        ["20240102_000000", "2024-01-02T00:00:00Z"],
      ];
      for (const [name, iso] of times) {
        const filePath = path.join(root, `${name}.tgz`);
        await writeFile(filePath, name);
        await utimes(filePath, new Date(iso), new Date(iso));
      }

      const entries = await new DirectoryArchiveStore(root).list();

      expect(entries.map((e) => e.name)).toEqual(["20240101_000000", "20240102_000000", "20240103_000000"]);
    });
  });

  describe("add", () => {
    test("creates the store on first add", async () => {
      const root = await freshRoot();
      const store = new DirectoryArchiveStore(root);

      await store.add(await stage("20240101_000000"));

      expect(await readdir(root)).toEqual(["20240101_000000.tgz"]);
    });

    test("moves the staged archive into place", async () => {
      const root = await freshRoot();
      const staged = await stage("20240101_000000", "payload");

      await new DirectoryArchiveStore(root).add(staged);

      expect(await readFile(path.join(root, "20240101_000000.tgz"), "utf8")).toBe("payload");
      await expect(readFile(staged.path)).rejects.toThrow();
    });

    test("re-adding the same name leaves exactly one entry", async () => {
      const root = await freshRoot();
      const store = new DirectoryArchiveStore(root);

      await store.add(await stage("20240101_000000", "first"));
      await store.add(await stage("20240101_000000", "second"));

      const entries = await store.list();
      expect(entries.filter((e) => e.name === "20240101_000000")).toHaveLength(1);
      expect(await readFile(path.join(root, "20240101_000000.tgz"), "utf8")).toBe("second");
    });

    test("rejects names that are not cycle names", async () => {
      const store = new DirectoryArchiveStore(await freshRoot());
      await expect(store.add({ name: "../escape", path: "/nowhere" })).rejects.toThrow(ArchiveWriteError);
    });

    test("wraps filesystem failures in ArchiveWriteError", async () => {
      const store = new DirectoryArchiveStore(await freshRoot());
      await expect(
        store.add({ name: "20240101_000000", path: path.join(tempDir, "does-not-exist.tgz") }),
      ).rejects.toThrow(ArchiveWriteError);
    });
  });

  describe("remove", () => {
    test("deletes every named entry", async () => {
      const root = await freshRoot();
      const store = new DirectoryArchiveStore(root);
      await store.add(await stage("20240101_000000"));
      await store.add(await stage("20240102_000000"));
      await store.add(await stage("20240103_000000"));

      await store.remove(new Set(["20240101_000000", "20240103_000000"]));

      expect((await store.list()).map((e) => e.name)).toEqual(["20240102_000000"]);
    });

    test("ignores names that are not in the store", async () => {
      const root = await freshRoot();
      const store = new DirectoryArchiveStore(root);
      await store.add(await stage("20240101_000000"));

      await expect(store.remove(new Set(["20231231_235959"]))).resolves.toBeUndefined();
      expect(await store.list()).toHaveLength(1);
    });

    test("never touches paths outside the store", async () => {
      const root = await freshRoot();
      await mkdir(root, { recursive: true });
      const outside = path.join(tempDir, "keep-me.tgz");
      await writeFile(outside, "x");

      await new DirectoryArchiveStore(root).remove(new Set(["../keep-me"]));

      expect(await readFile(outside, "utf8")).toBe("x");
    });
  });
});
