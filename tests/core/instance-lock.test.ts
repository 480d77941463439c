import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  acquireInstanceLock,
  isProcessAlive,
  LOCK_FILE_NAME,
  lockPathFor,
  readLockHolder,
} from "../../src/core/scheduler/instance-lock";

describe("instance lock", () => {
  let tempDir: string;
  let counter = 0;

  const alive = (pids: number[]) => (pid: number) => pids.includes(pid);

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "tierback-lock-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function destination(): Promise<string> {
    counter++;
    const dest = path.join(tempDir, `dest-${counter}`);
    await mkdir(dest, { recursive: true });
    return dest;
  }

  test("lock file lives in the destination root", () => {
    expect(lockPathFor("/backups")).toBe(path.join("/backups", LOCK_FILE_NAME));
  });

  test("acquires a free destination and writes the pid", async () => {
    const dest = await destination();

    const result = await acquireInstanceLock(dest, 4321, alive([4321]));

    expect(result.acquired).toBe(true);
    expect(await readFile(lockPathFor(dest), "utf8")).toBe("4321\n");
  });

  test("refuses a destination held by a live process", async () => {
    const dest = await destination();
    await acquireInstanceLock(dest, 1111, alive([1111]));

    const result = await acquireInstanceLock(dest, 2222, alive([1111, 2222]));

    expect(result).toEqual({ acquired: false, holderPid: 1111 });
    expect(await readFile(lockPathFor(dest), "utf8")).toBe("1111\n");
  });

  test("takes over a lock left by a dead process", async () => {
    const dest = await destination();
    await writeFile(lockPathFor(dest), "1111\n");

    const result = await acquireInstanceLock(dest, 2222, alive([2222]));

    expect(result.acquired).toBe(true);
    expect(await readFile(lockPathFor(dest), "utf8")).toBe("2222\n");
  });

  test("takes over a lock with garbage contents", async () => {
    const dest = await destination();
    await writeFile(lockPathFor(dest), "not a pid");

    const result = await acquireInstanceLock(dest, 2222, alive([]));

    expect(result.acquired).toBe(true);
  });

  test("takes over a lock naming its own pid", async () => {
    const dest = await destination();
    await writeFile(lockPathFor(dest), "1\n");

    const result = await acquireInstanceLock(dest, 1, alive([1]));

    expect(result.acquired).toBe(true);
    expect(await readFile(lockPathFor(dest), "utf8")).toBe("1\n");
  });

  test("release removes the lock file", async () => {
    const dest = await destination();
    const result = await acquireInstanceLock(dest, 4321, alive([4321]));
    if (!result.acquired) throw new Error("expected lock");

    await result.lock.release();

    await expect(stat(lockPathFor(dest))).rejects.toThrow();
  });

  test("release leaves a lock taken over by another pid", async () => {
    const dest = await destination();
    const result = await acquireInstanceLock(dest, 4321, alive([4321]));
    if (!result.acquired) throw new Error("expected lock");
    await writeFile(lockPathFor(dest), "9999\n");

    await result.lock.release();

    expect(await readFile(lockPathFor(dest), "utf8")).toBe("9999\n");
  });

  describe("readLockHolder", () => {
    test("returns the live holder", async () => {
      const dest = await destination();
      await writeFile(lockPathFor(dest), "1234\n");

      expect(await readLockHolder(dest, alive([1234]), 1)).toBe(1234);
    });

    test("returns null for a stale lock", async () => {
      const dest = await destination();
      await writeFile(lockPathFor(dest), "1234\n");

      expect(await readLockHolder(dest, alive([]))).toBeNull();
    });

    test("ignores a lock naming the caller", async () => {
      const dest = await destination();
      await writeFile(lockPathFor(dest), "1234\n");

      expect(await readLockHolder(dest, alive([1234]), 1234)).toBeNull();
    });

    test("returns null without a lock file", async () => {
      expect(await readLockHolder(await destination(), alive([1]))).toBeNull();
    });
  });

  test("isProcessAlive sees the current process", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
