import { describe, expect, test } from "vitest";
import { packDirectory } from "../../src/core/backup/packer";
import { ArchiveWriteError } from "../../src/storage/errors";
import { CommandError, type CommandRunner } from "../../src/utils/exec";

describe("packDirectory", () => {
  function recorder(exitCode = 0) {
    const calls: Array<{ command: string; args: string[] }> = [];
    const run: CommandRunner = async (command, args) => {
      calls.push({ command, args });
      return { success: exitCode === 0, stdout: "", stderr: exitCode === 0 ? "" : "tar: write error", exitCode };
    };
    return { run, calls };
  }

  test("gzips for the tgz format", async () => {
    const { run, calls } = recorder();

    await packDirectory("/dest/.cycle-x/snapshot", "/dest/.cycle-x/x.tgz", "tgz", run);

    expect(calls).toEqual([
      { command: "tar", args: ["-czf", "/dest/.cycle-x/x.tgz", "-C", "/dest/.cycle-x/snapshot", "."] },
    ]);
  });

  test("writes plain tar for the tar format", async () => {
    const { run, calls } = recorder();

    await packDirectory("/snap", "/out/x.tar", "tar", run);

    expect(calls[0]?.args).toEqual(["-cf", "/out/x.tar", "-C", "/snap", "."]);
  });

  test("throws ArchiveWriteError carrying the tar failure", async () => {
    const { run } = recorder(2);

    const failure = await packDirectory("/snap", "/out/x.tgz", "tgz", run).then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ArchiveWriteError);
    if (!(failure instanceof ArchiveWriteError)) return;
    expect(failure.message).toBe("Failed to create archive /out/x.tgz");
    expect(failure.cause).toBeInstanceOf(CommandError);
    expect(failure.cause instanceof CommandError && failure.cause.message).toBe(
      "tar exited with code 2: tar: write error",
    );
  });
});
