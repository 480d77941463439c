import { spawn } from "node:child_process";
import { closeSync, openSync } from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { ensureDestination, LOG_FILE_NAME, readLockHolder } from "../../core";
import { getErrorMessage, setLogLevel } from "../../utils";
import { color, ui } from "../ui";
import { DAEMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "./options";

/**
 * Re-run this program as `run <args>` in its own session, with output
 * appended to the run log. Returns the child's pid.
 */
export function spawnDetachedDaemon(args: string[], logPath: string): number {
  const entry = process.argv[1];
  if (!entry) {
    throw new Error("Unable to determine the tierback entry point");
  }

  const out = openSync(logPath, "a");
  try {
    const child = spawn(process.execPath, [...process.execArgv, entry, "run", ...args], {
      detached: true,
      stdio: ["ignore", out, out],
    });
    child.unref();

    if (child.pid === undefined) {
      throw new Error("Failed to spawn the backup process");
    }
    return child.pid;
  } finally {
    closeSync(out);
  }
}

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: DAEMON_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const config = await loadCommandConfig(values);

    ui.banner("start");

    await ensureDestination(config.destination);

    const holder = await readLockHolder(config.destination);
    if (holder !== null) {
      ui.info(`Backup process already running (pid ${holder})`);
      return 0;
    }

    const logPath = path.join(config.destination, LOG_FILE_NAME);
    const pid = spawnDetachedDaemon(args, logPath);

    ui.success(`Backup process started (pid ${pid})`);
    ui.info(`Logging to ${logPath}`);
    ui.info(`Stop it with ${color.cyan(`kill -TERM ${pid}`)}; a final backup runs before exit`);

    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${getErrorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("tierback start")} - Start the backup daemon in the background

${color.dim("USAGE:")}
  tierback start [OPTIONS]

${color.dim("OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Starts the backup loop detached from the terminal, unless one is already
  running for the same destination. Every cycle checks free space, copies the
  sources, archives them and prunes old backups. Output goes to logs.txt in
  the destination. Send SIGTERM or SIGHUP to stop after a final backup.

${color.dim("EXAMPLES:")}
  tierback start                                  # Start with ./tierback.config.yaml
  tierback start -c ~/.config/tierback/work.yaml  # Start with a specific config
  tierback start --source ~/workdir --dest ~/.backups
`);
}
