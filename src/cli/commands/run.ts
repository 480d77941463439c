import { parseArgs } from "node:util";
import { Daemon } from "../../core";
import { getErrorMessage, logger, setLogLevel } from "../../utils";
import { color } from "../ui";
import { DAEMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "./options";

export const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGHUP", "SIGINT"];

export async function runDaemonCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: DAEMON_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    setLogLevel(values.verbose ? "debug" : config.logLevel);

    const daemon = new Daemon(config);
    const result = await daemon.start();
    if (result.status === "already-running") {
      return 0;
    }

    const { handle } = result;
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}`);
      handle.stop();
    };

    for (const signal of STOP_SIGNALS) {
      process.on(signal, onSignal);
    }

    await handle.done;

    for (const signal of STOP_SIGNALS) {
      process.off(signal, onSignal);
    }

    return 0;
  } catch (error) {
    logger.error(`Backup process failed: ${getErrorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("tierback run")} - Run the backup daemon in the foreground

${color.dim("USAGE:")}
  tierback run [OPTIONS]

${color.dim("OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Runs the backup loop attached to the terminal, logging to stdout. This is
  what "tierback start" launches in the background, and what a service
  manager should run. SIGTERM, SIGHUP or SIGINT trigger one final backup,
  then the process exits with status 0.
`);
}
