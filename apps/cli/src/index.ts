import * as dotenv from "dotenv";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { GoogleMapsClient } from "@drivewindow/google-maps";
import { CliUsageError, parseCliArgs, USAGE, wantsHelp, type CliArgs } from "./args";
import { fetchTuningFromConfig, getConfig } from "./config";
import { createLogger, logUnexpectedError } from "./logger";
import { confirm } from "./prompt";
import { EXIT_FAILURE, EXIT_OK, runCli } from "./run";

dotenv.config({ path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../.env") });

async function main(argv: string[]): Promise<number> {
  if (wantsHelp(argv)) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const config = getConfig();
  const logger = createLogger(config.LOG_LEVEL);

  let args: CliArgs;
  try {
    args = parseCliArgs(argv, { timeZone: config.DEFAULT_TIME_ZONE });
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const maps = new GoogleMapsClient({
    apiKey: config.GOOGLE_MAPS_API_KEY,
    baseUrl: config.GOOGLE_MAPS_BASE_URL,
    timeoutMs: config.GOOGLE_MAPS_TIMEOUT_MS
  });

  return runCli(args, {
    maps,
    logger,
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    confirm,
    writeFile: (filePath, data) => writeFile(filePath, data),
    fetch: fetchTuningFromConfig(config)
  });
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    // Config may be what failed, so this logger does not read it
    logUnexpectedError(createLogger("error"), error);
    process.exitCode = EXIT_FAILURE;
  });
