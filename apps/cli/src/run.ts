import {
  DriveWindowError,
  formatCoordinate,
  parseCoordinate,
  runEtaSeries,
  type BatchFetchOptions,
  type Coordinate,
  type Geocoder,
  type Logger,
  type Place,
  type RoutingClient
} from "@drivewindow/eta";
import type { CliArgs } from "./args";
import {
  renderCandidates,
  renderDepartureTable,
  renderFailedWarning,
  renderKeyPoints,
  renderSkippedNote
} from "./report";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DECLINED = 2;

export type CliMaps = RoutingClient &
  Geocoder & {
    downloadStaticMap(origin: Coordinate, destination: Coordinate): Promise<Uint8Array>;
  };

export type CliDeps = {
  maps: CliMaps;
  logger: Logger;
  /** Report output (stdout) */
  print: (line: string) => void;
  /** User-facing errors (stderr) */
  printError: (line: string) => void;
  confirm: (question: string) => Promise<boolean>;
  writeFile: (path: string, data: Uint8Array) => Promise<void>;
  fetch?: Partial<BatchFetchOptions>;
};

function printLines(print: (line: string) => void, lines: readonly string[]) {
  for (const line of lines) {
    print(line);
  }
}

async function resolvePlace(label: string, text: string, deps: CliDeps): Promise<Place> {
  const location = parseCoordinate(text);
  if (location) {
    return { query: text, formattedAddress: formatCoordinate(location), location, placeId: null };
  }

  const candidates = await deps.maps.geocode(text);
  const [first] = candidates;
  if (!first) {
    throw new DriveWindowError("not_found", `No places found for ${label.toLowerCase()} "${text}"`);
  }

  printLines(deps.print, renderCandidates(label, candidates));
  return first;
}

async function run(args: CliArgs, deps: CliDeps): Promise<number> {
  const origin = await resolvePlace("Origin", args.origin, deps);
  const destination = await resolvePlace("Destination", args.destination, deps);

  if (!args.yes) {
    const question =
      `Proceed with ${origin.formattedAddress} (${formatCoordinate(origin.location)})` +
      ` -> ${destination.formattedAddress} (${formatCoordinate(destination.location)})?`;
    if (!(await deps.confirm(question))) {
      deps.print("Cancelled. Pass --origin and --destination as lat,lng to skip geocoding.");
      return EXIT_DECLINED;
    }
  }

  if (args.saveMapPath) {
    const image = await deps.maps.downloadStaticMap(origin.location, destination.location);
    await deps.writeFile(args.saveMapPath, image);
    deps.print(`Saved static map to ${args.saveMapPath}`);
  }

  const report = await runEtaSeries(
    deps.maps,
    {
      origin: origin.location,
      destination: destination.location,
      date: args.date,
      start: args.start,
      end: args.end,
      intervalMinutes: args.intervalMinutes,
      timeZone: args.timeZone
    },
    { fetch: deps.fetch, logger: deps.logger, chartHeightRows: args.heightRows }
  );

  deps.print("");
  printLines(deps.print, renderDepartureTable(report.series));

  const notes = [
    renderFailedWarning(report.failedTasks),
    renderSkippedNote(report.skippedTimePoints)
  ].filter((line): line is string => line !== null);
  if (notes.length > 0) {
    deps.print("");
    printLines(deps.print, notes);
  }

  deps.print("");
  printLines(deps.print, renderKeyPoints(report.insight));

  if (args.ascii) {
    deps.print("");
    deps.print(report.chart);
  }

  return EXIT_OK;
}

/**
 * Resolve both places, confirm, then fetch and print the series.
 * Domain failures become exit code 1; anything else propagates.
 */
export async function runCli(args: CliArgs, deps: CliDeps): Promise<number> {
  try {
    return await run(args, deps);
  } catch (error) {
    if (error instanceof DriveWindowError) {
      deps.printError(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
