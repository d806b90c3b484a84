import { CHART_HEIGHT_ROWS, DEFAULT_INTERVAL_MINUTES } from "@drivewindow/config";
import { DriveWindowError } from "@drivewindow/eta";

export const USAGE = `Usage: drivewindow --origin=PLACE --destination=PLACE --date=YYYY-MM-DD --start=HH:MM --end=HH:MM [options]

PLACE is an address or a "lat,lng" pair.

Options:
  --interval=MINUTES   Minutes between departures (default ${DEFAULT_INTERVAL_MINUTES})
  --tz=ZONE            IANA time zone of date, start and end (default from DEFAULT_TIME_ZONE)
  --height=ROWS        Chart height in rows (default ${CHART_HEIGHT_ROWS})
  --save-map=PATH      Save a static map of the route to PATH
  --ascii              Print a text chart of the series
  --yes                Skip the confirmation prompt
  --help               Show this message`;

export class CliUsageError extends DriveWindowError {
  constructor(message: string) {
    super("usage", message);
  }
}

export type CliArgs = {
  origin: string;
  destination: string;
  date: string;
  start: string;
  end: string;
  intervalMinutes: number;
  timeZone: string;
  heightRows: number;
  saveMapPath: string | null;
  ascii: boolean;
  yes: boolean;
};

const VALUE_FLAGS = new Set(["origin", "destination", "date", "start", "end", "interval", "tz", "height", "save-map"]);
const SWITCHES = new Set(["ascii", "yes", "help"]);

function readFlag(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length).trim();
}

function requireFlag(argv: readonly string[], name: string): string {
  const value = readFlag(argv, name);
  if (!value) {
    throw new CliUsageError(`--${name} is required`);
  }
  return value;
}

function integerFlag(argv: readonly string[], name: string, fallback: number, min: number): number {
  const raw = readFlag(argv, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw === "" || !Number.isInteger(value) || value < min) {
    throw new CliUsageError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function wantsHelp(argv: readonly string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

export function parseCliArgs(argv: readonly string[], defaults: { timeZone: string }): CliArgs {
  for (const arg of argv) {
    const match = /^--([a-z-]+)(=.*)?$/s.exec(arg);
    const known = match !== null && (match[2] === undefined ? SWITCHES.has(match[1]) : VALUE_FLAGS.has(match[1]));
    if (!known) {
      throw new CliUsageError(`unknown argument: ${arg}`);
    }
  }

  return {
    origin: requireFlag(argv, "origin"),
    destination: requireFlag(argv, "destination"),
    date: requireFlag(argv, "date"),
    start: requireFlag(argv, "start"),
    end: requireFlag(argv, "end"),
    intervalMinutes: integerFlag(argv, "interval", DEFAULT_INTERVAL_MINUTES, 1),
    timeZone: readFlag(argv, "tz") || defaults.timeZone,
    heightRows: integerFlag(argv, "height", CHART_HEIGHT_ROWS, 2),
    saveMapPath: readFlag(argv, "save-map") || null,
    ascii: argv.includes("--ascii"),
    yes: argv.includes("--yes")
  };
}
