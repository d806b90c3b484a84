import pino from "pino";

type FatalLogger = {
  fatal: (obj: object, msg?: string) => void;
};

// stdout carries the report; logs go to stderr
export function createLogger(level: string) {
  return pino({ name: "drivewindow", level }, pino.destination(2));
}

export function logUnexpectedError(logger: FatalLogger, error: unknown) {
  logger.fatal({ err: error }, "unexpected failure");
}
