export class DriveWindowError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRangeError extends DriveWindowError {
  constructor(message: string) {
    super("invalid_range", message);
  }
}

export class EmptySeriesError extends DriveWindowError {
  constructor(message = "no time point has both traffic models") {
    super("no_data", message);
  }
}
