import { DriveWindowError } from "@drivewindow/eta";

export class GoogleMapsError extends DriveWindowError {
  /** Google's status string (e.g. OVER_QUERY_LIMIT), or HTTP_<code> for transport errors */
  readonly status: string | null;

  constructor(message: string, status: string | null = null) {
    super("upstream_error", message);
    this.status = status;
  }
}
