/**
 * Error classes for the download pipeline.
 * Listing-level errors (InvalidInput, FrameNotFound, TabNotFound) end the run;
 * per-case errors (Resolution, Download) are recorded and the run continues.
 */

export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly input?: string
  ) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class FrameNotFoundError extends Error {
  constructor(
    message: string,
    public readonly urlPattern?: string
  ) {
    super(message);
    this.name = "FrameNotFoundError";
  }
}

export class TabNotFoundError extends Error {
  constructor(
    message: string,
    public readonly year?: string,
    public readonly availableTabs: string[] = []
  ) {
    super(message);
    this.name = "TabNotFoundError";
  }
}

export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly mediaPlayerUrl?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ResolutionError";
  }
}

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DownloadError";
  }
}

/** Per-case failure categories as they appear in the run report. */
export enum FailureType {
  RESOLUTION = "ResolutionFailure",
  DOWNLOAD = "DownloadFailure"
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : JSON.stringify(err);
}
