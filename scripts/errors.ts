/**
 * Base error for track data loading.
 */
export class TrackDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackDataError";
  }
}

/**
 * A source file is missing or unreadable. The loader returns this instead of throwing.
 */
export class DataUnavailableError extends TrackDataError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Track data unavailable at ${filePath}${reason}`, { cause });
    this.name = "DataUnavailableError";
    this.filePath = filePath;
  }
}

/**
 * Neither an identifier join nor a title/artist join is possible between the two sources.
 */
export class MissingJoinKeyError extends TrackDataError {
  readonly primaryColumns: readonly string[];
  readonly secondaryColumns: readonly string[];

  constructor(primaryColumns: readonly string[], secondaryColumns: readonly string[]) {
    super(
      "No common merge keys found between datasets (expected 'id'/'track_id' or ['title', 'artist']).",
    );
    this.name = "MissingJoinKeyError";
    this.primaryColumns = primaryColumns;
    this.secondaryColumns = secondaryColumns;
  }
}
