export class SourceUnavailableError extends Error {
  constructor(readonly sourcePath: string, options?: ErrorOptions) {
    super(`Source data is unavailable: ${sourcePath}`, options);
    this.name = "SourceUnavailableError";
  }
}

export class StoreUnreadableError extends Error {
  constructor(
    readonly filePath: string,
    readonly lineNumber: number | null,
    options?: ErrorOptions,
  ) {
    const location = lineNumber === null ? filePath : `${filePath}:${lineNumber}`;
    super(`Checkpoint log cannot be read: ${location}`, options);
    this.name = "StoreUnreadableError";
  }
}

export class CheckpointLockedError extends Error {
  constructor(readonly lockPath: string, readonly holder: string | null) {
    super(
      holder
        ? `Checkpoint is locked by another run (${holder}). Remove ${lockPath} if that run is gone.`
        : `Checkpoint is locked by another run. Remove ${lockPath} if that run is gone.`,
    );
    this.name = "CheckpointLockedError";
  }
}

export class ResponseParseError extends Error {
  constructor(options?: ErrorOptions) {
    super("Generator response could not be parsed as JSON", options);
    this.name = "ResponseParseError";
  }
}

export class MalformedShapeError extends Error {
  constructor(readonly receivedType: string) {
    super(`Generator response is not a list (got ${receivedType})`);
    this.name = "MalformedShapeError";
  }
}

export class GeneratorRequestError extends Error {
  constructor(
    readonly providerId: string,
    message: string,
    readonly status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "GeneratorRequestError";
  }
}

export class BatchFailedError extends Error {
  constructor(
    readonly batchNumber: number,
    readonly totalBatches: number,
    readonly lastCompletedBatch: number | null,
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(
      `Batch ${batchNumber}/${totalBatches} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
      options,
    );
    this.name = "BatchFailedError";
  }
}
