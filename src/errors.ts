export type RemoteService = "translation" | "scoring";

export class RemoteCallError extends Error {
  constructor(
    readonly service: RemoteService,
    message: string,
    readonly retryable: boolean,
    readonly attempts = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RemoteCallError";
  }

  withAttempts(attempts: number): RemoteCallError {
    return new RemoteCallError(
      this.service,
      `${this.message} (after ${attempts} attempt${attempts === 1 ? "" : "s"})`,
      this.retryable,
      attempts,
      { cause: this.cause }
    );
  }
}

export class CheckpointStoreError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Checkpoint store ${operation} failed${detail}`, options);
    this.name = "CheckpointStoreError";
  }
}

export class PipelineAbortedError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Pipeline run aborted", options);
    this.name = "PipelineAbortedError";
  }
}
