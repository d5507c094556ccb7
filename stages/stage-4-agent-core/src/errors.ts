export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/** The caller aborted a respond call; its turn log is discarded. */
export class RequestCancelledError extends Error {
  readonly runId: string;

  constructor(runId: string, cause?: unknown) {
    super(`Run ${runId} was cancelled`, { cause });
    this.name = "RequestCancelledError";
    this.runId = runId;
  }
}
