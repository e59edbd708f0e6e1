/** The job store could not be reached or refused the write. */
export class TaskQueueError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class ScraperRequestError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, params: { status?: number; retryable: boolean; cause?: unknown }) {
    super(message, { cause: params.cause });
    this.name = this.constructor.name;
    if (params.status !== undefined) {
      this.status = params.status;
    }
    this.retryable = params.retryable;
  }
}
