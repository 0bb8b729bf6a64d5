export class SyncError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Upstream record failed validation; the item is skipped and not retried. */
export class ValidationError extends SyncError {}

export class FetchError extends SyncError {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class StoreReadError extends SyncError {
  constructor(readonly key: string, cause?: unknown) {
    super(`store read failed key=${key}: ${describeError(cause)}`, cause);
  }
}

export class StoreWriteError extends SyncError {
  constructor(readonly key: string, cause?: unknown) {
    super(`store write failed key=${key}: ${describeError(cause)}`, cause);
  }
}

export class SerializationError extends SyncError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined || error === null) return 'unknown';
  return String(error);
}
