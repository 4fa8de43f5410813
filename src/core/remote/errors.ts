export class RemoteStorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteStorageError';
  }
}

export class RemoteNetworkError extends RemoteStorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteNetworkError';
  }
}

export class RemoteAuthError extends RemoteStorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteAuthError';
  }
}

export class RemoteNotFoundError extends RemoteStorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteNotFoundError';
  }
}

export class RemoteHttpError extends RemoteStorageError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`HTTP ${status}: ${body}`);
    this.name = 'RemoteHttpError';
    this.status = status;
    this.body = body;
  }
}
