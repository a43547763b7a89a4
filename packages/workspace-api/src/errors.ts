export class WorkspaceApiError extends Error {
  readonly code: string = "WORKSPACE_API_ERROR";

  constructor(
    message: string,
    readonly status: number,
    readonly errorCode?: string,
    readonly requestId?: string
  ) {
    super(message);
    this.name = "WorkspaceApiError";
  }
}

export class AuthenticationError extends Error {
  readonly code = "AUTHENTICATION_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

export class MalformedResponseError extends Error {
  readonly code = "MALFORMED_RESPONSE";

  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class OperationFailedError extends Error {
  readonly code = "OPERATION_FAILED";

  constructor(
    message: string,
    readonly operationUrl: string,
    readonly errorCode?: string
  ) {
    super(message);
    this.name = "OperationFailedError";
  }
}
