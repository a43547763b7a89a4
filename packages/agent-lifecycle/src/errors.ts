export type AgentLifecycleErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "MISSING_WORKSPACE"
  | "INVALID_WORKSPACE_ID"
  | "MISSING_NOTEBOOK_REFERENCE"
  | "UNSUPPORTED_OPERATION"
  | "UPDATE_DECLINED"
  | "INVALID_AGENT_NAME"
  | "JOB_TIMEOUT"
  | "INVALID_RECORD";

/** Local precondition failures raised before any remote call is made. */
export class AgentLifecycleError extends Error {
  constructor(
    message: string,
    readonly code: AgentLifecycleErrorCode
  ) {
    super(message);
    this.name = "AgentLifecycleError";
  }
}

export class NotFoundError extends AgentLifecycleError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends AgentLifecycleError {
  constructor(readonly folderName: string) {
    super(`Agent '${folderName}' already exists`, "ALREADY_EXISTS");
    this.name = "AlreadyExistsError";
  }
}

export class MissingWorkspaceError extends AgentLifecycleError {
  constructor() {
    super(
      "No workspace id given. Pass one, store it in the agent record or set a default workspace",
      "MISSING_WORKSPACE"
    );
    this.name = "MissingWorkspaceError";
  }
}

export class InvalidWorkspaceIdError extends AgentLifecycleError {
  constructor(readonly workspaceId: string) {
    super(`Invalid workspace id format: ${workspaceId}`, "INVALID_WORKSPACE_ID");
    this.name = "InvalidWorkspaceIdError";
  }
}

export class MissingNotebookReferenceError extends AgentLifecycleError {
  constructor(readonly agentName: string) {
    super(
      `Agent '${agentName}' has no notebook id or name; upload it first`,
      "MISSING_NOTEBOOK_REFERENCE"
    );
    this.name = "MissingNotebookReferenceError";
  }
}

export class UnsupportedOperationError extends AgentLifecycleError {
  constructor(message: string) {
    super(message, "UNSUPPORTED_OPERATION");
    this.name = "UnsupportedOperationError";
  }
}

export class UpdateDeclinedError extends AgentLifecycleError {
  constructor(readonly displayName: string) {
    super(
      `Notebook '${displayName}' exists and the update was declined`,
      "UPDATE_DECLINED"
    );
    this.name = "UpdateDeclinedError";
  }
}

export class InvalidAgentNameError extends AgentLifecycleError {
  constructor(
    readonly agentName: string,
    reason: string
  ) {
    super(`Invalid agent name '${agentName}': ${reason}`, "INVALID_AGENT_NAME");
    this.name = "InvalidAgentNameError";
  }
}

export class JobTimeoutError extends AgentLifecycleError {
  constructor(
    readonly jobId: string,
    readonly lastStatus: string,
    readonly elapsedMs: number
  ) {
    super(
      `Job ${jobId} still ${lastStatus} after ${elapsedMs} ms; it keeps running remotely`,
      "JOB_TIMEOUT"
    );
    this.name = "JobTimeoutError";
  }
}

export class InvalidRecordError extends AgentLifecycleError {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`Agent record ${filePath} is unreadable: ${detail}`, "INVALID_RECORD");
    this.name = "InvalidRecordError";
  }
}
