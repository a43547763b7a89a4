export const NOTEBOOK_ITEM_TYPE = "Notebook" as const;

export interface WorkspaceItem {
  id: string;
  displayName: string;
  type: string;
  workspaceId: string;
  description?: string;
}

export interface ListItemsOptions {
  type?: string;
}

/** Where the notebook payload came from; decides the definition part path. */
export type NotebookDefinitionFormat = "fabric-source" | "ipynb";

export interface NotebookDefinitionInput {
  content: string;
  format: NotebookDefinitionFormat;
}

export interface CreateNotebookInput {
  displayName: string;
  description?: string;
  definition: NotebookDefinitionInput;
}

export interface JobFailureReason {
  errorCode?: string;
  message?: string;
}

export interface JobInstance {
  id: string;
  status: string;
  itemId?: string;
  jobType?: string;
  invokeType?: string;
  startTimeUtc?: string | null;
  endTimeUtc?: string | null;
  failureReason?: JobFailureReason | null;
}

export interface StartedJob {
  jobId: string;
}

export interface WorkspaceApi {
  getItem(workspaceId: string, itemId: string): Promise<WorkspaceItem | null>;
  listItems(
    workspaceId: string,
    options?: ListItemsOptions
  ): Promise<WorkspaceItem[]>;
  findNotebookByName(
    workspaceId: string,
    displayName: string
  ): Promise<WorkspaceItem | null>;
  createNotebook(
    workspaceId: string,
    input: CreateNotebookInput
  ): Promise<WorkspaceItem>;
  updateNotebookDefinition(
    workspaceId: string,
    notebookId: string,
    definition: NotebookDefinitionInput
  ): Promise<void>;
  startNotebookRun(workspaceId: string, notebookId: string): Promise<StartedJob>;
  getJobInstance(
    workspaceId: string,
    notebookId: string,
    jobId: string
  ): Promise<JobInstance>;
}
