import { InvalidAgentNameError } from "./errors.js";

export interface AgentIdentity {
  displayName: string;
  folderName: string;
}

export const toFolderName = (displayName: string): string =>
  displayName.replace(/[ -]/g, "_").toLowerCase();

export const createAgentIdentity = (name: string): AgentIdentity => {
  const displayName = name.trim();
  if (displayName.length === 0) {
    throw new InvalidAgentNameError(name, "name is empty");
  }
  if (/[\\/]/.test(displayName) || displayName.includes("..")) {
    throw new InvalidAgentNameError(name, "name must not contain a path");
  }
  return { displayName, folderName: toFolderName(displayName) };
};
