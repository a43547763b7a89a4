import { promises as fs } from "node:fs";
import type { AgentIdentity } from "./identity.js";

const TEMPLATE_DIR = new URL("../templates/", import.meta.url);

export const NOTEBOOK_NAME_PLACEHOLDER = "data-agent-name";

const readTemplate = (fileName: string) =>
  fs.readFile(new URL(fileName, TEMPLATE_DIR), "utf8");

// The notebook template is JSON, so the name is inserted as an escaped string body.
export const renderAgentNotebook = async (displayName: string) => {
  const template = await readTemplate("data-agent.ipynb");
  const escaped = JSON.stringify(displayName).slice(1, -1);
  return template.replaceAll(NOTEBOOK_NAME_PLACEHOLDER, escaped);
};

export const renderReadme = async (
  identity: AgentIdentity,
  createdDate: string
) => {
  const template = await readTemplate("readme.md");
  return template
    .replaceAll("{agent_name}", identity.displayName)
    .replaceAll("{folder_name}", identity.folderName)
    .replaceAll("{created_date}", createdDate);
};

export const renderTestingNotebook = () => readTemplate("testing.ipynb");
