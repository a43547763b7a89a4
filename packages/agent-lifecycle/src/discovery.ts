import type { WorkspaceApi, WorkspaceItem } from "@dagent/workspace-api";
import type { Discovery } from "./record.js";

export const PUBLISHED_RESOURCE_TYPES: ReadonlySet<string> = new Set([
  "DataAgent",
  "AISkill",
  "Agent",
]);

export const DEFAULT_PUBLISHED_RESOURCE_BASE_URL =
  "https://api.fabric.microsoft.com/v1";

export const normalizeAgentName = (name: string): string =>
  name.toLowerCase().replace(/[ \-_]+/g, "_");

export const matchPublishedResource = (
  items: readonly WorkspaceItem[],
  agentName: string
): WorkspaceItem | undefined => {
  const wanted = normalizeAgentName(agentName);
  return items.find((item) => {
    if (!PUBLISHED_RESOURCE_TYPES.has(item.type)) {
      return false;
    }
    const candidate = normalizeAgentName(item.displayName);
    return candidate === wanted || candidate.includes(wanted);
  });
};

export const buildPublishedResourceUrl = (
  baseUrl: string,
  workspaceId: string,
  resourceId: string
): string =>
  `${baseUrl.replace(/\/+$/, "")}/workspaces/${workspaceId}/aiskills/${resourceId}/aiassistant/openai`;

/** Looks up the resource a successful run published. Never throws. */
export const discoverPublishedResource = async (
  api: WorkspaceApi,
  workspaceId: string,
  agentName: string,
  baseUrl: string
): Promise<Discovery> => {
  try {
    const items = await api.listItems(workspaceId);
    const match = matchPublishedResource(items, agentName);
    if (!match) {
      return { state: "not_found" };
    }
    return {
      state: "found",
      resource: {
        id: match.id,
        displayName: match.displayName,
        type: match.type,
        url: buildPublishedResourceUrl(baseUrl, workspaceId, match.id),
      },
    };
  } catch (error) {
    return {
      state: "error",
      message: error instanceof Error ? error.message : String(error),
    };
  }
};
