import { promises as fs } from "node:fs";
import path from "node:path";
import {
  isParametersCell,
  type CodeCell,
  type MarkdownCell,
  type NotebookDocument,
} from "@dagent/notebook-schema";

export const KERNEL_NAME = "synapse_pyspark" as const;
export const LANGUAGE_GROUP = "synapse_pyspark" as const;
export const QUERY_LANGUAGE = "sparksql" as const;
export const HOST_LANGUAGE = "python" as const;

export const SOURCE_HEADER = "# Fabric notebook source" as const;
export const METADATA_MARKER = "# METADATA ********************" as const;
export const CELL_MARKER = "# CELL ********************" as const;
export const PARAMETERS_CELL_MARKER =
  "# PARAMETERS CELL ********************" as const;
export const MARKDOWN_MARKER = "# MARKDOWN ********************" as const;

const META_PREFIX = "# META";
const MAGIC_PREFIX = "# MAGIC ";
const COMMENT_PREFIX = "# ";

export type CodeCellKind =
  | "query-magic"
  | "configure-magic"
  | "generic-magic"
  | "plain";

export interface StorageMetadata {
  workspaceId?: string;
  storageId?: string;
  storageName?: string;
}

export interface ConvertOptions {
  storage?: StorageMetadata;
}

interface CompleteStorage {
  workspaceId: string;
  storageId: string;
  storageName: string;
}

const present = (value: string | undefined): value is string =>
  typeof value === "string" && value.length > 0;

const completeStorage = (
  storage: StorageMetadata | undefined
): CompleteStorage | null => {
  if (!storage) {
    return null;
  }
  const { workspaceId, storageId, storageName } = storage;
  if (present(workspaceId) && present(storageId) && present(storageName)) {
    return { workspaceId, storageId, storageName };
  }
  return null;
};

/**
 * Classifies a code cell from the literal prefix of its first source line.
 * Later lines never influence the result.
 */
export const classifyCodeCell = (source: readonly string[]): CodeCellKind => {
  const firstLine = source[0] ?? "";
  if (firstLine.startsWith("%%sql")) {
    return "query-magic";
  }
  if (firstLine.startsWith("%%configure")) {
    return "configure-magic";
  }
  if (firstLine.startsWith("%")) {
    return "generic-magic";
  }
  return "plain";
};

const languageFor = (kind: CodeCellKind): string | null => {
  switch (kind) {
    case "query-magic":
      return QUERY_LANGUAGE;
    case "configure-magic":
    case "plain":
      return HOST_LANGUAGE;
    case "generic-magic":
      return null;
  }
};

const meta = (line: string) => `${META_PREFIX} ${line}\n`;

const renderHeader = (options: ConvertOptions): string => {
  const storage = completeStorage(options.storage);
  let header = `${SOURCE_HEADER}\n\n${METADATA_MARKER}\n\n`;
  header += meta("{");
  header += meta(`  "kernel_info": {`);
  header += meta(`    "name": ${JSON.stringify(KERNEL_NAME)}`);
  if (storage) {
    header += meta("  },");
    header += meta(`  "dependencies": {`);
    header += meta(`    "lakehouse": {`);
    header += meta(
      `      "default_lakehouse": ${JSON.stringify(storage.storageId)},`
    );
    header += meta(
      `      "default_lakehouse_name": ${JSON.stringify(storage.storageName)},`
    );
    header += meta(
      `      "default_lakehouse_workspace_id": ${JSON.stringify(storage.workspaceId)}`
    );
    header += meta("    }");
  }
  header += meta("  }");
  header += meta("}");
  return `${header}\n`;
};

const renderFooter = (language: string): string =>
  `${METADATA_MARKER}\n\n` +
  meta("{") +
  meta(`  "language": ${JSON.stringify(language)},`) +
  meta(`  "language_group": ${JSON.stringify(LANGUAGE_GROUP)}`) +
  meta("}") +
  "\n";

// Exactly one blank line follows a body, however many line breaks it ends with.
const closeBody = (lines: readonly string[]): string =>
  `${lines.join("").replace(/[\r\n]+$/, "")}\n\n`;

const renderCodeCell = (cell: CodeCell): string => {
  const kind = classifyCodeCell(cell.source);
  const marker = isParametersCell(cell) ? PARAMETERS_CELL_MARKER : CELL_MARKER;
  const lines =
    kind === "plain"
      ? cell.source
      : cell.source.map((line) => `${MAGIC_PREFIX}${line}`);
  const language = languageFor(kind);
  const footer = language === null ? "" : renderFooter(language);
  return `${marker}\n\n${closeBody(lines)}${footer}`;
};

const renderMarkdownCell = (cell: MarkdownCell): string => {
  const lines = cell.source.map((line) => `${COMMENT_PREFIX}${line}`);
  return `${MARKDOWN_MARKER}\n\n${closeBody(lines)}`;
};

/**
 * Transcodes a notebook document into Fabric notebook source. The output is a
 * pure function of the input: repeated calls yield identical text.
 */
export const convertNotebook = (
  document: NotebookDocument,
  options: ConvertOptions = {}
): string => {
  const sections: string[] = [renderHeader(options)];
  for (const cell of document.cells) {
    if (cell.source.length === 0) {
      continue;
    }
    sections.push(
      cell.type === "code" ? renderCodeCell(cell) : renderMarkdownCell(cell)
    );
  }
  return `${sections.join("").trimEnd()}\n`;
};

export const writeConvertedNotebook = async (
  filePath: string,
  content: string
): Promise<void> => {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
};
