import { promises as fs } from "node:fs";
import { z } from "zod";

export const PARAMETERS_TAG = "parameters" as const;

const LINE_PATTERN = /[^\n]*\n|[^\n]+$/g;

/**
 * Splits a multi-line string into lines that keep their line endings, the
 * shape notebook files use for cell sources.
 */
export const splitSourceLines = (text: string): string[] => {
  if (text.length === 0) {
    return [];
  }
  return text.match(LINE_PATTERN) ?? [];
};

const CellSourceSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    typeof value === "string" ? splitSourceLines(value) : value
  );

const CellMetadataSchema = z.record(z.string(), z.unknown());

// A missing or malformed container reads as empty.
const LenientMetadataSchema = CellMetadataSchema.catch({});

export const NotebookFileCodeCellSchema = z
  .object({
    cell_type: z.literal("code"),
    source: CellSourceSchema.default([]),
    metadata: LenientMetadataSchema,
    outputs: z.array(z.unknown()).catch([]),
    execution_count: z.number().int().nullable().catch(null),
  })
  .passthrough();

export const NotebookFileMarkdownCellSchema = z
  .object({
    cell_type: z.literal("markdown"),
    source: CellSourceSchema.default([]),
    metadata: LenientMetadataSchema,
  })
  .passthrough();

const KNOWN_CELL_TYPES: ReadonlySet<string> = new Set(["code", "markdown"]);

// Raw cells and anything newer the editor writes; kept so files still parse.
// Code and markdown cells never land here: they must match their own schema.
export const NotebookFileOtherCellSchema = z
  .object({
    cell_type: z
      .string()
      .refine((type) => !KNOWN_CELL_TYPES.has(type), {
        message: "Code and markdown cells need a string or string[] source",
      }),
  })
  .passthrough();

export const NotebookFileCellSchema = z.union([
  NotebookFileCodeCellSchema,
  NotebookFileMarkdownCellSchema,
  NotebookFileOtherCellSchema,
]);

export const NotebookFileSchema = z
  .object({
    cells: z.array(NotebookFileCellSchema).default([]),
    metadata: CellMetadataSchema.default({}),
    nbformat: z.number().int().optional(),
    nbformat_minor: z.number().int().optional(),
  })
  .passthrough();

export type NotebookFileCodeCell = z.infer<typeof NotebookFileCodeCellSchema>;
export type NotebookFileMarkdownCell = z.infer<
  typeof NotebookFileMarkdownCellSchema
>;
export type NotebookFileCell = z.infer<typeof NotebookFileCellSchema>;
export type NotebookFile = z.infer<typeof NotebookFileSchema>;

export interface CodeCell {
  type: "code";
  source: string[];
  tags?: ReadonlySet<string>;
}

export interface MarkdownCell {
  type: "markdown";
  source: string[];
}

export type NotebookCell = CodeCell | MarkdownCell;

export interface NotebookDocument {
  cells: NotebookCell[];
}

export const createCodeCell = (
  partial: { source?: string | string[]; tags?: Iterable<string> } = {}
): CodeCell => {
  const source =
    typeof partial.source === "string"
      ? splitSourceLines(partial.source)
      : [...(partial.source ?? [])];
  const cell: CodeCell = { type: "code", source };
  if (partial.tags) {
    cell.tags = new Set(partial.tags);
  }
  return cell;
};

export const createMarkdownCell = (
  partial: { source?: string | string[] } = {}
): MarkdownCell => {
  const source =
    typeof partial.source === "string"
      ? splitSourceLines(partial.source)
      : [...(partial.source ?? [])];
  return { type: "markdown", source };
};

export const createNotebookDocument = (
  cells: NotebookCell[] = []
): NotebookDocument => ({ cells: [...cells] });

export const isParametersCell = (cell: CodeCell): boolean =>
  cell.tags?.has(PARAMETERS_TAG) ?? false;

const readTags = (
  metadata: Record<string, unknown>
): ReadonlySet<string> | undefined => {
  const tags = metadata.tags;
  if (!Array.isArray(tags)) {
    return undefined;
  }
  const values = tags.filter(
    (value): value is string => typeof value === "string"
  );
  return values.length > 0 ? new Set(values) : undefined;
};

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((line) => typeof line === "string");

const isMetadata = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCodeFileCell = (
  cell: NotebookFileCell
): cell is NotebookFileCodeCell =>
  cell.cell_type === "code" &&
  isStringArray(cell.source) &&
  isMetadata(cell.metadata);

const isMarkdownFileCell = (
  cell: NotebookFileCell
): cell is NotebookFileMarkdownCell =>
  cell.cell_type === "markdown" &&
  isStringArray(cell.source) &&
  isMetadata(cell.metadata);

export const toNotebookDocument = (file: NotebookFile): NotebookDocument => {
  const cells: NotebookCell[] = [];
  for (const cell of file.cells) {
    if (isCodeFileCell(cell)) {
      const tags = readTags(cell.metadata);
      const code: CodeCell = { type: "code", source: [...cell.source] };
      if (tags) {
        code.tags = tags;
      }
      cells.push(code);
      continue;
    }
    if (isMarkdownFileCell(cell)) {
      cells.push({ type: "markdown", source: [...cell.source] });
    }
  }
  return { cells };
};

export class NotebookParseError extends Error {
  constructor(
    message: string,
    readonly filePath?: string
  ) {
    super(message);
    this.name = "NotebookParseError";
  }
}

export const parseNotebookFile = (
  value: unknown,
  filePath?: string
): NotebookFile => {
  const parsed = NotebookFileSchema.safeParse(value);
  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new NotebookParseError(
      formatted || "Invalid notebook file",
      filePath
    );
  }
  return parsed.data;
};

export const parseNotebookDocument = (
  raw: string,
  filePath?: string
): NotebookDocument => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NotebookParseError(`Notebook is not valid JSON: ${reason}`, filePath);
  }
  return toNotebookDocument(parseNotebookFile(json, filePath));
};

export const readNotebookDocument = async (
  filePath: string
): Promise<NotebookDocument> => {
  const raw = await fs.readFile(filePath, "utf8");
  return parseNotebookDocument(raw, filePath);
};
