import { DatasetRow } from "../types/rateTables";
import { CellValue, ColumnKind, DATASET_COLUMNS } from "./datasetColumns";

function formatPreviewCell(value: CellValue, kind: ColumnKind): string {
  if (value === null) return "<NA>";
  if (kind === "money" && typeof value === "number") return value.toFixed(2);
  return String(value);
}

function isRightAligned(kind: ColumnKind): boolean {
  return kind === "integer" || kind === "money";
}

/** Space-aligned text table of the first `limit` rows, numbers right-aligned. */
export function formatPreview(rows: DatasetRow[], limit: number): string {
  const shown = rows.slice(0, limit);
  const columns = DATASET_COLUMNS.map((column) => {
    const texts = shown.map((row) => formatPreviewCell(column.value(row), column.kind));
    const width = Math.max(column.header.length, ...texts.map((text) => text.length));
    const pad = (text: string) =>
      isRightAligned(column.kind) ? text.padStart(width) : text.padEnd(width);
    return { header: pad(column.header), texts: texts.map(pad) };
  });

  const lines = [columns.map((column) => column.header).join(" ")];
  shown.forEach((_, index) => {
    lines.push(columns.map((column) => column.texts[index]).join(" "));
  });
  return lines.map((line) => line.trimEnd()).join("\n");
}
