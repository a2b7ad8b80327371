import { DatasetRow } from "../types/rateTables";
import { writeText } from "../utils/fs";
import { CellValue, DATASET_COLUMNS } from "./datasetColumns";

function formatCsvCell(value: CellValue): string {
  if (value === null) return "";
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(rows: DatasetRow[]): string {
  const lines = [DATASET_COLUMNS.map((column) => formatCsvCell(column.header)).join(",")];
  for (const row of rows) {
    lines.push(DATASET_COLUMNS.map((column) => formatCsvCell(column.value(row))).join(","));
  }
  return lines.join("\n") + "\n";
}

export async function writeDatasetCsv(filePath: string, rows: DatasetRow[]): Promise<void> {
  await writeText(filePath, toCsv(rows));
}
