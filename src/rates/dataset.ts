import { EmptyResultError } from "../errors";
import { DatasetRow, ExtractedRow } from "../types/rateTables";
import { inferDependents } from "./dependents";

export interface AssembledDataset {
  rows: DatasetRow[];
  duplicatesRemoved: number;
}

function rowIdentity(row: ExtractedRow): string {
  return JSON.stringify([
    row.year,
    row.rating,
    row.dependentGroup,
    row.dependentStatus,
    row.category,
    row.addedItem,
    row.monthlyRate
  ]);
}

export function dedupeRows(rows: ExtractedRow[]): ExtractedRow[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = rowIdentity(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function enrichRow(row: ExtractedRow): DatasetRow {
  if (row.category !== "Basic") {
    return { ...row, hasSpouse: null, parentCount: null, hasChild: null };
  }
  return { ...row, ...inferDependents(row.dependentStatus) };
}

export function assembleDataset(rows: ExtractedRow[]): AssembledDataset {
  const unique = dedupeRows(rows);
  if (!unique.length) {
    throw new EmptyResultError();
  }
  return {
    rows: unique.map(enrichRow),
    duplicatesRemoved: rows.length - unique.length
  };
}
