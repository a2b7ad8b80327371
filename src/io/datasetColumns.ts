import { DatasetRow } from "../types/rateTables";

export type CellValue = string | number | boolean | null;

export type ColumnKind = "text" | "integer" | "money" | "boolean";

export interface DatasetColumn {
  header: string;
  kind: ColumnKind;
  value: (row: DatasetRow) => CellValue;
}

export const DATASET_COLUMNS: DatasetColumn[] = [
  { header: "Year", kind: "integer", value: (row) => row.year },
  { header: "Rating", kind: "integer", value: (row) => row.rating },
  { header: "Dependent_Group", kind: "text", value: (row) => row.dependentGroup },
  { header: "Dependent_Status", kind: "text", value: (row) => row.dependentStatus },
  { header: "Category", kind: "text", value: (row) => row.category },
  { header: "Added_Item", kind: "text", value: (row) => row.addedItem },
  { header: "Monthly_Rate_USD", kind: "money", value: (row) => row.monthlyRate },
  { header: "Has_Spouse", kind: "boolean", value: (row) => row.hasSpouse },
  { header: "Parent_Count", kind: "integer", value: (row) => row.parentCount },
  { header: "Has_Child", kind: "boolean", value: (row) => row.hasChild }
];
