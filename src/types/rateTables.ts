export type TableCategory = "Basic" | "Added";

export type TableLayout = "twoColumn" | "ratingColumns";

export interface SectionMeta {
  id: string;
  text: string;
}

/** Text read out of one rendered rate table, detached from the page. */
export interface RawTableSnapshot {
  caption: string;
  headers: string[];
  rows: string[][];
  section: SectionMeta | null;
}

export interface ExtractedRow {
  year: number;
  rating: number;
  dependentGroup: string;
  dependentStatus: string;
  category: TableCategory;
  addedItem: string | null;
  monthlyRate: number;
}

export interface DependentInference {
  hasSpouse: boolean;
  parentCount: number;
  hasChild: boolean;
}

export interface DatasetRow extends ExtractedRow {
  hasSpouse: boolean | null;
  parentCount: number | null;
  hasChild: boolean | null;
}
