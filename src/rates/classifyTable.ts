import { findPercent, hasPercent } from "../normalize/percent";
import { TableCategory, TableLayout } from "../types/rateTables";

export interface TableClassification {
  category: TableCategory;
  layout: TableLayout;
  /** Category read from the caption alone, before any header fallback. */
  captionCategory: TableCategory | null;
}

export function categoryFromCaption(caption: string): TableCategory | null {
  if (caption.includes("Basic")) return "Basic";
  if (caption.includes("Added")) return "Added";
  return null;
}

/** The 10% and 20% table: a rating column and a rate column, no percentages in the headers. */
export function looksLikeTwoColumnTable(headers: string[]): boolean {
  return headers.length === 2 && !headers.some(hasPercent);
}

export function extractRatingsFromHeaders(headers: string[]): (number | null)[] {
  return headers.map(findPercent);
}

function categoryFromHeaders(headers: string[]): TableCategory {
  if (headers.join(" ").includes("Dependent status")) return "Basic";
  return headers.some((header) => header.includes("Added")) ? "Added" : "Basic";
}

export function classifyTable(caption: string, headers: string[]): TableClassification {
  const captionCategory = categoryFromCaption(caption);
  const twoColumn = looksLikeTwoColumnTable(headers);

  // Always Basic, whatever the caption says.
  if (twoColumn) {
    return { category: "Basic", layout: "twoColumn", captionCategory };
  }

  return {
    category: captionCategory ?? categoryFromHeaders(headers),
    layout: "ratingColumns",
    captionCategory
  };
}
