import { parseMoneyText } from "../normalize/money";
import { findPercent } from "../normalize/percent";
import { NormalizationWarning } from "../normalize/types";
import { normalizeWhitespace } from "../utils/text";
import { ExtractedRow, RawTableSnapshot, SectionMeta, TableCategory } from "../types/rateTables";
import { classifyTable, extractRatingsFromHeaders, TableClassification } from "./classifyTable";

const SPOUSE_OR_PARENT_SECTION = "with-a-dependent-spouse-or-par";
const CHILDREN_SECTION = "with-dependents-including-chil";

export interface TableNormalization {
  classification: TableClassification;
  rows: ExtractedRow[];
  warnings: NormalizationWarning[];
}

export function dependentGroupFromHeadingId(headingId: string): string | null {
  const id = headingId.toLowerCase();
  if (id.startsWith(SPOUSE_OR_PARENT_SECTION)) return "No children";
  if (id.startsWith(CHILDREN_SECTION)) return "With children";
  return null;
}

export function sectionOverride(section: SectionMeta | null): string | null {
  return section ? dependentGroupFromHeadingId(section.id) : null;
}

function dependentGroupFromLabel(label: string): string {
  const lower = label.toLowerCase();
  if (lower.includes("child")) return "With children";
  if (lower.includes("spouse") || lower.includes("parent")) return "No children";
  return "All";
}

function resolveColumnRating(
  ratings: (number | null)[],
  headers: string[],
  column: number
): number | null {
  const fromHeader = column < ratings.length ? ratings[column] : null;
  if (fromHeader !== null) return fromHeader;
  return findPercent(headers[column] ?? "");
}

function normalizeTwoColumnRows(
  table: RawTableSnapshot,
  year: number,
  override: string | null,
  warnings: NormalizationWarning[]
): ExtractedRow[] {
  const rows: ExtractedRow[] = [];
  for (const cells of table.rows) {
    if (cells.length < 2) continue;
    const [left, right] = cells;
    const rating = findPercent(left);
    if (rating === null) continue;

    const rate = parseMoneyText(right);
    if (rate.value === null) {
      if (rate.warning) {
        warnings.push({ ...rate.warning, message: `${rate.warning.message} (row '${left}')` });
      }
      continue;
    }

    rows.push({
      year,
      rating,
      dependentGroup: override ?? "All",
      dependentStatus: "All",
      category: "Basic",
      addedItem: null,
      monthlyRate: rate.value
    });
  }
  return rows;
}

function normalizeRatingColumnRows(
  table: RawTableSnapshot,
  year: number,
  category: TableCategory,
  override: string | null,
  warnings: NormalizationWarning[]
): ExtractedRow[] {
  const ratings = extractRatingsFromHeaders(table.headers);
  const rows: ExtractedRow[] = [];

  for (const cells of table.rows) {
    if (!cells.length) continue;
    const label = normalizeWhitespace(cells[0]);

    const labels =
      category === "Added"
        ? { dependentGroup: "", dependentStatus: "", addedItem: label }
        : {
            dependentGroup: override ?? dependentGroupFromLabel(label),
            dependentStatus: label,
            addedItem: null
          };

    cells.slice(1).forEach((value, offset) => {
      const column = offset + 1;
      if (!value.trim()) return;

      const rating = resolveColumnRating(ratings, table.headers, column);
      if (rating === null) return;

      const rate = parseMoneyText(value);
      if (rate.value === null) {
        if (rate.warning) {
          warnings.push({
            ...rate.warning,
            message: `${rate.warning.message} (row '${label}', col ${column})`
          });
        }
        return;
      }

      rows.push({ year, rating, ...labels, category, monthlyRate: rate.value });
    });
  }
  return rows;
}

/** Turns one table snapshot into dataset rows. Pure: the same snapshot always yields the same rows. */
export function normalizeTable(table: RawTableSnapshot, year: number): TableNormalization {
  const classification = classifyTable(table.caption, table.headers);
  const override = sectionOverride(table.section);
  const warnings: NormalizationWarning[] = [];

  const rows =
    classification.layout === "twoColumn"
      ? normalizeTwoColumnRows(table, year, override, warnings)
      : normalizeRatingColumnRows(table, year, classification.category, override, warnings);

  return { classification, rows, warnings };
}
