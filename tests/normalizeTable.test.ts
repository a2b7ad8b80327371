import { describe, expect, it } from "vitest";
import { dependentGroupFromHeadingId, normalizeTable } from "../src/rates/normalizeTable";
import { RawTableSnapshot } from "../src/types/rateTables";
import { loadFixtureTables } from "./helpers";

function table(overrides: Partial<RawTableSnapshot>): RawTableSnapshot {
  return { caption: "", headers: [], rows: [], section: null, ...overrides };
}

describe("row normalization", () => {
  it("reads the two-column low-rating table", () => {
    const result = normalizeTable(
      table({ headers: ["Rating", "Monthly rate"], rows: [["10%", "$175.51"]] }),
      2024
    );

    expect(result.rows).toEqual([
      {
        year: 2024,
        rating: 10,
        dependentGroup: "All",
        dependentStatus: "All",
        category: "Basic",
        addedItem: null,
        monthlyRate: 175.51
      }
    ]);
  });

  it("skips two-column rows without a rating or with an unreadable rate", () => {
    const result = normalizeTable(
      table({
        headers: ["Rating", "Monthly rate"],
        rows: [["Note"], ["Total", "$1.00"], ["20%", "pending"], ["20%", "$346.95"]]
      }),
      2024
    );

    expect(result.rows.map((row) => [row.rating, row.monthlyRate])).toEqual([[20, 346.95]]);
    expect(result.warnings).toEqual([
      {
        code: "RATE_PARSE_FAILED",
        message: "Could not parse rate: pending (row '20%')",
        severity: "warning"
      }
    ]);
  });

  it("skips whitespace-only rate cells without a warning", () => {
    const result = normalizeTable(
      table({
        caption: "Basic monthly rates",
        headers: ["Dependent status", "30%", "40%"],
        rows: [["With spouse", " ", "$651.27"]]
      }),
      2024
    );

    expect(result.rows.map((row) => [row.rating, row.monthlyRate])).toEqual([[40, 651.27]]);
    expect(result.warnings).toEqual([]);
  });

  it("applies a section override to the two-column table", () => {
    const result = normalizeTable(
      table({
        headers: ["Rating", "Monthly rate"],
        rows: [["10%", "$175.51"]],
        section: { id: "with-dependents-including-children", text: "With dependents" }
      }),
      2024
    );
    expect(result.rows[0].dependentGroup).toBe("With children");
    expect(result.rows[0].dependentStatus).toBe("All");
  });

  it("infers the dependent group from the row label without a section override", () => {
    const result = normalizeTable(
      table({
        caption: "Basic monthly rates",
        headers: ["Dependent status", "30% disability rating"],
        rows: [
          ["Veteran alone", "$537.42"],
          ["With spouse", "$601.42"],
          ["With 1 parent", "$588.42"],
          ["With Child only", "$580.42"]
        ]
      }),
      2024
    );

    expect(result.rows.map((row) => [row.dependentStatus, row.dependentGroup])).toEqual([
      ["Veteran alone", "All"],
      ["With spouse", "No children"],
      ["With 1 parent", "No children"],
      ["With Child only", "With children"]
    ]);
  });

  it("labels Added rows by item and leaves the dependent fields empty", () => {
    const result = normalizeTable(
      table({
        caption: "Added amounts",
        headers: ["Added amounts", "70% disability rating", "80% disability rating"],
        rows: [["Spouse receiving Aid and Attendance", "$150.00", ""]],
        section: { id: "with-dependents-including-children", text: "With dependents" }
      }),
      2024
    );

    expect(result.rows).toEqual([
      {
        year: 2024,
        rating: 70,
        dependentGroup: "",
        dependentStatus: "",
        category: "Added",
        addedItem: "Spouse receiving Aid and Attendance",
        monthlyRate: 150
      }
    ]);
  });

  it("skips columns whose header carries no rating", () => {
    const result = normalizeTable(
      table({
        caption: "Basic monthly rates",
        headers: ["Dependent status", "Notes", "30% disability rating"],
        rows: [["Veteran alone", "$1.00", "$537.42"]]
      }),
      2024
    );
    expect(result.rows.map((row) => row.rating)).toEqual([30]);
  });

  it("skips cells beyond the last header", () => {
    const result = normalizeTable(
      table({
        caption: "Basic monthly rates",
        headers: ["Dependent status", "30% disability rating"],
        rows: [["Veteran alone", "$537.42", "$774.16"]]
      }),
      2024
    );
    expect(result.rows).toHaveLength(1);
  });

  it("normalizes the fixture tables", async () => {
    const [, spouseOrParent, , added, , noCaption] = await loadFixtureTables();

    const basic = normalizeTable(spouseOrParent, 2024);
    expect(basic.classification.category).toBe("Basic");
    expect(basic.rows.map((row) => [row.rating, row.dependentGroup, row.monthlyRate])).toEqual([
      [30, "No children", 537.42],
      [40, "No children", 774.16],
      [30, "No children", 601.42],
      [40, "No children", 859.16],
      [30, "No children", 588.42]
    ]);
    expect(basic.warnings.map((warning) => warning.message)).toEqual([
      "Could not parse rate: N/A (row 'With 1 parent (no spouse or children)', col 2)"
    ]);

    const addedRows = normalizeTable(added, 2024).rows;
    expect(addedRows.map((row) => [row.addedItem, row.rating, row.monthlyRate])).toEqual([
      ["Each additional child under age 18", 30, 31],
      ["Each additional child under age 18", 40, 42],
      ["Spouse receiving Aid and Attendance", 30, 58]
    ]);

    const fallback = normalizeTable(noCaption, 2024);
    expect(fallback.classification).toEqual({
      category: "Basic",
      layout: "ratingColumns",
      captionCategory: null
    });
    expect(fallback.rows[0]).toMatchObject({
      rating: 70,
      dependentGroup: "No children",
      monthlyRate: 2034.04
    });
  });

  it("yields the same rows when run twice on one snapshot", async () => {
    const tables = await loadFixtureTables();
    const first = tables.map((snapshot) => normalizeTable(snapshot, 2024).rows);
    const second = tables.map((snapshot) => normalizeTable(snapshot, 2024).rows);
    expect(second).toEqual(first);
  });
});

describe("section override", () => {
  it("maps heading ids to dependent groups", () => {
    expect(dependentGroupFromHeadingId("with-a-dependent-spouse-or-parent-but-no-children")).toBe(
      "No children"
    );
    expect(dependentGroupFromHeadingId("With-Dependents-Including-Children")).toBe("With children");
    expect(dependentGroupFromHeadingId("veteran-alone")).toBeNull();
    expect(dependentGroupFromHeadingId("")).toBeNull();
  });
});
