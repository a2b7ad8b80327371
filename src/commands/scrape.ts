import path from "path";
import { PlaywrightRatesRenderer } from "../capture/ratesPage";
import { RatesPageRenderer } from "../capture/renderer";
import { writeTableSnapshots } from "../capture/snapshotFile";
import { ScrapeSettings } from "../config/settings";
import { OutputConfigurationError } from "../errors";
import { writeDatasetCsv } from "../io/csv";
import { formatPreview } from "../io/preview";
import { TableClassification } from "../rates/classifyTable";
import { assembleDataset, AssembledDataset } from "../rates/dataset";
import { normalizeTable } from "../rates/normalizeTable";
import { DatasetRow, ExtractedRow, RawTableSnapshot } from "../types/rateTables";
import { createConsoleLogger, Logger } from "../utils/log";

export interface ScrapeOptions {
  url: string;
  year: number;
  outPath?: string;
  preview?: number;
  snapshotOut?: string;
  debug: boolean;
  settings: ScrapeSettings;
  renderer?: RatesPageRenderer;
  logger?: Logger;
}

export interface ScrapeResult {
  dataset: AssembledDataset;
  outPath: string | null;
}

function describeTable(
  index: number,
  table: RawTableSnapshot,
  classification: TableClassification
): string {
  const lines = [
    `Table ${index}:`,
    `\tcaption='${table.caption}',`,
    `\tcategory=${classification.category} (caption: ${classification.captionCategory ?? "UNKNOWN"}, layout: ${classification.layout}),`
  ];
  if (table.section) {
    lines.push(`\tsection_id='${table.section.id}', section_text='${table.section.text}',`);
  }
  lines.push("\theaders=[");
  lines.push(table.headers.map((header) => `\t\t'${header}'`).join(",\n"));
  lines.push("\t],");
  lines.push(`\tbody_rows=${table.rows.length}`);
  return lines.join("\n");
}

export function extractRows(
  tables: RawTableSnapshot[],
  year: number,
  logger: Logger
): ExtractedRow[] {
  const rows: ExtractedRow[] = [];
  tables.forEach((table, index) => {
    const result = normalizeTable(table, year);
    logger.debug(describeTable(index + 1, table, result.classification));
    for (const warning of result.warnings) {
      logger.debug(`Skipping cell. ${warning.message}`);
    }
    rows.push(...result.rows);
  });
  return rows;
}

async function readRenderedTables(
  renderer: RatesPageRenderer,
  url: string,
  logger: Logger
): Promise<RawTableSnapshot[]> {
  try {
    logger.debug(`Opening ${url} with ${renderer.name} renderer`);
    await renderer.open(url);
    const expanded = await renderer.expandAccordions();
    logger.debug(`Clicked 'Expand all' on ${expanded} accordion(s)`);
    await renderer.settle();
    const tables = await renderer.readTables();
    logger.debug(`Found ${tables.length} table(s) in hydrated table hosts (shadow DOM)`);
    return tables;
  } finally {
    await renderer.close();
  }
}

async function emitDataset(
  rows: DatasetRow[],
  options: Pick<ScrapeOptions, "outPath" | "preview">,
  logger: Logger
): Promise<string | null> {
  if (options.preview !== undefined && options.preview > 0) {
    logger.info(formatPreview(rows, options.preview));
    logger.info("[INFO] Preview mode: skipped writing CSV.");
    return null;
  }

  if (!options.outPath) {
    throw new OutputConfigurationError();
  }

  const outPath = path.resolve(options.outPath);
  await writeDatasetCsv(outPath, rows);
  logger.info(`Saved ${rows.length} rows to ${options.outPath}`);
  return outPath;
}

export async function runScrape(options: ScrapeOptions): Promise<ScrapeResult> {
  const logger = options.logger ?? createConsoleLogger(options.debug);
  const renderer = options.renderer ?? new PlaywrightRatesRenderer(options.settings, logger);

  const tables = await readRenderedTables(renderer, options.url, logger);
  if (options.snapshotOut) {
    await writeTableSnapshots(path.resolve(options.snapshotOut), options.url, tables);
    logger.debug(`Wrote ${tables.length} table snapshot(s) to ${options.snapshotOut}`);
  }
  const dataset = assembleDataset(extractRows(tables, options.year, logger));
  logger.debug(
    `Deduplication removed ${dataset.duplicatesRemoved} row(s); ${dataset.rows.length} row(s) remain`
  );

  const outPath = await emitDataset(dataset.rows, options, logger);
  return { dataset, outPath };
}
