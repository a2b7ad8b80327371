import { RawTableSnapshot } from "../types/rateTables";
import { readJson, writeJson } from "../utils/fs";
import { TableSnapshotFile, TableSnapshotFileSchema } from "../validation/tableSnapshotSchema";
import { RatesPageRenderer } from "./renderer";

export async function writeTableSnapshots(
  filePath: string,
  sourceUrl: string,
  tables: RawTableSnapshot[]
): Promise<void> {
  const file: TableSnapshotFile = {
    schema_version: "1.0",
    source_url: sourceUrl,
    captured_at: new Date().toISOString().replace(/\.\d{3}Z$/, "Z"),
    tables
  };
  await writeJson(filePath, file);
}

export async function readTableSnapshots(filePath: string): Promise<TableSnapshotFile> {
  return TableSnapshotFileSchema.parse(await readJson(filePath));
}

/** Replays tables saved with `--snapshot-out`; `open` takes the snapshot file path. */
export class SnapshotFileRenderer implements RatesPageRenderer {
  name = "snapshot-file";
  private tables: RawTableSnapshot[] | null = null;

  async open(filePath: string): Promise<void> {
    const file = await readTableSnapshots(filePath);
    this.tables = file.tables;
  }

  async expandAccordions(): Promise<number> {
    return 0;
  }

  async settle(): Promise<void> {
    return undefined;
  }

  async readTables(): Promise<RawTableSnapshot[]> {
    if (!this.tables) {
      throw new Error("Snapshot file is not open");
    }
    return this.tables;
  }

  async close(): Promise<void> {
    this.tables = null;
  }
}
