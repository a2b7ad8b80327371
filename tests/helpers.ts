import path from "path";
import { readTableSnapshots } from "../src/capture/snapshotFile";
import { RawTableSnapshot } from "../src/types/rateTables";
import { Logger } from "../src/utils/log";

export const fixturesDir = path.join(process.cwd(), "fixtures");

export async function loadFixtureTables(): Promise<RawTableSnapshot[]> {
  const file = await readTableSnapshots(path.join(fixturesDir, "rate_tables.json"));
  return file.tables;
}

export interface RecordingLogger extends Logger {
  infoLines: string[];
  debugLines: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const infoLines: string[] = [];
  const debugLines: string[] = [];
  return {
    infoLines,
    debugLines,
    info: (message) => {
      infoLines.push(message);
    },
    debug: (message) => {
      debugLines.push(message);
    }
  };
}
