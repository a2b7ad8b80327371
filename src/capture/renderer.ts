import { RawTableSnapshot } from "../types/rateTables";

/** The browser-side capabilities a scrape needs from one rendered rates page. */
export interface RatesPageRenderer {
  name: string;
  /** Navigate and wait for network quiescence. */
  open(url: string): Promise<void>;
  /** Best effort; resolves to the number of controls that were clicked. */
  expandAccordions(): Promise<number>;
  settle(): Promise<void>;
  /** Waits (bounded) for hydrated tables, then reads each one in document order. */
  readTables(): Promise<RawTableSnapshot[]>;
  close(): Promise<void>;
}
