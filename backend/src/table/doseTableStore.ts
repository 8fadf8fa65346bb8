import type { Logger } from "../logger";
import type { DoseTable } from "../types";
import { loadDoseTable, type LoadedTable } from "./loadDoseTable";

/**
 * Holds the published table. A reload builds the replacement completely before swapping the
 * reference, so callers that already took `current()` keep a consistent table.
 */
export class DoseTableStore {
  private table: DoseTable;
  // Bumped per reload; only the most recently started reload may publish.
  private generation = 0;

  constructor(
    initial: DoseTable,
    private readonly source: () => Promise<LoadedTable>
  ) {
    this.table = initial;
  }

  static async open(file: string, log: Logger): Promise<DoseTableStore> {
    const source = () => loadDoseTable(file, log);
    const { table } = await source();
    return new DoseTableStore(table, source);
  }

  current(): DoseTable {
    return this.table;
  }

  async reload(): Promise<LoadedTable & { published: boolean }> {
    const ticket = ++this.generation;
    const loaded = await this.source();
    const published = ticket === this.generation;
    if (published) this.table = loaded.table;
    return { ...loaded, published };
  }
}
