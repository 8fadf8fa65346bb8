import { readFile } from "fs/promises";
import { parse } from "csv-parse";
import { z } from "zod";
import { DecimalString } from "../engine/normalize";
import type { Logger } from "../logger";
import type { AlgorithmKind, DoseTable } from "../types";
import {
  DEFAULT_DOSE_TABLE,
  TableFormatError,
  buildDoseTable,
  parseRange,
  type TableEntry,
} from "./doseTable";

// ------- CSV row schema ----------------
// header: algorithm,level,grbs_range,dose
const RowSchema = z.object({
  algorithm: z.string().trim(),
  level: z.string().trim().regex(/^[+-]?\d+$/, "level must be an integer").transform(Number),
  grbs_range: z.string(),
  dose: DecimalString,
});

const ALGORITHM_BY_NAME: Record<string, AlgorithmKind | undefined> = {
  IV: "iv",
  Basal: "basal_bolus",
};

export type LoadedTable = { table: DoseTable; source: "file" | "default" };

function readCsv(text: string): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    parse(text, { columns: true, skip_empty_lines: true, trim: true }, (err, records) => {
      if (err) reject(err);
      else resolve(records ?? []);
    });
  });
}

export async function parseDoseTableCsv(text: string): Promise<DoseTable> {
  const rows = z.array(RowSchema).parse(await readCsv(text));

  const entries: TableEntry[] = [];
  for (const row of rows) {
    // Rows for other algorithms are ignored.
    const algorithm = ALGORITHM_BY_NAME[row.algorithm];
    if (!algorithm) continue;

    const [min, max] = parseRange(row.grbs_range);
    // Basal-bolus doses are whole units.
    const dose = algorithm === "basal_bolus" ? Math.trunc(row.dose) : row.dose;
    entries.push({ algorithm, level: row.level, min, max, dose });
  }

  const table = buildDoseTable(entries);
  for (const algorithm of ["iv", "basal_bolus"] as const) {
    if (table[algorithm].size === 0) {
      throw new TableFormatError(`No ${algorithm} levels defined`);
    }
  }
  return table;
}

/** Reads the table from a CSV file; any failure falls back to the built-in table. */
export async function loadDoseTable(file: string, log: Logger): Promise<LoadedTable> {
  try {
    const table = await parseDoseTableCsv(await readFile(file, "utf8"));
    log.info(`Loaded dose table from ${file}`);
    return { table, source: "file" };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.error(`Error loading algorithm config from ${file}: ${reason}. Using default values.`);
    return { table: DEFAULT_DOSE_TABLE, source: "default" };
  }
}
