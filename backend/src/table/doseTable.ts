import type { AlgorithmKind, DoseRange, DoseTable, LevelTable } from "../types";

// Upper bound given to open-ended ">N" ranges.
export const GLUCOSE_CEILING = 1000;

export class TableFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TableFormatError";
  }
}

type Row = [level: number, min: number, max: number, dose: number];

const table = (rows: Row[]): LevelTable => {
  const levels = new Map<number, DoseRange[]>();
  for (const [level, min, max, dose] of rows) {
    levels.set(level, [...(levels.get(level) ?? []), { min, max, dose }]);
  }
  return levels;
};

export const DEFAULT_DOSE_TABLE: DoseTable = {
  iv: table([
    [1, 0, 110, 0],
    [2, 111, 150, 1.0],
    [3, 151, 200, 2.0],
    [4, 201, 250, 3.0],
    [5, 251, 300, 4.0],
  ]),
  basal_bolus: table([
    [1, 0, 140, 0],
    [2, 141, 180, 2],
    [3, 181, 220, 4],
    [4, 221, 260, 6],
    [5, 261, 300, 8],
    [6, 301, 350, 16],
    [7, 351, GLUCOSE_CEILING, 12],
  ]),
};

const toInt = (text: string | undefined, source: string) => {
  const trimmed = (text ?? "").trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new TableFormatError(`Bad glucose range "${source}"`);
  }
  return Number(trimmed);
};

/** `"<N"` → [0, N], `">N"` → [N, 1000], `"A-B"` → [A, B]. */
export function parseRange(text: string): [min: number, max: number] {
  if (text.includes("<")) return [0, toInt(text.replace(/</g, ""), text)];
  if (text.includes(">")) return [toInt(text.replace(/>/g, ""), text), GLUCOSE_CEILING];
  const [min, max] = text.split("-");
  return [toInt(min, text), toInt(max, text)];
}

export type TableEntry = {
  algorithm: AlgorithmKind;
  level: number;
  min: number;
  max: number;
  dose: number;
};

/**
 * Builds a table from entries in source order. Repeating a (min, max) range within a level
 * overwrites that row's dose and keeps its position.
 */
export function buildDoseTable(entries: Iterable<TableEntry>): DoseTable {
  const out: Record<AlgorithmKind, Map<number, DoseRange[]>> = {
    iv: new Map(),
    basal_bolus: new Map(),
  };

  for (const { algorithm, level, min, max, dose } of entries) {
    const rows = out[algorithm].get(level) ?? [];
    const existing = rows.findIndex((r) => r.min === min && r.max === max);
    if (existing >= 0) rows[existing] = { min, max, dose };
    else rows.push({ min, max, dose });
    out[algorithm].set(level, rows);
  }

  return out;
}

export type SerializedTable = Record<
  AlgorithmKind,
  { level: number; ranges: DoseRange[] }[]
>;

export function serializeTable(t: DoseTable): SerializedTable {
  const levels = (lt: LevelTable) =>
    [...lt.entries()].map(([level, ranges]) => ({ level, ranges: [...ranges] }));
  return { iv: levels(t.iv), basal_bolus: levels(t.basal_bolus) };
}
