import type { AlgorithmKind, DoseTable } from "../types";

// Used when the level has no rows at all.
const FALLBACK_DOSE: Record<AlgorithmKind, number> = {
  iv: 1.0,
  basal_bolus: 2,
};

export type ResolvedDose = { dose: number; action: string };

/**
 * Looks up the dose for `level` at `glucose`. The first range containing the value wins;
 * when none does, the level's first row is used so a dose is always returned.
 */
export function findDose(
  table: DoseTable,
  algorithm: AlgorithmKind,
  level: number,
  glucose: number
): number {
  const rows = table[algorithm].get(level);
  if (!rows || rows.length === 0) return FALLBACK_DOSE[algorithm];

  const match = rows.find((r) => r.min <= glucose && glucose <= r.max);
  return (match ?? rows[0]).dose;
}

export function ivAction(rate: number): string {
  if (rate === 0) return "Turn off insulin";
  if (rate <= 1) return "Maintain current rate";
  if (rate >= 40) return "Maximum rate";
  return "Increase rate";
}

export function basalAction(dose: number): string {
  if (dose === 0) return "No insulin";
  if (dose <= 2) return "Low dose";
  if (dose <= 6) return "Medium dose";
  if (dose <= 12) return "High dose";
  if (dose <= 20) return "Very high dose";
  return "Critical dose";
}

export function resolveDose(
  table: DoseTable,
  algorithm: AlgorithmKind,
  level: number,
  glucose: number
): ResolvedDose {
  const dose = findDose(table, algorithm, level, glucose);
  const action = algorithm === "iv" ? ivAction(dose) : basalAction(dose);
  return { dose, action };
}
