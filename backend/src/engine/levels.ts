import type { AlgorithmKind, DoseTable, PatientSnapshot } from "../types";
import { findDose } from "./doses";

export const DEFAULT_LEVEL = 2;

export type StartingLevel = {
  level: number;
  // Only a level inferred from dosing history goes on to the transition rules.
  inferred: boolean;
  reason: "insufficient_readings" | "no_prior_dose" | "dual_inotropes" | "matched_prior_dose";
};

/** Glucose value used for table lookups. IV skips a missing latest reading; basal-bolus does not. */
export function currentGlucose(snapshot: PatientSnapshot, algorithm: AlgorithmKind): number {
  const [latest] = snapshot.glucose;
  if (algorithm === "basal_bolus" || latest > 0) return latest;
  return snapshot.glucose.find((g) => g > 0) ?? 0;
}

/**
 * Level whose dose at `glucose` is closest to `priorDose`. Levels are visited in table order
 * and an equal distance never displaces an earlier level.
 */
export function matchLevelToDose(
  table: DoseTable,
  algorithm: AlgorithmKind,
  glucose: number,
  priorDose: number
): number {
  let best = DEFAULT_LEVEL;
  let bestDiff = Number.POSITIVE_INFINITY;

  for (const level of table[algorithm].keys()) {
    const diff = Math.abs(findDose(table, algorithm, level, glucose) - priorDose);
    if (diff < bestDiff) {
      bestDiff = diff;
      best = level;
    }
  }
  return best;
}

export function startingLevel(
  snapshot: PatientSnapshot,
  algorithm: AlgorithmKind,
  table: DoseTable
): StartingLevel {
  const validReadings = snapshot.glucose.filter((g) => g > 0).length;
  const hasPriorDose = snapshot.doses.some((d) => d > 0);

  if (validReadings <= 1) {
    return { level: DEFAULT_LEVEL, inferred: false, reason: "insufficient_readings" };
  }
  if (!hasPriorDose) {
    return { level: DEFAULT_LEVEL, inferred: false, reason: "no_prior_dose" };
  }
  if (algorithm === "iv" && snapshot.dualInotropes) {
    return { level: DEFAULT_LEVEL, inferred: false, reason: "dual_inotropes" };
  }

  const level = matchLevelToDose(
    table,
    algorithm,
    currentGlucose(snapshot, algorithm),
    snapshot.doses[0]
  );
  return { level, inferred: true, reason: "matched_prior_dose" };
}
