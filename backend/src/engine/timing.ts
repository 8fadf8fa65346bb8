import type { AlgorithmKind, PatientSnapshot } from "../types";

// Hours until the next glucose check.
export function nextCheckHours(snapshot: PatientSnapshot, algorithm: AlgorithmKind): number {
  if (algorithm === "iv") {
    const stable = snapshot.glucose.slice(0, 4).every((g) => g >= 140 && g <= 180);
    return stable ? 2 : 1;
  }
  return snapshot.dietOrder === "NPO" ? 4 : 6;
}
