import type { AlgorithmKind, PatientSnapshot } from "../types";

const SEVERE_HYPERGLYCEMIA = 350; // mg/dL
const SEVERE_READINGS_FOR_IV = 2;
const CONTROLLED_MIN = 150;
const CONTROLLED_MAX = 180;

/** Picks IV infusion or subcutaneous basal-bolus; the first matching rule wins. */
export function selectAlgorithm(snapshot: PatientSnapshot): AlgorithmKind {
  const { glucose, route, dualInotropes } = snapshot;

  if (dualInotropes) return "iv";

  if (route === "sc") {
    const severe = glucose.filter((g) => g > SEVERE_HYPERGLYCEMIA).length;
    return severe >= SEVERE_READINGS_FOR_IV ? "iv" : "basal_bolus";
  }

  if (route === "iv") {
    const controlled = glucose
      .slice(0, 4)
      .every((g) => g >= CONTROLLED_MIN && g <= CONTROLLED_MAX);
    return controlled ? "basal_bolus" : "iv";
  }

  return "basal_bolus";
}
