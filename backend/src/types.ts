// ---------------- Enumerations ----------------
export type Route = "iv" | "sc";
export type DietOrder = "NPO" | "others";
export type AlgorithmKind = "iv" | "basal_bolus";

// Positional series after normalization: index 0 is the most recent value.
export type GlucoseSeries = readonly [number, number, number, number, number];
export type DoseHistory = readonly [number, number, number, number];

export type PatientSnapshot = {
  glucose: GlucoseSeries; // mg/dL, 0 = not taken
  doses: DoseHistory; // 0 = none recorded
  hasCkd: boolean; // accepted, not used by any rule yet
  dualInotropes: boolean;
  route: Route;
  dietOrder: DietOrder;
};

// ---------------- Dose table ----------------
export type DoseRange = {
  readonly min: number;
  readonly max: number;
  readonly dose: number;
};

export type LevelTable = ReadonlyMap<number, readonly DoseRange[]>;

// Iteration order of each map is the table order used by level inference.
export type DoseTable = Readonly<Record<AlgorithmKind, LevelTable>>;

// ---------------- Output ----------------
export type Recommendation = {
  readonly dose: number;
  readonly routeLabel: "iv" | "subcutaneous";
  readonly nextCheckHours: number;
  readonly algorithm: AlgorithmKind;
  readonly level: number;
  readonly action: string;
  readonly unit: "IU/hr" | "IU";
};

// Wire shape returned by POST /recommend
export type RecommendationResponse = {
  Suggested_insulin_dose: number;
  Suggested_route: Recommendation["routeLabel"];
  next_grbs_after: number;
  algorithm_used: "IV Infusion" | "Basal Bolus";
  level: number;
  action: string;
  unit: Recommendation["unit"];
};
