import type { ValidationError } from "../errors";
import type {
  AlgorithmKind,
  DoseTable,
  PatientSnapshot,
  Recommendation,
  RecommendationResponse,
} from "../types";
import { resolveDose } from "./doses";
import { currentGlucose, startingLevel, type StartingLevel } from "./levels";
import { normalizeInput, type RawRequest } from "./normalize";
import { selectAlgorithm } from "./selectAlgorithm";
import { nextCheckHours } from "./timing";
import { applyTransition, type LevelMove } from "./transitions";

export type RecommendResult =
  | { success: true; data: Recommendation }
  | { success: false; error: ValidationError };

// One event per pipeline step, in order. The caller decides what to do with them.
export type TraceEvent =
  | { step: "normalized"; snapshot: PatientSnapshot }
  | { step: "algorithm"; algorithm: AlgorithmKind }
  | { step: "starting_level"; start: StartingLevel; glucose: number }
  | { step: "transition"; from: number; to: number; move: LevelMove }
  | { step: "dose"; level: number; dose: number; action: string }
  | { step: "timing"; hours: number };

export type Trace = (event: TraceEvent) => void;

const UNIT = { iv: "IU/hr", basal_bolus: "IU" } as const;
const ROUTE_LABEL = { iv: "iv", basal_bolus: "subcutaneous" } as const;
const ALGORITHM_LABEL = { iv: "IV Infusion", basal_bolus: "Basal Bolus" } as const;

export function recommend(raw: RawRequest, table: DoseTable, trace?: Trace): RecommendResult {
  const normalized = normalizeInput(raw);
  if (!normalized.success) return normalized;

  const snapshot = normalized.data;
  trace?.({ step: "normalized", snapshot });

  const algorithm = selectAlgorithm(snapshot);
  trace?.({ step: "algorithm", algorithm });

  const glucose = currentGlucose(snapshot, algorithm);
  const start = startingLevel(snapshot, algorithm, table);
  trace?.({ step: "starting_level", start, glucose });

  let level = start.level;
  if (start.inferred) {
    const moved = applyTransition(algorithm, level, snapshot.glucose);
    trace?.({ step: "transition", from: level, to: moved.level, move: moved.move });
    level = moved.level;
  }

  const { dose, action } = resolveDose(table, algorithm, level, glucose);
  trace?.({ step: "dose", level, dose, action });

  const hours = nextCheckHours(snapshot, algorithm);
  trace?.({ step: "timing", hours });

  return {
    success: true,
    data: {
      dose,
      routeLabel: ROUTE_LABEL[algorithm],
      nextCheckHours: hours,
      algorithm,
      level,
      action,
      unit: UNIT[algorithm],
    },
  };
}

export function toResponse(r: Recommendation): RecommendationResponse {
  return {
    Suggested_insulin_dose: r.dose,
    Suggested_route: r.routeLabel,
    next_grbs_after: r.nextCheckHours,
    algorithm_used: ALGORITHM_LABEL[r.algorithm],
    level: r.level,
    action: r.action,
    unit: r.unit,
  };
}
