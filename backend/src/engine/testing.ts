import type { PatientSnapshot } from "../types";

// Snapshot builder for engine tests.
export function snapshot(overrides: Partial<PatientSnapshot> = {}): PatientSnapshot {
  return {
    glucose: [0, 0, 0, 0, 0],
    doses: [0, 0, 0, 0],
    hasCkd: false,
    dualInotropes: false,
    route: "sc",
    dietOrder: "others",
    ...overrides,
  };
}
