import type { AlgorithmKind } from "../types";

export const LEVEL_BOUNDS: Record<AlgorithmKind, { min: number; max: number }> = {
  // An upward move never passes 5 for IV, even when a loaded table defines more levels.
  iv: { min: 1, max: 5 },
  basal_bolus: { min: 1, max: 7 },
};

export type LevelMove = "up" | "down" | "hold";

export function ivMove(glucose: readonly number[]): LevelMove {
  if (glucose.length < 2) return "hold";
  const [current, previous] = glucose;

  // Up when above 150 and rising, or falling by no more than 60.
  if (current > 150 && (current > previous || previous - current <= 60)) return "up";
  if (current < 110) return "down";
  return "hold";
}

export function basalBolusMove(glucose: readonly number[]): LevelMove {
  if (glucose.length < 2) return "hold";
  const above180 = glucose.filter((g) => g > 180).length;
  const below140 = glucose.filter((g) => g > 0 && g < 140).length;

  if (above180 >= 2) return "up";
  if (below140 >= 1) return "down";
  return "hold";
}

export function applyTransition(
  algorithm: AlgorithmKind,
  level: number,
  glucose: readonly number[]
): { level: number; move: LevelMove } {
  const move = algorithm === "iv" ? ivMove(glucose) : basalBolusMove(glucose);
  const { min, max } = LEVEL_BOUNDS[algorithm];
  // A held level stays put, even above the ceiling.
  if (move === "up") return { level: Math.min(level + 1, max), move };
  if (move === "down") return { level: Math.max(level - 1, min), move };
  return { level, move };
}
