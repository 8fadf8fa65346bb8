import { z } from "zod";
import { ValidationError } from "../errors";
import type { PatientSnapshot } from "../types";

export type RawRequest = Record<string, unknown>;

export type NormalizeResult =
  | { success: true; data: PatientSnapshot }
  | { success: false; error: ValidationError };

const GLUCOSE_SLOTS = 5;
const DOSE_SLOTS = 4;

// ------- Field schemas ----------------
// Plain decimal text only: hex, binary and octal literals are not readings.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export const DecimalString = z.string().trim().regex(DECIMAL).pipe(z.coerce.number());

// A number, a boolean (true → 1) or a decimal string.
const Numeric = z.union([z.number(), z.boolean().transform((b) => (b ? 1 : 0)), DecimalString]);

// Every field except GRBS1 falls back instead of failing the request.
const Reading = Numeric.catch(0);
const Flag = z.boolean().catch(false);

const RequestSchema = z.object({
  GRBS1: Numeric,
  GRBS2: Reading,
  GRBS3: Reading,
  GRBS4: Reading,
  GRBS5: Reading,
  Insulin1: Reading,
  Insulin2: Reading,
  Insulin3: Reading,
  Insulin4: Reading,
  CKD: Flag,
  "Dual inotropes": Flag,
  route: z.enum(["iv", "sc"]).catch("sc"),
  diet_order: z.enum(["NPO", "others"]).catch("others"),
});

// `GRBS: [...]` / `Insulin: [...]` win over the numbered fields; short arrays are padded with 0.
function spreadArray(fields: RawRequest, key: string, length: number) {
  const values = fields[key];
  if (!Array.isArray(values)) return;
  for (let i = 0; i < length; i++) {
    fields[`${key}${i + 1}`] = i < values.length ? values[i] : 0;
  }
}

export function normalizeInput(raw: RawRequest): NormalizeResult {
  const fields: RawRequest = { ...raw };
  spreadArray(fields, "GRBS", GLUCOSE_SLOTS);
  spreadArray(fields, "Insulin", DOSE_SLOTS);

  if (fields.GRBS1 === undefined) {
    return { success: false, error: ValidationError.missing("GRBS1") };
  }

  const parsed = RequestSchema.safeParse(fields);
  if (!parsed.success) {
    return { success: false, error: ValidationError.invalid("GRBS1", fields.GRBS1) };
  }

  const d = parsed.data;
  return {
    success: true,
    data: {
      glucose: [d.GRBS1, d.GRBS2, d.GRBS3, d.GRBS4, d.GRBS5],
      doses: [d.Insulin1, d.Insulin2, d.Insulin3, d.Insulin4],
      hasCkd: d.CKD,
      dualInotropes: d["Dual inotropes"],
      route: d.route,
      dietOrder: d.diet_order,
    },
  };
}
