export type ValidationErrorKind = "MissingField" | "InvalidValue";

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly field: string;

  constructor(kind: ValidationErrorKind, field: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.field = field;
  }

  static missing(field: string) {
    return new ValidationError(
      "MissingField",
      field,
      "Missing required field: GRBS (at least one GRBS value)"
    );
  }

  static invalid(field: string, value: unknown) {
    return new ValidationError("InvalidValue", field, `Invalid GRBS value: ${describe(value)}`);
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
