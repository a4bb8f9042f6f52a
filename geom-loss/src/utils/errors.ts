export type GeometryInputErrorKind = "ShapeMismatch" | "InvalidValue";

/** Raised synchronously, before any computation, for inputs that cannot be evaluated. */
export class GeometryInputError extends Error {
  readonly kind: GeometryInputErrorKind;

  constructor(kind: GeometryInputErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = "GeometryInputError";
    this.kind = kind;
  }
}

export function shapeMismatch(message: string): GeometryInputError {
  return new GeometryInputError("ShapeMismatch", message);
}

export function invalidValue(message: string): GeometryInputError {
  return new GeometryInputError("InvalidValue", message);
}
