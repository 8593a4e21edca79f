export type SvgWriterErrorCode =
  | "marker-id-required"
  | "invalid-orientation"
  | "invalid-scene"
  | "unknown-marker";

/**
 * Raised when the output would be structurally meaningless,
 * e.g. a marker nobody can reference.
 */
export class SvgWriterError extends Error {
  public readonly code: SvgWriterErrorCode;
  public readonly details?: unknown;

  constructor(code: SvgWriterErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "SvgWriterError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, this.constructor);
  }
}
