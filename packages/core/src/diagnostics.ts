// ---- Diagnostics ----

export type DiagnosticCode =
  | "non-finite-number"
  | "opacity-out-of-range"
  | "empty-text"
  | "marker-collision"
  | "animation-missing-href"
  | "animation-missing-attribute"
  | "animation-missing-path"
  | "negative-dash"
  | "write-failed";

/**
 * A non-fatal condition found while building or writing a document.
 * Serialization always continues after one is reported.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: "error" | "warning";
  message: string;
  elementId: string | null;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const consoleSink: DiagnosticSink = (diagnostic) => {
  console.warn(`[${diagnostic.code}] ${diagnostic.message}`);
};

export const silentSink: DiagnosticSink = () => {};

export interface DiagnosticCollector {
  sink: DiagnosticSink;
  diagnostics: Diagnostic[];
}

/** Sink that keeps every report in memory, in arrival order. */
export function collectDiagnostics(): DiagnosticCollector {
  const diagnostics: Diagnostic[] = [];
  return {
    sink: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
    diagnostics,
  };
}

export function warning(
  code: DiagnosticCode,
  message: string,
  elementId: string | null = null,
): Diagnostic {
  return { code, severity: "warning", message, elementId };
}

/**
 * Report once if any of `values` is NaN or infinite.
 * Returns whether all values were finite.
 */
export function checkFinite(
  values: readonly number[],
  subject: string,
  sink: DiagnosticSink,
  elementId: string | null = null,
): boolean {
  if (values.every(Number.isFinite)) return true;
  sink(warning("non-finite-number", `Infs or NaNs provided to ${subject}`, elementId));
  return false;
}

export function checkOpacity(
  opacity: number,
  subject: string,
  sink: DiagnosticSink,
  elementId: string | null = null,
): boolean {
  if (opacity >= 0 && opacity <= 1) return true;
  sink(
    warning(
      "opacity-out-of-range",
      `${subject}: opacity=${opacity} is out of range [0,1]`,
      elementId,
    ),
  );
  return false;
}
