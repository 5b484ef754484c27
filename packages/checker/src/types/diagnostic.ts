/**
 * Diagnostic types for the checker
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Program creation (TCH1xxx)
  | "TCH1001" // Source file not found
  | "TCH1002" // TypeScript syntax or options error
  // Unhandled checking events (TCH2xxx)
  | "TCH2001" // Unresolved variable
  | "TCH2002" // Unresolved property
  | "TCH2003" // Unresolved attribute
  | "TCH2004" // Incompatible assignment
  | "TCH2005" // Incompatible return type
  | "TCH2006" // Missing method
  | "TCH2007" // Ambiguous method call
  // Extensions (TCH3xxx)
  | "TCH3001"; // Error reported by an extension

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation
): Diagnostic => ({
  code,
  severity,
  message,
  location,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

/**
 * Render as `file:line:column severity CODE: message`
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});
