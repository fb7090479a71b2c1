// Diagnostic model for business-rule outcomes

export type Severity = 'error' | 'warning';

/**
 * Every diagnostic code and its fixed severity
 */
export const DIAGNOSTIC_SEVERITY = {
  // Lifecycle
  INVALID_TRANSITION: 'error',
  STATUS_PHASE_FORBIDDEN: 'error',
  STATUS_PHASE_WARNING: 'warning',
  CRITERIA_INCOMPLETE: 'error',
  AMENDMENT_NOT_OPEN: 'error',
  DELETE_FORBIDDEN: 'error',
  RELEASE_REFUSED: 'error',
  // Store consistency
  MISSING_CHANGELOG: 'warning',
  MISSING_SINCE: 'warning',
  MISSING_CLAUSE: 'error',
  ORPHAN_CLAUSE: 'warning',
  DUPLICATE_CLAUSE: 'error',
  INVALID_SUPERSESSION: 'error',
  ADR_WITHOUT_REFS: 'warning',
  INVALID_VERSION: 'error',
  // References
  DANGLING_REFERENCE: 'error',
  OUTDATED_REFERENCE: 'warning',
  // Signatures
  TAMPER_OR_STALE: 'error',
  SIGNATURE_MISSING: 'error',
  ORPHAN_PROJECTION: 'warning'
} as const satisfies Record<string, Severity>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_SEVERITY;

export interface Diagnostic {
  code: DiagnosticCode;
  severity: Severity;
  message: string;
  /** Offending artifact id, or the file path for external source mentions */
  artifactId: string;
  file?: string;
  line?: number;
}

/**
 * Outcome of an operation that may be refused by a business rule
 */
export interface OperationResult {
  applied: boolean;
  diagnostics: Diagnostic[];
}

export function createDiagnostic(
  code: DiagnosticCode,
  artifactId: string,
  message: string,
  location: { file?: string; line?: number } = {}
): Diagnostic {
  const diagnostic: Diagnostic = { code, severity: DIAGNOSTIC_SEVERITY[code], message, artifactId };
  if (location.file !== undefined) diagnostic.file = location.file;
  if (location.line !== undefined) diagnostic.line = location.line;
  return diagnostic;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable order: artifact id, severity (errors first), code, message, then location
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareText(a.artifactId, b.artifactId) ||
    (a.severity === b.severity ? 0 : a.severity === 'error' ? -1 : 1) ||
    compareText(a.code, b.code) ||
    compareText(a.message, b.message) ||
    compareText(a.file ?? '', b.file ?? '') ||
    (a.line ?? 0) - (b.line ?? 0)
  );
}

export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(compareDiagnostics);
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}

/**
 * One-line human readable form, e.g. `error[DANGLING_REFERENCE] WI-0001: ... (src/a.ts:3)`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.file
    ? ` (${diagnostic.file}${diagnostic.line !== undefined ? `:${diagnostic.line}` : ''})`
    : '';
  return `${diagnostic.severity}[${diagnostic.code}] ${diagnostic.artifactId}: ${diagnostic.message}${location}`;
}

export function applied(diagnostics: Diagnostic[] = []): OperationResult {
  return { applied: true, diagnostics };
}

export function refused(diagnostics: Diagnostic[]): OperationResult {
  return { applied: false, diagnostics };
}
