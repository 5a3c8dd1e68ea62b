/** Severity classes used by decoder, assembly, and layout diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional score location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  bar?: number;
  channel?: number;
  /** Zero-based character offset inside the channel notation text. */
  position?: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
}

/** True when at least one diagnostic is an error. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

/** Render a diagnostic as one human-readable line, prefixed by its location. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const source = diagnostic.source;
  const parts: string[] = [];
  if (source?.name) {
    parts.push(source.name);
  }
  if (source?.bar !== undefined) {
    parts.push(`bar ${source.bar}`);
  }
  if (source?.channel !== undefined) {
    parts.push(`channel ${source.channel}`);
  }
  if (source?.position !== undefined) {
    parts.push(`col ${source.position}`);
  }

  const location = parts.length > 0 ? `${parts.join(', ')}: ` : '';
  return `${location}${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}
