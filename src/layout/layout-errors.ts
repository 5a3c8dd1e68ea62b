import type { Diagnostic } from '../core/diagnostics.js';
import type { LayoutError } from './layout-types.js';

/** Convert a layout failure into a canonical diagnostic. */
export function layoutErrorToDiagnostic(error: LayoutError, sourceName?: string): Diagnostic {
  const name = sourceName ? { name: sourceName } : {};
  switch (error.kind) {
    case 'invalid-page-width':
      return {
        code: 'LAYOUT_INVALID_PAGE_WIDTH',
        severity: 'error',
        message: `Page width must be a positive finite number, got ${error.pageWidth}.`,
        ...(sourceName ? { source: name } : {})
      };
    case 'invalid-option':
      return {
        code: 'LAYOUT_INVALID_OPTION',
        severity: 'error',
        message: `Layout option '${error.option}' ${error.reason}, got ${error.value}.`,
        ...(sourceName ? { source: name } : {})
      };
    case 'invalid-measure':
      return {
        code: 'LAYOUT_INVALID_MEASURE',
        severity: 'error',
        message: `Bar ${error.barIndex} ${error.reason}.`,
        source: { ...name, bar: error.barIndex }
      };
    case 'unsatisfiable':
      return {
        code: 'LAYOUT_UNSATISFIABLE',
        severity: 'error',
        message: `Bar needs width ${error.width} but the page is only ${error.pageWidth} wide.`,
        source: { ...name, bar: error.barIndex }
      };
  }
}
