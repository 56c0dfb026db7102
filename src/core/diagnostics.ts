import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic, DiagnosticSink } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function fromLexerError(e: ILexingError): Diagnostic {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    code: 'DOT-LEXER',
    message: e.message,
    length: e.length,
  };
}

function tokenImage(t?: IToken | null) {
  const img = t?.image ?? '';
  return img === '\n' ? '\\n' : img;
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not expose expected tokens structurally; fall back to message text.
  return (err.message || '').includes(`--> ${tokenName} <--`);
}

export function mapDotParserError(err: IRecognitionException, text: string): Diagnostic {
  const tok = err.token;
  const atEof = !tok || tok.tokenType?.name === 'EOF' || !Number.isFinite(tok.startLine);
  const fallback = endOfTextPos(text);
  const { line, column } = tok && !atEof
    ? coercePos(tok.startLine ?? null, tok.startColumn ?? null, fallback.line, fallback.column)
    : fallback;
  const found = tokenImage(tok);

  if (expecting(err, 'RCurly')) {
    return {
      line, column, severity: 'error', code: 'DOT-PARSER',
      message: atEof ? "Missing '}' to close the graph body." : `Unexpected '${found}' inside a graph body.`,
      hint: "Every '{' needs a matching '}'.",
      length: Math.max(1, found.length),
    };
  }
  if (expecting(err, 'RSquare')) {
    return {
      line, column, severity: 'error', code: 'DOT-PARSER',
      message: `Unexpected '${found}' in attribute list.`,
      hint: 'Attributes are written as [name=value, name=value].',
      length: Math.max(1, found.length),
    };
  }
  return {
    line,
    column,
    severity: 'error',
    code: 'DOT-PARSER',
    message: err.message,
    length: Math.max(1, found.length),
  };
}

/**
 * Sink that keeps every diagnostic it receives, optionally forwarding to another sink
 */
export function collectDiagnostics(forward?: DiagnosticSink): { sink: DiagnosticSink; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const sink: DiagnosticSink = (d) => {
    diagnostics.push(d);
    if (forward) forward(d);
  };
  return { sink, diagnostics };
}
