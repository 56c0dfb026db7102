import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { fromLexerError } from './diagnostics.js';

export interface ParseAdapters<T> {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  build: (cst: CstNode, text: string) => T;
  mapParserError: (err: IRecognitionException, text: string) => Diagnostic;
}

export interface ParseOutcome<T> {
  value: T | null;
  diagnostics: Diagnostic[];
}

export function parseWithChevrotain<T>(text: string, adapters: ParseAdapters<T>): ParseOutcome<T> {
  const diagnostics: Diagnostic[] = [];

  // Lexing
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    diagnostics.push(...lex.errors.map(fromLexerError));
    return { value: null, diagnostics };
  }

  // Parsing; recovery is off, so a CST with errors is incomplete and never built
  const parseRes = adapters.parse(lex.tokens);
  if (parseRes.errors.length > 0) {
    diagnostics.push(...parseRes.errors.map((e) => adapters.mapParserError(e, text)));
    return { value: null, diagnostics };
  }

  try {
    return { value: adapters.build(parseRes.cst, text), diagnostics };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    diagnostics.push({ line: 1, column: 1, severity: 'error', code: 'DOT-INTERNAL', message: `Internal error while reading the graph: ${message}` });
    return { value: null, diagnostics };
  }
}
