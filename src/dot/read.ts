import type { AnnotatedLayout } from './types.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import { LayoutBuilder } from './builder.js';
import { parseWithChevrotain, type ParseOutcome } from '../core/pipeline.js';
import { mapDotParserError } from '../core/diagnostics.js';

/**
 * Reads DOT text (usually the layout engine's xdot output) into an AnnotatedLayout
 */
export function readDot(text: string): ParseOutcome<AnnotatedLayout> {
  const builder = new LayoutBuilder();
  return parseWithChevrotain(text, {
    tokenize,
    parse,
    build: (cst) => builder.build(cst),
    mapParserError: mapDotParserError,
  });
}

// Layout output always carries drawing directives; hand-written DOT never does
export function hasDrawingAttributes(text: string): boolean {
  return /\b_draw_\s*=/.test(text);
}
