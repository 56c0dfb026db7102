import type { DiagnosticSink, Point, Rgba, Transform } from '../core/types.js';
import { warning } from '../core/errorBuilder.js';
import { resolveColor } from './colors.js';
import { createPenState, snapshotPen, type PenState } from './pen.js';
import {
  bezierShape,
  ellipseShape,
  isBezierPointCount,
  polygonShape,
  textShape,
  type Shape,
  type TextJustify,
} from './shapes.js';

export interface AttrParserOptions {
  // graph space → canvas space
  transform: Transform;
  diagnostics?: DiagnosticSink;
  // Names the element in diagnostics, e.g. `node "a" _draw_`
  element?: string;
}

// Malformed operand inside one directive string; ends interpretation of that string
class XDotSyntaxError extends Error {
  constructor(readonly code: string, message: string) {
    super(message);
    this.name = 'XDotSyntaxError';
  }
}

const JUSTIFY: Record<string, TextJustify> = { '-1': 'left', '0': 'center', '1': 'right' };

const DASHED: readonly number[] = [6]; // 6pt on, 6pt off
const DOTTED: readonly number[] = [2, 6];

export function unescapeDirectives(buf: string): string {
  return buf.replace(/\\"/g, '"').replace(/\\n/g, '\n');
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Interpreter for the xdot drawing directives of one graph element.
 * See http://www.graphviz.org/doc/info/output.html#d:xdot
 */
export class XDotAttrParser {
  private readonly buf: string;
  private pos = 0;

  constructor(buf: string, private readonly options: AttrParserOptions) {
    this.buf = unescapeDirectives(buf);
    this.skipSpace();
  }

  parse(): Shape[] {
    const shapes: Shape[] = [];
    const pen = createPenState();

    try {
      while (this.pos < this.buf.length) {
        const op = this.readCode();
        if (!this.execute(op, pen, shapes)) {
          this.report('XD-UNKNOWN-OPCODE', `Unknown xdot opcode '${op}'`);
          break;
        }
      }
    } catch (e) {
      if (!(e instanceof XDotSyntaxError)) throw e;
      this.report(e.code, e.message);
    }
    return shapes;
  }

  // Returns false for an opcode it does not know
  private execute(op: string, pen: PenState, shapes: Shape[]): boolean {
    switch (op) {
      case 'c':
        pen.color = this.readColor(pen.color);
        return true;
      case 'C':
        pen.fillcolor = this.readColor(pen.fillcolor);
        return true;
      case 'S':
        this.applyStyle(pen, this.readText());
        return true;
      case 'F':
        pen.fontsize = this.readFloat();
        pen.fontname = this.readText();
        return true;
      case 'T': {
        const [x, y] = this.readPoint();
        const j = this.readInt();
        const w = this.readFloat();
        const t = this.readText();
        const justify = JUSTIFY[String(j)];
        if (!justify) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', `Invalid text justification ${j}`);
        shapes.push(textShape(snapshotPen(pen), x, y, justify, w, t));
        return true;
      }
      case 'E':
      case 'e': {
        const [x0, y0] = this.readPoint();
        const w = this.readFloat();
        const h = this.readFloat();
        const snapshot = snapshotPen(pen);
        // "E" means a filled shape with an outline
        if (op === 'E') shapes.push(ellipseShape(snapshot, x0, y0, w, h, true));
        shapes.push(ellipseShape(snapshot, x0, y0, w, h));
        return true;
      }
      case 'B': {
        const points = this.readPolygon();
        if (!isBezierPointCount(points.length)) {
          throw new XDotSyntaxError('XD-BAD-BEZIER', `Bezier needs 1 + 3k points, got ${points.length}`);
        }
        shapes.push(bezierShape(snapshotPen(pen), points));
        return true;
      }
      case 'P':
      case 'p': {
        const points = this.readPolygon();
        const snapshot = snapshotPen(pen);
        if (op === 'P') shapes.push(polygonShape(snapshot, points, true));
        shapes.push(polygonShape(snapshot, points));
        return true;
      }
      default:
        return false;
    }
  }

  private applyStyle(pen: PenState, style: string) {
    if (style.startsWith('setlinewidth(')) {
      const lw = parseFloat(style.slice('setlinewidth('.length, style.indexOf(')')));
      if (Number.isFinite(lw)) pen.linewidth = lw;
    } else if (style === 'solid') {
      pen.dash = [];
    } else if (style === 'dashed') {
      pen.dash = DASHED;
    } else if (style === 'dotted') {
      pen.dash = DOTTED;
    }
    // bold, filled, rounded etc. carry no stroke information here
  }

  private report(code: string, message: string) {
    this.options.diagnostics?.(warning(code, message, { element: this.options.element }));
  }

  private skipSpace() {
    while (this.pos < this.buf.length && isSpace(this.buf.charAt(this.pos))) this.pos++;
  }

  private readCode(): string {
    let end = this.pos;
    while (end < this.buf.length && !isSpace(this.buf.charAt(end))) end++;
    const code = this.buf.slice(this.pos, end);
    this.pos = end;
    this.skipSpace();
    return code;
  }

  private readFloat(): number {
    const code = this.readCode();
    const n = code === '' ? NaN : Number(code);
    if (!Number.isFinite(n)) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', `Expected a number, found '${code}'`);
    return n;
  }

  private readInt(): number {
    const n = this.readFloat();
    if (!Number.isInteger(n)) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', `Expected an integer, found '${n}'`);
    return n;
  }

  private readPoint(): [number, number] {
    const x = this.readFloat();
    const y = this.readFloat();
    return this.options.transform(x, y);
  }

  // N -<N bytes of UTF-8 text>
  private readText(): string {
    const n = this.readInt();
    const dash = this.buf.indexOf('-', this.pos);
    if (n < 0 || dash < 0) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', 'Malformed text operand');
    const start = dash + 1;
    let end = start;
    let bytes = 0;
    while (bytes < n) {
      const cp = this.buf.codePointAt(end);
      if (cp === undefined) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', `Text operand runs past the end (${n} bytes expected)`);
      bytes += utf8Length(cp);
      end += cp > 0xffff ? 2 : 1;
    }
    this.pos = end;
    this.skipSpace();
    return this.buf.slice(start, end);
  }

  private readPolygon(): Point[] {
    const n = this.readInt();
    if (n < 0) throw new XDotSyntaxError('XD-MALFORMED-OPERAND', `Negative point count ${n}`);
    const points: Point[] = [];
    for (let i = 0; i < n; i++) {
      const [x, y] = this.readPoint();
      points.push({ x, y });
    }
    return points;
  }

  private readColor(fallback: Rgba): Rgba {
    const text = this.readText();
    const color = resolveColor(text);
    if (!color) {
      this.report('XD-UNKNOWN-COLOR', `Unknown color '${text}'`);
      return fallback;
    }
    return color;
  }
}

export function parseXdotAttribute(buf: string, options: AttrParserOptions): Shape[] {
  return new XDotAttrParser(buf, options).parse();
}
