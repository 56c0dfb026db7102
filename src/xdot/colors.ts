import { color as cssColor } from 'd3-color';
import type { Rgba } from '../core/types.js';

function hexByte(text: string): number {
  return /^[0-9a-fA-F]{2}$/.test(text) ? parseInt(text, 16) / 255 : NaN;
}

// Six-sector HSV to RGB; h, s, v all in 0..1
export function hsvToRgb(h: number, s: number, v: number): [number, number, number] {
  if (s === 0) return [v, v, v];
  let i = Math.floor(h * 6);
  const f = h * 6 - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  i = ((i % 6) + 6) % 6;
  switch (i) {
    case 0: return [v, t, p];
    case 1: return [q, v, p];
    case 2: return [p, v, t];
    case 3: return [p, q, v];
    case 4: return [t, p, v];
    default: return [v, p, q];
  }
}

// #RRGGBB or #RRGGBBAA; a missing or malformed alpha means opaque
export function parseHexColor(text: string): Rgba | null {
  const r = hexByte(text.slice(1, 3));
  const g = hexByte(text.slice(3, 5));
  const b = hexByte(text.slice(5, 7));
  if (Number.isNaN(r) || Number.isNaN(g) || Number.isNaN(b)) return null;
  const a = hexByte(text.slice(7, 9));
  return [r, g, b, Number.isNaN(a) ? 1.0 : a];
}

// "H S V", "H,S,V" or any mix of commas and spaces
export function parseHsvColor(text: string): Rgba | null {
  const parts = text.replace(/,/g, ' ').trim().split(/\s+/).map(Number);
  if (parts.length !== 3 || parts.some((n) => !Number.isFinite(n))) return null;
  const [h = 0, s = 0, v = 0] = parts;
  const [r, g, b] = hsvToRgb(h, s, v);
  return [r, g, b, 1.0];
}

export function parseNamedColor(text: string): Rgba | null {
  // Graphviz allows a color scheme prefix such as /x11/red
  const name = text.replace(/^\/[^/]*\//, '');
  const parsed = cssColor(name);
  if (!parsed) return null;
  const { r, g, b, opacity } = parsed.rgb();
  // d3 reports "transparent" with NaN channels
  const channel = (n: number) => (Number.isFinite(n) ? n / 255 : 0);
  return [channel(r), channel(g), channel(b), Number.isFinite(opacity) ? opacity : 1.0];
}

/**
 * Resolves an xdot color token, or null when it names no known color
 */
export function resolveColor(text: string): Rgba | null {
  const c1 = text.charAt(0);
  if (c1 === '#') return parseHexColor(text);
  if (/[0-9.]/.test(c1)) return parseHsvColor(text);
  return parseNamedColor(text);
}
