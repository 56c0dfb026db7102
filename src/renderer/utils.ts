// Shared utilities for the SVG output

import type { Rgba } from '../core/types.js';

export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// Simple text width approximation for non-browser environments
// Assumes ~0.6em per character (reasonable for Arial/Sans at 12–16px)
export function measureText(text: string, fontSize = 12): number {
  const avg = 0.6 * fontSize;
  return Math.max(0, Math.round(text.length * avg));
}

// Line height of a single line of text
export function lineHeight(fontSize: number): number {
  return Math.round(1.2 * fontSize);
}

export function formatNumber(n: number): string {
  // Keep simple, avoid locales so output is stable
  if (Number.isInteger(n)) return String(n);
  return (Math.round(n * 100) / 100).toString();
}

export function rgbString(color: Rgba): string {
  const [r, g, b] = color;
  return `rgb(${Math.round(r * 255)},${Math.round(g * 255)},${Math.round(b * 255)})`;
}
