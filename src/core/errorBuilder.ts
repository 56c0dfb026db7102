import type { Diagnostic } from './types.js';

type Common = {
  element?: string;
  hint?: string;
  length?: number;
};

// Warnings about drawing attributes have no source position, only the element they belong to
export function warning(code: string, message: string, extra: Common = {}): Diagnostic {
  return { code, message, severity: 'warning', ...extra };
}

export function error(code: string, message: string, extra: Common = {}): Diagnostic {
  return { code, message, severity: 'error', ...extra };
}
