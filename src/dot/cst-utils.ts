import type { CstElement, CstNode, IToken } from 'chevrotain';

function isCstNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

export function childNodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

export function childNode(cst: CstNode, key: string): CstNode | undefined {
  return childNodes(cst, key)[0];
}

export function childTokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

export function hasToken(cst: CstNode, key: string): boolean {
  return childTokens(cst, key).length > 0;
}

// Strip the quotes and join backslash-newline continuations; other escapes are left alone
export function unquote(image: string): string {
  const inner = image.length >= 2 && image.startsWith('"') && image.endsWith('"') ? image.slice(1, -1) : image;
  return inner.replace(/\\\r?\n/g, '');
}

export function unescapeQuotes(text: string): string {
  return text.replace(/\\"/g, '"');
}

// Value of an `id` rule: identifier, numeral, HTML string or concatenated quoted strings
export function idText(idCst: CstNode | undefined): string {
  if (!idCst) return '';
  const quoted = childTokens(idCst, 'QuotedString');
  if (quoted.length > 0) {
    return quoted.map((t) => unquote(t.image)).join('');
  }
  const tok = childTokens(idCst, 'Identifier')[0]
    ?? childTokens(idCst, 'Numeral')[0]
    ?? childTokens(idCst, 'HtmlString')[0];
  return tok?.image ?? '';
}
