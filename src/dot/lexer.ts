import { createToken, Lexer } from 'chevrotain';

// Identifiers - define first since used by keywords
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[a-zA-Z\u0080-\uffff_][a-zA-Z\u0080-\uffff_0-9]*/
});

// Keywords are case-insensitive in DOT
export const StrictKeyword = createToken({ name: 'StrictKeyword', pattern: /strict/i, longer_alt: Identifier });
export const DigraphKeyword = createToken({ name: 'DigraphKeyword', pattern: /digraph/i, longer_alt: Identifier });
export const GraphKeyword = createToken({ name: 'GraphKeyword', pattern: /graph/i, longer_alt: Identifier });
export const SubgraphKeyword = createToken({ name: 'SubgraphKeyword', pattern: /subgraph/i, longer_alt: Identifier });
export const NodeKeyword = createToken({ name: 'NodeKeyword', pattern: /node/i, longer_alt: Identifier });
export const EdgeKeyword = createToken({ name: 'EdgeKeyword', pattern: /edge/i, longer_alt: Identifier });

export const Numeral = createToken({ name: 'Numeral', pattern: /-?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)/ });

// Escapes (\" and backslash-newline) stay in the image; the builder interprets them
export const QuotedString = createToken({ name: 'QuotedString', pattern: /"(?:\\[\s\S]|[^"\\])*"/, line_breaks: true });

// HTML-like labels nest angle brackets, which a regular expression cannot balance
function matchHtmlString(text: string, offset: number): [string] | null {
  if (text.charAt(offset) !== '<') return null;
  let depth = 0;
  for (let i = offset; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '<') depth++;
    else if (ch === '>') {
      depth--;
      if (depth === 0) return [text.slice(offset, i + 1)];
    }
  }
  return null;
}

export const HtmlString = createToken({
  name: 'HtmlString',
  pattern: matchHtmlString,
  line_breaks: true,
  start_chars_hint: ['<'],
});

export const EdgeOp = createToken({ name: 'EdgeOp', pattern: /->|--/ });

export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
export const LSquare = createToken({ name: 'LSquare', pattern: /\[/ });
export const RSquare = createToken({ name: 'RSquare', pattern: /\]/ });
export const Equals = createToken({ name: 'Equals', pattern: /=/ });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });

export const LineComment = createToken({ name: 'LineComment', pattern: /\/\/[^\n\r]*/, group: Lexer.SKIPPED });
export const BlockComment = createToken({ name: 'BlockComment', pattern: /\/\*[\s\S]*?\*\//, group: Lexer.SKIPPED, line_breaks: true });
// C preprocessor output lines
export const Preprocessor = createToken({ name: 'Preprocessor', pattern: /#[^\n\r]*/, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r\n\f]+/, group: Lexer.SKIPPED, line_breaks: true });

export const allTokens = [
  // skipped
  WhiteSpace,
  LineComment,
  BlockComment,
  Preprocessor,
  // strings
  QuotedString,
  HtmlString,
  // edge operators before numerals so "--" is never read as a sign
  EdgeOp,
  Numeral,
  // keywords before identifiers
  StrictKeyword,
  DigraphKeyword,
  GraphKeyword,
  SubgraphKeyword,
  NodeKeyword,
  EdgeKeyword,
  Identifier,
  // punctuation
  LCurly,
  RCurly,
  LSquare,
  RSquare,
  Equals,
  Semicolon,
  Comma,
  Colon,
  Plus,
];

export const DotLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return DotLexer.tokenize(text);
}
