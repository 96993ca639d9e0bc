/**
 * Lexical helpers shared by the line-scanning parsers (Python, Go).
 *
 * `maskSource` blanks out comments and string contents while keeping every
 * newline and every offset in place, so later regex passes only ever see code.
 */

export interface LexicalSyntax {
  /** Line comment opener ('#' or '//') */
  readonly lineComment: string;
  /** Block comment delimiters, if the language has them */
  readonly blockComment?: readonly [string, string];
  /** Single-line string delimiters */
  readonly quotes: readonly string[];
  /** Python triple-quoted strings */
  readonly tripleQuotes?: boolean;
  /** Multi-line raw string delimiter without escapes (Go backticks) */
  readonly rawQuote?: string;
}

export interface MaskResult {
  readonly masked: string;
  readonly errors: string[];
}

const MAX_ERRORS = 5;

export const PYTHON_SYNTAX: LexicalSyntax = {
  lineComment: '#',
  quotes: ['"', "'"],
  tripleQuotes: true,
};

export const GO_SYNTAX: LexicalSyntax = {
  lineComment: '//',
  blockComment: ['/*', '*/'],
  quotes: ['"', "'"],
  rawQuote: '`',
};

/**
 * Replace comment and string contents with spaces. String delimiters stay.
 */
export function maskSource(content: string, syntax: LexicalSyntax): MaskResult {
  const out = content.split('');
  const errors: string[] = [];
  let line = 1;
  let i = 0;

  const blank = (from: number, to: number): void => {
    for (let k = from; k < to; k++) {
      if (out[k] !== '\n') out[k] = ' ';
    }
  };
  const countLines = (from: number, to: number): void => {
    for (let k = from; k < to; k++) {
      if (content[k] === '\n') line++;
    }
  };

  while (i < content.length) {
    const ch = content[i];

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }

    if (content.startsWith(syntax.lineComment, i)) {
      const end = content.indexOf('\n', i);
      const stop = end === -1 ? content.length : end;
      blank(i, stop);
      i = stop;
      continue;
    }

    if (syntax.blockComment && content.startsWith(syntax.blockComment[0], i)) {
      const [open, close] = syntax.blockComment;
      const end = content.indexOf(close, i + open.length);
      const startLine = line;
      const stop = end === -1 ? content.length : end + close.length;
      blank(i, stop);
      countLines(i, stop);
      if (end === -1) errors.push(`line ${startLine}: unterminated block comment`);
      i = stop;
      continue;
    }

    if (syntax.tripleQuotes && (content.startsWith('"""', i) || content.startsWith("'''", i))) {
      const delimiter = content.slice(i, i + 3);
      const startLine = line;
      let k = i + 3;
      while (k < content.length && !content.startsWith(delimiter, k)) {
        k += content[k] === '\\' ? 2 : 1;
      }
      const stop = Math.min(k + 3, content.length);
      blank(i + 3, Math.min(k, content.length));
      countLines(i, stop);
      if (k >= content.length) errors.push(`line ${startLine}: unterminated triple-quoted string`);
      i = stop;
      continue;
    }

    if (syntax.rawQuote && ch === syntax.rawQuote) {
      const end = content.indexOf(syntax.rawQuote, i + 1);
      const startLine = line;
      const stop = end === -1 ? content.length : end + 1;
      blank(i + 1, end === -1 ? content.length : end);
      countLines(i, stop);
      if (end === -1) errors.push(`line ${startLine}: unterminated raw string`);
      i = stop;
      continue;
    }

    if (syntax.quotes.includes(ch)) {
      let k = i + 1;
      let terminated = false;
      while (k < content.length) {
        const c = content[k];
        if (c === '\\') {
          k += 2;
          continue;
        }
        if (c === '\n') break;
        if (c === ch) {
          terminated = true;
          break;
        }
        k++;
      }
      const bodyEnd = Math.min(k, content.length);
      blank(i + 1, bodyEnd);
      // escaped newlines inside the literal
      countLines(i + 1, bodyEnd);
      if (!terminated) errors.push(`line ${line}: unterminated string literal`);
      i = terminated ? k + 1 : bodyEnd;
      continue;
    }

    i++;
  }

  return { masked: out.join(''), errors: errors.slice(0, MAX_ERRORS) };
}

const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/**
 * Check bracket balance in masked source.
 */
export function checkBalance(masked: string): string[] {
  const stack: Array<{ ch: string; line: number }> = [];
  const errors: string[] = [];
  let line = 1;

  for (const ch of masked) {
    if (ch === '\n') {
      line++;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      stack.push({ ch, line });
    } else if (ch in CLOSERS) {
      const top = stack.pop();
      if (!top || top.ch !== CLOSERS[ch]) {
        errors.push(`line ${line}: unexpected '${ch}'`);
        if (top) stack.push(top);
        if (errors.length >= MAX_ERRORS) return errors;
      }
    }
  }

  for (const open of stack.slice(0, MAX_ERRORS - errors.length)) {
    errors.push(`line ${open.line}: unclosed '${open.ch}'`);
  }
  return errors;
}

/**
 * Offset → 1-based line/column lookup.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(content: string) {
    for (let i = 0; i < content.length; i++) {
      if (content[i] === '\n') this.starts.push(i + 1);
    }
  }

  locate(offset: number): { line: number; column: number } {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - (this.starts[lo] ?? 0) + 1 };
  }
}
