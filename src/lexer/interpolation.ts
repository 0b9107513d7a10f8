import { ErrorCode, SprigError } from '../runtime/errors';

export type InterpolationPart =
  | { kind: 'text'; value: string; offset: number }
  | { kind: 'expr'; source: string; offset: number };

export interface InterpolationScan {
  parts: InterpolationPart[];
  /** Index just past the closing quote (quoted mode) or the end of input. */
  end: number;
}

/**
 * Split the body of a format string into literal text and `#{expr}` spans.
 *
 * In quoted mode the scan starts just after the opening `"`, handles escapes
 * in the literal text and stops at the closing quote. In raw mode (used by
 * the `format` builtin on an already-built string) the whole input is the
 * body and no escapes are processed.
 *
 * Only `#{` opens an expression. Inside one, braces nest and string literals
 * are skipped over, so `#{(f "}")}` is a single span.
 */
export function scanInterpolation(source: string, start: number, quoted: boolean): InterpolationScan {
  const parts: InterpolationPart[] = [];
  let pos = start;
  let text = '';
  let textStart = start;

  const pushText = (): void => {
    if (text.length > 0) parts.push({ kind: 'text', value: text, offset: textStart });
    text = '';
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (quoted && ch === '"') {
      pushText();
      return finish(parts, pos + 1);
    }

    if (quoted && ch === '\\') {
      pos++;
      if (pos < source.length) {
        text += unescape(source[pos]);
        pos++;
      }
      continue;
    }

    if (ch === '#' && source[pos + 1] === '{') {
      pushText();
      const exprStart = pos + 2;
      const exprEnd = findClosingBrace(source, exprStart);
      parts.push({ kind: 'expr', source: source.slice(exprStart, exprEnd), offset: exprStart });
      pos = exprEnd + 1;
      textStart = pos;
      continue;
    }

    text += ch;
    pos++;
  }

  if (quoted) {
    throw new SprigError(ErrorCode.UnclosedString);
  }
  pushText();
  return finish(parts, pos);
}

export function unescape(ch: string): string {
  switch (ch) {
    case 'n': return '\n';
    case 't': return '\t';
    case 'r': return '\r';
    default: return ch;
  }
}

function findClosingBrace(source: string, start: number): number {
  let depth = 0;
  let pos = start;
  while (pos < source.length) {
    const ch = source[pos];
    if (ch === '"') {
      pos = skipString(source, pos + 1);
      continue;
    }
    if (ch === '{') depth++;
    if (ch === '}') {
      if (depth === 0) return pos;
      depth--;
    }
    pos++;
  }
  throw new SprigError(ErrorCode.UnclosedInterpolation);
}

function skipString(source: string, start: number): number {
  let pos = start;
  while (pos < source.length) {
    if (source[pos] === '\\') {
      pos += 2;
      continue;
    }
    if (source[pos] === '"') return pos + 1;
    pos++;
  }
  throw new SprigError(ErrorCode.UnclosedInterpolation);
}

function finish(parts: InterpolationPart[], end: number): InterpolationScan {
  const exprs = parts.filter(p => p.kind === 'expr');
  if (exprs.length === 0 || exprs.some(p => p.kind === 'expr' && p.source.trim() === '')) {
    throw new SprigError(ErrorCode.FormatWithoutExpression);
  }
  return { parts, end };
}
