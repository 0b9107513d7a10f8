import type { SprigValue } from '../runtime/values';

/**
 * A parsed, pre-evaluation syntax node.
 *
 * `InfixGroup` is deliberately not part of this union: the parser rewrites
 * every curly-brace group into a `List` before handing terms out.
 */
export type Term =
  | NumberAtom
  | StringAtom
  | SymbolAtom
  | BooleanAtom
  | NilAtom
  | List
  | QuoteForm
  | QuasiquoteForm
  | UnquoteForm
  | Interpolation
  | Embedded;

export interface Position {
  line: number;
  column: number;
}

export interface BaseTerm {
  position: Position;
}

export interface NumberAtom extends BaseTerm {
  type: 'Number';
  value: number;
}

export interface StringAtom extends BaseTerm {
  type: 'String';
  value: string;
}

export interface SymbolAtom extends BaseTerm {
  type: 'Symbol';
  name: string;
}

export interface BooleanAtom extends BaseTerm {
  type: 'Boolean';
  value: boolean;
}

export interface NilAtom extends BaseTerm {
  type: 'Nil';
}

export interface List extends BaseTerm {
  type: 'List';
  elements: Term[];
}

export interface QuoteForm extends BaseTerm {
  type: 'Quote';
  term: Term;
}

export interface QuasiquoteForm extends BaseTerm {
  type: 'Quasiquote';
  term: Term;
}

export interface UnquoteForm extends BaseTerm {
  type: 'Unquote';
  term: Term;
}

/** `#"text #{expr} text"`, with each embedded expression already parsed. */
export interface Interpolation extends BaseTerm {
  type: 'Interpolation';
  parts: (string | Term)[];
}

/**
 * A runtime value placed back into a term tree, e.g. a procedure inside data
 * handed to `eval`, or the result of a macro's computed hole. Self-evaluating.
 */
export interface Embedded extends BaseTerm {
  type: 'Embedded';
  value: SprigValue;
}

/** Parser-internal: `{a op b op c}` before it is rewritten to `(op a b c)`. */
export interface InfixGroup extends BaseTerm {
  type: 'InfixGroup';
  operands: Term[];
  operators: Term[];
}

export const NO_POSITION: Position = { line: 0, column: 0 };

// ─── Constructors ────────────────────────────────────

export function symbol(name: string, position: Position = NO_POSITION): SymbolAtom {
  return { type: 'Symbol', name, position };
}

export function list(elements: Term[], position: Position = NO_POSITION): List {
  return { type: 'List', elements, position };
}

// ─── Utilities ───────────────────────────────────────

export function isSymbol(term: Term, name?: string): term is SymbolAtom {
  return term.type === 'Symbol' && (name === undefined || term.name === name);
}

/** Structural equality, ignoring positions. */
export function termsEqual(a: Term, b: Term): boolean {
  switch (a.type) {
    case 'Number':
      return b.type === 'Number' && b.value === a.value;
    case 'String':
      return b.type === 'String' && b.value === a.value;
    case 'Boolean':
      return b.type === 'Boolean' && b.value === a.value;
    case 'Symbol':
      return b.type === 'Symbol' && b.name === a.name;
    case 'Nil':
      return b.type === 'Nil';
    case 'List': {
      if (b.type !== 'List' || a.elements.length !== b.elements.length) return false;
      const others = b.elements;
      return a.elements.every((el, i) => termsEqual(el, others[i]));
    }
    case 'Quote':
      return b.type === 'Quote' && termsEqual(a.term, b.term);
    case 'Quasiquote':
      return b.type === 'Quasiquote' && termsEqual(a.term, b.term);
    case 'Unquote':
      return b.type === 'Unquote' && termsEqual(a.term, b.term);
    case 'Interpolation': {
      if (b.type !== 'Interpolation' || a.parts.length !== b.parts.length) return false;
      const others = b.parts;
      return a.parts.every((part, i) => {
        const other = others[i];
        if (typeof part === 'string' || typeof other === 'string') return part === other;
        return termsEqual(part, other);
      });
    }
    case 'Embedded':
      return b.type === 'Embedded' && b.value === a.value;
  }
}

/** Render a term back to source text, e.g. for `--parse` and macro traces. */
export function termToSource(term: Term): string {
  switch (term.type) {
    case 'Number': return String(term.value);
    case 'String': return JSON.stringify(term.value);
    case 'Symbol': return term.name;
    case 'Boolean': return term.value ? 'true' : 'false';
    case 'Nil': return 'nil';
    case 'List': return '(' + term.elements.map(termToSource).join(' ') + ')';
    case 'Quote': return `'${termToSource(term.term)}`;
    case 'Quasiquote': return `\`${termToSource(term.term)}`;
    case 'Unquote': return `,${termToSource(term.term)}`;
    case 'Interpolation':
      return '#"' + term.parts
        .map(p => typeof p === 'string' ? p.replace(/\\/g, '\\\\').replace(/"/g, '\\"') : `#{${termToSource(p)}}`)
        .join('') + '"';
    case 'Embedded': return '<value>';
  }
}
