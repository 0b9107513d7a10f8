import * as AST from '../parser/ast';
import {
  RuleTransformer,
  SprigMacro,
  TemplateTransformer,
  termToValue,
  valueToTerm,
} from './values';
import { ErrorCode, SprigError, arityMismatch } from './errors';
import type { Interpreter } from './interpreter';

/**
 * Expand one macro call. `call` is the whole list, head included; the
 * result is evaluated by the caller in the call-site environment.
 */
export function expandMacro(macro: SprigMacro, call: AST.List, interp: Interpreter): AST.Term {
  const operands = call.elements.slice(1);
  switch (macro.transformer.kind) {
    case 'template':
      return expandTemplate(macro.transformer, operands, interp);
    case 'rule':
      return expandRule(macro.name, macro.transformer, operands);
  }
}

// ─── Template macros ─────────────────────────────────

function expandTemplate(t: TemplateTransformer, operands: AST.Term[], interp: Interpreter): AST.Term {
  if (operands.length !== t.params.length) {
    throw arityMismatch(t.params.length, operands.length);
  }

  const args = new Map<string, AST.Term>();
  t.params.forEach((param, i) => args.set(param, operands[i]));

  // Computed holes see the parameters bound to the call-site terms as data.
  const scope = t.env.child();
  args.forEach((term, param) => scope.define(param, termToValue(term)));

  if (t.body.type !== 'Quasiquote') {
    return valueToTerm(interp.evaluate(t.body, scope), t.body.position);
  }

  const fill = (term: AST.Term, depth: number): AST.Term => {
    switch (term.type) {
      case 'Unquote': {
        if (depth > 0) return { ...term, term: fill(term.term, depth - 1) };
        const inner = term.term;
        if (inner.type === 'Symbol') {
          const arg = args.get(inner.name);
          if (arg) return arg;
        }
        return valueToTerm(interp.evaluate(inner, scope), term.position);
      }
      case 'Quasiquote':
        return { ...term, term: fill(term.term, depth + 1) };
      case 'Quote':
        return { ...term, term: fill(term.term, depth) };
      case 'List':
        return { ...term, elements: term.elements.map(el => fill(el, depth)) };
      case 'Interpolation':
        return { ...term, parts: term.parts.map(p => typeof p === 'string' ? p : fill(p, depth)) };
      default:
        return term;
    }
  };

  return fill(t.body.term, 0);
}

// ─── Rule macros ─────────────────────────────────────

function expandRule(name: string, rule: RuleTransformer, operands: AST.Term[]): AST.Term {
  if (operands.length !== rule.pattern.length) {
    throw arityMismatch(rule.pattern.length, operands.length);
  }
  const bindings = new Map<string, AST.Term>();
  rule.pattern.forEach((pattern, i) => match(name, pattern, operands[i], bindings));
  return substitute(rule.template, bindings);
}

function match(macroName: string, pattern: AST.Term, term: AST.Term, bindings: Map<string, AST.Term>): void {
  if (pattern.type === 'Symbol' && pattern.name !== macroName) {
    const bound = bindings.get(pattern.name);
    if (bound && !AST.termsEqual(bound, term)) {
      throw shapeMismatch(pattern, term);
    }
    bindings.set(pattern.name, term);
    return;
  }

  if (pattern.type === 'List') {
    if (term.type !== 'List' || term.elements.length !== pattern.elements.length) {
      throw shapeMismatch(pattern, term);
    }
    const elements = term.elements;
    pattern.elements.forEach((p, i) => match(macroName, p, elements[i], bindings));
    return;
  }

  if (!AST.termsEqual(pattern, term)) {
    throw shapeMismatch(pattern, term);
  }
}

function substitute(template: AST.Term, bindings: Map<string, AST.Term>): AST.Term {
  switch (template.type) {
    case 'Symbol':
      return bindings.get(template.name) ?? template;
    case 'List':
      return { ...template, elements: template.elements.map(el => substitute(el, bindings)) };
    case 'Quote':
    case 'Quasiquote':
    case 'Unquote':
      return { ...template, term: substitute(template.term, bindings) };
    case 'Interpolation':
      return {
        ...template,
        parts: template.parts.map(p => typeof p === 'string' ? p : substitute(p, bindings)),
      };
    default:
      return template;
  }
}

function shapeMismatch(pattern: AST.Term, term: AST.Term): SprigError {
  return new SprigError(ErrorCode.SignatureMismatch, {
    detail: `expected ${AST.termToSource(pattern)}, found ${AST.termToSource(term)}`,
    position: term.position,
  });
}
