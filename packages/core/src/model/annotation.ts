/**
 * Parser for type annotations of the meta-model file
 *
 *   Atomic     := bool | int | float | str | bytearray | <TypeName>
 *   Annotation := Atomic | List[Atomic] | Optional[Atomic] | Optional[List[Atomic]]
 */

import { err, ok, type Result } from '../types/result.js';
import { isPrimitiveKind, type PrimitiveKind } from './types.js';

export type AtomicSyntax =
  | { kind: 'primitive'; primitive: PrimitiveKind }
  | { kind: 'name'; name: string };

export interface ListSyntax {
  kind: 'list';
  items: AtomicSyntax;
}

export interface OptionalSyntax {
  kind: 'optional';
  value: AtomicSyntax | ListSyntax;
}

export type AnnotationSyntax = AtomicSyntax | ListSyntax | OptionalSyntax;

interface Term {
  head: string;
  argument: Term | null;
}

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*/;

class TermParser {
  #pos = 0;

  constructor(private readonly text: string) {}

  parse(): Result<Term, string> {
    const term = this.#term();
    if (!term.isOk()) return term;
    this.#skipSpaces();
    if (this.#pos !== this.text.length) {
      return err(`unexpected ${JSON.stringify(this.text.slice(this.#pos))}`);
    }
    return term;
  }

  #term(): Result<Term, string> {
    this.#skipSpaces();
    const match = IDENT_RE.exec(this.text.slice(this.#pos));
    if (match === null) {
      return err(
        this.#pos >= this.text.length
          ? 'unexpected end of annotation'
          : `expected a type name at position ${this.#pos}`
      );
    }
    const head = match[0];
    this.#pos += head.length;
    this.#skipSpaces();
    if (this.text.charAt(this.#pos) !== '[') {
      return ok({ head, argument: null });
    }
    this.#pos += 1;
    const argument = this.#term();
    if (!argument.isOk()) return argument;
    this.#skipSpaces();
    if (this.text.charAt(this.#pos) !== ']') {
      return err(`expected "]" at position ${this.#pos}`);
    }
    this.#pos += 1;
    return ok({ head, argument: argument.value });
  }

  #skipSpaces(): void {
    while (this.text.charAt(this.#pos) === ' ') {
      this.#pos += 1;
    }
  }
}

function toAtomic(term: Term): Result<AtomicSyntax, string> {
  if (term.argument !== null) {
    return err(`${render(term)} is nested deeper than supported`);
  }
  if (term.head === 'List' || term.head === 'Optional') {
    return err(`${term.head} requires a type argument`);
  }
  if (isPrimitiveKind(term.head)) {
    return ok({ kind: 'primitive', primitive: term.head });
  }
  return ok({ kind: 'name', name: term.head });
}

function toList(term: Term): Result<ListSyntax, string> {
  if (term.argument === null) {
    return err('List requires a type argument');
  }
  const items = toAtomic(term.argument);
  if (!items.isOk()) return items;
  return ok({ kind: 'list', items: items.value });
}

function render(term: Term): string {
  return term.argument === null
    ? term.head
    : `${term.head}[${render(term.argument)}]`;
}

export function parseAnnotation(text: string): Result<AnnotationSyntax, string> {
  const parsed = new TermParser(text).parse();
  if (!parsed.isOk()) return parsed;
  const term = parsed.value;

  switch (term.head) {
    case 'List':
      return toList(term);
    case 'Optional': {
      const inner = term.argument;
      if (inner === null) {
        return err('Optional requires a type argument');
      }
      const value = inner.head === 'List' ? toList(inner) : toAtomic(inner);
      if (!value.isOk()) return value;
      return ok({ kind: 'optional', value: value.value });
    }
    default:
      return toAtomic(term);
  }
}

/** Names of the model types an annotation refers to */
export function referencedNames(syntax: AnnotationSyntax): string[] {
  switch (syntax.kind) {
    case 'primitive':
      return [];
    case 'name':
      return [syntax.name];
    case 'list':
      return referencedNames(syntax.items);
    case 'optional':
      return referencedNames(syntax.value);
    default: {
      const exhaustive: never = syntax;
      return exhaustive;
    }
  }
}
