/**
 * Type-annotation resolver
 *
 * Maps a property or argument annotation to the codec strategy both codec
 * directions follow. Pure and total over the resolved model: the loader
 * has already rejected anything the strategies do not cover.
 */

import type {
  AtomicAnnotation,
  Class,
  ConcreteClass,
  Enumeration,
  Interface,
  PrimitiveKind,
  TypeAnnotation,
} from '../model/types.js';

export type AtomicStrategy =
  | { kind: 'primitive'; primitive: PrimitiveKind }
  | { kind: 'enumeration'; enumeration: Enumeration }
  | { kind: 'interface'; iface: Interface }
  | { kind: 'class'; cls: ConcreteClass };

export type Shape =
  | { kind: 'atomic'; strategy: AtomicStrategy }
  | { kind: 'list'; items: AtomicStrategy };

export interface PropertyStrategy {
  optional: boolean;
  shape: Shape;
}

export function assertNever(value: never, what = 'value'): never {
  throw new Error(`Unexpected ${what}: ${JSON.stringify(value)}`);
}

function classStrategy(cls: Class): AtomicStrategy {
  if (cls.interface !== null) {
    return { kind: 'interface', iface: cls.interface };
  }
  if (cls.kind === 'abstractClass') {
    // Abstract classes without descendants are rejected while loading
    throw new Error(`Abstract class without an interface: ${cls.name}`);
  }
  return { kind: 'class', cls };
}

export function resolveAtomic(annotation: AtomicAnnotation): AtomicStrategy {
  switch (annotation.kind) {
    case 'primitive':
      return { kind: 'primitive', primitive: annotation.primitive };
    case 'named': {
      const { symbol } = annotation;
      switch (symbol.kind) {
        case 'enumeration':
          return { kind: 'enumeration', enumeration: symbol };
        case 'constrainedPrimitive':
          return { kind: 'primitive', primitive: symbol.constrainee };
        case 'abstractClass':
        case 'concreteClass':
          return classStrategy(symbol);
        default:
          return assertNever(symbol, 'named type');
      }
    }
    default:
      return assertNever(annotation, 'annotation');
  }
}

export function resolveStrategy(annotation: TypeAnnotation): PropertyStrategy {
  switch (annotation.kind) {
    case 'primitive':
    case 'named':
      return {
        optional: false,
        shape: { kind: 'atomic', strategy: resolveAtomic(annotation) },
      };
    case 'list':
      return {
        optional: false,
        shape: { kind: 'list', items: resolveAtomic(annotation.items) },
      };
    case 'optional': {
      const inner = resolveStrategy(annotation.value);
      return { optional: true, shape: inner.shape };
    }
    default:
      return assertNever(annotation, 'annotation');
  }
}

/** Name of the model type behind a strategy, e.g. for routine names */
export function strategyTypeName(strategy: AtomicStrategy): string {
  switch (strategy.kind) {
    case 'primitive':
      return strategy.primitive;
    case 'enumeration':
      return strategy.enumeration.name;
    case 'interface':
      return strategy.iface.name;
    case 'class':
      return strategy.cls.name;
    default:
      return assertNever(strategy, 'strategy');
  }
}
