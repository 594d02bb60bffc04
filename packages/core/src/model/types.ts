/**
 * Resolved meta-model
 *
 * Produced by loadModel() and never modified afterwards. All references
 * between types are direct object references; names are kept for
 * diagnostics and emission.
 */

export const PRIMITIVE_KINDS = [
  'bool',
  'int',
  'float',
  'str',
  'bytearray',
] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

export function isPrimitiveKind(value: string): value is PrimitiveKind {
  return PRIMITIVE_KINDS.some((kind) => kind === value);
}

// Descriptions

export type Inline =
  | { kind: 'text'; text: string }
  | { kind: 'typeRef'; symbol: NamedType }
  | { kind: 'propertyRef'; owner: Class; property: Property };

export type Paragraph = readonly Inline[];

export interface Description {
  summary: Paragraph;
  remarks: readonly Paragraph[];
}

// Type annotations

export interface PrimitiveAnnotation {
  kind: 'primitive';
  primitive: PrimitiveKind;
}

export interface NamedAnnotation {
  kind: 'named';
  symbol: NamedType;
}

export type AtomicAnnotation = PrimitiveAnnotation | NamedAnnotation;

export interface ListAnnotation {
  kind: 'list';
  items: AtomicAnnotation;
}

export interface OptionalAnnotation {
  kind: 'optional';
  value: AtomicAnnotation | ListAnnotation;
}

export type TypeAnnotation =
  | AtomicAnnotation
  | ListAnnotation
  | OptionalAnnotation;

// Named types

export interface EnumerationLiteral {
  readonly name: string;
  readonly value: string;
  readonly description: Description | null;
}

export interface Enumeration {
  readonly kind: 'enumeration';
  readonly name: string;
  readonly literals: readonly EnumerationLiteral[];
  readonly description: Description | null;
}

export interface ConstrainedPrimitive {
  readonly kind: 'constrainedPrimitive';
  readonly name: string;
  readonly constrainee: PrimitiveKind;
  readonly description: Description | null;
}

export interface Property {
  readonly name: string;
  readonly type: TypeAnnotation;
  readonly description: Description | null;
  /** Class that declares the property; differs from the owner when inherited */
  readonly specifiedFor: Class;
}

export type DefaultValue =
  | { kind: 'constant'; value: boolean | number | string }
  | { kind: 'enumerationLiteral'; enumeration: Enumeration; literal: EnumerationLiteral };

export interface Argument {
  readonly name: string;
  readonly type: TypeAnnotation;
  readonly default: DefaultValue | null;
}

export interface Serialization {
  /** Whether the discriminator is written and accepted for this class */
  readonly withModelType: boolean;
}

interface ClassBase {
  readonly name: string;
  readonly inheritances: readonly Class[];
  /** Effective properties: inherited ones first, then own ones */
  readonly properties: readonly Property[];
  readonly arguments: readonly Argument[];
  readonly interface: Interface | null;
  readonly descendants: readonly Class[];
  readonly serialization: Serialization;
  readonly description: Description | null;
}

export interface AbstractClass extends ClassBase {
  readonly kind: 'abstractClass';
}

export interface ConcreteClass extends ClassBase {
  readonly kind: 'concreteClass';
  readonly isImplementationSpecific: boolean;
}

export type Class = AbstractClass | ConcreteClass;

export type NamedType = Enumeration | ConstrainedPrimitive | Class;

/**
 * Polymorphic view of a class with descendants
 */
export interface Interface {
  readonly name: string;
  readonly base: Class;
  /** Concrete members of the class and its descendants, in model order */
  readonly implementers: readonly ConcreteClass[];
}

export interface SymbolTable {
  readonly name: string;
  readonly version: string | null;
  readonly description: Description | null;
  /** In model order */
  readonly types: readonly NamedType[];
  readonly interfaces: readonly Interface[];
  readonly byName: ReadonlyMap<string, NamedType>;
}

export function isClass(symbol: NamedType): symbol is Class {
  return symbol.kind === 'abstractClass' || symbol.kind === 'concreteClass';
}

export function enumerationsOf(table: SymbolTable): Enumeration[] {
  return table.types.filter(
    (t): t is Enumeration => t.kind === 'enumeration'
  );
}

export function concreteClassesOf(table: SymbolTable): ConcreteClass[] {
  return table.types.filter(
    (t): t is ConcreteClass => t.kind === 'concreteClass'
  );
}

export function classesOf(table: SymbolTable): Class[] {
  return table.types.filter(isClass);
}

export function propertyOf(cls: Class, name: string): Property | undefined {
  return cls.properties.find((p) => p.name === name);
}

/**
 * Render an annotation back to the model syntax, e.g. `Optional[List[str]]`
 */
export function annotationToString(annotation: TypeAnnotation): string {
  switch (annotation.kind) {
    case 'primitive':
      return annotation.primitive;
    case 'named':
      return annotation.symbol.name;
    case 'list':
      return `List[${annotationToString(annotation.items)}]`;
    case 'optional':
      return `Optional[${annotationToString(annotation.value)}]`;
    default: {
      const exhaustive: never = annotation;
      return exhaustive;
    }
  }
}

export function annotationsEqual(a: TypeAnnotation, b: TypeAnnotation): boolean {
  return annotationToString(a) === annotationToString(b);
}
