/**
 * Meta-model loader
 *
 * Validates a meta-model document against schemas/meta-model.schema.json
 * and resolves it into a linked SymbolTable. Resolution never stops at the
 * first problem: every diagnostic of the document is reported at once.
 */

import { readFileSync } from 'node:fs';
import { Ajv2020 } from 'ajv/dist/2020.js';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

import {
  createDiagnostic,
  DIAGNOSTIC_CODES,
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
} from '../diag/codes.js';
import { capitalCamelCase, jsonProperty, lowerCamelCase } from '../naming/naming.js';
import { err, ok, type Result } from '../types/result.js';
import { parseAnnotation, type AnnotationSyntax, type AtomicSyntax } from './annotation.js';
import { parseDescription, type ReferenceLookup, type ReferenceRole } from './description.js';
import {
  type AbstractClass,
  type Argument,
  type AtomicAnnotation,
  type Class,
  type ConcreteClass,
  type ConstrainedPrimitive,
  type DefaultValue,
  type Description,
  type Enumeration,
  type EnumerationLiteral,
  type Inline,
  type Interface,
  type NamedType,
  type PrimitiveKind,
  type Property,
  type SymbolTable,
  type TypeAnnotation,
} from './types.js';

// Shape of a document that passed schema validation

export interface RawEnumeration {
  kind: 'enumeration';
  name: string;
  description?: string;
  literals: { name: string; value: string; description?: string }[];
}

export interface RawConstrainedPrimitive {
  kind: 'constrainedPrimitive';
  name: string;
  description?: string;
  constrainee: PrimitiveKind;
}

export interface RawProperty {
  name: string;
  type: string;
  description?: string;
}

export interface RawArgument {
  name: string;
  type: string;
  default?: boolean | number | string | null;
}

export interface RawClass {
  kind: 'abstractClass' | 'concreteClass';
  name: string;
  description?: string;
  inheritances?: string[];
  properties?: RawProperty[];
  constructorArguments?: RawArgument[];
  implementationSpecific?: boolean;
}

export type RawNamedType = RawEnumeration | RawConstrainedPrimitive | RawClass;

export interface RawModel {
  name: string;
  version?: string;
  description?: string;
  types: RawNamedType[];
}

export interface LoadOptions {
  /** Wire property reserved for the discriminator (default: 'modelType') */
  discriminatorKey?: string;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type ClassDraft = Mutable<AbstractClass> | Mutable<ConcreteClass>;

/** Names taken by the scaffolding of the generated code and the globals it refers to */
const RESERVED_TYPE_NAMES = new Set([
  'IClass',
  'AbstractTransformer',
  'Transformer',
  'Array',
  'Uint8Array',
]);
const RESERVED_MEMBER_NAMES = new Set(['transform', 'constructor']);

const SCHEMA_URL = new URL('../../schemas/meta-model.schema.json', import.meta.url);

let cachedValidator: ValidateFunction<RawModel> | undefined;

function getValidator(): ValidateFunction<RawModel> {
  if (cachedValidator === undefined) {
    const ajv = new Ajv2020({
      strict: true,
      allErrors: true,
      discriminator: true,
      allowUnionTypes: true,
    });
    const schema: SchemaObject = JSON.parse(readFileSync(SCHEMA_URL, 'utf8'));
    cachedValidator = ajv.compile<RawModel>(schema);
  }
  return cachedValidator;
}

function schemaDiagnostic(error: ErrorObject): Diagnostic {
  const subject = error.instancePath === '' ? '/' : error.instancePath;
  let message = error.message ?? 'is invalid';
  const extra: unknown = error.params['additionalProperty'];
  if (error.keyword === 'additionalProperties' && typeof extra === 'string') {
    message += ` (${JSON.stringify(extra)})`;
  }
  return createDiagnostic(DIAGNOSTIC_CODES.MODEL_SCHEMA_VIOLATION, subject, message);
}

function dedupe(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((d) => {
    const key = formatDiagnostic(d);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Validate and resolve a parsed meta-model document
 */
export function loadModel(
  document: unknown,
  options: LoadOptions = {}
): Result<SymbolTable, Diagnostic[]> {
  const validate = getValidator();
  if (!validate(document)) {
    return err(dedupe((validate.errors ?? []).map(schemaDiagnostic)));
  }
  return new ModelResolver(document, options.discriminatorKey ?? 'modelType').resolve();
}

class ModelResolver {
  readonly #diagnostics: Diagnostic[] = [];
  readonly #symbols = new Map<string, NamedType>();
  readonly #casedNames = new Map<string, string>();
  readonly #types: NamedType[] = [];
  readonly #classes: ClassDraft[] = [];
  readonly #rawClasses = new Map<string, RawClass>();
  readonly #parents = new Map<string, ClassDraft[]>();
  readonly #ownProperties = new Map<string, Mutable<Property>[]>();
  readonly #effective = new Map<string, Property[]>();
  readonly #enumerations = new Map<
    string,
    { symbol: Mutable<Enumeration>; literals: Mutable<EnumerationLiteral>[] }
  >();
  readonly #primitives = new Map<string, Mutable<ConstrainedPrimitive>>();

  constructor(
    private readonly raw: RawModel,
    private readonly discriminatorKey: string
  ) {}

  resolve(): Result<SymbolTable, Diagnostic[]> {
    for (const rawType of this.raw.types) {
      this.#declare(rawType);
    }
    this.#linkParents();
    this.#linkDescendants();
    for (const cls of this.#classes) {
      cls.properties = this.#effectiveProperties(cls);
    }
    for (const cls of this.#classes) {
      cls.arguments = this.#constructorArguments(cls);
    }
    const interfaces = this.#synthesizeInterfaces();
    this.#checkJsonNames();
    const description = this.#resolveDescriptions();

    if (this.#diagnostics.length > 0) {
      return err(dedupe(this.#diagnostics));
    }
    return ok({
      name: this.raw.name,
      version: this.raw.version ?? null,
      description,
      types: this.#types,
      interfaces,
      byName: this.#symbols,
    });
  }

  #report(code: DiagnosticCode, subject: string, message: string): void {
    this.#diagnostics.push(createDiagnostic(code, subject, message));
  }

  #declare(rawType: RawNamedType): void {
    const { name } = rawType;
    const cased = capitalCamelCase(name);
    const clash = this.#casedNames.get(cased);
    if (clash !== undefined) {
      this.#report(
        DIAGNOSTIC_CODES.DUPLICATE_NAME,
        name,
        clash === name
          ? `Type "${name}" is defined more than once`
          : `Type "${name}" clashes with "${clash}" (both are named ${cased})`
      );
      return;
    }
    if (RESERVED_TYPE_NAMES.has(cased)) {
      this.#report(
        DIAGNOSTIC_CODES.INVALID_IDENTIFIER,
        name,
        `"${cased}" is reserved for the generated code`
      );
    }
    this.#casedNames.set(cased, name);

    const symbol = this.#createSymbol(rawType);
    this.#symbols.set(name, symbol);
    this.#types.push(symbol);
  }

  #createSymbol(rawType: RawNamedType): NamedType {
    switch (rawType.kind) {
      case 'enumeration': {
        const literals: Mutable<EnumerationLiteral>[] = [];
        const names = new Set<string>();
        const values = new Set<string>();
        for (const literal of rawType.literals) {
          const subject = `${rawType.name}.${literal.name}`;
          if (names.has(capitalCamelCase(literal.name))) {
            this.#report(DIAGNOSTIC_CODES.DUPLICATE_NAME, subject, 'Literal is defined more than once');
            continue;
          }
          if (values.has(literal.value)) {
            this.#report(
              DIAGNOSTIC_CODES.DUPLICATE_NAME,
              subject,
              `Literal value ${JSON.stringify(literal.value)} is used more than once`
            );
            continue;
          }
          names.add(capitalCamelCase(literal.name));
          values.add(literal.value);
          literals.push({ name: literal.name, value: literal.value, description: null });
        }
        const enumeration: Mutable<Enumeration> = {
          kind: 'enumeration',
          name: rawType.name,
          literals,
          description: null,
        };
        this.#enumerations.set(rawType.name, { symbol: enumeration, literals });
        return enumeration;
      }
      case 'constrainedPrimitive': {
        const primitive: Mutable<ConstrainedPrimitive> = {
          kind: 'constrainedPrimitive',
          name: rawType.name,
          constrainee: rawType.constrainee,
          description: null,
        };
        this.#primitives.set(rawType.name, primitive);
        return primitive;
      }
      case 'abstractClass':
      case 'concreteClass': {
        const base = {
          name: rawType.name,
          inheritances: [],
          properties: [],
          arguments: [],
          interface: null,
          descendants: [],
          serialization: { withModelType: false },
          description: null,
        };
        const draft: ClassDraft =
          rawType.kind === 'abstractClass'
            ? { kind: 'abstractClass', ...base }
            : {
                kind: 'concreteClass',
                isImplementationSpecific: rawType.implementationSpecific ?? false,
                ...base,
              };
        this.#classes.push(draft);
        this.#rawClasses.set(rawType.name, rawType);
        return draft;
      }
      default: {
        const exhaustive: never = rawType;
        return exhaustive;
      }
    }
  }

  #classDraft(name: string): ClassDraft | undefined {
    return this.#classes.find((c) => c.name === name);
  }

  #linkParents(): void {
    for (const cls of this.#classes) {
      const parents: ClassDraft[] = [];
      for (const parentName of this.#rawClasses.get(cls.name)?.inheritances ?? []) {
        const symbol = this.#symbols.get(parentName);
        const parent = this.#classDraft(parentName);
        if (symbol === undefined) {
          this.#report(DIAGNOSTIC_CODES.INVALID_PARENT, cls.name, `Unknown parent "${parentName}"`);
        } else if (parent === undefined) {
          this.#report(
            DIAGNOSTIC_CODES.INVALID_PARENT,
            cls.name,
            `Parent "${parentName}" is not a class`
          );
        } else if (parents.includes(parent)) {
          this.#report(
            DIAGNOSTIC_CODES.INVALID_PARENT,
            cls.name,
            `Parent "${parentName}" is listed more than once`
          );
        } else {
          parents.push(parent);
        }
      }
      this.#parents.set(cls.name, parents);
    }

    // Drop the edges that close a cycle so that the rest of the resolution
    // works on a directed acyclic graph
    const state = new Map<string, 'visiting' | 'done'>();
    const stack: string[] = [];
    const visit = (cls: ClassDraft): void => {
      state.set(cls.name, 'visiting');
      stack.push(cls.name);
      const parents = this.#parents.get(cls.name) ?? [];
      for (const parent of [...parents]) {
        const parentState = state.get(parent.name);
        if (parentState === 'visiting') {
          const cycle = [...stack.slice(stack.indexOf(parent.name)), parent.name];
          this.#report(
            DIAGNOSTIC_CODES.INHERITANCE_CYCLE,
            parent.name,
            `Inheritance cycle: ${cycle.join(' -> ')}`
          );
          parents.splice(parents.indexOf(parent), 1);
        } else if (parentState === undefined) {
          visit(parent);
        }
      }
      stack.pop();
      state.set(cls.name, 'done');
    };
    for (const cls of this.#classes) {
      if (!state.has(cls.name)) visit(cls);
    }

    for (const cls of this.#classes) {
      cls.inheritances = this.#parents.get(cls.name) ?? [];
    }
  }

  #ancestors(cls: ClassDraft, into = new Set<string>()): Set<string> {
    for (const parent of this.#parents.get(cls.name) ?? []) {
      if (!into.has(parent.name)) {
        into.add(parent.name);
        this.#ancestors(parent, into);
      }
    }
    return into;
  }

  #linkDescendants(): void {
    const descendants = new Map<string, Class[]>();
    for (const cls of this.#classes) {
      for (const ancestor of this.#ancestors(cls)) {
        const list = descendants.get(ancestor) ?? [];
        list.push(cls);
        descendants.set(ancestor, list);
      }
    }
    for (const cls of this.#classes) {
      cls.descendants = descendants.get(cls.name) ?? [];
    }
  }

  #effectiveProperties(cls: ClassDraft): Property[] {
    const memo = this.#effective.get(cls.name);
    if (memo !== undefined) return memo;

    const result: Property[] = [];
    const byName = new Map<string, Property>();
    for (const parent of this.#parents.get(cls.name) ?? []) {
      for (const property of this.#effectiveProperties(parent)) {
        const existing = byName.get(property.name);
        if (existing === undefined) {
          byName.set(property.name, property);
          result.push(property);
        } else if (existing !== property) {
          this.#report(
            DIAGNOSTIC_CODES.DUPLICATE_NAME,
            `${cls.name}.${property.name}`,
            `Property is inherited from both "${existing.specifiedFor.name}" and "${property.specifiedFor.name}"`
          );
        }
      }
    }

    const own: Mutable<Property>[] = [];
    for (const rawProperty of this.#rawClasses.get(cls.name)?.properties ?? []) {
      const subject = `${cls.name}.${rawProperty.name}`;
      const existing = byName.get(rawProperty.name);
      if (existing !== undefined) {
        this.#report(
          DIAGNOSTIC_CODES.DUPLICATE_NAME,
          subject,
          existing.specifiedFor === cls
            ? 'Property is defined more than once'
            : `Property is already defined in "${existing.specifiedFor.name}"`
        );
        continue;
      }
      if (RESERVED_MEMBER_NAMES.has(lowerCamelCase(rawProperty.name))) {
        this.#report(
          DIAGNOSTIC_CODES.INVALID_IDENTIFIER,
          subject,
          `"${rawProperty.name}" is reserved for the generated code`
        );
      }
      const property: Mutable<Property> = {
        name: rawProperty.name,
        type: this.#resolveAnnotation(rawProperty.type, subject),
        description: null,
        specifiedFor: cls,
      };
      own.push(property);
      byName.set(property.name, property);
      result.push(property);
    }
    this.#ownProperties.set(cls.name, own);
    this.#effective.set(cls.name, result);
    return result;
  }

  #resolveAnnotation(text: string, subject: string): TypeAnnotation {
    const placeholder: TypeAnnotation = { kind: 'primitive', primitive: 'str' };
    const parsed = parseAnnotation(text);
    if (!parsed.isOk()) {
      this.#report(
        DIAGNOSTIC_CODES.INVALID_TYPE_ANNOTATION,
        subject,
        `Invalid type annotation "${text}": ${parsed.error}`
      );
      return placeholder;
    }
    return this.#linkAnnotation(parsed.value, subject) ?? placeholder;
  }

  #linkAtomic(syntax: AtomicSyntax, subject: string): AtomicAnnotation | null {
    if (syntax.kind === 'primitive') {
      return { kind: 'primitive', primitive: syntax.primitive };
    }
    const symbol = this.#symbols.get(syntax.name);
    if (symbol === undefined) {
      this.#report(DIAGNOSTIC_CODES.UNKNOWN_TYPE, subject, `Unknown type "${syntax.name}"`);
      return null;
    }
    return { kind: 'named', symbol };
  }

  #linkAnnotation(syntax: AnnotationSyntax, subject: string): TypeAnnotation | null {
    switch (syntax.kind) {
      case 'primitive':
      case 'name':
        return this.#linkAtomic(syntax, subject);
      case 'list': {
        const items = this.#linkAtomic(syntax.items, subject);
        return items === null ? null : { kind: 'list', items };
      }
      case 'optional': {
        const inner = syntax.value;
        if (inner.kind === 'list') {
          const items = this.#linkAtomic(inner.items, subject);
          return items === null ? null : { kind: 'optional', value: { kind: 'list', items } };
        }
        const value = this.#linkAtomic(inner, subject);
        return value === null ? null : { kind: 'optional', value };
      }
      default: {
        const exhaustive: never = syntax;
        return exhaustive;
      }
    }
  }

  #constructorArguments(cls: ClassDraft): Argument[] {
    const rawArguments = this.#rawClasses.get(cls.name)?.constructorArguments;
    if (rawArguments === undefined) {
      return cls.properties.map((p) => ({ name: p.name, type: p.type, default: null }));
    }

    const args: Argument[] = [];
    for (const rawArgument of rawArguments) {
      const subject = `${cls.name}(${rawArgument.name})`;
      if (args.some((a) => a.name === rawArgument.name)) {
        this.#report(DIAGNOSTIC_CODES.DUPLICATE_NAME, subject, 'Argument is defined more than once');
        continue;
      }
      const type = this.#resolveAnnotation(rawArgument.type, subject);
      args.push({
        name: rawArgument.name,
        type,
        default: this.#resolveDefault(rawArgument.default, type, subject),
      });
    }

    const propertyNames = new Set(cls.properties.map((p) => p.name));
    const argumentNames = new Set(args.map((a) => a.name));
    const missing = [...propertyNames].filter((n) => !argumentNames.has(n));
    const unexpected = [...argumentNames].filter((n) => !propertyNames.has(n));
    if (missing.length > 0 || unexpected.length > 0) {
      const parts: string[] = [];
      if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
      if (unexpected.length > 0) parts.push(`unexpected ${unexpected.join(', ')}`);
      this.#report(
        DIAGNOSTIC_CODES.CONSTRUCTOR_MISMATCH,
        cls.name,
        `Constructor arguments do not match the properties: ${parts.join('; ')}`
      );
    }
    return args;
  }

  #resolveDefault(
    value: boolean | number | string | null | undefined,
    type: TypeAnnotation,
    subject: string
  ): DefaultValue | null {
    if (value === undefined) return null;
    const invalid = (message: string): null => {
      this.#report(DIAGNOSTIC_CODES.INVALID_DEFAULT, subject, message);
      return null;
    };
    if (value === null) {
      return type.kind === 'optional'
        ? null
        : invalid('Only optional arguments can default to null');
    }

    const base = type.kind === 'optional' ? type.value : type;
    if (base.kind === 'list') {
      return invalid('List arguments can not have a default');
    }
    if (base.kind === 'named' && base.symbol.kind === 'enumeration') {
      const enumeration = base.symbol;
      const literal = enumeration.literals.find((l) => l.name === value);
      return literal === undefined
        ? invalid(`${JSON.stringify(value)} is not a literal of "${enumeration.name}"`)
        : { kind: 'enumerationLiteral', enumeration, literal };
    }
    const primitive =
      base.kind === 'primitive'
        ? base.primitive
        : base.symbol.kind === 'constrainedPrimitive'
          ? base.symbol.constrainee
          : null;

    const accepted =
      (primitive === 'bool' && typeof value === 'boolean') ||
      (primitive === 'int' && typeof value === 'number' && Number.isSafeInteger(value)) ||
      (primitive === 'float' && typeof value === 'number') ||
      (primitive === 'str' && typeof value === 'string');
    return accepted
      ? { kind: 'constant', value }
      : invalid(`Default ${JSON.stringify(value)} does not fit the argument type`);
  }

  #synthesizeInterfaces(): Interface[] {
    const interfaces: Interface[] = [];
    for (const cls of this.#classes) {
      const members = new Set<Class>([cls, ...cls.descendants]);
      const implementers = this.#classes.filter(
        (c): c is Mutable<ConcreteClass> => c.kind === 'concreteClass' && members.has(c)
      );
      if (cls.kind === 'abstractClass' && implementers.length === 0) {
        this.#report(
          DIAGNOSTIC_CODES.NO_IMPLEMENTERS,
          cls.name,
          `Abstract class "${cls.name}" has no concrete descendants`
        );
      }
      if (cls.descendants.length === 0) continue;

      const interfaceName = `I${capitalCamelCase(cls.name)}`;
      const clash = this.#casedNames.get(interfaceName);
      if (clash !== undefined) {
        this.#report(
          DIAGNOSTIC_CODES.DUPLICATE_NAME,
          clash,
          `Type "${clash}" clashes with the interface of "${cls.name}"`
        );
      }
      const iface: Interface = { name: cls.name, base: cls, implementers };
      cls.interface = iface;
      interfaces.push(iface);
      for (const implementer of implementers) {
        implementer.serialization = { withModelType: true };
      }
    }
    return interfaces;
  }

  #checkJsonNames(): void {
    for (const cls of this.#classes) {
      const seen = new Map<string, Property>();
      for (const property of cls.properties) {
        const subject = `${property.specifiedFor.name}.${property.name}`;
        const jsonName = jsonProperty(property.name);
        if (jsonName === this.discriminatorKey) {
          this.#report(
            DIAGNOSTIC_CODES.JSON_NAME_COLLISION,
            subject,
            `JSON name "${jsonName}" is reserved for the discriminator`
          );
          continue;
        }
        const other = seen.get(jsonName);
        if (other !== undefined) {
          this.#report(
            DIAGNOSTIC_CODES.JSON_NAME_COLLISION,
            `${cls.name}.${property.name}`,
            `JSON name "${jsonName}" is also used by "${other.name}"`
          );
        } else {
          seen.set(jsonName, property);
        }
      }
    }
  }

  #lookup(context: ClassDraft | null): ReferenceLookup {
    return (role: ReferenceRole, target: string): Inline | null => {
      if (role === 'class') {
        const symbol = this.#symbols.get(target);
        return symbol === undefined ? null : { kind: 'typeRef', symbol };
      }
      const dot = target.indexOf('.');
      const owner =
        dot < 0 ? context : this.#classDraft(target.slice(0, dot)) ?? null;
      const propertyName = dot < 0 ? target : target.slice(dot + 1);
      const property = owner?.properties.find((p) => p.name === propertyName);
      return owner === null || property === undefined
        ? null
        : { kind: 'propertyRef', owner, property };
    };
  }

  #describe(
    text: string | undefined,
    subject: string,
    context: ClassDraft | null
  ): Description | null {
    const { description, unresolved } = parseDescription(text, this.#lookup(context));
    for (const reference of unresolved) {
      this.#report(
        DIAGNOSTIC_CODES.UNRESOLVED_REFERENCE,
        subject,
        `Unresolved reference ${reference}`
      );
    }
    return description;
  }

  #resolveDescriptions(): Description | null {
    for (const rawType of this.raw.types) {
      switch (rawType.kind) {
        case 'enumeration': {
          const draft = this.#enumerations.get(rawType.name);
          if (draft === undefined) break;
          draft.symbol.description = this.#describe(rawType.description, rawType.name, null);
          for (const literal of draft.literals) {
            literal.description = this.#describe(
              rawType.literals.find((l) => l.name === literal.name)?.description,
              `${rawType.name}.${literal.name}`,
              null
            );
          }
          break;
        }
        case 'constrainedPrimitive': {
          const draft = this.#primitives.get(rawType.name);
          if (draft === undefined) break;
          draft.description = this.#describe(rawType.description, rawType.name, null);
          break;
        }
        case 'abstractClass':
        case 'concreteClass': {
          const cls = this.#classDraft(rawType.name);
          if (cls === undefined) break;
          cls.description = this.#describe(rawType.description, cls.name, cls);
          for (const property of this.#ownProperties.get(cls.name) ?? []) {
            property.description = this.#describe(
              rawType.properties?.find((p) => p.name === property.name)?.description,
              `${cls.name}.${property.name}`,
              cls
            );
          }
          break;
        }
        default: {
          const exhaustive: never = rawType;
          return exhaustive;
        }
      }
    }
    return this.#describe(this.raw.description, this.raw.name, null);
  }
}
