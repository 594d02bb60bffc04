/**
 * Identifier conventions
 *
 * Model identifiers are snake_case words (`URL_to_something`); a word that
 * starts with a capital letter is taken as an abbreviation and left as-is.
 */

const RESERVED_WORDS = new Set([
  'break',
  'case',
  'catch',
  'class',
  'const',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'export',
  'extends',
  'false',
  'finally',
  'for',
  'function',
  'if',
  'import',
  'in',
  'instanceof',
  'new',
  'null',
  'return',
  'super',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'var',
  'void',
  'while',
  'with',
  'yield',
  'let',
  'static',
  'implements',
  'interface',
  'package',
  'private',
  'protected',
  'public',
  'await',
]);

function words(identifier: string): string[] {
  return identifier.split('_').filter((part) => part.length > 0);
}

function capitalizeOrLeaveAbbreviation(word: string): string {
  const first = word.charAt(0);
  if (first !== first.toLowerCase() || !/[a-z]/.test(first)) {
    return word;
  }
  return first.toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * `URL_to_something` → `URLToSomething`
 */
export function capitalCamelCase(identifier: string): string {
  return words(identifier).map(capitalizeOrLeaveAbbreviation).join('');
}

/**
 * `URL_to_something` → `urlToSomething`, `something_to_URL` → `somethingToURL`
 */
export function lowerCamelCase(identifier: string): string {
  const [head, ...rest] = words(identifier);
  if (head === undefined) {
    throw new Error(`Expected a non-empty identifier, got ${JSON.stringify(identifier)}`);
  }
  return head.toLowerCase() + rest.map(capitalizeOrLeaveAbbreviation).join('');
}

/** Wire name of a property or constructor argument */
export function jsonProperty(identifier: string): string {
  return lowerCamelCase(identifier);
}

/** Discriminator value of a concrete class */
export function jsonModelType(identifier: string): string {
  return capitalCamelCase(identifier);
}

/** Identifiers for the TypeScript target */
export const tsNaming = {
  className(identifier: string): string {
    return capitalCamelCase(identifier);
  },

  interfaceName(identifier: string): string {
    return `I${capitalCamelCase(identifier)}`;
  },

  enumName(identifier: string): string {
    return capitalCamelCase(identifier);
  },

  enumLiteralName(identifier: string): string {
    return capitalCamelCase(identifier);
  },

  propertyName(identifier: string): string {
    return escapeReserved(lowerCamelCase(identifier));
  },

  variableName(identifier: string): string {
    return escapeReserved(lowerCamelCase(identifier));
  },

  functionName(identifier: string): string {
    return escapeReserved(lowerCamelCase(identifier));
  },
};

function escapeReserved(name: string): string {
  return RESERVED_WORDS.has(name) ? `${name}_` : name;
}

/** Anchor used to link into rendered documentation */
export function anchorOf(...parts: string[]): string {
  return parts
    .join('-')
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
