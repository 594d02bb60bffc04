/**
 * Error paths for deserialization failures
 *
 * An error path is created where a value first fails to parse and grows
 * by one segment per enclosing property or list frame while the failure
 * travels back to the caller. Values are immutable: every prepend returns
 * a new path, so nested routines never share an accumulator.
 */

export interface NameSegment {
  readonly kind: 'name';
  readonly name: string;
}

export interface IndexSegment {
  readonly kind: 'index';
  readonly index: number;
}

export type Segment = NameSegment | IndexSegment;

export interface ErrorPath {
  /** Segments ordered from the document root to the failing value */
  readonly segments: readonly Segment[];
  /** Human-readable reason of the failure */
  readonly cause: string;
}

export function newError(cause: string): ErrorPath {
  return { segments: [], cause };
}

export function prependName(error: ErrorPath, name: string): ErrorPath {
  return {
    segments: [{ kind: 'name', name }, ...error.segments],
    cause: error.cause,
  };
}

export function prependIndex(error: ErrorPath, index: number): ErrorPath {
  return {
    segments: [{ kind: 'index', index }, ...error.segments],
    cause: error.cause,
  };
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Render the segments as a JSON path rooted at `$`, e.g. `$.items[2].name`.
 * Names that are not plain identifiers use the bracket notation.
 */
export function toPathString(error: ErrorPath): string {
  const parts: string[] = ['$'];
  for (const segment of error.segments) {
    switch (segment.kind) {
      case 'name':
        parts.push(
          IDENTIFIER_RE.test(segment.name)
            ? `.${segment.name}`
            : `[${JSON.stringify(segment.name)}]`
        );
        break;
      case 'index':
        parts.push(`[${segment.index}]`);
        break;
      default: {
        const unexpected: never = segment;
        throw new Error(`Unexpected segment: ${JSON.stringify(unexpected)}`);
      }
    }
  }
  return parts.join('');
}
