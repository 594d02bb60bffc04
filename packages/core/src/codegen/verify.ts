import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import {
  annotationsEqual,
  annotationToString,
  classesOf,
  propertyOf,
} from '../model/types.js';
import type { EmitContext } from './context.js';

/**
 * Check that every constructor argument can be assigned to its property:
 * the types must be equal, or the argument is the optional version of the
 * property type and has a default to fall back to.
 */
export function verifyConstructors(ctx: EmitContext): void {
  for (const cls of classesOf(ctx.table)) {
    for (const arg of cls.arguments) {
      const property = propertyOf(cls, arg.name);
      if (property === undefined) continue;
      if (annotationsEqual(arg.type, property.type)) continue;

      const fallsBackToDefault =
        arg.type.kind === 'optional' &&
        annotationsEqual(arg.type.value, property.type) &&
        arg.default !== null;
      if (fallsBackToDefault) continue;

      const hint =
        arg.type.kind === 'optional' &&
        annotationsEqual(arg.type.value, property.type)
          ? ' (an optional argument of a required property needs a default)'
          : '';
      ctx.report(
        DIAGNOSTIC_CODES.ARGUMENT_TYPE_MISMATCH,
        `${cls.name}(${arg.name})`,
        `Argument type ${annotationToString(arg.type)} does not match the property type ${annotationToString(property.type)}${hint}`
      );
    }
  }
}
