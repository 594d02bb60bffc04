import { docComment } from '../../util/text.js';
import type { EmitContext, GenerationResult } from '../context.js';
import { generateJsonization } from './jsonization.js';
import { generateStructure } from './structure.js';

export function bannerComment(banner: readonly string[]): string {
  return banner.length > 0 ? docComment([banner.join('\n')]) : '';
}

/**
 * Generate `types.ts` and `jsonization.ts`
 */
export function generateTypeScript(ctx: EmitContext): GenerationResult {
  const header = bannerComment(ctx.options.emit.banner);
  return ctx.finish([
    { path: 'types.ts', content: generateStructure(ctx, header) },
    { path: 'jsonization.ts', content: generateJsonization(ctx, header) },
  ]);
}
