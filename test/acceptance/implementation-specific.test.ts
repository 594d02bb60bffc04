import { fileURLToPath } from 'node:url';
import { beforeAll, describe, expect, it } from 'vitest';

import {
  CORE_EMITTERS,
  generateFromDocument,
  loadSnippets,
  snippetKeys,
  type Snippets,
} from '../../packages/core/src/index.js';
import {
  enumLiteral,
  exportedClass,
  exportedFunction,
  generateTypeScriptFiles,
  loadCodec,
  readFixture,
  thrownBy,
  type GeneratedCodec,
} from '../helpers/generated-module.js';

const SNIPPETS_DIR = fileURLToPath(new URL('../fixtures/snippets', import.meta.url));

describe('Acceptance: implementation-specific classes', () => {
  let snippets: Snippets;
  let codec: GeneratedCodec;

  beforeAll(async () => {
    snippets = await loadSnippets(SNIPPETS_DIR);
    codec = loadCodec(generateTypeScriptFiles(readFixture('events.model.json'), {}, snippets));
  });

  it('loads snippets under their relative POSIX paths', () => {
    expect([...snippets.keys()]).toEqual([
      'jsonization/parse/Timestamp.ts',
      'jsonization/transform/Timestamp.ts',
      'types/Timestamp.ts',
    ]);
  });

  it('places the hand-written class in types.ts', () => {
    const types = codec.files.get('types.ts') ?? '';
    expect(types).toContain('export class Timestamp implements IClass {\n  constructor(readonly epochSeconds: bigint) {}');
  });

  it('round-trips through the hand-written codec', () => {
    const parseEvent = exportedFunction(codec.jsonization, 'eventFromJsonable');
    const toJsonable = exportedFunction(codec.jsonization, 'toJsonable');
    const json = { name: 'deploy', at: { epochSeconds: 1700000000 }, severity: 'high', retries: 0 };

    const event = parseEvent(json);
    expect(event).toEqual({
      name: 'deploy',
      at: { epochSeconds: 1700000000n },
      severity: enumLiteral(codec.types, 'Severity', 'High'),
      retries: 0n,
    });
    expect(JSON.stringify(toJsonable(event))).toBe(JSON.stringify(json));
  });

  it('applies constructor defaults to absent optional arguments', () => {
    const parseEvent = exportedFunction(codec.jsonization, 'eventFromJsonable');
    const event = parseEvent({ name: 'deploy', at: { epochSeconds: 1 }, severity: null });
    expect(event).toEqual({
      name: 'deploy',
      at: { epochSeconds: 1n },
      severity: enumLiteral(codec.types, 'Severity', 'Low'),
      retries: 3n,
    });
  });

  it('extends the error path reported by the snippet', () => {
    const parseEvent = exportedFunction(codec.jsonization, 'eventFromJsonable');
    const error = thrownBy(() => parseEvent({ name: 'deploy', at: { epochSeconds: 'soon' } }));
    expect(error).toMatchObject({
      reason: 'Expected a 64-bit integer, but got string',
      path: '$.at.epochSeconds',
    });
  });

  it('serializes constructed instances through the hand-written transform', () => {
    const Event = exportedClass(codec.types, 'Event');
    const Timestamp = exportedClass(codec.types, 'Timestamp');
    const toJsonable = exportedFunction(codec.jsonization, 'toJsonable');
    expect(toJsonable(Event('backup', Timestamp(60n)))).toEqual({
      name: 'backup',
      at: { epochSeconds: 60 },
      severity: 'low',
      retries: 3,
    });
  });

  it('reports every missing snippet in one run and produces no files', () => {
    const partial = new Map(snippets);
    partial.delete(snippetKeys.parse('Timestamp'));
    partial.delete(snippetKeys.transform('Timestamp'));

    const result = generateFromDocument(
      readFixture('events.model.json'),
      CORE_EMITTERS.typescript,
      {},
      partial
    );
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual([
        'MISSING_SNIPPET Timestamp: The snippet "jsonization/parse/Timestamp.ts" is missing',
        'MISSING_SNIPPET Timestamp: The snippet "jsonization/transform/Timestamp.ts" is missing',
      ]);
    }
  });
});
