import { beforeAll, describe, expect, it } from 'vitest';

import { DeserializationError, LossyIntegerError } from '../../packages/runtime/src/index.js';
import {
  compileCodec,
  enumLiteral,
  exportedClass,
  exportedFunction,
  readFixture,
  thrownBy,
  type GeneratedCodec,
} from '../helpers/generated-module.js';

// Keys in serialization order, so that the JSON text itself can be compared
const CANVAS = {
  title: 'Sketch',
  visible: true,
  shapes: [
    { color: 'red', center: { x: 1, y: 2 }, radius: 0.5, modelType: 'Circle' },
    {
      color: 'dark-blue',
      label: 'triangle',
      corners: [
        { x: 0, y: 0 },
        { x: 4, y: 0 },
        { x: 0, y: 3 },
      ],
      modelType: 'Polygon',
    },
  ],
  thumbnail: 'AQID',
  urlOfSource: 'https://example.com/sketch',
};

function canvasWith(patch: Record<string, unknown>): Record<string, unknown> {
  return { ...CANVAS, ...patch };
}

function without(key: string): Record<string, unknown> {
  return Object.fromEntries(Object.entries(CANVAS).filter(([k]) => k !== key));
}

describe('Acceptance: polymorphic drawing model', () => {
  let codec: GeneratedCodec;
  let parseCanvas: (node: unknown) => unknown;
  let parseShape: (node: unknown) => unknown;
  let toJsonable: (value: unknown) => unknown;

  beforeAll(() => {
    codec = compileCodec(readFixture('drawing.model.json'));
    parseCanvas = exportedFunction(codec.jsonization, 'canvasFromJsonable');
    parseShape = exportedFunction(codec.jsonization, 'iShapeFromJsonable');
    toJsonable = exportedFunction(codec.jsonization, 'toJsonable');
  });

  describe('round trip', () => {
    it('serializes a parsed canvas to the same JSON text', () => {
      const canvas = parseCanvas(CANVAS);
      expect(JSON.stringify(toJsonable(canvas))).toBe(JSON.stringify(CANVAS));
    });

    it('decodes every field into its in-memory representation', () => {
      const canvas = parseCanvas(CANVAS);
      const red = enumLiteral(codec.types, 'Color', 'Red');
      const darkBlue = enumLiteral(codec.types, 'Color', 'DarkBlue');
      expect(canvas).toEqual({
        title: 'Sketch',
        visible: true,
        shapes: [
          { color: red, label: null, center: { x: 1n, y: 2n }, radius: 0.5 },
          {
            color: darkBlue,
            label: 'triangle',
            corners: [
              { x: 0n, y: 0n },
              { x: 4n, y: 0n },
              { x: 0n, y: 3n },
            ],
          },
        ],
        highlight: null,
        thumbnail: new Uint8Array([1, 2, 3]),
        tags: null,
        urlOfSource: 'https://example.com/sketch',
      });
    });

    it('parses constructed instances back to equal values', () => {
      const Point = exportedClass(codec.types, 'Point');
      const Circle = exportedClass(codec.types, 'Circle');
      const Canvas = exportedClass(codec.types, 'Canvas');
      const red = enumLiteral(codec.types, 'Color', 'Red');

      const circle = Circle(red, 'dot', Point(-5n, 7n), 1.25);
      const canvas = Canvas('Empty', false, [], circle, null, ['a', 'b']);

      expect(parseCanvas(toJsonable(canvas))).toEqual(canvas);
    });
  });

  describe('discriminator dispatch', () => {
    it('dispatches each implementer to its own parser', () => {
      const [circle, polygon] = CANVAS.shapes;

      expect(parseShape(circle)).toBeInstanceOf(codec.types['Circle']);
      expect(parseShape(polygon)).toBeInstanceOf(codec.types['Polygon']);
    });

    it('names the interface and the unknown model type', () => {
      const error = thrownBy(() => parseShape({ color: 'red', modelType: 'Triangle' }));
      expect(error).toBeInstanceOf(DeserializationError);
      expect(error).toMatchObject({
        reason: 'Unexpected model type for IShape: Triangle',
        path: '$',
      });
    });

    it('reports a missing model type', () => {
      expect(thrownBy(() => parseShape({ color: 'red' }))).toMatchObject({
        reason: 'Expected a model type, but none is present',
      });
    });

    it('treats a null model type as missing', () => {
      expect(thrownBy(() => parseShape({ modelType: null }))).toMatchObject({
        reason: 'Expected a model type, but none is present',
      });
    });

    it('reports a model type that is not a string', () => {
      expect(thrownBy(() => parseShape({ modelType: 5 }))).toMatchObject({
        reason: 'Expected the model type to be a string, but got number',
      });
    });

    it('reports a node that is not an object', () => {
      expect(thrownBy(() => parseShape('Circle'))).toMatchObject({
        reason: 'Expected an object, but got string',
      });
    });

    it('writes the discriminator only for polymorphic classes', () => {
      const Point = exportedClass(codec.types, 'Point');
      const Circle = exportedClass(codec.types, 'Circle');
      const red = enumLiteral(codec.types, 'Color', 'Red');

      expect(toJsonable(Point(1n, 2n))).toEqual({ x: 1, y: 2 });
      expect(toJsonable(Circle(red, null, Point(1n, 2n), 3))).toEqual({
        color: 'red',
        center: { x: 1, y: 2 },
        radius: 3,
        modelType: 'Circle',
      });
    });

    it('rejects the discriminator on a class outside any hierarchy', () => {
      const parsePoint = exportedFunction(codec.jsonization, 'pointFromJsonable');
      expect(thrownBy(() => parsePoint({ x: 1, y: 2, modelType: 'Point' }))).toMatchObject({
        reason: 'Unexpected property: modelType',
      });
    });
  });

  describe('unknown keys', () => {
    it('rejects an extra key even when every known key is valid', () => {
      expect(thrownBy(() => parseCanvas(canvasWith({ author: 'someone' })))).toMatchObject({
        reason: 'Unexpected property: author',
        path: '$',
      });
    });

    it('rejects an extra key inside a nested object', () => {
      const shapes = [{ ...CANVAS.shapes[0], z: 1 }];
      expect(thrownBy(() => parseCanvas(canvasWith({ shapes })))).toMatchObject({
        reason: 'Unexpected property: z',
        path: '$.shapes[0]',
      });
    });

    it('rejects internal identifiers in place of wire names', () => {
      expect(
        thrownBy(() => parseCanvas(canvasWith({ URL_of_source: 'https://example.com' })))
      ).toMatchObject({ reason: 'Unexpected property: URL_of_source' });
    });
  });

  describe('required fields', () => {
    it.each(['title', 'visible', 'shapes'])('names %s when it is omitted', (key) => {
      expect(thrownBy(() => parseCanvas(without(key)))).toMatchObject({
        reason: `Required property "${key}" is missing`,
        path: '$',
      });
    });

    it('reports the first missing argument in constructor order', () => {
      expect(thrownBy(() => parseCanvas({ shapes: [] }))).toMatchObject({
        reason: 'Required property "title" is missing',
      });
    });
  });

  describe('list index attribution', () => {
    it('locates a malformed element by field and index', () => {
      const polygon = {
        color: 'red',
        corners: [
          { x: 0, y: 0 },
          { x: 1, y: 1 },
          { x: 'three', y: 0 },
        ],
        modelType: 'Polygon',
      };
      const error = thrownBy(() => parseCanvas(canvasWith({ shapes: [CANVAS.shapes[0], polygon] })));
      expect(error).toMatchObject({
        reason: 'Expected a 64-bit integer, but got string',
        path: '$.shapes[1].corners[2].x',
        message: 'Expected a 64-bit integer, but got string at: $.shapes[1].corners[2].x',
      });
    });

    it('rejects a null element', () => {
      expect(thrownBy(() => parseCanvas(canvasWith({ shapes: [null] })))).toMatchObject({
        reason: 'Expected a non-null item, but got a null',
        path: '$.shapes[0]',
      });
    });

    it('rejects a list property that is not an array', () => {
      expect(thrownBy(() => parseCanvas(canvasWith({ tags: 'a,b' })))).toMatchObject({
        reason: 'Expected an array, but got string',
        path: '$.tags',
      });
    });

    it('locates a malformed primitive item', () => {
      expect(thrownBy(() => parseCanvas(canvasWith({ tags: ['a', 2] })))).toMatchObject({
        reason: 'Expected a string, but got number',
        path: '$.tags[1]',
      });
    });
  });

  describe('null versus absent', () => {
    it('parses an explicit null optional like an omitted one', () => {
      const withNull = parseCanvas(canvasWith({ highlight: null, tags: null }));
      const omitted = parseCanvas(CANVAS);
      expect(withNull).toEqual(omitted);
    });

    it('fails identically for a null and an omitted required field', () => {
      const withNull = thrownBy(() => parseCanvas(canvasWith({ title: null })));
      const omitted = thrownBy(() => parseCanvas(without('title')));
      expect(withNull).toMatchObject({ reason: 'Required property "title" is missing', path: '$' });
      expect(omitted).toMatchObject({ reason: 'Required property "title" is missing', path: '$' });
    });
  });

  describe('optional omission', () => {
    it('never writes an absent optional, not even as null', () => {
      const Canvas = exportedClass(codec.types, 'Canvas');
      const serialized = toJsonable(Canvas('Blank', true, []));
      expect(JSON.stringify(serialized)).toBe('{"title":"Blank","visible":true,"shapes":[]}');
    });
  });

  describe('primitives', () => {
    it('rejects an unknown enumeration string', () => {
      const shapes = [{ ...CANVAS.shapes[0], color: 'blue' }];
      expect(thrownBy(() => parseCanvas(canvasWith({ shapes })))).toMatchObject({
        reason: 'Not a valid JSON representation of Color: "blue"',
        path: '$.shapes[0].color',
      });
    });

    it('rejects bytes that are not standard Base64', () => {
      expect(thrownBy(() => parseCanvas(canvasWith({ thumbnail: 'AQI' })))).toMatchObject({
        reason: 'Expected Base64-encoded bytes, but the decoding failed',
        path: '$.thumbnail',
      });
    });

    it('rejects a fractional integer', () => {
      const shapes = [{ ...CANVAS.shapes[0], center: { x: 1.5, y: 0 } }];
      expect(thrownBy(() => parseCanvas(canvasWith({ shapes })))).toMatchObject({
        reason: 'Expected a 64-bit integer, but the conversion failed from 1.5',
        path: '$.shapes[0].center.x',
      });
    });

    it('refuses to serialize an integer a double can not hold', () => {
      const Point = exportedClass(codec.types, 'Point');
      expect(() => toJsonable(Point(2n ** 60n + 1n, 0n))).toThrow(LossyIntegerError);
    });

    it('round-trips an enumeration literal through its own facade', () => {
      const parseColor = exportedFunction(codec.jsonization, 'colorFromJsonable');
      const colorToJsonable = exportedFunction(codec.jsonization, 'colorToJsonable');
      expect(colorToJsonable(parseColor('dark-blue'))).toBe('dark-blue');
    });
  });
});
