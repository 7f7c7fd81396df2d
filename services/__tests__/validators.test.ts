import { describe, test, expect } from 'vitest';
import { isValidColor, validateCanvasDocument, DEFAULT_VALIDATOR_OPTIONS } from '../validators';
import { CanvasDocumentSchema } from '../../types/canvasTypes';
import { cleanLayout, makeDocument, SQUARE, textbox } from './fixtures';

const codes = (doc: ReturnType<typeof makeDocument>) =>
  validateCanvasDocument(doc, SQUARE).violations.map(v => [v.code, v.path]);

describe('validateCanvasDocument', () => {
  test('accepts a clean layout', () => {
    expect(validateCanvasDocument(cleanLayout(), SQUARE)).toEqual({ ok: true, violations: [] });
  });

  test('is pure and repeatable', () => {
    const doc = cleanLayout();
    const before = JSON.stringify(doc);
    const first = validateCanvasDocument(doc, SQUARE);
    const second = validateCanvasDocument(doc, SQUARE);
    expect(second).toEqual(first);
    expect(JSON.stringify(doc)).toBe(before);
  });

  describe('structure', () => {
    test('reports missing top-level fields', () => {
      const doc = CanvasDocumentSchema.parse({ objects: [] });
      expect(codes(doc)).toEqual([
        ['MISSING_FIELD', '$.version'],
        ['MISSING_FIELD', '$.width'],
        ['MISSING_FIELD', '$.height']
      ]);
    });

    test('reports a declared size that differs from the canvas', () => {
      const [violation] = validateCanvasDocument(makeDocument([], { width: 1920 }), SQUARE).violations;
      expect(violation).toEqual({
        category: 'structure',
        code: 'CANVAS_MISMATCH',
        path: '$.width',
        message: 'Declared width 1920 does not match canvas width 1080.'
      });
    });
  });

  describe('boundary', () => {
    test('reports negative offsets apart from overflow', () => {
      const doc = makeDocument([{ type: 'rect', left: -10, top: 1000, width: 1200, height: 100 }]);
      expect(codes(doc)).toEqual([
        ['NEGATIVE_OFFSET', '$.objects[0]'],
        ['OVERFLOW_RIGHT', '$.objects[0]'],
        ['OVERFLOW_BOTTOM', '$.objects[0]']
      ]);
    });

    test('measures group children at their absolute position', () => {
      const doc = makeDocument([{
        type: 'group', left: 1000, top: 0, width: 80, height: 80,
        objects: [{ type: 'rect', left: 70, top: 0, width: 20, height: 20 }]
      }]);
      expect(codes(doc)).toEqual([['OVERFLOW_RIGHT', '$.objects[0].objects[0]']]);
    });

    test('uses estimated text height over a zero declared height', () => {
      const doc = makeDocument([textbox(1000, 'A\nB', { height: 0 })]);
      expect(codes(doc)).toEqual([['OVERFLOW_BOTTOM', '$.objects[0]']]);
    });
  });

  describe('gradient', () => {
    test('flags keyed colorStops', () => {
      const doc = makeDocument([{
        type: 'rect', width: 100, height: 100,
        fill: { type: 'linear', colorStops: { '0': '#FFFFFF', '1': '#000000' } }
      }]);
      const report = validateCanvasDocument(doc, SQUARE);
      expect(report.violations).toHaveLength(1);
      expect(report.violations[0]).toMatchObject({ category: 'gradient', code: 'GRADIENT_KEYED_STOPS', path: '$.objects[0].fill' });
    });

    test('flags stops missing offset or color', () => {
      const doc = makeDocument([{
        type: 'rect', width: 100, height: 100,
        fill: { type: 'radial', colorStops: [{ offset: 0, color: '#FFFFFF' }, { color: '#000000' }] }
      }]);
      expect(codes(doc)).toEqual([['GRADIENT_STOP_INCOMPLETE', '$.objects[0].fill']]);
    });
  });

  test('flags legacy text kinds', () => {
    const doc = makeDocument([{ type: 'i-text', left: 10, top: 10, width: 200, text: 'Hello' }]);
    const [violation] = validateCanvasDocument(doc, SQUARE).violations;
    expect(violation).toMatchObject({ category: 'text-type', code: 'LEGACY_TEXT', path: '$.objects[0]' });
  });

  describe('color', () => {
    test('accepts #RRGGBB and rgba() only', () => {
      expect(isValidColor('#A1B2C3')).toBe(true);
      expect(isValidColor('rgba(255, 255, 255, 0.5)')).toBe(true);
      expect(isValidColor('rgba(0,0,0)')).toBe(true);
      expect(isValidColor('#abc')).toBe(false);
      expect(isValidColor('blue')).toBe(false);
    });

    test('checks flat paints and gradient stop colors', () => {
      const doc = makeDocument([
        { type: 'rect', left: 0, top: 0, width: 100, height: 100, fill: 'red' },
        {
          type: 'rect', left: 300, top: 0, width: 100, height: 100,
          fill: { type: 'linear', colorStops: [{ offset: 0, color: '#FFFFFF' }, { offset: 1, color: 'black' }] }
        }
      ]);
      expect(codes(doc)).toEqual([
        ['INVALID_COLOR', '$.objects[0].fill'],
        ['INVALID_COLOR', '$.objects[1].fill.colorStops[1]']
      ]);
    });
  });

  describe('overlap', () => {
    test('reports overlapping textboxes once', () => {
      const doc = makeDocument([textbox(100, 'First'), textbox(120, 'Second')]);
      expect(codes(doc)).toEqual([['ELEMENT_OVERLAP', '$.objects[1]']]);
    });

    test('reports stacked captions closer than the text gap', () => {
      const doc = makeDocument([textbox(100, 'First'), textbox(170, 'Second', { left: 600 })]);
      const [violation] = validateCanvasDocument(doc, SQUARE).violations;
      expect(violation).toEqual({
        category: 'overlap',
        code: 'TEXT_GAP',
        path: '$.objects[1]',
        message: 'Textbox at $.objects[1] sits 22px below $.objects[0]; minimum gap is 30px.'
      });
    });

    test('allows text over images in either stacking order by default', () => {
      const doc = makeDocument([
        textbox(100, 'Caption'),
        { type: 'image', left: 0, top: 0, width: 600, height: 600 }
      ]);
      expect(validateCanvasDocument(doc, SQUARE).ok).toBe(true);
    });

    test('respects z-order when the policy asks for it', () => {
      const doc = makeDocument([
        textbox(100, 'Caption'),
        { type: 'image', left: 0, top: 0, width: 600, height: 600 }
      ]);
      const options = {
        ...DEFAULT_VALIDATOR_OPTIONS,
        overlapPolicy: { ...DEFAULT_VALIDATOR_OPTIONS.overlapPolicy, respectZOrder: true }
      };
      const report = validateCanvasDocument(doc, SQUARE, options);
      expect(report.violations.map(v => [v.code, v.path])).toEqual([['ELEMENT_OVERLAP', '$.objects[1]']]);
    });
  });
});
