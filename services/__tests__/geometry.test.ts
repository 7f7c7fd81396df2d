import { describe, test, expect } from 'vitest';
import { fitFontSizeToHeight, lineCount, shrinkFontSize, textBlockHeight } from '../TextFitter';
import { boundingBox, effectiveHeight, effectiveWidth, paddedBoxesIntersect } from '../geometry';
import { makeDocument, textbox } from './fixtures';

describe('TextFitter', () => {
  test('counts explicit line breaks only', () => {
    expect(lineCount('')).toBe(1);
    expect(lineCount('single line that is quite long')).toBe(1);
    expect(lineCount('A\nB\r\nC')).toBe(3);
  });

  test('estimates block height from font size, line height and lines', () => {
    expect(textBlockHeight('A\nB', 40, 1.2)).toBe(96);
  });

  test('shrinks by factor and clamps at the floor', () => {
    expect(shrinkFontSize(40, 0.8, 24)).toBe(32);
    expect(shrinkFontSize(26, 0.8, 24)).toBe(24);
    expect(shrinkFontSize(20, 0.8, 24)).toBe(20);
  });

  test('fits a font size to a height budget', () => {
    expect(fitFontSizeToHeight('A\nB', 1.2, 1080)).toBe(450);
    expect(fitFontSizeToHeight('A\nB\nC', 1.2, 100)).toBe(27.77);
    expect(fitFontSizeToHeight('A', 1.2, 0)).toBe(0);
  });
});

describe('geometry', () => {
  const [caption, rect] = makeDocument([
    textbox(100, 'A\nB', { height: 0 }),
    { type: 'rect', left: 10, top: 20, width: 100, height: 50, scaleX: 2, scaleY: 0.5 }
  ]).objects;

  test('text is never shorter than its estimated block', () => {
    expect(effectiveHeight(caption)).toBe(96);
  });

  test('applies scale to declared size', () => {
    expect(effectiveWidth(rect)).toBe(200);
    expect(effectiveHeight(rect)).toBe(25);
  });

  test('offsets boxes by the enclosing group', () => {
    expect(boundingBox(rect, 100, 200)).toEqual({ left: 110, top: 220, right: 310, bottom: 245 });
  });

  test('padded intersection honours the clearance', () => {
    const a = { left: 0, top: 0, right: 100, bottom: 100 };
    const b = { left: 110, top: 0, right: 200, bottom: 100 };
    expect(paddedBoxesIntersect(a, b, 20)).toBe(true);
    expect(paddedBoxesIntersect(a, b, 5)).toBe(false);
  });
});
