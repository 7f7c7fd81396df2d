import { CanvasDocumentSchema, type Canvas, type CanvasDocument } from '../../types/canvasTypes';

export const SQUARE: Canvas = { width: 1080, height: 1080 };

/** Decodes a raw document so schema defaults (scale, fontSize, ...) are applied. */
export const makeDocument = (objects: unknown[], overrides: Record<string, unknown> = {}): CanvasDocument =>
  CanvasDocumentSchema.parse({ version: '4.6.0', width: 1080, height: 1080, objects, ...overrides });

export const textbox = (top: number, text: string, extra: Record<string, unknown> = {}) => ({
  type: 'textbox',
  left: 60,
  top,
  width: 400,
  text,
  fontSize: 40,
  lineHeight: 1.2,
  ...extra
});

/** Background, photo and two well separated captions: passes every check. */
export const cleanLayout = (): CanvasDocument => makeDocument([
  { type: 'rect', left: 0, top: 0, width: 1080, height: 1080, fill: '#112233' },
  { type: 'image', left: 540, top: 100, width: 400, height: 400, src: 'https://assets.test/photo.png' },
  textbox(100, 'Headline', { fill: '#FFFFFF' }),
  textbox(300, 'Subtitle', { fill: 'rgba(255, 255, 255, 0.8)' })
]);
