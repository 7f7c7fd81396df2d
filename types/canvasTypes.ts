import { z } from "zod";

// Fabric serialisation version written when a candidate omits it
export const FABRIC_VERSION = '4.6.0';

// --- CANVAS ---

export const CanvasSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive()
});

export type Canvas = z.infer<typeof CanvasSchema>;

export type Resolution = readonly [number, number];

// --- PAINT SCHEMAS (fills, strokes, gradients) ---

export const ColorStopSchema = z.object({
  offset: z.number().optional(),
  color: z.string().optional()
}).passthrough();

export const GradientSchema = z.object({
  type: z.enum(['linear', 'radial']),
  coords: z.record(z.number()).optional(),
  gradientUnits: z.enum(['pixels', 'percentage']).optional(),
  colorStops: z.union([
    z.array(ColorStopSchema),
    z.record(z.string())   // Legacy keyed mapping: {"0": "#FFFFFF", "1": "#000000"}
  ])
}).passthrough();

export const PaintSchema = z.union([z.string(), GradientSchema]);

export type ColorStopInput = z.infer<typeof ColorStopSchema>;
export type Gradient = z.infer<typeof GradientSchema>;
export type Paint = z.infer<typeof PaintSchema>;

export type ColorStop = {
  offset: number;
  color: string;
};

// --- ELEMENT SCHEMAS ---
// Closed variant over `type`. Unknown properties (fontFamily, src, opacity, ...)
// pass through untouched so the wire document round-trips.

const GeometryShape = {
  left: z.number().default(0),
  top: z.number().default(0),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  scaleX: z.number().positive().default(1),
  scaleY: z.number().positive().default(1),
  fill: PaintSchema.nullable().optional(),
  stroke: PaintSchema.nullable().optional()
};

const TextShape = {
  ...GeometryShape,
  height: z.number().nonnegative().default(0),
  text: z.string(),
  fontSize: z.number().positive().default(40),
  lineHeight: z.number().positive().default(1.2)
};

export const RectElementSchema = z.object({
  type: z.literal('rect'),
  ...GeometryShape
}).passthrough();

export const ImageElementSchema = z.object({
  type: z.literal('image'),
  ...GeometryShape,
  src: z.string().optional()
}).passthrough();

export const TextboxElementSchema = z.object({
  type: z.literal('textbox'),
  ...TextShape
}).passthrough();

/** Plain Fabric text kinds. Accepted on ingestion only so they can be flagged and retyped. */
export const LegacyTextElementSchema = z.object({
  type: z.enum(['text', 'i-text']),
  ...TextShape
}).passthrough();

const GroupBaseSchema = z.object({
  type: z.literal('group'),
  ...GeometryShape
}).passthrough();

export type RectElement = z.infer<typeof RectElementSchema>;
export type ImageElement = z.infer<typeof ImageElementSchema>;
export type TextboxElement = z.infer<typeof TextboxElementSchema>;
export type LegacyTextElement = z.infer<typeof LegacyTextElementSchema>;
export type GroupElement = z.infer<typeof GroupBaseSchema> & { objects: CanvasElement[] };

export type CanvasElement =
  | RectElement
  | ImageElement
  | TextboxElement
  | LegacyTextElement
  | GroupElement;

export type ElementKind = CanvasElement['type'];

export const GroupElementSchema = GroupBaseSchema.extend({
  objects: z.array(z.lazy(() => CanvasElementSchema))
});

export const CanvasElementSchema: z.ZodType<CanvasElement, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  RectElementSchema,
  ImageElementSchema,
  TextboxElementSchema,
  LegacyTextElementSchema,
  GroupElementSchema
]);

// --- DOCUMENT ---
// version/width/height stay optional here: their absence is a structure
// violation that repair fills in, not a reason to reject the candidate.

export const CanvasDocumentSchema = z.object({
  version: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  background: PaintSchema.nullable().optional(),
  objects: z.array(CanvasElementSchema)
}).passthrough();

export type CanvasDocument = z.infer<typeof CanvasDocumentSchema>;

// --- VIOLATIONS ---

export const VIOLATION_CATEGORIES = ['structure', 'boundary', 'gradient', 'text-type', 'color', 'overlap'] as const;

export type ViolationCategory = typeof VIOLATION_CATEGORIES[number];

export type ViolationCode =
  | 'MISSING_FIELD'             // structure: version/width/height absent
  | 'INVALID_FIELD'             // structure: schema mismatch on ingestion
  | 'CANVAS_MISMATCH'           // structure: declared size differs from target
  | 'NEGATIVE_OFFSET'           // boundary: left/top < 0
  | 'OVERFLOW_RIGHT'            // boundary: right edge past canvas width
  | 'OVERFLOW_BOTTOM'           // boundary: bottom edge past canvas height
  | 'GRADIENT_KEYED_STOPS'      // gradient: colorStops given as a keyed mapping
  | 'GRADIENT_STOP_INCOMPLETE'  // gradient: stop without offset or color
  | 'LEGACY_TEXT'               // text-type: text / i-text instead of textbox
  | 'INVALID_COLOR'             // color: not #RRGGBB or rgba(...)
  | 'ELEMENT_OVERLAP'           // overlap: padded boxes intersect
  | 'TEXT_GAP';                 // overlap: stacked textboxes too close

export interface Violation {
  readonly category: ViolationCategory;
  readonly code: ViolationCode;
  readonly path: string;
  readonly message: string;
}

export interface ValidationReport {
  ok: boolean;
  violations: readonly Violation[];
}

export const createViolation = (
  category: ViolationCategory,
  code: ViolationCode,
  path: string,
  message: string
): Violation => Object.freeze({ category, code, path, message });

// --- ASSETS ---

export const AssetDescriptorSchema = z.object({
  type: z.string().min(1),
  url: z.string().optional(),
  content: z.string().optional(),
  description: z.string().default('')
}).refine(asset => Boolean(asset.url || asset.content), {
  message: 'Asset needs either a url or inline content'
});

export type AssetDescriptor = z.infer<typeof AssetDescriptorSchema>;

export const canvasFromResolution = (resolution: Resolution): Canvas =>
  CanvasSchema.parse({ width: resolution[0], height: resolution[1] });
