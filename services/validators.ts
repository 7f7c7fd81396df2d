
import {
  createViolation,
  type Canvas,
  type CanvasDocument,
  type ValidationReport,
  type Violation
} from "../types/canvasTypes";
import { collectElementBoxes, visitPaints, ROOT_PATH, type PlacedElement } from "./canvasVisitor";
import { GEOMETRY_EPSILON, paddedBoxesIntersect } from "./geometry";
import { DEFAULT_OVERLAP_POLICY, isOverlapAllowed, layerKindOf, type OverlapPolicy } from "./overlapPolicy";

export interface ValidatorOptions {
  /** Minimum clearance between non-exempt element boxes. */
  minSpacing: number;
  /** Minimum vertical gap between consecutive textboxes. */
  minTextGap: number;
  overlapPolicy: OverlapPolicy;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  minSpacing: 20,
  minTextGap: 30,
  overlapPolicy: DEFAULT_OVERLAP_POLICY
};

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;
const RGBA_COLOR = /^rgba\(\s*\d{1,3}\s*,\s*\d{1,3}\s*,\s*\d{1,3}\s*(?:,\s*(?:0|1|0?\.\d+|1\.0*)\s*)?\)$/;

export const isValidColor = (value: string): boolean => HEX_COLOR.test(value) || RGBA_COLOR.test(value);

const fmt = (n: number): string => String(Math.round(n * 100) / 100);

// 1. STRUCTURE: required top-level fields (objects is enforced on decode)
export const checkStructure = (document: CanvasDocument): Violation[] => {
  const errors: Violation[] = [];
  if (!document.version) {
    errors.push(createViolation('structure', 'MISSING_FIELD', `${ROOT_PATH}.version`, 'Document has no version tag.'));
  }
  if (document.width === undefined) {
    errors.push(createViolation('structure', 'MISSING_FIELD', `${ROOT_PATH}.width`, 'Document has no width.'));
  }
  if (document.height === undefined) {
    errors.push(createViolation('structure', 'MISSING_FIELD', `${ROOT_PATH}.height`, 'Document has no height.'));
  }
  return errors;
};

// 2. CANVAS: declared size must match the target resolution exactly
export const checkCanvasDimensions = (document: CanvasDocument, canvas: Canvas): Violation[] => {
  const errors: Violation[] = [];
  if (document.width !== undefined && document.width !== canvas.width) {
    errors.push(createViolation('structure', 'CANVAS_MISMATCH', `${ROOT_PATH}.width`,
      `Declared width ${document.width} does not match canvas width ${canvas.width}.`));
  }
  if (document.height !== undefined && document.height !== canvas.height) {
    errors.push(createViolation('structure', 'CANVAS_MISMATCH', `${ROOT_PATH}.height`,
      `Declared height ${document.height} does not match canvas height ${canvas.height}.`));
  }
  return errors;
};

// 3. BOUNDARY: negative offsets reported apart from overflow
export const checkBoundaries = (document: CanvasDocument, canvas: Canvas): Violation[] => {
  const errors: Violation[] = [];
  for (const { element, path, box } of collectElementBoxes(document.objects)) {
    if (box.left < -GEOMETRY_EPSILON || box.top < -GEOMETRY_EPSILON) {
      errors.push(createViolation('boundary', 'NEGATIVE_OFFSET', path,
        `${element.type} starts off-canvas at (${fmt(box.left)}, ${fmt(box.top)}).`));
    }
    if (box.right > canvas.width + GEOMETRY_EPSILON) {
      errors.push(createViolation('boundary', 'OVERFLOW_RIGHT', path,
        `${element.type} right edge ${fmt(box.right)} exceeds canvas width ${canvas.width}.`));
    }
    if (box.bottom > canvas.height + GEOMETRY_EPSILON) {
      errors.push(createViolation('boundary', 'OVERFLOW_BOTTOM', path,
        `${element.type} bottom edge ${fmt(box.bottom)} exceeds canvas height ${canvas.height}.`));
    }
  }
  return errors;
};

// 4. GRADIENT: colorStops must be an ordered sequence of complete stops
export const checkGradients = (document: CanvasDocument): Violation[] => {
  const errors: Violation[] = [];
  visitPaints(document, (paint, { path }) => {
    if (typeof paint === 'string') return;
    if (!Array.isArray(paint.colorStops)) {
      errors.push(createViolation('gradient', 'GRADIENT_KEYED_STOPS', path,
        `${paint.type} gradient colorStops is a keyed mapping, expected an ordered list.`));
      return;
    }
    paint.colorStops.forEach((stop, idx) => {
      if (typeof stop.offset !== 'number' || typeof stop.color !== 'string') {
        errors.push(createViolation('gradient', 'GRADIENT_STOP_INCOMPLETE', path,
          `Color stop ${idx} needs both offset and color.`));
      }
    });
  });
  return errors;
};

// 5. TEXT TYPE: only rich textboxes are allowed
export const checkTextTypes = (document: CanvasDocument): Violation[] =>
  collectElementBoxes(document.objects)
    .filter(({ element }) => element.type === 'text' || element.type === 'i-text')
    .map(({ element, path }) => createViolation('text-type', 'LEGACY_TEXT', path,
      `Element kind '${element.type}' is not allowed; use 'textbox'.`));

// 6. COLOR: flat paints and gradient stop colors
export const checkColors = (document: CanvasDocument): Violation[] => {
  const errors: Violation[] = [];
  visitPaints(document, (paint, { path }) => {
    if (typeof paint === 'string') {
      if (paint !== '' && !isValidColor(paint)) {
        errors.push(createViolation('color', 'INVALID_COLOR', path,
          `Color "${paint}" is not #RRGGBB or rgba(r,g,b[,a]).`));
      }
      return;
    }
    if (!Array.isArray(paint.colorStops)) return;
    paint.colorStops.forEach((stop, idx) => {
      if (typeof stop.color === 'string' && !isValidColor(stop.color)) {
        errors.push(createViolation('color', 'INVALID_COLOR', `${path}.colorStops[${idx}]`,
          `Color "${stop.color}" is not #RRGGBB or rgba(r,g,b[,a]).`));
      }
    });
  });
  return errors;
};

const pairKey = (a: string, b: string): string => (a < b ? `${a}|${b}` : `${b}|${a}`);

// 7. OVERLAP: padded box intersection + stacked-caption gap
export const detectOverlaps = (
  document: CanvasDocument,
  options: ValidatorOptions = DEFAULT_VALIDATOR_OPTIONS
): Violation[] => {
  const errors: Violation[] = [];
  const reported = new Set<string>();

  const leaves = collectElementBoxes(document.objects).filter(({ element }) => element.type !== 'group');

  for (let i = 0; i < leaves.length; i++) {
    for (let j = i + 1; j < leaves.length; j++) {
      const lower = leaves[i];
      const upper = leaves[j];
      const lowerKind = layerKindOf(lower.element);
      const upperKind = layerKindOf(upper.element);
      if (!lowerKind || !upperKind) continue;
      if (isOverlapAllowed(options.overlapPolicy, lowerKind, upperKind)) continue;
      if (!paddedBoxesIntersect(lower.box, upper.box, options.minSpacing)) continue;

      reported.add(pairKey(lower.path, upper.path));
      errors.push(createViolation('overlap', 'ELEMENT_OVERLAP', upper.path,
        `${upperKind} at ${upper.path} is within ${options.minSpacing}px of ${lowerKind} at ${lower.path}.`));
    }
  }

  // Adjacent captions at zero horizontal offset are the common failure,
  // so the gap rule ignores horizontal projection.
  const texts: PlacedElement[] = leaves
    .filter(({ element }) => layerKindOf(element) === 'textbox')
    .sort((a, b) => a.box.top - b.box.top);

  for (let k = 0; k + 1 < texts.length; k++) {
    const current = texts[k];
    const next = texts[k + 1];
    const gap = next.box.top - current.box.bottom;
    if (gap >= options.minTextGap) continue;
    const key = pairKey(current.path, next.path);
    if (reported.has(key)) continue;
    reported.add(key);
    errors.push(createViolation('overlap', 'TEXT_GAP', next.path,
      `Textbox at ${next.path} sits ${fmt(gap)}px below ${current.path}; minimum gap is ${options.minTextGap}px.`));
  }

  return errors;
};

/**
 * Runs every check against the document. Pure: the input is never mutated
 * and violations are produced fresh on every call.
 */
export const validateCanvasDocument = (
  document: CanvasDocument,
  canvas: Canvas,
  options: ValidatorOptions = DEFAULT_VALIDATOR_OPTIONS
): ValidationReport => {
  const violations: Violation[] = [
    ...checkStructure(document),
    ...checkCanvasDimensions(document, canvas),
    ...checkBoundaries(document, canvas),
    ...checkGradients(document),
    ...checkTextTypes(document),
    ...checkColors(document),
    ...detectOverlaps(document, options)
  ];

  return {
    ok: violations.length === 0,
    violations
  };
};
