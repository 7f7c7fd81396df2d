import {
    FABRIC_VERSION,
    type Canvas,
    type CanvasDocument,
    type CanvasElement,
    type ColorStop,
    type ColorStopInput,
    type Gradient,
    type TextboxElement,
    type Violation,
    type ViolationCode
} from "../../types/canvasTypes";
import { collectElementBoxes, findPlacedElement, visitPaints, ROOT_PATH, type PlacedElement } from "../canvasVisitor";
import { effectiveHeight, effectiveWidth, GEOMETRY_EPSILON, isTextual } from "../geometry";
import { fitFontSizeToHeight, textBlockHeight } from "../TextFitter";
import {
    DEFAULT_OVERLAP_RESOLVER_OPTIONS,
    resolveTextOverlaps,
    type OverlapResolverOptions
} from "./overlapResolver";

// --- DETERMINISTIC AUTO-REPAIR ---
// Fixes are keyed by violation code and applied to a deep copy. Nothing here
// re-validates: one pass can introduce a fresh violation (a slid element
// landing on a neighbour) and the caller is expected to validate again.

export interface RepairOptions {
    /** Below this width an oversized element is left intruding. */
    minWidth: number;
    /** Below this height an oversized element is left intruding. */
    minHeight: number;
    overlap: OverlapResolverOptions;
}

export const DEFAULT_REPAIR_OPTIONS: RepairOptions = {
    minWidth: 50,
    minHeight: 20,
    overlap: DEFAULT_OVERLAP_RESOLVER_OPTIONS
};

export interface RepairResult {
    document: CanvasDocument;
    /** Human-readable log of applied fixes. */
    actions: string[];
    /** Defects knowingly left in place (size floors, stacked text past the margin). */
    unresolved: string[];
}

const BOUNDARY_CODES: ReadonlySet<ViolationCode> = new Set(['NEGATIVE_OFFSET', 'OVERFLOW_RIGHT', 'OVERFLOW_BOTTOM']);
const GRADIENT_CODES: ReadonlySet<ViolationCode> = new Set(['GRADIENT_KEYED_STOPS', 'GRADIENT_STOP_INCOMPLETE']);
const OVERLAP_CODES: ReadonlySet<ViolationCode> = new Set(['ELEMENT_OVERLAP', 'TEXT_GAP']);

/**
 * Converts any colorStops shape into an offset-sorted list of complete stops.
 * Stops without a color are dropped; missing offsets are spread evenly.
 */
export function normalizeColorStops(colorStops: Gradient['colorStops']): ColorStop[] {
    if (!Array.isArray(colorStops)) {
        return Object.entries(colorStops)
            .map(([offset, color]) => ({ offset: parseFloat(offset), color }))
            .filter(stop => Number.isFinite(stop.offset))
            .sort((a, b) => a.offset - b.offset);
    }

    const colored = colorStops.filter((stop): stop is ColorStopInput & { color: string } => typeof stop.color === 'string');
    const spread = (idx: number): number => (colored.length > 1 ? idx / (colored.length - 1) : 0);
    return colored
        .map((stop, idx) => ({ offset: typeof stop.offset === 'number' ? stop.offset : spread(idx), color: stop.color }))
        .sort((a, b) => a.offset - b.offset);
}

function retypeLegacyText(placed: PlacedElement): boolean {
    const { element } = placed;
    if (element.type !== 'text' && element.type !== 'i-text') return false;
    const textbox: TextboxElement = { ...element, type: 'textbox' };
    placed.container[placed.index] = textbox;
    return true;
}

/**
 * Brings one axis of an element inside [0, span]:
 * clamp the near edge, slide the far edge in when the element fits at full
 * size, otherwise pin to the near edge and shrink scale (or the raw size when
 * scale is 1) down to the span, stopping at the floor.
 */
function fitAxis(
    axis: 'x' | 'y',
    placed: PlacedElement,
    span: number,
    floor: number,
    actions: string[],
    unresolved: string[]
): void {
    const { element, path } = placed;
    const parentOffset = axis === 'x' ? placed.parentLeft : placed.parentTop;
    const position = axis === 'x' ? 'left' : 'top';
    const size = axis === 'x' ? 'width' : 'height';
    const scale = axis === 'x' ? 'scaleX' : 'scaleY';
    const extent = (el: CanvasElement): number => (axis === 'x' ? effectiveWidth(el) : effectiveHeight(el));
    // Canvas edge in the element's own coordinates
    const nearEdge = 0 - parentOffset;

    if (parentOffset + element[position] < 0) {
        element[position] = nearEdge;
        actions.push(`Clamped ${position} of ${path} to canvas edge`);
    }

    const absStart = parentOffset + element[position];
    if (absStart + extent(element) <= span + GEOMETRY_EPSILON) return;

    if (extent(element) <= span) {
        element[position] = span - extent(element) - parentOffset;
        actions.push(`Slid ${path} so its ${axis === 'x' ? 'right' : 'bottom'} edge meets the canvas`);
        return;
    }

    element[position] = nearEdge;

    // Text taller than the canvas: scaling the box cannot help, the font must shrink
    if (axis === 'y' && isTextual(element) && textBlockHeight(element.text, element.fontSize, element.lineHeight) > span) {
        element.fontSize = fitFontSizeToHeight(element.text, element.lineHeight, span);
        actions.push(`Reduced fontSize of ${path} to ${element.fontSize} to fit canvas height`);
    }

    if (element[size] * element[scale] > span) {
        if (element[scale] !== 1) {
            element[scale] = span / element[size];
            actions.push(`Shrunk ${scale} of ${path} to ${element[scale].toFixed(4)}`);
        } else if (span >= floor) {
            element[size] = span;
            actions.push(`Shrunk ${size} of ${path} to ${span}`);
        } else {
            element[size] = floor;
            unresolved.push(`${path} ${size} held at floor ${floor}px; still exceeds canvas`);
        }
    }
}

/**
 * Deterministic repair keyed by violation category. Returns a new document;
 * the input is not touched. An empty violation list yields an identical copy.
 */
export function repairCanvasDocument(
    document: CanvasDocument,
    violations: readonly Violation[],
    canvas: Canvas,
    options: RepairOptions = DEFAULT_REPAIR_OPTIONS
): RepairResult {
    let working = structuredClone(document);
    const actions: string[] = [];
    const unresolved: string[] = [];

    const has = (codes: ReadonlySet<ViolationCode>) => violations.some(v => codes.has(v.code));
    const pathsFor = (codes: ReadonlySet<ViolationCode>) =>
        new Set(violations.filter(v => codes.has(v.code)).map(v => v.path));

    // 1. Structure: canvas is the authority, missing fields get defaults
    for (const v of violations) {
        if (v.code === 'CANVAS_MISMATCH' || (v.code === 'MISSING_FIELD' && (v.path === `${ROOT_PATH}.width` || v.path === `${ROOT_PATH}.height`))) {
            if (working.width !== canvas.width || working.height !== canvas.height) {
                working.width = canvas.width;
                working.height = canvas.height;
                actions.push(`Set document size to ${canvas.width}x${canvas.height}`);
            }
        } else if (v.code === 'MISSING_FIELD' && v.path === `${ROOT_PATH}.version`) {
            working.version = FABRIC_VERSION;
            actions.push(`Inserted version ${FABRIC_VERSION}`);
        }
    }

    // 2. Legacy text kinds → textbox, content preserved
    const legacyPaths = new Set(violations.filter(v => v.code === 'LEGACY_TEXT').map(v => v.path));
    for (const path of legacyPaths) {
        const placed = findPlacedElement(working, path);
        if (placed && retypeLegacyText(placed)) actions.push(`Retyped ${path} to textbox`);
    }

    // 3. Gradients → ordered colorStops
    if (has(GRADIENT_CODES)) {
        const gradientPaths = pathsFor(GRADIENT_CODES);
        visitPaints(working, (paint, ref) => {
            if (typeof paint === 'string' || !gradientPaths.has(ref.path)) return;
            ref.replace({ ...paint, colorStops: normalizeColorStops(paint.colorStops) });
            actions.push(`Normalized colorStops at ${ref.path}`);
        });
    }

    // 4. Boundary: parents first so children are measured against moved groups
    if (has(BOUNDARY_CODES)) {
        const boundaryPaths = pathsFor(BOUNDARY_CODES);
        const fitted = new Set<string>();
        const fitPath = (path: string): void => {
            if (fitted.has(path)) return;
            fitted.add(path);
            const placed = findPlacedElement(working, path);
            if (!placed) return;
            fitAxis('x', placed, canvas.width, options.minWidth, actions, unresolved);
            fitAxis('y', placed, canvas.height, options.minHeight, actions, unresolved);
            // A moved group carries its children, which may now cross the canvas edge
            if (placed.element.type === 'group') {
                collectElementBoxes(placed.element.objects, 0, 0, path).forEach(child => fitPath(child.path));
            }
        };
        collectElementBoxes(working.objects)
            .map(placed => placed.path)
            .filter(path => boundaryPaths.has(path))
            .forEach(fitPath);
    }

    // 5. Text overlaps → resolver
    if (has(OVERLAP_CODES)) {
        const resolution = resolveTextOverlaps(working, canvas, options.overlap);
        working = resolution.document;
        resolution.moved.forEach(path => actions.push(`Restacked textbox ${path}`));
        resolution.shrunk.forEach(path => actions.push(`Shrunk font of ${path}`));
        resolution.overflowing.forEach(path => unresolved.push(`${path} still ends inside the bottom margin`));
    }

    if (unresolved.length > 0) {
        console.warn(`[AUTO-REPAIR] ${unresolved.length} defect(s) left in place:`, unresolved.join('; '));
    }

    return { document: working, actions, unresolved };
}

/** Document-only form of repairCanvasDocument. */
export function repairDocument(
    document: CanvasDocument,
    violations: readonly Violation[],
    canvas: Canvas
): CanvasDocument {
    return repairCanvasDocument(document, violations, canvas).document;
}
