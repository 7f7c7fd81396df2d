import type { Canvas, CanvasDocument, TextboxElement } from "../../types/canvasTypes";
import { collectElementBoxes, type PlacedElement } from "../canvasVisitor";
import { effectiveHeight } from "../geometry";
import { shrinkFontSize } from "../TextFitter";

// --- TEXT OVERLAP RESOLUTION ---
// Vertical stacking in reading order (ascending top, document order on ties)
// with a single font-shrink fallback per element. Images and decorative
// shapes are never moved here.

export interface OverlapResolverOptions {
    minSpacing: number;
    /** Bottom safe area; an element ending below canvas.height - margin gets one shrink. */
    margin: number;
    fontShrinkFactor: number;
    minFontSize: number;
}

export const DEFAULT_OVERLAP_RESOLVER_OPTIONS: OverlapResolverOptions = {
    minSpacing: 40,
    margin: 40,
    fontShrinkFactor: 0.8,
    minFontSize: 24
};

export interface OverlapResolution {
    document: CanvasDocument;
    /** Paths of textboxes pushed down. */
    moved: string[];
    /** Paths of textboxes whose font was shrunk. */
    shrunk: string[];
    /** Paths still ending inside the bottom margin after the pass. */
    overflowing: string[];
}

type PlacedTextbox = PlacedElement & { element: TextboxElement };

const isPlacedTextbox = (placed: PlacedElement): placed is PlacedTextbox => placed.element.type === 'textbox';

/**
 * One resolver pass over a copy of the document. Does not iterate to
 * convergence: residual overflow is reported in `overflowing`.
 */
export function resolveTextOverlaps(
    document: CanvasDocument,
    canvas: Canvas,
    options: OverlapResolverOptions = DEFAULT_OVERLAP_RESOLVER_OPTIONS
): OverlapResolution {
    const working = structuredClone(document);
    const resolution: OverlapResolution = { document: working, moved: [], shrunk: [], overflowing: [] };

    // Array.prototype.sort is stable, so ties keep document order
    const ordered = collectElementBoxes(working.objects)
        .filter(isPlacedTextbox)
        .sort((a, b) => a.box.top - b.box.top);

    const settled: Array<{ bottom: number }> = [];
    const floor = canvas.height - options.margin;

    for (const placed of ordered) {
        const { element, path } = placed;
        let top = placed.box.top;
        let height = effectiveHeight(element);
        let moved = false;

        for (const earlier of settled) {
            if (top - earlier.bottom < options.minSpacing) {
                top = earlier.bottom + options.minSpacing;
                moved = true;
            }
        }

        if (moved) {
            element.top = top - placed.parentTop;
            resolution.moved.push(path);

            if (top + height > floor && element.fontSize > options.minFontSize) {
                const nextFontSize = shrinkFontSize(element.fontSize, options.fontShrinkFactor, options.minFontSize);
                const ratio = nextFontSize / element.fontSize;
                element.fontSize = nextFontSize;
                element.height = element.height * ratio;
                height = effectiveHeight(element);
                resolution.shrunk.push(path);
            }

            if (top + height > floor) {
                resolution.overflowing.push(path);
            }
        }

        settled.push({ bottom: top + height });
    }

    if (resolution.overflowing.length > 0) {
        console.warn(`[OVERLAP] ${resolution.overflowing.length} textbox(es) still end inside the bottom margin: ${resolution.overflowing.join(', ')}`);
    }

    return resolution;
}
