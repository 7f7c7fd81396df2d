import type { CanvasElement, LegacyTextElement, TextboxElement } from "../types/canvasTypes";
import { textBlockHeight } from "./TextFitter";

export interface BoundingBox {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

// Float slack for edges placed exactly on the canvas border by repair
export const GEOMETRY_EPSILON = 0.01;

export const isTextual = (element: CanvasElement): element is TextboxElement | LegacyTextElement =>
    element.type === 'textbox' || element.type === 'text' || element.type === 'i-text';

export function effectiveWidth(element: CanvasElement): number {
    return element.width * element.scaleX;
}

/**
 * Declared height times scale, raised to the estimated text height for
 * textual elements.
 */
export function effectiveHeight(element: CanvasElement): number {
    const declared = element.height * element.scaleY;
    if (isTextual(element)) {
        return Math.max(declared, textBlockHeight(element.text, element.fontSize, element.lineHeight));
    }
    return declared;
}

/**
 * Absolute bounding box of an element given the accumulated offset of its
 * enclosing groups. Every boundary and overlap check goes through here.
 */
export function boundingBox(element: CanvasElement, parentLeft: number = 0, parentTop: number = 0): BoundingBox {
    const left = parentLeft + element.left;
    const top = parentTop + element.top;
    return {
        left,
        top,
        right: left + effectiveWidth(element),
        bottom: top + effectiveHeight(element)
    };
}

/** True when the boxes come closer than `padding` on both axes. */
export function paddedBoxesIntersect(a: BoundingBox, b: BoundingBox, padding: number): boolean {
    return a.left < b.right + padding &&
        b.left < a.right + padding &&
        a.top < b.bottom + padding &&
        b.top < a.bottom + padding;
}
