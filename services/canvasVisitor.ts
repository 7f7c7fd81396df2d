import type { CanvasDocument, CanvasElement, Paint } from "../types/canvasTypes";
import { boundingBox, type BoundingBox } from "./geometry";

// --- TYPED TREE WALK ---
// Paths are JSON-path-like: "$.objects[2].objects[0]"

export const ROOT_PATH = '$';

export const elementPath = (parentPath: string, index: number): string => `${parentPath}.objects[${index}]`;

export interface PlacedElement {
    element: CanvasElement;
    path: string;
    box: BoundingBox;
    parentLeft: number;
    parentTop: number;
    /** Array holding the element, so callers can replace it in place. */
    container: CanvasElement[];
    index: number;
}

/**
 * Pre-order walk (parent before children, document order = z-order) that
 * resolves every element's absolute box.
 */
export function collectElementBoxes(
    objects: CanvasElement[],
    parentLeft: number = 0,
    parentTop: number = 0,
    parentPath: string = ROOT_PATH
): PlacedElement[] {
    const placed: PlacedElement[] = [];
    objects.forEach((element, index) => {
        const path = elementPath(parentPath, index);
        const box = boundingBox(element, parentLeft, parentTop);
        placed.push({ element, path, box, parentLeft, parentTop, container: objects, index });
        if (element.type === 'group') {
            placed.push(...collectElementBoxes(element.objects, box.left, box.top, path));
        }
    });
    return placed;
}

export function findPlacedElement(document: CanvasDocument, path: string): PlacedElement | undefined {
    return collectElementBoxes(document.objects).find(placed => placed.path === path);
}

export type PaintSlot = 'fill' | 'stroke' | 'background';

export interface PaintRef {
    path: string;
    slot: PaintSlot;
    replace: (next: Paint) => void;
}

/**
 * Visits every fill/stroke in the tree plus the document background.
 * Absent and null paints are skipped.
 */
export function visitPaints(document: CanvasDocument, visit: (paint: Paint, ref: PaintRef) => void): void {
    if (document.background !== undefined && document.background !== null) {
        visit(document.background, {
            path: `${ROOT_PATH}.background`,
            slot: 'background',
            replace: next => { document.background = next; }
        });
    }

    for (const { element, path } of collectElementBoxes(document.objects)) {
        for (const slot of ['fill', 'stroke'] as const) {
            const paint = element[slot];
            if (paint === undefined || paint === null) continue;
            visit(paint, {
                path: `${path}.${slot}`,
                slot,
                replace: next => { element[slot] = next; }
            });
        }
    }
}
