import type { CanvasElement } from "../types/canvasTypes";

/** Element kinds that take part in overlap checks. Groups contribute their children. */
export type LayerKind = 'rect' | 'image' | 'textbox';

export interface OverlapAllowRule {
    below: LayerKind;
    above: LayerKind;
}

export interface OverlapPolicy {
    rules: readonly OverlapAllowRule[];
    /**
     * When false a rule matches either stacking order, e.g. a rect drawn over
     * a textbox is exempt just like one drawn under it.
     */
    respectZOrder: boolean;
}

// Intentional layering: backgrounds, scrims, image collages, captions on photos.
// TODO: rect-over-textbox exemption regardless of z-order needs a product decision
export const DEFAULT_OVERLAP_POLICY: OverlapPolicy = {
    rules: [
        { below: 'image', above: 'image' },
        { below: 'rect', above: 'image' },
        { below: 'rect', above: 'textbox' },
        { below: 'image', above: 'textbox' }
    ],
    respectZOrder: false
};

export function layerKindOf(element: CanvasElement): LayerKind | null {
    switch (element.type) {
        case 'rect':
        case 'image':
        case 'textbox':
            return element.type;
        case 'text':
        case 'i-text':
            return 'textbox';
        case 'group':
            return null;
    }
}

export function isOverlapAllowed(policy: OverlapPolicy, lower: LayerKind, upper: LayerKind): boolean {
    return policy.rules.some(rule =>
        (rule.below === lower && rule.above === upper) ||
        (!policy.respectZOrder && rule.below === upper && rule.above === lower)
    );
}
