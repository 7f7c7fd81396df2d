/**
 * Text Fitter Utility
 *
 * Render-free text height estimation for textbox layout.
 * Text is never assumed to be shorter than its estimated rendered height,
 * so boundary and overlap math both go through textBlockHeight().
 */

/** Number of rendered lines; explicit line breaks only, minimum 1. */
export function lineCount(text: string): number {
    if (!text) return 1;
    return text.split(/\r?\n/).length;
}

/**
 * Estimated rendered height of a text block in pixels.
 *
 * @example textBlockHeight("A\nB", 40, 1.2) // 96
 */
export function textBlockHeight(text: string, fontSize: number, lineHeight: number): number {
    return fontSize * lineHeight * lineCount(text);
}

const roundDown = (value: number): number => Math.floor(value * 100) / 100;

/**
 * One shrink step. Never goes below minFontSize, and never grows a font that
 * is already under the floor.
 */
export function shrinkFontSize(fontSize: number, factor: number, minFontSize: number): number {
    if (fontSize <= minFontSize) return fontSize;
    return Math.max(minFontSize, roundDown(fontSize * factor));
}

/** Largest font size whose text block fits in maxHeight. */
export function fitFontSizeToHeight(text: string, lineHeight: number, maxHeight: number): number {
    if (maxHeight <= 0 || lineHeight <= 0) return 0;
    return roundDown(maxHeight / (lineHeight * lineCount(text)));
}
