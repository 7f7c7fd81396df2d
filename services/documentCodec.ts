/**
 * Document Codec
 *
 * Collaborators answer with free-form model text. Everything that enters the
 * refinement loop goes through here: JSON extraction with a decode ladder,
 * then a zod decode into the closed canvas element variant.
 */

import { z } from "zod";
import {
    CanvasDocumentSchema,
    createViolation,
    type CanvasDocument,
    type Violation
} from "../types/canvasTypes";
import { DocumentDecodeError, JsonParseError } from "./errors";

// Helper: strip markdown fences around a JSON payload
function extractJsonBlock(text: string): string {
    const match = text.match(/```(?:json)?\s*([\s\S]*?)(?:```|$)/);
    if (match && match[1]) return match[1].trim();
    return text.trim();
}

/**
 * Robust JSON parse for model output.
 * Ladder: fenced block → envelope slice → plain parse → auto-close truncation
 * → escaped newlines → double-encoded string.
 */
export function cleanAndParseJson(text: string): unknown {
    if (!text || !text.trim()) throw new JsonParseError('EMPTY', '', "Empty response received.");

    // Any word (4+ chars) repeated 25+ times: the model is stuck in a loop
    const repetitionRegex = /(\b\w{4,}\b)(?:[\s,."]*\1){25,}/;
    if (repetitionRegex.test(text)) {
        throw new JsonParseError('REPETITION', text.substring(0, 1000), "Detected repetition loop hallucination.");
    }

    let cleaned = extractJsonBlock(text);

    const firstBrace = cleaned.indexOf('{');
    const firstBracket = cleaned.indexOf('[');
    if (firstBrace === -1 && firstBracket === -1) {
        throw new JsonParseError('MALFORMED', text.substring(0, 1000), "No JSON envelope found.");
    }

    const startIdx = (firstBracket !== -1 && (firstBrace === -1 || firstBracket < firstBrace))
        ? firstBracket : firstBrace;
    const endChar = cleaned[startIdx] === '[' ? ']' : '}';
    const lastIdx = cleaned.lastIndexOf(endChar);

    cleaned = (lastIdx === -1 || lastIdx <= startIdx)
        ? cleaned.substring(startIdx)   // Truncated, take all we have
        : cleaned.substring(startIdx, lastIdx + 1);

    try {
        return JSON.parse(cleaned);
    } catch {
        // fall through to repair strategies
    }

    // Auto-close truncated JSON
    const stack: string[] = [];
    let inString = false;
    let escape = false;
    for (let i = 0; i < cleaned.length; i++) {
        const char = cleaned[i];
        if (escape) { escape = false; continue; }
        if (char === '\\') { escape = true; continue; }
        if (char === '"') { inString = !inString; continue; }
        if (inString) continue;
        if (char === '{') stack.push('}');
        else if (char === '[') stack.push(']');
        else if ((char === '}' || char === ']') && stack[stack.length - 1] === char) stack.pop();
    }

    if (inString) cleaned += '"';
    if (stack.length > 0) {
        const closers = stack.reverse().join('');
        console.warn(`[JSON REPAIR] Detected truncation. Appending: "${closers}"`);
        cleaned += closers;
    }

    try {
        return JSON.parse(cleaned);
    } catch (e1) {
        try {
            return JSON.parse(cleaned.replace(/(?<!\\)\n/g, "\\n"));
        } catch (e2) {
            console.warn(`[JSON REPAIR] Secondary parse failed: ${e2 instanceof Error ? e2.message : String(e2)}`);
        }
        if (cleaned.startsWith('"') && cleaned.endsWith('"')) {
            try {
                const firstLayer: unknown = JSON.parse(cleaned);
                return typeof firstLayer === 'string' ? JSON.parse(firstLayer) : firstLayer;
            } catch (e3) {
                console.warn(`[JSON REPAIR] Tertiary parse failed: ${e3 instanceof Error ? e3.message : String(e3)}`);
            }
        }
        const reason = e1 instanceof Error ? e1.message : String(e1);
        throw new JsonParseError(stack.length > 0 ? 'TRUNCATION' : 'MALFORMED', text.substring(0, 5000), `Heuristic parse failed: ${reason}`);
    }
}

const issuePath = (path: ReadonlyArray<string | number>): string =>
    path.reduce<string>((acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : `${acc}.${key}`), '$');

function issueToViolation(issue: z.ZodIssue): Violation {
    const missing = issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';
    return createViolation(
        'structure',
        missing ? 'MISSING_FIELD' : 'INVALID_FIELD',
        issuePath(issue.path),
        issue.message
    );
}

export type DecodeResult =
    | { success: true; document: CanvasDocument }
    | { success: false; violations: Violation[] };

/** Schema decode of an already-parsed JSON value. Never throws. */
export function decodeCanvasDocument(raw: unknown): DecodeResult {
    const parsed = CanvasDocumentSchema.safeParse(raw);
    if (parsed.success) return { success: true, document: parsed.data };
    return { success: false, violations: parsed.error.issues.map(issueToViolation) };
}

export type ParseResult =
    | { success: true; document: CanvasDocument }
    | { success: false; error: JsonParseError | DocumentDecodeError };

/** Full ingestion of collaborator text. Never throws. */
export function parseCanvasDocumentText(text: string): ParseResult {
    let raw: unknown;
    try {
        raw = cleanAndParseJson(text);
    } catch (e) {
        if (e instanceof JsonParseError) return { success: false, error: e };
        return { success: false, error: new JsonParseError('MALFORMED', text.substring(0, 1000), String(e)) };
    }
    const decoded = decodeCanvasDocument(raw);
    if (decoded.success) return decoded;
    return { success: false, error: new DocumentDecodeError(decoded.violations) };
}

export const serializeCanvasDocument = (document: CanvasDocument): string => JSON.stringify(document);
