/**
 * Refinement Director - Bounded validate/repair/feedback loop
 *
 * State Machine:
 * ┌──────────────────────────────────────────────────────────────────┐
 * │  COMPOSING → VALIDATING ──ok──► critic? ──PASS──► DONE           │
 * │                  │                 │                              │
 * │        deterministic only      CONTINUE                          │
 * │                  ▼                 │                              │
 * │              REPAIRING             ▼                              │
 * │                  │        REQUESTING_FEEDBACK ◄── judgment /      │
 * │                  ▼                 │               residual       │
 * │              VALIDATING ◄──────────┘                              │
 * └──────────────────────────────────────────────────────────────────┘
 *
 * Each REQUESTING_FEEDBACK closes one iteration; after maxIterations the
 * director returns its best candidate instead of raising. Collaborator
 * failures (throws, unparseable text) keep the previous candidate.
 */

import {
    CanvasSchema,
    type AssetDescriptor,
    type Canvas,
    type CanvasDocument,
    type Resolution,
    type ValidationReport,
    type Violation,
    type ViolationCategory
} from "../types/canvasTypes";
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "./config";
import { parseCanvasDocumentText } from "./documentCodec";
import { errorMessage, type CollaboratorName } from "./errors";
import { RefinementLogger, type RefinementTrace } from "./refinementLogger";
import { repairCanvasDocument } from "./repair/autoRepair";
import { validateCanvasDocument } from "./validators";

// =============================================================================
// COLLABORATOR CONTRACTS
// =============================================================================

export interface RefinementCollaborators {
    generateCandidate(brief: string, assets: readonly AssetDescriptor[], resolution: Resolution): Promise<string>;
    /** Optional design critic: "PASS" or "CONTINUE: <feedback>". */
    critique?(document: CanvasDocument, brief: string, resolution: Resolution): Promise<string>;
    applyFeedback(
        document: CanvasDocument,
        feedback: string,
        brief: string,
        assets: readonly AssetDescriptor[],
        resolution: Resolution
    ): Promise<string>;
}

export interface RefinementContext {
    brief: string;
    assets: readonly AssetDescriptor[];
    resolution: Resolution;
}

export type RefinementOutcome =
    | { status: 'converged'; document: CanvasDocument; violations: readonly Violation[]; iterations: number; trace: RefinementTrace }
    | { status: 'exhausted'; document: CanvasDocument; violations: readonly Violation[]; iterations: number; trace: RefinementTrace }
    | { status: 'failed'; reason: string; violations: readonly Violation[]; iterations: number; trace: RefinementTrace };

export type CritiqueVerdict =
    | { verdict: 'pass' }
    | { verdict: 'continue'; feedback: string };

/** Categories repair can fix without judgment. Color needs the generator. */
export const DETERMINISTIC_CATEGORIES: ReadonlySet<ViolationCategory> = new Set([
    'structure', 'boundary', 'gradient', 'text-type', 'overlap'
]);

/** The part of a report local repair can act on; judgment violations are left to feedback. */
export const deterministicViolations = (violations: readonly Violation[]): Violation[] =>
    violations.filter(v => DETERMINISTIC_CATEGORIES.has(v.category));

/**
 * Critic replies are free text. Leading PASS means accept; anything else is
 * feedback, with an optional "CONTINUE:" prefix stripped.
 */
export function parseCritique(text: string): CritiqueVerdict {
    const trimmed = text.trim();
    if (/^PASS\b/i.test(trimmed)) return { verdict: 'pass' };
    const feedback = trimmed.replace(/^CONTINUE\s*:?\s*/i, '').trim();
    return { verdict: 'continue', feedback: feedback || 'Improve the overall layout quality.' };
}

export function summarizeViolations(violations: readonly Violation[]): string {
    const lines = violations.map(v => `- [${v.category}] ${v.path}: ${v.message}`);
    return `The layout has ${violations.length} validation issue(s) that must be fixed:\n${lines.join('\n')}`;
}

// =============================================================================
// DIRECTOR
// =============================================================================

interface Candidate {
    document: CanvasDocument;
    report: ValidationReport;
}

class RefinementRun {
    private best: Candidate | null = null;

    constructor(
        private readonly context: RefinementContext,
        private readonly canvas: Canvas,
        private readonly collaborators: RefinementCollaborators,
        private readonly config: EngineConfig,
        private readonly logger: RefinementLogger
    ) {}

    private validate(document: CanvasDocument): Candidate {
        const candidate = { document, report: validateCanvasDocument(document, this.canvas, this.config.validator) };
        // Fewest violations wins; later candidates win ties
        if (!this.best || candidate.report.violations.length <= this.best.report.violations.length) {
            this.best = candidate;
        }
        return candidate;
    }

    private async call<T>(
        iteration: number,
        collaborator: CollaboratorName,
        operation: () => Promise<T>
    ): Promise<{ ok: true; value: T } | { ok: false; error: string }> {
        const start = Date.now();
        try {
            const value = await operation();
            this.logger.logCollaboratorCall(iteration, collaborator, Date.now() - start, true);
            return { ok: true, value };
        } catch (err) {
            const error = errorMessage(err);
            this.logger.logCollaboratorCall(iteration, collaborator, Date.now() - start, false, error);
            return { ok: false, error };
        }
    }

    /** COMPOSING: ask for a first candidate until one parses. */
    async compose(): Promise<CanvasDocument | null> {
        const { brief, assets, resolution } = this.context;
        for (let attempt = 1; attempt <= this.config.maxComposeAttempts; attempt++) {
            this.logger.logState(0, 'COMPOSING', `attempt ${attempt}/${this.config.maxComposeAttempts}`);
            const result = await this.call(0, 'generateCandidate', () =>
                this.collaborators.generateCandidate(brief, assets, resolution));
            if (!result.ok) continue;

            const parsed = parseCanvasDocumentText(result.value);
            if (parsed.success) return parsed.document;
            this.logger.logCollaboratorCall(0, 'generateCandidate', 0, false, `Unparseable candidate: ${parsed.error.message}`);
        }
        return null;
    }

    private async critique(iteration: number, document: CanvasDocument): Promise<CritiqueVerdict> {
        const critic = this.collaborators.critique;
        if (!critic || !this.config.enableCritique) return { verdict: 'pass' };

        const { brief, resolution } = this.context;
        const result = await this.call(iteration, 'critique', () => critic.call(this.collaborators, document, brief, resolution));
        if (!result.ok) {
            // Structurally valid already; a broken critic does not block acceptance
            this.logger.warn(`Critic unavailable, accepting validated candidate: ${result.error}`);
            return { verdict: 'pass' };
        }
        return parseCritique(result.value);
    }

    /** REQUESTING_FEEDBACK: returns the re-validated candidate, or null to keep the current one. */
    private async requestFeedback(iteration: number, document: CanvasDocument, feedback: string): Promise<Candidate | null> {
        const { brief, assets, resolution } = this.context;
        this.logger.logState(iteration, 'REQUESTING_FEEDBACK', feedback.split('\n')[0]);

        const result = await this.call(iteration, 'applyFeedback', () =>
            this.collaborators.applyFeedback(document, feedback, brief, assets, resolution));
        if (!result.ok) return null;

        const parsed = parseCanvasDocumentText(result.value);
        if (!parsed.success) {
            this.logger.logCollaboratorCall(iteration, 'applyFeedback', 0, false, `Discarded unparseable revision: ${parsed.error.message}`);
            return null;
        }

        const candidate = this.validate(parsed.document);
        this.logger.info(`Revision accepted with ${candidate.report.violations.length} violation(s)`);
        return candidate;
    }

    async refine(initial: CanvasDocument): Promise<RefinementOutcome> {
        let current: Candidate = this.validate(initial);
        let iterations = 0;

        while (iterations < this.config.maxIterations) {
            iterations++;
            this.logger.logState(iterations, 'VALIDATING', `${current.report.violations.length} violation(s)`);

            const fixable = deterministicViolations(current.report.violations);
            if (fixable.length > 0) {
                this.logger.logState(iterations, 'REPAIRING', `${fixable.length} of ${current.report.violations.length}`);
                const repaired = repairCanvasDocument(current.document, fixable, this.canvas, this.config.repair);
                repaired.actions.forEach(action => this.logger.info(action));
                current = this.validate(repaired.document);
                this.logger.logState(iterations, 'VALIDATING', `${current.report.violations.length} violation(s) after repair`);
            }

            let feedback: string;
            if (current.report.ok) {
                const verdict = await this.critique(iterations, current.document);
                if (verdict.verdict === 'pass') {
                    this.logger.logState(iterations, 'DONE', 'converged');
                    return {
                        status: 'converged',
                        document: current.document,
                        violations: [],
                        iterations,
                        trace: this.logger.getSummary()
                    };
                }
                feedback = verdict.feedback;
            } else {
                feedback = summarizeViolations(current.report.violations);
            }

            const revised = await this.requestFeedback(iterations, current.document, feedback);
            if (revised) current = revised;
        }

        return this.finish(current, iterations);
    }

    /** Budget exhausted: one last local repair, then hand back the best candidate. */
    private finish(current: Candidate, iterations: number): RefinementOutcome {
        const fixable = deterministicViolations(current.report.violations);
        if (fixable.length > 0) {
            const repaired = repairCanvasDocument(current.document, fixable, this.canvas, this.config.repair);
            this.validate(repaired.document);
        }

        const best = this.best ?? current;
        const converged = best.report.ok && !(this.collaborators.critique && this.config.enableCritique);
        this.logger.logState(iterations, 'DONE', converged ? 'converged' : `budget exhausted with ${best.report.violations.length} violation(s)`);

        return {
            status: converged ? 'converged' : 'exhausted',
            document: best.document,
            violations: best.report.violations,
            iterations,
            trace: this.logger.getSummary()
        };
    }
}

/**
 * Runs the refinement loop on an already-composed candidate.
 */
export async function refineDocument(
    initial: CanvasDocument,
    context: RefinementContext,
    collaborators: RefinementCollaborators,
    userConfig?: EngineConfigOverrides
): Promise<RefinementOutcome> {
    const config = resolveEngineConfig(userConfig);
    const logger = new RefinementLogger(config.verbose);
    const canvas = canvasFromResolutionSafe(context.resolution);
    if (!canvas) return invalidResolution(context.resolution, logger);

    const run = new RefinementRun(context, canvas, collaborators, config, logger);
    return run.refine(initial);
}

/**
 * Engine entry point: compose a first candidate, then refine it.
 * Returns `failed` only when no candidate could ever be parsed.
 */
export async function composeAndRefine(
    brief: string,
    assets: readonly AssetDescriptor[],
    resolution: Resolution,
    collaborators: RefinementCollaborators,
    userConfig?: EngineConfigOverrides
): Promise<RefinementOutcome> {
    const config = resolveEngineConfig(userConfig);
    const logger = new RefinementLogger(config.verbose);
    const context: RefinementContext = { brief, assets, resolution };

    const canvas = canvasFromResolutionSafe(resolution);
    if (!canvas) return invalidResolution(resolution, logger);

    logger.info(`Composing ${canvas.width}x${canvas.height} layout with ${assets.length} asset(s)`);
    const run = new RefinementRun(context, canvas, collaborators, config, logger);
    const initial = await run.compose();
    if (!initial) {
        logger.logState(0, 'DONE', 'no parseable candidate');
        return {
            status: 'failed',
            reason: `No parseable candidate after ${config.maxComposeAttempts} attempt(s)`,
            violations: [],
            iterations: 0,
            trace: logger.getSummary()
        };
    }
    return run.refine(initial);
}

function canvasFromResolutionSafe(resolution: Resolution): Canvas | null {
    const parsed = CanvasSchema.safeParse({ width: resolution[0], height: resolution[1] });
    return parsed.success ? parsed.data : null;
}

function invalidResolution(resolution: Resolution, logger: RefinementLogger): RefinementOutcome {
    logger.logState(0, 'DONE', 'invalid resolution');
    return {
        status: 'failed',
        reason: `Invalid resolution ${resolution[0]}x${resolution[1]}`,
        violations: [],
        iterations: 0,
        trace: logger.getSummary()
    };
}
