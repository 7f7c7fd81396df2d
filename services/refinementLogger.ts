import type { CollaboratorName } from "./errors";

// --- LOGGING ---

export type RefinementState = 'COMPOSING' | 'VALIDATING' | 'REPAIRING' | 'REQUESTING_FEEDBACK' | 'DONE';

export interface StateTransitionLog {
    timestamp: number;
    iteration: number;
    state: RefinementState;
    detail: string;
}

export interface CollaboratorCallLog {
    timestamp: number;
    iteration: number;
    collaborator: CollaboratorName;
    durationMs: number;
    ok: boolean;
    detail: string;
}

export interface RefinementTrace {
    transitions: StateTransitionLog[];
    calls: CollaboratorCallLog[];
    /** Collaborator failures recovered locally (throws, unparseable text). */
    recoveredFailures: number;
    totalDurationMs: number;
}

export class RefinementLogger {
    private transitions: StateTransitionLog[] = [];
    private calls: CollaboratorCallLog[] = [];
    private startTime: number = Date.now();

    constructor(private readonly verbose: boolean = true) {}

    logState(iteration: number, state: RefinementState, detail: string = ''): void {
        this.transitions.push({ timestamp: Date.now(), iteration, state, detail });
        if (this.verbose) {
            console.log(`[REFINE] Iteration ${iteration} State: ${state}${detail ? ` (${detail})` : ''}`);
        }
    }

    logCollaboratorCall(iteration: number, collaborator: CollaboratorName, durationMs: number, ok: boolean, detail: string = ''): void {
        this.calls.push({ timestamp: Date.now(), iteration, collaborator, durationMs, ok, detail });
        if (!this.verbose) return;
        if (ok) {
            console.log(`[COLLABORATOR] ${collaborator} (${durationMs}ms)${detail ? `: ${detail.substring(0, 100)}` : ''}`);
        } else {
            console.warn(`[COLLABORATOR] ${collaborator} FAILED (${durationMs}ms): ${detail.substring(0, 200)}`);
        }
    }

    info(message: string): void {
        if (this.verbose) console.log(`[REFINE] ${message}`);
    }

    warn(message: string): void {
        if (this.verbose) console.warn(`[REFINE] ${message}`);
    }

    getSummary(): RefinementTrace {
        return {
            transitions: [...this.transitions],
            calls: [...this.calls],
            recoveredFailures: this.calls.filter(c => !c.ok).length,
            totalDurationMs: Date.now() - this.startTime
        };
    }
}
