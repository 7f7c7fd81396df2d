import type { Violation } from "../types/canvasTypes";

// --- ERROR HANDLING TYPES ---

export type JsonErrorType = 'REPETITION' | 'TRUNCATION' | 'MALFORMED' | 'EMPTY';

export class JsonParseError extends Error {
  constructor(public type: JsonErrorType, public text: string, message: string) {
    super(message);
    this.name = 'JsonParseError';
  }
}

/** Parsed JSON that does not fit the canvas document schema. */
export class DocumentDecodeError extends Error {
  constructor(public violations: readonly Violation[]) {
    super(`Document failed schema decode with ${violations.length} structure violation(s)`);
    this.name = 'DocumentDecodeError';
  }
}

export type CollaboratorName = 'generateCandidate' | 'critique' | 'applyFeedback' | 'planAssets';

export class CollaboratorError extends Error {
  constructor(public collaborator: CollaboratorName, message: string, public originalError?: unknown) {
    super(`[${collaborator}] ${message}`);
    this.name = 'CollaboratorError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
