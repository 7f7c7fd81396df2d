/**
 * Gemini Collaborators - model-backed implementations of the refinement
 * collaborator contracts.
 *
 * The transport is hidden behind `TextGenerator` so the director and the
 * tests never depend on the SDK. Transient failures (429, 503, timeouts)
 * are retried with exponential backoff, then retried once on the fallback
 * model; anything else surfaces as a CollaboratorError.
 */

import { GoogleGenAI } from "@google/genai";
import { z } from "zod";
import type { AssetDescriptor, CanvasDocument, Resolution } from "../types/canvasTypes";
import { AssetPlanSchema, type AssetPlan } from "./assetFanOut";
import { loadEnvConfig } from "./config";
import { cleanAndParseJson, serializeCanvasDocument } from "./documentCodec";
import { CollaboratorError, ConfigError, errorMessage, type CollaboratorName } from "./errors";
import { PROMPTS } from "./promptRegistry";
import type { RefinementCollaborators } from "./RefinementDirector";

// =============================================================================
// TRANSPORT
// =============================================================================

export interface TextGenerationRequest {
    model: string;
    prompt: string;
    systemInstruction?: string;
    temperature?: number;
    json?: boolean;
}

export interface TextGenerationResponse {
    text: string;
    inputTokens: number;
    outputTokens: number;
}

export interface TextGenerator {
    generate(request: TextGenerationRequest): Promise<TextGenerationResponse>;
}

export function createGeminiTextGenerator(apiKey: string): TextGenerator {
    const client = new GoogleGenAI({ apiKey });
    return {
        async generate(request) {
            const response = await client.models.generateContent({
                model: request.model,
                contents: request.prompt,
                config: {
                    systemInstruction: request.systemInstruction,
                    temperature: request.temperature,
                    responseMimeType: request.json ? 'application/json' : undefined
                }
            });
            return {
                text: response.text ?? '',
                inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
                outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0
            };
        }
    };
}

// =============================================================================
// COST TRACKING
// =============================================================================

// USD per 1M tokens (approximation)
const TOKEN_PRICING: Record<string, { input: number; output: number }> = {
    'gemini-2.5-flash': { input: 0.30, output: 2.50 },
    'gemini-2.0-flash': { input: 0.10, output: 0.40 },
    'gemini-2.0-flash-lite': { input: 0.075, output: 0.30 }
};

export interface ModelUsage {
    calls: number;
    inputTokens: number;
    outputTokens: number;
}

export class TokenTracker {
    totalCost = 0;
    private usage = new Map<string, ModelUsage>();

    addTokenUsage(model: string, inputTokens: number, outputTokens: number): void {
        const rates = TOKEN_PRICING[model] ?? { input: 0, output: 0 };
        this.totalCost += (inputTokens / 1_000_000 * rates.input) + (outputTokens / 1_000_000 * rates.output);

        const entry = this.usage.get(model) ?? { calls: 0, inputTokens: 0, outputTokens: 0 };
        this.usage.set(model, {
            calls: entry.calls + 1,
            inputTokens: entry.inputTokens + inputTokens,
            outputTokens: entry.outputTokens + outputTokens
        });
    }

    getUsage(model: string): ModelUsage | undefined {
        return this.usage.get(model);
    }

    getSummary(): { totalCost: number; models: Record<string, ModelUsage> } {
        return { totalCost: this.totalCost, models: Object.fromEntries(this.usage) };
    }
}

// =============================================================================
// RETRY / FALLBACK
// =============================================================================

export interface ModelCallOptions {
    model: string;
    fallbackModel?: string;
    timeoutMs: number;
    /** Retries on the same model before falling back. */
    maxRetries: number;
    /** First backoff delay; doubles per retry. */
    baseDelayMs: number;
    tracker?: TokenTracker;
}

export function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    const message = error.message;
    const isQuota = status === 429 || message.includes('429') || message.includes('quota') || message.includes('RESOURCE_EXHAUSTED');
    const isOverloaded = status === 503 || message.includes('503') || message.includes('Overloaded');
    const isTimeout = status === 499 || message.includes('Timeout') || message.includes('timeout') || message.includes('cancelled');
    return isQuota || isOverloaded || isTimeout;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, model: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timeout: ${model} took too long to respond.`)), timeoutMs);
    });
    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

export async function callModel(
    generator: TextGenerator,
    collaborator: CollaboratorName,
    request: Omit<TextGenerationRequest, 'model'>,
    options: ModelCallOptions
): Promise<string> {
    const models = options.fallbackModel && options.fallbackModel !== options.model
        ? [options.model, options.fallbackModel]
        : [options.model];
    let lastError: unknown;

    for (const model of models) {
        for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
            try {
                const response = await withTimeout(generator.generate({ ...request, model }), options.timeoutMs, model);
                options.tracker?.addTokenUsage(model, response.inputTokens, response.outputTokens);
                return response.text;
            } catch (err) {
                lastError = err;
                if (!isTransientError(err)) {
                    console.error(`[GEMINI] ${collaborator} failed on ${model}: ${errorMessage(err)}`);
                    throw new CollaboratorError(collaborator, `AI call failed: ${errorMessage(err)}`, err);
                }
                if (attempt < options.maxRetries) {
                    const delay = Math.pow(2, attempt) * options.baseDelayMs;
                    console.warn(`[GEMINI] ${model} failed (${errorMessage(err)}). Retrying in ${delay}ms (attempt ${attempt + 1})...`);
                    await sleep(delay);
                }
            }
        }
        if (model !== models[models.length - 1]) {
            console.warn(`[GEMINI] Exhausted retries for ${model}. Falling back to ${options.fallbackModel}.`);
        }
    }

    throw new CollaboratorError(collaborator, `All models failed: ${errorMessage(lastError)}`, lastError);
}

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface GeminiCollaboratorOptions {
    generator: TextGenerator;
    model: string;
    fallbackModel?: string;
    timeoutMs?: number;
    maxRetries?: number;
    baseDelayMs?: number;
    tracker?: TokenTracker;
    /** Omit the critic entirely; refinement then converges on validity alone. */
    withCritic?: boolean;
}

export interface GeminiCollaborators extends RefinementCollaborators {
    planAssets(brief: string, resolution: Resolution, hasProductImage: boolean): Promise<AssetPlan[]>;
    tracker: TokenTracker;
}

export function createGeminiCollaborators(options: GeminiCollaboratorOptions): GeminiCollaborators {
    const tracker = options.tracker ?? new TokenTracker();
    const callOptions: ModelCallOptions = {
        model: options.model,
        fallbackModel: options.fallbackModel,
        timeoutMs: options.timeoutMs ?? 180000,
        maxRetries: options.maxRetries ?? 2,
        baseDelayMs: options.baseDelayMs ?? 1000,
        tracker
    };
    const call = (collaborator: CollaboratorName, prompt: string, role: string, json: boolean) =>
        callModel(options.generator, collaborator, { prompt, systemInstruction: `You are a ${role}.`, json }, callOptions);

    const collaborators: GeminiCollaborators = {
        tracker,
        generateCandidate: (brief: string, assets: readonly AssetDescriptor[], resolution: Resolution) =>
            call('generateCandidate', PROMPTS.COMPOSER.TASK(brief, assets, resolution), PROMPTS.COMPOSER.ROLE, true),
        applyFeedback: (document: CanvasDocument, feedback: string, brief: string, assets: readonly AssetDescriptor[], resolution: Resolution) =>
            call('applyFeedback', PROMPTS.FEEDBACK_APPLIER.TASK(serializeCanvasDocument(document), feedback, brief, assets, resolution), PROMPTS.FEEDBACK_APPLIER.ROLE, true),
        async planAssets(brief, resolution, hasProductImage) {
            const text = await call('planAssets', PROMPTS.ASSET_PLANNER.TASK(brief, resolution, hasProductImage), PROMPTS.ASSET_PLANNER.ROLE, true);
            return z.array(AssetPlanSchema).parse(cleanAndParseJson(text));
        }
    };

    if (options.withCritic !== false) {
        collaborators.critique = (document: CanvasDocument, brief: string, resolution: Resolution) =>
            call('critique', PROMPTS.CRITIC.TASK(serializeCanvasDocument(document), brief, resolution), PROMPTS.CRITIC.ROLE, false);
    }
    return collaborators;
}

export function createGeminiCollaboratorsFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<Omit<GeminiCollaboratorOptions, 'generator'>> = {}
): GeminiCollaborators {
    const config = loadEnvConfig(env);
    if (!config.GEMINI_API_KEY) {
        throw new ConfigError('GEMINI_API_KEY is required to build Gemini collaborators. Add it to your .env file.');
    }
    return createGeminiCollaborators({
        model: config.GEMINI_MODEL,
        fallbackModel: config.GEMINI_FALLBACK_MODEL,
        timeoutMs: config.GEMINI_TIMEOUT_MS,
        ...overrides,
        generator: createGeminiTextGenerator(config.GEMINI_API_KEY)
    });
}
