import { z } from "zod";
import { AssetDescriptorSchema, type AssetDescriptor, type Resolution } from "../types/canvasTypes";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig, type EngineConfigOverrides } from "./config";
import { ConfigError, errorMessage } from "./errors";

// =============================================================================
// ASSET FAN-OUT
// Independent asset jobs run on a bounded pool. A failed job never cancels
// its siblings; results arrive in completion order.
// =============================================================================

export const DEFAULT_MAX_CONCURRENT_ASSETS = DEFAULT_ENGINE_CONFIG.maxConcurrentAssets;

/** Counting semaphore; a released permit passes straight to the oldest waiter. */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    acquire(): Promise<void> {
        if (this.available > 0) {
            this.available--;
            return Promise.resolve();
        }
        return new Promise<void>(resolve => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
        } else {
            this.available++;
        }
    }

    async run<T>(job: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await job();
        } finally {
            this.release();
        }
    }
}

export interface AssetTaskResult {
    descriptor: AssetDescriptor;
    /** Font results feed `fontUrl` instead of the asset list. */
    isFont: boolean;
}

export interface AssetTask {
    index: number;
    type: string;
    run(): Promise<AssetTaskResult>;
}

export interface AssetFailure {
    index: number;
    type: string;
    error: string;
}

export interface AssetFanOutResult {
    assets: AssetDescriptor[];
    failures: AssetFailure[];
    fontUrl?: string;
}

export interface FanOutOptions {
    maxConcurrent?: number;
}

export async function runAssetFanOut(
    tasks: readonly AssetTask[],
    options: FanOutOptions = {}
): Promise<AssetFanOutResult> {
    const result: AssetFanOutResult = { assets: [], failures: [] };
    if (tasks.length === 0) return result;

    const limit = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT_ASSETS;
    if (!Number.isInteger(limit) || limit < 1) {
        throw new ConfigError(`maxConcurrent must be a positive integer, got ${limit}`);
    }
    const poolSize = Math.min(tasks.length, limit);
    const semaphore = new Semaphore(poolSize);
    console.log(`[FANOUT] Generating ${tasks.length} asset(s), max ${poolSize} concurrent`);

    await Promise.all(tasks.map(task => semaphore.run(async () => {
        try {
            const { descriptor, isFont } = await task.run();
            if (isFont) {
                result.fontUrl = descriptor.url;
            } else {
                result.assets.push(descriptor);
            }
        } catch (err) {
            const error = errorMessage(err);
            console.warn(`[FANOUT] Asset ${task.index} (${task.type}) failed: ${error}`);
            result.failures.push({ index: task.index, type: task.type, error });
        }
    })));

    console.log(`[FANOUT] Generated ${result.assets.length}/${tasks.length} asset(s), ${result.failures.length} failure(s)`);
    return result;
}

// =============================================================================
// ASSET PLANS → TASKS
// =============================================================================

export const ASSET_TOOL_NAMES = [
    'text_to_image_generator',
    'svg_generator',
    'generate_image_tool',
    'background_replacer',
    'select_best_font_url'
] as const;

export type AssetToolName = typeof ASSET_TOOL_NAMES[number];

export const AssetPlanSchema = z.object({
    type: z.string(),
    tool: z.string(),
    prompt: z.string().default(''),
    description: z.string().default(''),
    dimensions: z.object({
        width: z.number().positive(),
        height: z.number().positive()
    }).optional()
});

export type AssetPlan = z.infer<typeof AssetPlanSchema>;

export interface AssetToolRequest {
    prompt: string;
    width: number;
    height: number;
    designBrief: string;
    /** Only set for background_replacer. */
    imageUrl?: string;
}

/** Tools answer with a string (URL, markup or "Error: ...") or a keyed object. */
export type AssetToolOutput = string | { error?: string; link?: string; url?: string };

export type AssetTool = (request: AssetToolRequest) => Promise<AssetToolOutput>;

export type AssetToolRegistry = Partial<Record<AssetToolName, AssetTool>>;

export interface AssetPlanContext {
    resolution: Resolution;
    designBrief: string;
    productImageUrl?: string;
}

export function isToolSuccess(output: AssetToolOutput): boolean {
    if (typeof output === 'string') {
        return output.length > 0 && !output.startsWith('Error');
    }
    return !output.error;
}

export function extractToolResult(output: AssetToolOutput): string {
    if (typeof output === 'string') return output;
    if (output.error) return output.error;
    return output.link ?? output.url ?? JSON.stringify(output);
}

const isAssetToolName = (name: string): name is AssetToolName =>
    ASSET_TOOL_NAMES.some(tool => tool === name);

// svg_generator canvas when a plan gives no dimensions
const DEFAULT_SVG_SIZE = 200;

/**
 * Turns planner output into runnable tasks. Plans that cannot run (unknown
 * tool, missing product image) become tasks that fail, so they surface in
 * `failures` like any other.
 */
export function planAssetTasks(
    plans: readonly AssetPlan[],
    tools: AssetToolRegistry,
    context: AssetPlanContext
): AssetTask[] {
    return plans.map((plan, idx) => {
        const index = idx + 1;
        const fail = (message: string): AssetTask => ({
            index,
            type: plan.type,
            run: () => Promise.reject(new Error(message))
        });

        if (!isAssetToolName(plan.tool)) return fail(`Unknown tool: ${plan.tool}`);
        const tool = tools[plan.tool];
        if (!tool) return fail(`Tool not registered: ${plan.tool}`);

        const toolName = plan.tool;
        if (toolName === 'background_replacer' && !context.productImageUrl) {
            return fail('Background replacement requires a product image URL');
        }

        const fallbackSize = toolName === 'svg_generator'
            ? { width: DEFAULT_SVG_SIZE, height: DEFAULT_SVG_SIZE }
            : { width: context.resolution[0], height: context.resolution[1] };
        const { width, height } = plan.dimensions ?? fallbackSize;

        return {
            index,
            type: plan.type,
            run: async (): Promise<AssetTaskResult> => {
                const output = await tool({
                    prompt: plan.prompt,
                    width,
                    height,
                    designBrief: context.designBrief,
                    imageUrl: toolName === 'background_replacer' ? context.productImageUrl : undefined
                });
                const value = extractToolResult(output);
                if (!isToolSuccess(output)) {
                    throw new Error(value || `${toolName} returned an empty result`);
                }

                if (toolName === 'select_best_font_url') {
                    return { descriptor: AssetDescriptorSchema.parse({ type: 'font', url: value, description: plan.description }), isFont: true };
                }
                const payload = toolName === 'svg_generator' ? { content: value } : { url: value };
                return {
                    descriptor: AssetDescriptorSchema.parse({ type: plan.type, description: plan.description, ...payload }),
                    isFont: false
                };
            }
        };
    });
}

/**
 * Validates raw planner output and runs it through the fan-out, with the pool
 * ceiling taken from the engine config (`maxConcurrentAssets`).
 */
export async function generateAssets(
    rawPlans: unknown,
    tools: AssetToolRegistry,
    context: AssetPlanContext,
    userConfig?: EngineConfigOverrides
): Promise<AssetFanOutResult> {
    const { maxConcurrentAssets } = resolveEngineConfig(userConfig);
    const plans = z.array(AssetPlanSchema).parse(rawPlans);
    return runAssetFanOut(planAssetTasks(plans, tools, context), { maxConcurrent: maxConcurrentAssets });
}
