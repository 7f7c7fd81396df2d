import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_REPAIR_OPTIONS, type RepairOptions } from "./repair/autoRepair";
import type { OverlapResolverOptions } from "./repair/overlapResolver";
import { DEFAULT_VALIDATOR_OPTIONS, type ValidatorOptions } from "./validators";

// =============================================================================
// ENGINE CONFIGURATION
// =============================================================================

export type EngineMode = 'fast' | 'balanced' | 'strict';

export interface EngineConfig {
    mode?: EngineMode;
    maxIterations: number;        // Hard cap on validate → feedback round trips
    maxComposeAttempts: number;   // Retries for an unparseable first candidate
    enableCritique: boolean;      // Ask the critic once a candidate validates
    maxConcurrentAssets: number;  // Fan-out pool ceiling
    verbose: boolean;             // Console output from RefinementLogger
    validator: ValidatorOptions;
    repair: RepairOptions;
}

export interface EngineConfigOverrides extends Partial<Omit<EngineConfig, 'validator' | 'repair'>> {
    validator?: Partial<ValidatorOptions>;
    repair?: Partial<Omit<RepairOptions, 'overlap'>> & { overlap?: Partial<OverlapResolverOptions> };
}

export const DEFAULT_ENGINE_CONFIG: Omit<EngineConfig, 'mode'> = {
    maxIterations: 5,
    maxComposeAttempts: 3,
    enableCritique: true,
    maxConcurrentAssets: 4,
    verbose: true,
    validator: DEFAULT_VALIDATOR_OPTIONS,
    repair: DEFAULT_REPAIR_OPTIONS
};

const MODE_PRESETS: Record<EngineMode, EngineConfigOverrides> = {
    fast: {
        enableCritique: false,       // Structural convergence only
        maxComposeAttempts: 1
    },
    balanced: {},
    strict: {
        validator: { minSpacing: 24, minTextGap: 40 },
        repair: { overlap: { minSpacing: 48, margin: 48 } }
    }
};

const withoutUndefined = <T extends object>(value: T): Partial<T> =>
    Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined)) as Partial<T>;

function merge(base: EngineConfig, overrides: EngineConfigOverrides): EngineConfig {
    const { validator = {}, repair = {}, ...flat } = overrides;
    const { overlap = {}, ...repairFlat } = repair;
    return {
        ...base,
        ...withoutUndefined(flat),
        validator: { ...base.validator, ...withoutUndefined(validator) },
        repair: {
            ...base.repair,
            ...withoutUndefined(repairFlat),
            overlap: { ...base.repair.overlap, ...withoutUndefined(overlap) }
        }
    };
}

/**
 * Resolve config with mode presets. The preset is applied first, individual
 * overrides on top; undefined values never clobber a default.
 */
export function resolveEngineConfig(userConfig?: EngineConfigOverrides): EngineConfig {
    const mode = userConfig?.mode ?? 'balanced';
    const preset = merge({ ...DEFAULT_ENGINE_CONFIG, mode }, MODE_PRESETS[mode]);
    const resolved = userConfig ? merge(preset, userConfig) : preset;

    if (!Number.isInteger(resolved.maxIterations) || resolved.maxIterations < 1) {
        throw new ConfigError(`maxIterations must be a positive integer, got ${resolved.maxIterations}`);
    }
    if (!Number.isInteger(resolved.maxConcurrentAssets) || resolved.maxConcurrentAssets < 1) {
        throw new ConfigError(`maxConcurrentAssets must be a positive integer, got ${resolved.maxConcurrentAssets}`);
    }
    return resolved;
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

const EnvSchema = z.object({
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    GEMINI_FALLBACK_MODEL: z.string().min(1).default('gemini-2.0-flash'),
    GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(180000)
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid environment configuration: ${details}`);
    }
    return parsed.data;
}
