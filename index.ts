export * from "./types/canvasTypes";
export { validateCanvasDocument, isValidColor, DEFAULT_VALIDATOR_OPTIONS, type ValidatorOptions } from "./services/validators";
export { DEFAULT_OVERLAP_POLICY, isOverlapAllowed, type OverlapPolicy, type OverlapAllowRule, type LayerKind } from "./services/overlapPolicy";
export {
    repairCanvasDocument,
    repairDocument,
    normalizeColorStops,
    DEFAULT_REPAIR_OPTIONS,
    type RepairOptions,
    type RepairResult
} from "./services/repair/autoRepair";
export {
    resolveTextOverlaps,
    DEFAULT_OVERLAP_RESOLVER_OPTIONS,
    type OverlapResolverOptions,
    type OverlapResolution
} from "./services/repair/overlapResolver";
export {
    composeAndRefine,
    refineDocument,
    parseCritique,
    summarizeViolations,
    DETERMINISTIC_CATEGORIES,
    deterministicViolations,
    type RefinementCollaborators,
    type RefinementContext,
    type RefinementOutcome
} from "./services/RefinementDirector";
export {
    runAssetFanOut,
    planAssetTasks,
    generateAssets,
    isToolSuccess,
    extractToolResult,
    Semaphore,
    AssetPlanSchema,
    type AssetPlan,
    type AssetTask,
    type AssetTool,
    type AssetToolRegistry,
    type AssetFanOutResult
} from "./services/assetFanOut";
export {
    cleanAndParseJson,
    decodeCanvasDocument,
    parseCanvasDocumentText,
    serializeCanvasDocument
} from "./services/documentCodec";
export {
    createGeminiCollaborators,
    createGeminiCollaboratorsFromEnv,
    createGeminiTextGenerator,
    TokenTracker,
    type TextGenerator,
    type GeminiCollaborators
} from "./services/geminiCollaborators";
export { resolveEngineConfig, loadEnvConfig, DEFAULT_ENGINE_CONFIG, type EngineConfig, type EngineConfigOverrides, type EngineMode } from "./services/config";
export { JsonParseError, DocumentDecodeError, CollaboratorError, ConfigError } from "./services/errors";
export { RefinementLogger, type RefinementTrace } from "./services/refinementLogger";
