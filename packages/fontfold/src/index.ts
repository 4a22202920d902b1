// fontfold/src/index.ts
// Public API — font family build orchestration and merge resolution.

// Config model
export type {
    Repository,
    UnitRange,
    ExclusionRule,
    Exclusion,
    Source,
    Folder,
    Style,
    Family,
    FetchSettings,
    MergeSettings,
    BuildSettings,
    BuildConfig,
} from './lib/model.js';
export { DEFAULT_FIELD_POLICIES, findRepository, findFolder, findStyle, allFamilies } from './lib/model.js';

// Config loader
export type { ConfigFile, ConfigOverrides, EnvSettings, ParseOptions } from './lib/config.js';
export {
    DEFAULT_CONFIG_FILE,
    DEFAULT_MAX_UNITS,
    ConfigFileSchema,
    readEnv,
    validateConfig,
    parseConfig,
    loadConfig,
    parseFilter,
} from './lib/config.js';

// Exclusion rules
export type { BlockTable } from './lib/exclusion.js';
export {
    MAX_CODEPOINT,
    builtinBlocks,
    NO_EXCLUSION,
    parseUnitRange,
    parseControlFile,
    normalizeRanges,
    loadBlockTable,
    unassignedRanges,
    compileExclusion,
} from './lib/exclusion.js';

// Errors
export type { BuildErrorKind, BuildErrorOptions, SourceIdentity } from './lib/errors.js';
export {
    BuildError,
    ConfigError,
    FetchError,
    InstantiationError,
    MergeError,
    BaseBuildError,
    DeliveryError,
    CancelledError,
    InternalError,
    isBuildError,
    toBuildError,
    describeSource,
} from './lib/errors.js';

// Logging
export type { LogLevel, LogContext } from './lib/logger.js';
export { Logger, createLogger, isLogLevel } from './lib/logger.js';

// Artifact engine
export type { ArtifactEngine, FontArtifact, UnitData, AxisRange } from './lib/artifact.js';
export type { GlyphsDocument } from './lib/json-engine.js';
export { JsonGlyphEngine, GLYPHS_FORMAT, createArtifact, resolveAxisValue } from './lib/json-engine.js';

// Content cache
export type { CacheKey, CacheStats, CacheOptions } from './lib/cache.js';
export { ContentCache } from './lib/cache.js';

// Fetchers
export type { Fetcher, HttpFetcherOptions, RetryOptions } from './lib/fetcher.js';
export {
    UNVERSIONED,
    HttpFetcher,
    LocalFetcher,
    RepositoryFetcher,
    createDefaultFetcher,
    isTransientStatus,
    withRetry,
} from './lib/fetcher.js';

// Instantiation
export type { PreparedSource, SourcePreparerDeps } from './lib/instantiator.js';
export { SourcePreparer, instanceStage, subsetStage } from './lib/instantiator.js';

// Merge engine
export type { Contribution, ContributionReport, MergeOptions, MergeResult } from './lib/merge.js';
export { mergeTarget } from './lib/merge.js';

// Build graph
export type { BuildTarget, BuildPlan, PlanFilters, ContributionRef, TargetKind } from './lib/graph.js';
export { plan, targetId, orderedSources, topologicalOrder } from './lib/graph.js';

// Scheduler
export type { Step, StepResult, RunOptions } from './lib/scheduler.js';
export { runSteps, dependencyLevels } from './lib/scheduler.js';

// Naming / delivery
export type { FamilyNames } from './lib/naming.js';
export { familyNames, canonicalFileName, stripAxisTags } from './lib/naming.js';
export type { Deliverable, DeliveryReport, DeliveryOptions } from './lib/delivery.js';
export { deliver } from './lib/delivery.js';

// Pipeline / reporting
export type { BuildDeps, BuildOptions, BuildOutcome, TargetOutput } from './lib/pipeline.js';
export { build, TARGET_REPOSITORY } from './lib/pipeline.js';
export type { BuildSummary, TargetFailure } from './lib/report.js';
export { summarize, formatSummary, writeErrorReport } from './lib/report.js';

// CLI
export type { CliIo } from './cli.js';
export { runCli, EXIT_OK, EXIT_TARGET_FAILED, EXIT_USAGE } from './cli.js';
