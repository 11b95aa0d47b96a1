// Engine
export { SluiceEngine } from './engine';
export type {
    SluiceEngineOptions,
    RunOptions,
    RunStatusReport,
    LearnResult,
    ApprovalResult,
    EvolveResult,
    EvolutionStats,
} from './engine';

// Configuration
export {
    resolveEngineConfig,
    createSequentialIds,
    DEFAULT_ENGINE_CONFIG,
} from './lib/config';
export type { EngineConfig, ResolvedEngineConfig, Clock, IdGenerator } from './lib/config';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, createScopedLogger } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    LoggerTracer,
    setGlobalTracer,
    getGlobalTracer,
    redactContent,
    redactAttributes,
    recordContent,
    DEFAULT_TRACER_CONFIG,
    PRODUCTION_TRACER_CONFIG,
} from './lib/tracer';
export type { Tracer, Span, TracerConfig } from './lib/tracer';
export { OTelTracer } from './lib/otel-tracer';
export type { OTelTracerProviderLike, OTelTracerLike, OTelSpanLike } from './lib/otel-tracer';

// Error types
export {
    SluiceError,
    GraphValidationError,
    ConfigError,
    GuardSyntaxError,
    OutputSchemaError,
    ParallelTaskFailure,
    RetryBoundExceededError,
    MaxStepsExceededError,
    MemoryConflictError,
    SkillInvocationError,
    ArtifactConflictError,
    ProposalNotFoundError,
    RunNotFoundError,
    errorMessage,
    redactSecrets,
} from './lib/errors';
export type { ValidationIssue, OutputErrorItem } from './lib/errors';

// JSON paths
export { getPath, setPath, deepClone, deepEqual } from './lib/paths';
export type { JsonValue, JsonObject, PathSegment } from './lib/paths';

// Graph definition
export * from './graph';

// Run state
export * from './state';

// Memory
export * from './memory';

// Node executors
export * from './nodes';

// Parallel tasks
export * from './parallel';

// Runtime
export * from './runtime';

// Learning loop
export * from './learning';

// Artifacts
export * from './artifacts';
