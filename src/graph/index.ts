/**
 * Graph definition: document schema, loader and compiled arena.
 */

export * from './guard';
export type {
    GraphDocument,
    NodeDocument,
    EdgeDocument,
    RelationshipDocument,
    NodeType,
    EdgeKind,
    OutputSchema,
    DredgeSpec,
    WriteRule,
    TaskSpecDocument,
    ParallelDirective,
    MemoryDirective,
    GateDirective,
    DecisionDirective,
    DecisionRuleDocument,
    MergeDirective,
    ToolDirective,
    TerminalDirective,
    TraverseAction,
    FactKind,
    ConflictPolicy,
    MergePolicy,
    FailurePolicy,
} from './schema';
export {
    graphDocumentSchema,
    nodeSchema,
    edgeSchema,
    outputSchemaSchema,
    jsonValueSchema,
} from './schema';
export type {
    CompiledGraph,
    CompiledNode,
    CompiledEdge,
    CompiledCriterion,
    CompiledDecisionRule,
    DecisionTest,
    TerminalOutcome,
} from './types';
export { DEFAULT_EDGE_PRIORITY, DEFAULT_EDGE_WEIGHT, WILDCARD } from './types';
export { loadGraph, loadGraphFile, compileGraph, normalizeDocument, parseGraphSource } from './loader';
export { toDocument, dumpGraph, saveGraphFile } from './serialize';
export type { GraphFormat } from './serialize';
