/**
 * Runtime: external collaborators, routing and the execution controller.
 */

export type {
    LanguageModel,
    LanguageModelRequest,
    SkillInvoker,
    SkillContext,
    SkillResult,
} from './interfaces';
export { SkillRegistry } from './skill-registry';
export type { RegisteredSkill, SkillRegistryConfig, SkillConflictStrategy } from './skill-registry';
export { selectEdge, requirementsMet, spawnedBy, candidatesSignal } from './router';
export type { EdgeCheck, RouteDecision, RouterOptions } from './router';
export { ExecutionController } from './controller';
export type { ExecutionControllerOptions, RunResult } from './controller';
