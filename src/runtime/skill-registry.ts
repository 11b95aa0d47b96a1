/**
 * Skill registry: a {@link SkillInvoker} backed by registered handlers.
 *
 * @example
 * ```typescript
 * const skills = new SkillRegistry();
 * skills.register({
 *     name: 'search',
 *     description: 'Web search',
 *     execute: async ({ q }) => ({ hits: await search(String(q)) }),
 * });
 * ```
 */

import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { SkillInvocationError, errorMessage } from '../lib/errors';
import type { JsonObject } from '../lib/paths';
import type { SkillContext, SkillInvoker, SkillResult } from './interfaces';

export interface RegisteredSkill {
    name: string;
    description?: string;
    execute: (parameters: JsonObject, context: SkillContext) => Promise<unknown> | unknown;
}

/** Conflict resolution strategy */
export type SkillConflictStrategy = 'first-wins' | 'error';

export interface SkillRegistryConfig {
    /** How a second registration under the same name is handled (default: 'error') */
    conflictStrategy?: SkillConflictStrategy;
    logger?: Logger;
}

export class SkillRegistry implements SkillInvoker {
    private skills = new Map<string, RegisteredSkill>();
    private readonly conflictStrategy: SkillConflictStrategy;
    private readonly logger: Logger;

    constructor(config: SkillRegistryConfig = {}) {
        this.conflictStrategy = config.conflictStrategy ?? 'error';
        this.logger = config.logger ?? noopLogger;
    }

    /**
     * Register a skill. Returns false when an earlier registration wins.
     */
    register(skill: RegisteredSkill): boolean {
        if (this.skills.has(skill.name)) {
            if (this.conflictStrategy === 'error') {
                throw new SkillInvocationError(skill.name, `Skill "${skill.name}" is already registered`);
            }
            this.logger.debug('Skill registration ignored', { skill: skill.name });
            return false;
        }
        this.skills.set(skill.name, skill);
        return true;
    }

    has(name: string): boolean {
        return this.skills.has(name);
    }

    list(): string[] {
        return [...this.skills.keys()];
    }

    /**
     * Unknown skills and thrown errors come back as `isError` results,
     * never as exceptions.
     */
    async invoke(name: string, parameters: JsonObject, context: SkillContext): Promise<SkillResult> {
        const skill = this.skills.get(name);
        if (!skill) {
            return { result: `Unknown skill: ${name}`, isError: true };
        }
        try {
            return { result: await skill.execute(parameters, context), isError: false };
        } catch (error) {
            this.logger.warn('Skill failed', { skill: name, nodeId: context.nodeId, error: errorMessage(error) });
            return { result: errorMessage(error), isError: true };
        }
    }
}
