/**
 * Node executors, one per node type.
 */

import type { NodeExecutorMap } from './types';
import { executeInit, executeReason } from './model-nodes';
import { executeTool } from './tool-node';
import { executeMerge } from './merge-node';
import { executeMemoryWrite } from './memory-node';
import { executeGate, executeDecision } from './logic-nodes';
import { executeTerminal } from './terminal-node';

export const DEFAULT_EXECUTORS: Readonly<NodeExecutorMap> = Object.freeze({
    'init': executeInit,
    'reason': executeReason,
    'tool': executeTool,
    'merge': executeMerge,
    'memory-write': executeMemoryWrite,
    'gate': executeGate,
    'decision': executeDecision,
    'terminal': executeTerminal,
});

export type { NodeContext, NodeResult, NodeExecutor, NodeExecutorMap } from './types';
export {
    executeInit,
    executeReason,
    executeTool,
    executeMerge,
    executeMemoryWrite,
    executeGate,
    executeDecision,
    executeTerminal,
};
export { renderTemplate, renderValue, resolveTemplatePath } from './template';
export type { TemplateScope } from './template';
export { compileOutputSchema, validateOutput, callModel } from './output';
export type { OutputValidation } from './output';
export { applyWriteRules, applyTransform, writeOutput } from './writes';
export { spawnTasks, taskIdFor } from './spawn';
export { dredge, toFactInputs } from './memory-node';
export { selectRule } from './logic-nodes';
