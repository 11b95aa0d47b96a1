export class SluiceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SluiceError';
    }
}

/** A single problem found while validating a graph definition */
export interface ValidationIssue {
    /** Location inside the document, e.g. ['edges', 3, 'guard'] */
    path: (string | number)[];
    message: string;
}

/**
 * Thrown when a graph definition cannot be compiled.
 * All issues found in one pass are collected before throwing.
 */
export class GraphValidationError extends SluiceError {
    issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        const first = issues[0];
        const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
        const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
        super(`Invalid graph${where}: ${first ? first.message : 'unknown issue'}${more}`);
        this.name = 'GraphValidationError';
        this.issues = issues;
    }
}

export class ConfigError extends SluiceError {
    issues: ValidationIssue[];

    constructor(issues: ValidationIssue[]) {
        super(`Invalid configuration: ${issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

export class GuardSyntaxError extends SluiceError {
    constructor(
        public readonly source: string,
        public readonly position: number,
        message: string,
    ) {
        super(`${message} at position ${position} in guard "${source}"`);
        this.name = 'GuardSyntaxError';
    }
}

/** Validation error details */
export interface OutputErrorItem {
    path: (string | number)[];
    message: string;
}

/**
 * Thrown when a model response still fails its node's output schema
 * after every allowed attempt. Escalates the run.
 */
export class OutputSchemaError extends SluiceError {
    /** Node that produced the output */
    nodeId: string;
    /** Number of attempts made */
    attempts: number;
    /** Validation errors from the last attempt */
    validationErrors: OutputErrorItem[];

    constructor(nodeId: string, attempts: number, validationErrors: OutputErrorItem[]) {
        super(`Output of node "${nodeId}" failed schema validation after ${attempts} attempt(s)`);
        this.name = 'OutputSchemaError';
        this.nodeId = nodeId;
        this.attempts = attempts;
        this.validationErrors = validationErrors;
    }
}

/**
 * Raised by a task whose failure policy is `propagate`.
 * Escalates the run.
 */
export class ParallelTaskFailure extends SluiceError {
    constructor(
        public readonly taskId: string,
        public readonly reason: string,
    ) {
        super(`Parallel task "${taskId}" failed: ${reason}`);
        this.name = 'ParallelTaskFailure';
    }
}

export class RetryBoundExceededError extends SluiceError {
    constructor(
        public readonly edgeId: string,
        public readonly retries: number,
        public readonly scope: 'edge' | 'global',
    ) {
        super(scope === 'edge'
            ? `Retry edge "${edgeId}" exhausted its bound of ${retries}`
            : `Global retry budget of ${retries} exhausted at edge "${edgeId}"`);
        this.name = 'RetryBoundExceededError';
    }
}

export class MaxStepsExceededError extends SluiceError {
    maxSteps: number;

    constructor(maxSteps: number) {
        super(`Run exceeded maximum steps: ${maxSteps}`);
        this.name = 'MaxStepsExceededError';
        this.maxSteps = maxSteps;
    }
}

/**
 * Reported (not thrown) when a memory write under the `reject`
 * policy contradicts an existing fact.
 */
export class MemoryConflictError extends SluiceError {
    constructor(
        public readonly factText: string,
        public readonly conflictsWith: string[],
    ) {
        super(`Fact "${factText}" conflicts with ${conflictsWith.join(', ')}`);
        this.name = 'MemoryConflictError';
    }
}

export class SkillInvocationError extends SluiceError {
    constructor(
        public readonly skill: string,
        message: string,
    ) {
        super(message);
        this.name = 'SkillInvocationError';
    }
}

/** Write-once artifact already exists */
export class ArtifactConflictError extends SluiceError {
    constructor(public readonly key: string) {
        super(`Artifact already written: ${key}`);
        this.name = 'ArtifactConflictError';
    }
}

export class ProposalNotFoundError extends SluiceError {
    constructor(public readonly proposalId: string) {
        super(`Proposal not found: ${proposalId}`);
        this.name = 'ProposalNotFoundError';
    }
}

export class RunNotFoundError extends SluiceError {
    constructor(public readonly runId: string) {
        super(`Run not found: ${runId}`);
        this.name = 'RunNotFoundError';
    }
}

/** Convert an unknown thrown value into a message string */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Redaction
// ============================================================================

/**
 * Sensitive key patterns for redaction.
 * Matches keys that CONTAIN these patterns (case insensitive).
 */
const SENSITIVE_KEY_PATTERNS = [
    'password', 'secret', 'token', 'apikey', 'api_key', 'auth', 'credential',
    'bearer', 'cookie', 'session', 'private',
];

function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return SENSITIVE_KEY_PATTERNS.some(pattern => lowerKey.includes(pattern));
}

/**
 * Redact potentially sensitive values before they reach logs or escalations.
 * Recurses through nested objects and arrays.
 */
export function redactSecrets(value: unknown): unknown {
    if (value === null || value === undefined) {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(item => redactSecrets(item));
    }

    if (typeof value === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
            result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactSecrets(val);
        }
        return result;
    }

    return value;
}
