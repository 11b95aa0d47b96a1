/**
 * Tracer abstraction for run observability.
 * Runs open a `sluice.run` span, each executed node a `sluice.node` span
 * and each spawned task a `sluice.task` span.
 *
 * Default: recordPrompts=true (development friendly)
 * Production: Use PRODUCTION_TRACER_CONFIG
 */

import type { Logger } from './logger';

/** Span interface */
export interface Span {
    /** Set a string attribute */
    setAttribute(key: string, value: string | number | boolean): void;
    /** Set multiple attributes */
    setAttributes(attributes: Record<string, string | number | boolean>): void;
    /** Record an error */
    recordException(error: Error): void;
    /** Add an event */
    addEvent(name: string, attributes?: Record<string, string | number | boolean>): void;
    /** End the span */
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Record prompt content (default: true) */
    recordPrompts?: boolean;
    /** Record model outputs (default: true) */
    recordOutputs?: boolean;
    /** Record skill parameters (default: true) */
    recordSkillParams?: boolean;
    /** Maximum content length before truncation (default: 1000) */
    maxContentLength?: number;
    /** Sensitive keys to mask (default: ['password', 'apiKey', 'token', 'secret']) */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    /** Start a new span */
    startSpan(name: string, attributes?: Record<string, string | number | boolean>): Span;
    /** Execute a function within a span */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
    /** Get the tracer config */
    getConfig(): TracerConfig;
}

/** Default configuration (development friendly) */
export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    recordPrompts: true,
    recordOutputs: true,
    recordSkillParams: true,
    maxContentLength: 1000,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

/** Production configuration (safety first) */
export const PRODUCTION_TRACER_CONFIG: TracerConfig = {
    recordPrompts: false,
    recordOutputs: false,
    recordSkillParams: false,
    maxContentLength: 200,
};

/**
 * Redact sensitive information from content.
 * Strategy: truncate first, then regex mask.
 */
export function redactContent(
    content: string,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const maxLen = config.maxContentLength ?? DEFAULT_TRACER_CONFIG.maxContentLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;

    // Step 1: Truncate
    let result = content;
    if (result.length > maxLen) {
        result = result.substring(0, maxLen) + `... [truncated ${content.length - maxLen} chars]`;
    }

    // Step 2: Mask sensitive keys
    for (const key of sensitiveKeys) {
        const regex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, 'gi');
        result = result.replace(regex, '$1"[REDACTED]"');
    }

    return result;
}

/**
 * Redact attributes based on config.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): Record<string, string | number | boolean> {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: Record<string, string | number | boolean> = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (typeof value === 'object') {
            result[key] = JSON.stringify(value).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

/**
 * No-op span (for NoopTracer).
 */
class NoopSpan implements Span {
    setAttribute(_key: string, _value: string | number | boolean): void { }
    setAttributes(_attributes: Record<string, string | number | boolean>): void { }
    recordException(_error: Error): void { }
    addEvent(_name: string, _attributes?: Record<string, string | number | boolean>): void { }
    end(): void { }
}

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    private readonly config: TracerConfig;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: Record<string, string | number | boolean>): Span {
        return new NoopSpan();
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/**
 * Tracer that reports spans through a {@link Logger} at debug level.
 * Useful during development when no OpenTelemetry pipeline is wired.
 */
export class LoggerTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(
        private readonly logger: Logger,
        config: TracerConfig = {},
    ) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: Record<string, string | number | boolean>): Span {
        const startTime = Date.now();
        const logger = this.logger;
        const config = this.config;
        logger.debug(`span start ${name}`, attributes ? redactAttributes(attributes, config) : undefined);

        return {
            setAttribute: (key, value) => {
                logger.debug(`span attr ${name}.${key}`, redactAttributes({ [key]: value }, config));
            },
            setAttributes: attrs => {
                logger.debug(`span attrs ${name}`, redactAttributes(attrs, config));
            },
            recordException: error => {
                logger.warn(`span error ${name}: ${error.message}`, { error: error.name });
            },
            addEvent: (eventName, eventAttrs) => {
                logger.debug(`span event ${name}.${eventName}`, eventAttrs ? redactAttributes(eventAttrs, config) : undefined);
            },
            end: () => {
                logger.debug(`span end ${name}`, { durationMs: Date.now() - startTime });
            },
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        const span = this.startSpan(name);
        try {
            return await fn(span);
        } catch (error) {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            throw error;
        } finally {
            span.end();
        }
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/** Global tracer instance */
let globalTracer: Tracer = new NoopTracer();

/**
 * Set the global tracer.
 */
export function setGlobalTracer(tracer: Tracer): void {
    globalTracer = tracer;
}

/**
 * Get the global tracer.
 */
export function getGlobalTracer(): Tracer {
    return globalTracer;
}

/**
 * Record content on a span only when the tracer's config allows it.
 */
export function recordContent(
    span: Span,
    tracer: Tracer,
    kind: 'prompt' | 'output' | 'params',
    content: unknown,
): void {
    const config = { ...DEFAULT_TRACER_CONFIG, ...tracer.getConfig() };
    const allowed = kind === 'prompt'
        ? config.recordPrompts
        : kind === 'output' ? config.recordOutputs : config.recordSkillParams;
    if (!allowed) return;
    const text = typeof content === 'string' ? content : JSON.stringify(content) ?? '';
    span.setAttribute(`sluice.${kind}`, redactContent(text, config));
}
