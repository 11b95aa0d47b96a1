/**
 * OpenTelemetry adapter for the run tracer.
 *
 * Structurally typed against `@opentelemetry/api`, so the package is only
 * needed by callers who pass a real provider.
 */

import type { Span, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, redactAttributes } from './tracer';

const INSTRUMENTATION_NAME = 'sluice';
const INSTRUMENTATION_VERSION = '0.1.0';

/** `SpanStatusCode.ERROR` in @opentelemetry/api */
const STATUS_ERROR = 2;

type Attributes = Record<string, string | number | boolean>;

/** The slice of an OTel span the adapter drives */
export interface OTelSpanLike {
    setAttribute(key: string, value: string | number | boolean): unknown;
    setAttributes(attributes: Attributes): unknown;
    addEvent(name: string, attributes?: Attributes): unknown;
    recordException(exception: Error): void;
    setStatus(status: { code: number; message?: string }): unknown;
    end(): void;
}

export interface OTelTracerLike {
    startSpan(name: string, options?: { attributes?: Attributes }): OTelSpanLike;
}

export interface OTelTracerProviderLike {
    getTracer(name: string, version?: string): OTelTracerLike;
}

class OTelSpan implements Span {
    constructor(
        private readonly span: OTelSpanLike,
        private readonly config: Required<TracerConfig>,
    ) { }

    setAttribute(key: string, value: string | number | boolean): void {
        this.span.setAttributes(redactAttributes({ [key]: value }, this.config));
    }

    setAttributes(attributes: Attributes): void {
        this.span.setAttributes(redactAttributes(attributes, this.config));
    }

    recordException(error: Error): void {
        this.span.recordException(error);
        this.span.setStatus({ code: STATUS_ERROR, message: error.message });
    }

    addEvent(name: string, attributes?: Attributes): void {
        this.span.addEvent(name, attributes ? redactAttributes(attributes, this.config) : undefined);
    }

    end(): void {
        this.span.end();
    }
}

/**
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer, PRODUCTION_TRACER_CONFIG, setGlobalTracer } from 'sluice';
 *
 * setGlobalTracer(new OTelTracer(trace.getTracerProvider(), PRODUCTION_TRACER_CONFIG));
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly tracer: OTelTracerLike;
    private readonly config: Required<TracerConfig>;

    constructor(provider: OTelTracerProviderLike, config: TracerConfig = {}) {
        this.tracer = provider.getTracer(INSTRUMENTATION_NAME, INSTRUMENTATION_VERSION);
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: Attributes): Span {
        const span = this.tracer.startSpan(name, {
            attributes: attributes ? redactAttributes(attributes, this.config) : undefined,
        });
        return new OTelSpan(span, this.config);
    }

    /** Errors mark the span failed and are rethrown */
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
