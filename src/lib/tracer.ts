/**
 * Tracer abstraction for observability.
 *
 * The interpreter opens one `graph.node` span per step, covering the node
 * body, the merge, routing and the checkpoint write. Any backend can be
 * plugged in by implementing `Tracer`.
 */

import type { Logger } from './logger';
import { consoleLogger } from './logger';

export type SpanAttributeValue = string | number | boolean;
export type SpanAttributes = Record<string, SpanAttributeValue>;

/** Span interface */
export interface Span {
    setAttribute(key: string, value: SpanAttributeValue): void;
    setAttributes(attributes: SpanAttributes): void;
    /** Record an error; marks the span as failed */
    recordException(error: Error): void;
    addEvent(name: string, attributes?: SpanAttributes): void;
    end(): void;
}

/** Tracer configuration */
export interface TracerConfig {
    /** Keys to mask in attributes, matched case-insensitively as substrings */
    sensitiveKeys?: string[];
}

/** Tracer interface */
export interface Tracer {
    startSpan(name: string, attributes?: SpanAttributes): Span;
    /** Run `fn` inside a span that ends when `fn` settles */
    withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T>;
}

export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    sensitiveKeys: ['password', 'apikey', 'token', 'secret', 'authorization'],
};

/**
 * Mask sensitive attributes. Objects become a JSON preview of at most 100 chars.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): SpanAttributes {
    const sensitiveKeys = (config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys).map(k => k.toLowerCase());
    const result: SpanAttributes = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();

        if (sensitiveKeys.some(sk => lowerKey.includes(sk))) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (value !== null && typeof value === 'object') {
            result[key] = JSON.stringify(value).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

/**
 * Shared `withSpan` body: errors are recorded and rethrown, the span always ends.
 */
async function runInSpan<T>(span: Span, fn: (span: Span) => Promise<T> | T): Promise<T> {
    try {
        return await fn(span);
    } catch (error) {
        span.recordException(error instanceof Error ? error : new Error(String(error)));
        throw error;
    } finally {
        span.end();
    }
}

// ============================================================================
// Implementations
// ============================================================================

const noopSpan: Span = {
    setAttribute: () => { },
    setAttributes: () => { },
    recordException: () => { },
    addEvent: () => { },
    end: () => { },
};

/**
 * No-op tracer (default when no tracing configured).
 */
export class NoopTracer implements Tracer {
    startSpan(): Span {
        return noopSpan;
    }

    async withSpan<T>(_name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
        return fn(noopSpan);
    }
}

/**
 * Writes span lifecycle to a logger: start, attributes and end at debug,
 * exceptions at error.
 */
export class ConsoleTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(
        private readonly logger: Logger = consoleLogger,
        config: TracerConfig = {},
    ) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes?: SpanAttributes): Span {
        const startTime = Date.now();
        const redact = (attrs: SpanAttributes) => redactAttributes(attrs, this.config);

        this.logger.debug(`span start: ${name}`, attributes ? redact(attributes) : undefined);

        return {
            setAttribute: (key, value) => this.logger.debug(`span attrs: ${name}`, redact({ [key]: value })),
            setAttributes: (attrs) => this.logger.debug(`span attrs: ${name}`, redact(attrs)),
            recordException: (error) => this.logger.error(`span error: ${name}`, { error: error.message }),
            addEvent: (event, attrs) => this.logger.debug(`span event: ${name}.${event}`, attrs ? redact(attrs) : undefined),
            end: () => this.logger.debug(`span end: ${name}`, { durationMs: Date.now() - startTime }),
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        return runInSpan(this.startSpan(name, attributes), fn);
    }
}

/** Span as kept by `MemoryTracer` once it has ended */
export interface FinishedSpan {
    name: string;
    attributes: SpanAttributes;
    events: Array<{ name: string; attributes: SpanAttributes }>;
    status: 'ok' | 'error';
    error?: string;
    durationMs: number;
}

/**
 * Keeps ended spans in memory, redacted. Useful in tests and for ad-hoc
 * inspection of a run.
 */
export class MemoryTracer implements Tracer {
    readonly spans: FinishedSpan[] = [];
    private readonly config: Required<TracerConfig>;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes: SpanAttributes = {}): Span {
        const startTime = Date.now();
        const record: Omit<FinishedSpan, 'durationMs'> = {
            name,
            attributes: redactAttributes(attributes, this.config),
            events: [],
            status: 'ok',
        };
        let ended = false;

        return {
            setAttribute: (key, value) => {
                Object.assign(record.attributes, redactAttributes({ [key]: value }, this.config));
            },
            setAttributes: (attrs) => {
                Object.assign(record.attributes, redactAttributes(attrs, this.config));
            },
            recordException: (error) => {
                record.status = 'error';
                record.error = error.message;
            },
            addEvent: (event, attrs = {}) => {
                record.events.push({ name: event, attributes: redactAttributes(attrs, this.config) });
            },
            end: () => {
                if (ended) return;
                ended = true;
                this.spans.push({ ...record, durationMs: Date.now() - startTime });
            },
        };
    }

    async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, attributes?: SpanAttributes): Promise<T> {
        return runInSpan(this.startSpan(name, attributes), fn);
    }

    reset(): void {
        this.spans.length = 0;
    }
}
