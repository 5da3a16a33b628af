// Graph runtime
export * from './graph';

// Logging
export {
    consoleLogger,
    noopLogger,
    createConsoleLogger,
    createFilteredLogger,
    withLogContext,
    LOG_LEVELS,
} from './lib/logger';
export type { Logger, LogLevel, LogMeta } from './lib/logger';

// Tracing
export { NoopTracer, ConsoleTracer, MemoryTracer, redactAttributes, DEFAULT_TRACER_CONFIG } from './lib/tracer';
export type { FinishedSpan, Span, SpanAttributes, SpanAttributeValue, Tracer, TracerConfig } from './lib/tracer';

// Error types
export {
    GraphError,
    DuplicateNodeError,
    UnknownNodeError,
    GraphValidationError,
    InvalidOptionsError,
    RoutingError,
    RecursionLimitExceeded,
    InvalidUpdateError,
    EmptyThreadError,
    GraphAbortedError,
    GraphInterrupt,
    NoPendingInterruptError,
    CheckpointConflictError,
    CheckpointNotFoundError,
} from './lib/errors';
export type { ValidationErrorItem } from './lib/errors';

// Utilities
export { createSemaphore, createKeyedMutex } from './lib/semaphore';
export type { Semaphore, KeyedMutex } from './lib/semaphore';
export { stableStringify } from './lib/stable-json';
