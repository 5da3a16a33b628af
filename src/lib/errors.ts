/**
 * Error taxonomy for graph building, execution and checkpoint storage.
 */

export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphError';
    }
}

// ============================================================================
// Build time
// ============================================================================

export class DuplicateNodeError extends GraphError {
    constructor(public readonly nodeName: string) {
        super(`Node "${nodeName}" is already registered.`);
        this.name = 'DuplicateNodeError';
    }
}

export class UnknownNodeError extends GraphError {
    constructor(public readonly nodeName: string) {
        super(`Node "${nodeName}" is not registered.`);
        this.name = 'UnknownNodeError';
    }
}

/**
 * Thrown by `compile()` with every problem found in the graph, not just the first.
 */
export class GraphValidationError extends GraphError {
    constructor(public readonly violations: string[]) {
        super(`Invalid graph:\n${violations.map(v => `  - ${v}`).join('\n')}`);
        this.name = 'GraphValidationError';
    }
}

/** Validation error details */
export interface ValidationErrorItem {
    path: (string | number)[];
    message: string;
}

export class InvalidOptionsError extends GraphError {
    constructor(
        message: string,
        public readonly issues: ValidationErrorItem[],
    ) {
        super(message);
        this.name = 'InvalidOptionsError';
    }
}

// ============================================================================
// Run time
// ============================================================================

/**
 * A conditional router returned a label outside its declared destinations.
 */
export class RoutingError extends GraphError {
    constructor(
        public readonly node: string,
        public readonly label: string,
        public readonly allowed: string[],
    ) {
        super(
            `Router for node "${node}" returned "${label}", ` +
            `expected one of: ${allowed.map(a => `"${a}"`).join(', ')}.`
        );
        this.name = 'RoutingError';
    }
}

/**
 * The step budget of a single call ran out.
 *
 * The thread stays resumable from `checkpointId`, its last persisted checkpoint.
 */
export class RecursionLimitExceeded extends GraphError {
    constructor(
        public readonly limit: number,
        public readonly threadId: string,
        public readonly checkpointId: string,
    ) {
        super(`Recursion limit of ${limit} reached for thread "${threadId}" without hitting END.`);
        this.name = 'RecursionLimitExceeded';
    }
}

/**
 * A node (or caller) produced an update the state schema does not accept.
 */
export class InvalidUpdateError extends GraphError {
    constructor(
        message: string,
        /** Node that produced the update, if any */
        public readonly node?: string,
        /** Schema validation failures */
        public readonly issues: ValidationErrorItem[] = [],
    ) {
        super(message);
        this.name = 'InvalidUpdateError';
    }
}

export class EmptyThreadError extends GraphError {
    constructor(public readonly threadId: string) {
        super(`Thread "${threadId}" has no checkpoints and no input was given.`);
        this.name = 'EmptyThreadError';
    }
}

export class GraphAbortedError extends GraphError {
    constructor(public readonly threadId: string) {
        super(`Execution of thread "${threadId}" was aborted.`);
        this.name = 'GraphAbortedError';
    }
}

/**
 * Thrown by `config.interrupt()` to pause the running node.
 * The interpreter catches it and stores an interrupt checkpoint; nodes should let it propagate.
 */
export class GraphInterrupt extends GraphError {
    constructor(
        /** Value the node asked the caller to act on */
        public readonly payload: unknown,
        /** Answers already given to earlier `interrupt()` calls of the same node run */
        public readonly resumes: unknown[] = [],
    ) {
        super('Node interrupted, waiting for a resume value.');
        this.name = 'GraphInterrupt';
    }
}

/**
 * A resume value was given but the starting checkpoint has no pending interrupt.
 */
export class NoPendingInterruptError extends GraphError {
    constructor(
        public readonly threadId: string,
        public readonly checkpointId: string,
    ) {
        super(`Checkpoint "${checkpointId}" of thread "${threadId}" has no pending interrupt to resume.`);
        this.name = 'NoPendingInterruptError';
    }
}

// ============================================================================
// Store time
// ============================================================================

/**
 * A retried put disagreed with the payload already stored under the same id.
 */
export class CheckpointConflictError extends GraphError {
    constructor(
        public readonly threadId: string,
        public readonly checkpointId: string,
    ) {
        super(`Checkpoint "${checkpointId}" of thread "${threadId}" already exists with a different payload.`);
        this.name = 'CheckpointConflictError';
    }
}

export class CheckpointNotFoundError extends GraphError {
    constructor(
        public readonly threadId: string,
        public readonly checkpointId: string,
    ) {
        super(`Checkpoint "${checkpointId}" not found in thread "${threadId}".`);
        this.name = 'CheckpointNotFoundError';
    }
}
