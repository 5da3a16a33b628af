/**
 * Defaults and validation for compile-time and per-call options.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { InvalidOptionsError, type ValidationErrorItem } from '../lib/errors';
import { LOG_LEVELS, type LogLevel } from '../lib/logger';
import type { BatchOptions, RunOptions } from './types';

/** Node executions allowed per call when neither the call nor the graph sets a limit */
export const DEFAULT_RECURSION_LIMIT = 25;

const recursionLimitSchema = z.number().int().positive();

const runOptionsSchema = z.object({
    threadId: z.string().min(1).optional(),
    checkpointId: z.string().min(1).optional(),
    recursionLimit: recursionLimitSchema.optional(),
});

const logLevelSchema = z.enum(LOG_LEVELS);

const batchOptionsSchema = z.object({
    maxConcurrency: z.number().int().positive().optional(),
});

/** Run options after defaults are applied */
export interface ResolvedRunOptions {
    threadId: string;
    checkpointId?: string;
    recursionLimit: number;
    signal?: AbortSignal;
    resume?: unknown;
}

export function resolveRunOptions(options: RunOptions = {}, defaultRecursionLimit = DEFAULT_RECURSION_LIMIT): ResolvedRunOptions {
    const parsed = parseOrThrow(runOptionsSchema, options, 'Invalid run options');

    return {
        threadId: parsed.threadId ?? randomUUID(),
        checkpointId: parsed.checkpointId,
        recursionLimit: parsed.recursionLimit ?? defaultRecursionLimit,
        signal: options.signal,
        resume: options.resume,
    };
}

export function resolveRecursionLimit(value: number | undefined): number {
    return value === undefined
        ? DEFAULT_RECURSION_LIMIT
        : parseOrThrow(recursionLimitSchema, value, 'Invalid recursionLimit');
}

export function resolveLogLevel(value: LogLevel | undefined): LogLevel {
    return value === undefined ? 'info' : parseOrThrow(logLevelSchema, value, 'Invalid logLevel');
}

export function resolveBatchOptions(options: BatchOptions = {}): BatchOptions {
    return parseOrThrow(batchOptionsSchema, options, 'Invalid batch options');
}

/**
 * Map zod issues onto the library's error type.
 */
export function toValidationItems(error: z.ZodError): ValidationErrorItem[] {
    return error.issues.map(issue => ({ path: issue.path, message: issue.message }));
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = toValidationItems(result.error);
        throw new InvalidOptionsError(
            `${message}: ${issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`,
            issues,
        );
    }
    return result.data;
}
