/**
 * State model: per-key merge policies ("channels") and the merge function
 * that folds a node's partial update into the accumulated state.
 */

import { InvalidUpdateError } from '../lib/errors';

export type MergePolicy = 'replace' | 'accumulate' | 'reduce';

/** Update accepted for a key holding `V`: array keys also take one element */
export type UpdateValue<V> = V extends readonly (infer T)[] ? V | T : V;

/**
 * Merge policy of a single state key.
 */
export interface Channel<V, U = V> {
    readonly policy: MergePolicy;
    merge(current: V | undefined, update: U): V;
}

/** Channel declaration for every key of `S` */
export type Channels<S> = { [K in keyof S]-?: Channel<S[K], UpdateValue<S[K]>> };

/** Type-erased channel table used by the runtime */
export type ChannelMap = ReadonlyMap<string, Channel<unknown, unknown>>;

export type StateRecord = Record<string, unknown>;

// ============================================================================
// Channel factories
// ============================================================================

/**
 * New value overwrites the old one.
 */
export function replace<V>(): Channel<V> {
    return {
        policy: 'replace',
        merge: (_current, update) => update,
    };
}

/**
 * Appends to an array. A single element is wrapped; a missing key starts empty.
 *
 * An update that is itself an array is always treated as a list of elements.
 */
export function accumulate<T>(): Channel<T[], T | T[]> {
    return {
        policy: 'accumulate',
        merge: (current, update) => [...(current ?? []), ...toList(update)],
    };
}

/**
 * Combines old and new value with a custom binary reducer, e.g. a running sum.
 */
export function reducer<V, U = V>(fn: (current: V | undefined, update: U) => V): Channel<V, U> {
    return {
        policy: 'reduce',
        merge: fn,
    };
}

function toList<T>(update: T | T[]): T[] {
    return Array.isArray(update) ? update : [update];
}

// ============================================================================
// Merge
// ============================================================================

export function toChannelMap<S>(channels: Channels<S>): ChannelMap {
    return new Map(Object.entries(channels));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Fold `update` into `current` using each key's channel.
 *
 * Keys missing from `update`, or set to `undefined`, carry over unchanged.
 * `current` is never mutated.
 *
 * @param node - Name of the node that produced the update, for error messages
 * @throws InvalidUpdateError - Update is not a plain object or names an undeclared key
 */
export function mergeState(
    channels: ChannelMap,
    current: object,
    update: unknown,
    node?: string,
): StateRecord {
    const source = node ? `Node "${node}"` : 'Update';

    if (!isPlainObject(update)) {
        throw new InvalidUpdateError(`${source} must return a plain object, got ${describe(update)}.`, node);
    }

    const unknownKeys = Object.keys(update).filter(key => !channels.has(key));
    if (unknownKeys.length > 0) {
        throw new InvalidUpdateError(
            `${source} wrote undeclared state keys: ${unknownKeys.join(', ')}.`,
            node,
        );
    }

    const next: StateRecord = Object.fromEntries(Object.entries(current));

    for (const [key, value] of Object.entries(update)) {
        const channel = channels.get(key);
        if (value === undefined || !channel) {
            continue;
        }
        next[key] = channel.merge(next[key], value);
    }

    return next;
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'an array';
    return typeof value;
}

// ============================================================================
// Copy-on-write helpers
// ============================================================================

/**
 * Freeze a value and everything reachable from it, in place.
 */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const key of Object.keys(value)) {
            deepFreeze(Reflect.get(value, key));
        }
    }
    return value;
}

/**
 * Detached, frozen copy of a state for handing to node code.
 */
export function frozenCopy<T>(value: T): T {
    return deepFreeze(structuredClone(value));
}
