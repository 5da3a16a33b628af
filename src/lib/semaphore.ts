/**
 * Concurrency primitives shared by batch execution and checkpoint stores.
 */

export interface Semaphore {
    acquire(): Promise<void>;
    release(): void;
}

export function createSemaphore(max: number): Semaphore {
    if (!Number.isInteger(max) || max < 1) {
        throw new RangeError(`Semaphore size must be a positive integer, got ${max}`);
    }

    let current = 0;
    const queue: Array<() => void> = [];

    return {
        async acquire() {
            if (current < max) {
                current++;
                return;
            }
            // The releasing caller hands its slot over, so `current` stays put.
            await new Promise<void>(resolve => queue.push(resolve));
        },
        release() {
            const next = queue.shift();
            if (next) {
                next();
                return;
            }
            current--;
        },
    };
}

/**
 * Mutual exclusion per key. Callers sharing a key run one at a time in arrival order;
 * different keys never wait on each other.
 */
export interface KeyedMutex {
    runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export function createKeyedMutex(): KeyedMutex {
    const locks = new Map<string, { semaphore: Semaphore; holders: number }>();

    return {
        async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
            let entry = locks.get(key);
            if (!entry) {
                entry = { semaphore: createSemaphore(1), holders: 0 };
                locks.set(key, entry);
            }
            entry.holders++;

            await entry.semaphore.acquire();
            try {
                return await fn();
            } finally {
                entry.semaphore.release();
                entry.holders--;
                if (entry.holders === 0) {
                    locks.delete(key);
                }
            }
        },
    };
}
