/**
 * In-process stand-in for an ioredis client.
 * Implements only the commands RedisCheckpointStore uses.
 */
import type { RedisClient } from '../../src/graph/redis-checkpointer';

export class FakeRedis implements RedisClient {
    readonly strings = new Map<string, string>();
    readonly lists = new Map<string, string[]>();
    readonly expiries = new Map<string, number>();
    readonly commands: string[] = [];

    async set(key: string, value: string, ...args: Array<string | number>): Promise<'OK' | null> {
        this.commands.push(['SET', key, ...args].join(' '));
        if (args.includes('NX') && this.strings.has(key)) {
            return null;
        }
        this.strings.set(key, value);
        const exIndex = args.indexOf('EX');
        if (exIndex >= 0) {
            this.expiries.set(key, Number(args[exIndex + 1]));
        }
        return 'OK';
    }

    async get(key: string): Promise<string | null> {
        return this.strings.get(key) ?? null;
    }

    async del(key: string | string[]): Promise<number> {
        const keys = Array.isArray(key) ? key : [key];
        this.commands.push(['DEL', ...keys].join(' '));
        let removed = 0;
        for (const k of keys) {
            const hadString = this.strings.delete(k);
            const hadList = this.lists.delete(k);
            if (hadString || hadList) removed++;
        }
        return removed;
    }

    async rpush(key: string, ...values: string[]): Promise<number> {
        const list = this.lists.get(key) ?? [];
        list.push(...values);
        this.lists.set(key, list);
        return list.length;
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        const list = this.lists.get(key) ?? [];
        const from = start < 0 ? Math.max(list.length + start, 0) : start;
        const to = stop < 0 ? list.length + stop : stop;
        return list.slice(from, to + 1);
    }

    async expire(key: string, seconds: number): Promise<number> {
        this.expiries.set(key, seconds);
        return this.lists.has(key) || this.strings.has(key) ? 1 : 0;
    }

    /** Drop a key as if its TTL ran out */
    evict(key: string): void {
        this.strings.delete(key);
    }
}
