/**
 * Canonical JSON: object keys are written in sorted order so that equal values
 * always produce equal strings. Used for stored payloads and conflict checks.
 */
export function stableStringify(value: unknown): string {
    return JSON.stringify(canonicalize(value)) ?? 'null';
}

function canonicalize(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(item => canonicalize(item) ?? null);
    }

    if (value !== null && typeof value === 'object') {
        const toJSON: unknown = Reflect.get(value, 'toJSON');
        if (typeof toJSON === 'function') {
            return canonicalize(toJSON.call(value));
        }

        const result: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const entry: unknown = Reflect.get(value, key);
            if (entry !== undefined && typeof entry !== 'function') {
                result[key] = canonicalize(entry);
            }
        }
        return result;
    }

    return value;
}
