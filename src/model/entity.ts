/**
 * Decode percent-escapes in a URI, leaving malformed sequences untouched.
 *
 * `decodeURIComponent` rejects the whole string on a single bad escape
 * (e.g. "100%"), so runs of escapes are decoded one run at a time.
 */
export function decodePercent(uri: string): string {
    try {
        return decodeURIComponent(uri);
    } catch {
        return uri.replace(/(?:%[0-9a-fA-F]{2})+/g, (run) => {
            try {
                return decodeURIComponent(run);
            } catch {
                return run;
            }
        });
    }
}

/**
 * Normalized form of an entity URI: percent-decoded, then lowercased.
 */
export function normalizeEntityUri(uri: string): string {
    return decodePercent(uri).toLowerCase();
}

/**
 * A knowledge-graph resource, identified by its URI.
 *
 * Two entities are equal when their URIs decode to the same lowercase string,
 * so `http://x.org/Foo%20Bar` and `http://x.org/foo bar` name one resource.
 * Use `key` wherever an entity has to index a Map or Set.
 */
export class Entity {
    readonly uri: string;
    readonly key: string;

    constructor(uri: string) {
        this.uri = uri;
        this.key = normalizeEntityUri(uri);
        Object.freeze(this);
    }

    equals(other: unknown): boolean {
        return other instanceof Entity && other.key === this.key;
    }

    toString(): string {
        return this.uri;
    }

    toJSON(): string {
        return this.uri;
    }
}

/**
 * Drop later duplicates (by normalized key), keeping first-seen order.
 */
export function uniqueEntities(entities: Iterable<Entity>): Entity[] {
    const seen = new Set<string>();
    const unique: Entity[] = [];
    for (const entity of entities) {
        if (seen.has(entity.key)) continue;
        seen.add(entity.key);
        unique.push(entity);
    }
    return unique;
}
