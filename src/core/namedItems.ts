export interface Named {
    readonly name: string;
}

/**
 * Immutable, insertion-ordered collection whose entries are unique by name.
 * When the source holds the same name twice, the first entry is kept.
 */
export class NamedItems<T extends Named> implements Iterable<T> {
    private readonly _items: ReadonlyMap<string, T>;

    constructor(items: Iterable<T> = []) {
        const map = new Map<string, T>();
        for (const item of items) {
            if (!map.has(item.name)) {
                map.set(item.name, item);
            }
        }
        this._items = map;
        Object.freeze(this);
    }

    get size(): number {
        return this._items.size;
    }

    has(name: string): boolean {
        return this._items.has(name);
    }

    get(name: string): T | undefined {
        return this._items.get(name);
    }

    names(): string[] {
        return [...this._items.keys()];
    }

    toArray(): T[] {
        return [...this._items.values()];
    }

    [Symbol.iterator](): Iterator<T> {
        return this._items.values();
    }
}
