export class LruCache<V> {
    private map = new Map<string, { value: V; ts: number }>();

    constructor(readonly capacity = 500, readonly ttlMs = 30 * 60 * 1000, private readonly now: () => number = Date.now) { }

    get(k: string): V | undefined {
        const e = this.map.get(k);
        if (!e) { return undefined; }
        if (this.now() - e.ts > this.ttlMs) {
            this.map.delete(k);
            return undefined;
        }
        // refresh LRU position
        this.map.delete(k);
        this.map.set(k, e);
        return e.value;
    }

    set(k: string, v: V) {
        this.map.delete(k);
        if (this.map.size >= this.capacity) {
            const first = this.map.keys().next().value;
            if (first !== undefined) {
                this.map.delete(first);
            }
        }
        this.map.set(k, { value: v, ts: this.now() });
    }
}
