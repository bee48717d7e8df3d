// Serializes async sections per key; different keys run concurrently.
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(() => fn());
        const tail: Promise<void> = result
            .then(() => undefined, () => undefined)
            .then(() => {
                if (this.tails.get(key) === tail) this.tails.delete(key);
            });
        this.tails.set(key, tail);
        return result;
    }

    get size(): number {
        return this.tails.size;
    }
}
