/**
 * Serialises async work per key. Tasks for the same key run one after another in
 * submission order; tasks for different keys never wait on each other.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    get pendingKeys(): number {
        return this.tails.size;
    }
}
