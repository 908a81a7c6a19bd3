/**
 * Serialises async work per key (an absolute file path) inside one process.
 * Other processes writing the same shared folder are not covered.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>>;

    constructor() {
        this.tails = new Map();
    }

    async run<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await work();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }
}
