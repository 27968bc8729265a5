/** Simple async mutex providing coarse-grained critical sections. */
export class AsyncMutex {
    private tail: Promise<void> = Promise.resolve();

    async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => { };
        const wait = new Promise<void>((resolve) => {
            release = resolve;
        });
        this.tail = previous.then(() => wait);

        await previous;
        try {
            return await operation();
        } finally {
            release();
        }
    }
}
