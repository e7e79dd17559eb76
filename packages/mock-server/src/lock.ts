import { noop } from 'lodash';

export type Release = () => void;

/**
 * One lock per key. Holders of the same key run one after another, in the order they asked;
 * holders of different keys do not wait on each other.
 */
export class KeyedMutex {
    #tails = new Map<string, Promise<void>>();

    /**
     * wait for the lock on key
     * @returns a function that releases the lock. Calling it more than once does nothing.
     */
    async acquire(key: string): Promise<Release> {
        const previous = this.#tails.get(key) ?? Promise.resolve();
        let unlock: () => void = noop;
        const held = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        const tail = previous.then(() => held);
        this.#tails.set(key, tail);
        await previous;
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            unlock();
            if (this.#tails.get(key) === tail) {
                this.#tails.delete(key);
            }
        };
    }

    /**
     * run work while holding the lock on key
     */
    async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
        const release = await this.acquire(key);
        try {
            return await work();
        } finally {
            release();
        }
    }

    isLocked(key: string): boolean {
        return this.#tails.has(key);
    }
}
