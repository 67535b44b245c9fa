/**
 * Async read/write lock. Readers share; a writer is exclusive. Waiting
 * writers block new readers so a refresh cannot starve.
 */
export class RwLock {
    private readers = 0;
    private writing = false;
    private queue: Array<{ write: boolean; wake: () => void }> = [];

    async read<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire(false);
        try {
            return await fn();
        } finally {
            this.readers--;
            this.drain();
        }
    }

    async write<T>(fn: () => Promise<T> | T): Promise<T> {
        await this.acquire(true);
        try {
            return await fn();
        } finally {
            this.writing = false;
            this.drain();
        }
    }

    private acquire(write: boolean): Promise<void> {
        if (this.canEnter(write) && this.queue.length === 0) {
            this.enter(write);
            return Promise.resolve();
        }
        return new Promise(resolve => {
            this.queue.push({ write, wake: resolve });
        });
    }

    private canEnter(write: boolean): boolean {
        if (this.writing) return false;
        return write ? this.readers === 0 : true;
    }

    private enter(write: boolean): void {
        if (write) {
            this.writing = true;
        } else {
            this.readers++;
        }
    }

    private drain(): void {
        while (this.queue.length > 0) {
            const next = this.queue[0];
            if (!this.canEnter(next.write)) return;
            this.queue.shift();
            this.enter(next.write);
            next.wake();
            if (next.write) return;
        }
    }
}
