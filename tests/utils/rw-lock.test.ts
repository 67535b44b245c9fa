import { describe, expect, it } from 'vitest';
import { RwLock } from '../../src/utils/rw-lock.js';

function deferred() {
    let release: () => void = () => {};
    const promise = new Promise<void>(resolve => {
        release = resolve;
    });
    return { promise, release };
}

describe('RwLock', () => {
    it('lets readers overlap', async () => {
        const lock = new RwLock();
        const gate = deferred();
        let active = 0;
        let peak = 0;

        const reader = () => lock.read(async () => {
            active++;
            peak = Math.max(peak, active);
            await gate.promise;
            active--;
        });

        const both = Promise.all([reader(), reader()]);
        await Promise.resolve();
        gate.release();
        await both;

        expect(peak).toBe(2);
    });

    it('runs a writer alone and before later readers', async () => {
        const lock = new RwLock();
        const gate = deferred();
        const events: string[] = [];

        const first = lock.read(async () => {
            events.push('read-1 start');
            await gate.promise;
            events.push('read-1 end');
        });
        const writer = lock.write(() => {
            events.push('write');
        });
        const second = lock.read(() => {
            events.push('read-2');
        });

        await Promise.resolve();
        gate.release();
        await Promise.all([first, writer, second]);

        expect(events).toEqual(['read-1 start', 'read-1 end', 'write', 'read-2']);
    });

    it('releases the lock when the task throws', async () => {
        const lock = new RwLock();
        await expect(lock.write(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(lock.read(() => 'free')).resolves.toBe('free');
    });
});
