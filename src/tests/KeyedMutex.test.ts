import { KeyedMutex } from '../core/utils/KeyedMutex';

describe('KeyedMutex', () => {
    it('should run work for one key in order', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        let releaseFirst: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            releaseFirst = resolve;
        });

        const first = mutex.run('a', async () => {
            order.push('first:start');
            await gate;
            order.push('first:end');
        });
        const second = mutex.run('a', async () => {
            order.push('second');
        });

        await Promise.resolve();
        expect(order).toEqual(['first:start']);
        releaseFirst();
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not block other keys', async () => {
        const mutex = new KeyedMutex();
        let releaseA: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            releaseA = resolve;
        });

        const a = mutex.run('a', () => gate);
        await expect(mutex.run('b', async () => 'b done')).resolves.toBe('b done');

        releaseA();
        await a;
    });

    it('should release the key when work fails', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.run('a', async () => {
            throw new Error('write failed');
        })).rejects.toThrow('write failed');
        await expect(mutex.run('a', async () => 42)).resolves.toBe(42);
    });
});
