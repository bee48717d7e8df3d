import { KeyedMutex } from '../../src/utils/keyed-mutex';
import { sleep } from '../helpers/poll';

describe('KeyedMutex', () => {
    it('runs sections for one key in call order', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        await Promise.all([
            mutex.run('run-1', async () => {
                await sleep(20);
                order.push('first');
            }),
            mutex.run('run-1', async () => {
                order.push('second');
            }),
        ]);

        expect(order).toEqual(['first', 'second']);
    });

    it('lets different keys overlap', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        await Promise.all([
            mutex.run('run-1', async () => {
                await sleep(20);
                order.push('slow');
            }),
            mutex.run('run-2', async () => {
                order.push('fast');
            }),
        ]);

        expect(order).toEqual(['fast', 'slow']);
    });

    it('keeps going after a section throws', async () => {
        const mutex = new KeyedMutex();

        const failed = mutex.run('run-1', async () => {
            throw new Error('boom');
        });
        const next = mutex.run('run-1', async () => 'recovered');

        await expect(failed).rejects.toThrow('boom');
        await expect(next).resolves.toBe('recovered');
    });

    it('forgets keys once idle', async () => {
        const mutex = new KeyedMutex();
        await mutex.run('run-1', async () => undefined);
        await sleep(0);

        expect(mutex.size).toBe(0);
    });
});
