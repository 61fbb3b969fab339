import { describe, expect, it } from 'vitest';
import { OperationCancelledError } from '../errors';
import { OperationQueue, type Outcome } from '../queue';

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

describe('OperationQueue', () => {
    it('runs operations one at a time in submission order', async () => {
        const queue = new OperationQueue('test');
        const events: string[] = [];
        const gate = deferred<void>();

        const first = queue.enqueue('first', async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
            return 1;
        });
        const second = queue.enqueue('second', async () => {
            events.push('second:start');
            return 2;
        });

        expect(first.state).toBe('running');
        expect(second.state).toBe('queued');
        expect(queue.size).toBe(2);
        gate.resolve();

        await expect(first.result).resolves.toBe(1);
        await expect(second.result).resolves.toBe(2);
        expect(events).toEqual(['first:start', 'first:end', 'second:start']);
        expect(queue.size).toBe(0);
    });

    it('keeps going after a failure', async () => {
        const queue = new OperationQueue('test');
        const failing = queue.enqueue('failing', async () => {
            throw new Error('no answer');
        });
        const next = queue.enqueue('next', async () => 'ok');

        await expect(failing.result).rejects.toThrow('no answer');
        await expect(next.result).resolves.toBe('ok');
        expect(failing.state).toBe('rejected');
        expect(next.state).toBe('fulfilled');
    });

    it('withdraws queued operations without running them', async () => {
        const queue = new OperationQueue('test');
        const gate = deferred<void>();
        let ran = false;

        const running = queue.enqueue('running', () => gate.promise);
        const queued = queue.enqueue('queued', async () => {
            ran = true;
        });

        expect(running.cancel()).toBe(false);
        expect(queued.cancel()).toBe(true);
        expect(queued.cancel()).toBe(false);
        expect(queued.state).toBe('cancelled');
        await expect(queued.result).rejects.toBeInstanceOf(OperationCancelledError);

        gate.resolve();
        await queue.idle();
        expect(ran).toBe(false);
        expect(running.state).toBe('fulfilled');
    });

    it('notifies listeners once, including late ones', async () => {
        const queue = new OperationQueue('test');
        const outcomes: Array<Outcome<number>> = [];
        const operation = queue.enqueue('value', async () => 42);
        operation.onSettled(outcome => outcomes.push(outcome));

        await queue.idle();
        operation.onSettled(outcome => outcomes.push(outcome));
        expect(outcomes).toEqual([
            { status: 'fulfilled', value: 42 },
            { status: 'fulfilled', value: 42 }
        ]);
    });

    it('is idle right away when empty', async () => {
        const queue = new OperationQueue('test');
        await expect(queue.idle()).resolves.toBeUndefined();
        expect(queue.busy).toBe(false);
    });

    it('keeps running when a settle listener throws', async () => {
        const queue = new OperationQueue('test');
        const first = queue.enqueue('first', async () => 1);
        first.onSettled(() => {
            throw new Error('listener failed');
        });
        const seen: Array<Outcome<number>> = [];
        first.onSettled(outcome => seen.push(outcome));
        const second = queue.enqueue('second', async () => 2);

        await expect(first.result).resolves.toBe(1);
        await expect(second.result).resolves.toBe(2);
        expect(seen).toEqual([{ status: 'fulfilled', value: 1 }]);
        expect(queue.size).toBe(0);
    });
});
