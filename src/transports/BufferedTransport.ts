import { TimeoutError } from '../errors';
import type { Transport } from './types';

type Take<T> = () => T | null;

/**
 * Receive-buffer plumbing shared by every transport: incoming chunks are
 * appended with {@link receive}, reads wait on the buffer with a deadline.
 */
export abstract class BufferedTransport implements Transport {
    abstract readonly name: string;

    private buffer: Buffer = Buffer.alloc(0);
    private waiter: (() => void) | null = null;

    abstract open(): Promise<void>;
    abstract close(): Promise<void>;
    abstract isOpen(): boolean;
    abstract write(data: Buffer): Promise<void>;

    read(terminator: Buffer, timeoutMs: number): Promise<Buffer> {
        if (terminator.length === 0) return Promise.reject(new RangeError('Empty terminator'));
        return this.waitFor(() => {
            const index = this.buffer.indexOf(terminator);
            if (index < 0) return null;
            const line = this.buffer.subarray(0, index);
            this.buffer = this.buffer.subarray(index + terminator.length);
            return Buffer.from(line);
        }, timeoutMs, `terminator ${JSON.stringify(terminator.toString('latin1'))}`);
    }

    readBytes(count: number, timeoutMs: number): Promise<Buffer> {
        return this.waitFor(() => {
            if (this.buffer.length < count) return null;
            const chunk = this.buffer.subarray(0, count);
            this.buffer = this.buffer.subarray(count);
            return Buffer.from(chunk);
        }, timeoutMs, `${count} byte(s)`);
    }

    available(): number {
        return this.buffer.length;
    }

    discardInput(): Buffer {
        const dropped = this.buffer;
        this.buffer = Buffer.alloc(0);
        return dropped;
    }

    protected receive(data: Buffer): void {
        this.buffer = Buffer.concat([this.buffer, data]);
        this.waiter?.();
    }

    private waitFor<T>(take: Take<T>, timeoutMs: number, what: string): Promise<T> {
        if (this.waiter) {
            return Promise.reject(new Error(`${this.name}: a read is already pending`));
        }
        const immediate = take();
        if (immediate !== null) return Promise.resolve(immediate);

        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.waiter = null;
                reject(new TimeoutError(what, timeoutMs));
            }, timeoutMs);
            this.waiter = () => {
                const value = take();
                if (value === null) return;
                clearTimeout(timer);
                this.waiter = null;
                resolve(value);
            };
        });
    }
}
